import fs from "node:fs";
import { InvalidArgumentError } from "commander";
import { generateQuery, parseQueryJson, type GenerateQueryOptions, type VideoQuery } from "../domain/query";
import { parseApiDate } from "../utils/dates";

export interface QueryFlags {
  queryFileJson?: string;
  region?: string[];
  includeAnyHashtags?: string;
  excludeAnyHashtags?: string;
  includeAllHashtags?: string;
  excludeAllHashtags?: string;
  includeAnyKeywords?: string;
  excludeAnyKeywords?: string;
  includeAllKeywords?: string;
  excludeAllKeywords?: string;
  onlyFromUsernames?: string;
  excludeFromUsernames?: string;
}

const BUILDER_FLAGS = [
  "region",
  "includeAnyHashtags",
  "excludeAnyHashtags",
  "includeAllHashtags",
  "excludeAllHashtags",
  "includeAnyKeywords",
  "excludeAnyKeywords",
  "includeAllKeywords",
  "excludeAllKeywords",
  "onlyFromUsernames",
  "excludeFromUsernames",
] as const satisfies readonly (keyof QueryFlags)[];

export const splitCommaSeparated = (value: string | undefined): string[] | undefined =>
  value
    ?.split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

const hasValue = (value: string | string[] | undefined): boolean =>
  Array.isArray(value) ? value.length > 0 : Boolean(value?.trim());

export class QueryFlagsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "QueryFlagsError";
  }
}

/** Builds the query from either a JSON file or the builder flags, never both. */
export function queryFromFlags(flags: QueryFlags): VideoQuery {
  const usedBuilderFlags = BUILDER_FLAGS.filter((flag) => hasValue(flags[flag]));

  if (flags.queryFileJson) {
    if (usedBuilderFlags.length > 0) {
      throw new QueryFlagsError(
        `--query-file-json cannot be combined with query flags (got: ${usedBuilderFlags.join(", ")})`,
      );
    }
    return parseQueryJson(fs.readFileSync(flags.queryFileJson, "utf8"));
  }

  if (usedBuilderFlags.length === 0) {
    throw new QueryFlagsError("Specify a query with --query-file-json or at least one query flag");
  }

  const options: GenerateQueryOptions = {
    regionCodes: flags.region,
    includeAnyHashtags: splitCommaSeparated(flags.includeAnyHashtags),
    excludeAnyHashtags: splitCommaSeparated(flags.excludeAnyHashtags),
    includeAllHashtags: splitCommaSeparated(flags.includeAllHashtags),
    excludeAllHashtags: splitCommaSeparated(flags.excludeAllHashtags),
    includeAnyKeywords: splitCommaSeparated(flags.includeAnyKeywords),
    excludeAnyKeywords: splitCommaSeparated(flags.excludeAnyKeywords),
    includeAllKeywords: splitCommaSeparated(flags.includeAllKeywords),
    excludeAllKeywords: splitCommaSeparated(flags.excludeAllKeywords),
    onlyFromUsernames: splitCommaSeparated(flags.onlyFromUsernames),
    excludeFromUsernames: splitCommaSeparated(flags.excludeFromUsernames),
  };
  return generateQuery(options);
}

// Commander option parsers

export function parseDateOption(value: string): Date {
  try {
    return parseApiDate(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

export function parseIntegerOption(min: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}, got "${value}"`);
    }
    return parsed;
  };
}

export function collectValues(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), ...(splitCommaSeparated(value) ?? [])];
}
