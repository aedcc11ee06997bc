import { z } from "zod";
import { isApiDate } from "../utils/dates";
import { dedupe } from "./video";
import { isSupportedRegion } from "./regions";

export const OPERATIONS = ["EQ", "IN", "GT", "GTE", "LT", "LTE"] as const;
export type Operation = (typeof OPERATIONS)[number];

export const VIDEO_LENGTHS = ["SHORT", "MID", "LONG", "EXTRA_LONG"] as const;
export type VideoLength = (typeof VIDEO_LENGTHS)[number];

export const FIELD_NAMES = [
  "id",
  "username",
  "hashtag_name",
  "keyword",
  "video_id",
  "music_id",
  "effect_id",
  "region_code",
  "video_length",
  "create_date",
] as const;
export type FieldName = (typeof FIELD_NAMES)[number];

export interface Condition {
  operation: Operation;
  field_name: FieldName;
  field_values: string[];
}

export interface VideoQuery {
  and?: Condition[];
  or?: Condition[];
  not?: Condition[];
}

export class InvalidQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidQueryError";
  }
}

const isVideoLength = (value: string): value is VideoLength =>
  VIDEO_LENGTHS.some((length) => length === value);

const fieldValidators: Partial<Record<FieldName, (value: string) => boolean>> = {
  region_code: isSupportedRegion,
  video_length: isVideoLength,
  create_date: isApiDate,
};

export function makeCondition(fieldName: FieldName, values: string | string[], operation: Operation): Condition {
  const fieldValues = typeof values === "string" ? [values] : [...values];
  if (fieldValues.length === 0) {
    throw new InvalidQueryError(`Condition on ${fieldName} has no values`);
  }
  const validate = fieldValidators[fieldName];
  for (const value of fieldValues) {
    if (validate && !validate(value)) {
      throw new InvalidQueryError(`Invalid value "${value}" for field ${fieldName}`);
    }
  }
  return { operation, field_name: fieldName, field_values: fieldValues };
}

export function makeQuery(parts: VideoQuery): VideoQuery {
  const query: VideoQuery = {};
  if (parts.and?.length) query.and = parts.and;
  if (parts.or?.length) query.or = parts.or;
  if (parts.not?.length) query.not = parts.not;
  if (!query.and && !query.or && !query.not) {
    throw new InvalidQueryError("At least one of and, or, not must contain a condition");
  }
  return query;
}

/** Key order matches what the API documents: operation, field_name, field_values. */
export function serializeQuery(query: VideoQuery): string {
  const ordered = (conditions: Condition[] | undefined) =>
    conditions?.map((condition) => ({
      operation: condition.operation,
      field_name: condition.field_name,
      field_values: condition.field_values,
    }));
  return JSON.stringify({ and: ordered(query.and), or: ordered(query.or), not: ordered(query.not) });
}

const conditionSchema = z.object({
  operation: z.enum(OPERATIONS),
  field_name: z.enum(FIELD_NAMES),
  field_values: z.union([z.string(), z.array(z.string())]),
});

const queryFileSchema = z.object({
  and: z.array(conditionSchema).optional(),
  or: z.array(conditionSchema).optional(),
  not: z.array(conditionSchema).optional(),
});

/** Parses and validates a query written as API JSON. */
export function parseQueryJson(json: string): VideoQuery {
  const parsed = queryFileSchema.parse(JSON.parse(json));
  const build = (conditions: z.infer<typeof conditionSchema>[] | undefined) =>
    conditions?.map((condition) => makeCondition(condition.field_name, condition.field_values, condition.operation));
  return makeQuery({ and: build(parsed.and), or: build(parsed.or), not: build(parsed.not) });
}

export const normalizeHashtags = (values: string[]): string[] =>
  sortedSet(values.map((value) => value.replace(/^#+/, "").toLowerCase()));

export const normalizeKeywords = (values: string[]): string[] =>
  sortedSet(values.map((value) => value.toLowerCase()));

export const normalizeUsernames = (values: string[]): string[] =>
  sortedSet(values.map((value) => value.replace(/^@+|@+$/g, "").toLowerCase()));

function sortedSet(values: string[]): string[] {
  return dedupe(values).sort();
}

export interface GenerateQueryOptions {
  regionCodes?: string[];
  includeAnyHashtags?: string[];
  includeAllHashtags?: string[];
  excludeAnyHashtags?: string[];
  excludeAllHashtags?: string[];
  includeAnyKeywords?: string[];
  includeAllKeywords?: string[];
  excludeAnyKeywords?: string[];
  excludeAllKeywords?: string[];
  onlyFromUsernames?: string[];
  excludeFromUsernames?: string[];
}

const nonEmpty = (values: string[] | undefined): values is string[] => values !== undefined && values.length > 0;

/**
 * Builds a query from include/exclude lists. "any" lists become one IN
 * condition, "all" lists one EQ condition per value; when both are given
 * for the same field, "any" wins.
 */
export function generateQuery(options: GenerateQueryOptions): VideoQuery {
  const and: Condition[] = [];
  const not: Condition[] = [];

  const addAnyOrAll = (
    target: Condition[],
    field: FieldName,
    normalize: (values: string[]) => string[],
    any: string[] | undefined,
    all: string[] | undefined,
  ) => {
    if (nonEmpty(any)) {
      target.push(makeCondition(field, normalize(any), "IN"));
    } else if (nonEmpty(all)) {
      for (const value of normalize(all)) {
        target.push(makeCondition(field, value, "EQ"));
      }
    }
  };

  addAnyOrAll(and, "hashtag_name", normalizeHashtags, options.includeAnyHashtags, options.includeAllHashtags);
  addAnyOrAll(not, "hashtag_name", normalizeHashtags, options.excludeAnyHashtags, options.excludeAllHashtags);
  addAnyOrAll(and, "keyword", normalizeKeywords, options.includeAnyKeywords, options.includeAllKeywords);
  addAnyOrAll(not, "keyword", normalizeKeywords, options.excludeAnyKeywords, options.excludeAllKeywords);

  if (nonEmpty(options.onlyFromUsernames)) {
    and.push(makeCondition("username", normalizeUsernames(options.onlyFromUsernames), "IN"));
  }
  if (nonEmpty(options.excludeFromUsernames)) {
    not.push(makeCondition("username", normalizeUsernames(options.excludeFromUsernames), "IN"));
  }
  if (nonEmpty(options.regionCodes)) {
    and.push(makeCondition("region_code", sortedSet(options.regionCodes.map((code) => code.toUpperCase())), "IN"));
  }

  return makeQuery({ and, not });
}
