import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const regionFileSchema = z.object({
  codes: z.array(z.string().regex(/^[A-Z]{2}$/)),
});

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const REGION_CODES_PATH = path.resolve(currentDir, "../../data/region-codes.json");

let supportedRegions: ReadonlySet<string> | undefined;

export function getSupportedRegions(): ReadonlySet<string> {
  if (!supportedRegions) {
    const parsed = regionFileSchema.parse(JSON.parse(fs.readFileSync(REGION_CODES_PATH, "utf8")));
    supportedRegions = new Set(parsed.codes);
  }
  return supportedRegions;
}

export function isSupportedRegion(code: string): boolean {
  return getSupportedRegions().has(code);
}
