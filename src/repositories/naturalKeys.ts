import type Database from "better-sqlite3";

/** A lookup table keyed by a unique business value. */
export interface LookupTable {
  table: "hashtag" | "effect" | "crawl_tag";
  keyColumn: "name" | "effect_id";
}

export const HASHTAGS: LookupTable = { table: "hashtag", keyColumn: "name" };
export const EFFECTS: LookupTable = { table: "effect", keyColumn: "effect_id" };
export const CRAWL_TAGS: LookupTable = { table: "crawl_tag", keyColumn: "name" };

// SQLite caps bound parameters per statement; stay well under it
const MAX_PARAMS_PER_STATEMENT = 500;

export function chunk<T>(values: readonly T[], size: number = MAX_PARAMS_PER_STATEMENT): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < values.length; i += size) {
    chunks.push(values.slice(i, i + size));
  }
  return chunks;
}

export const placeholders = (count: number): string => new Array(count).fill("?").join(", ");

export interface ResolvedKeys {
  ids: Map<string, number>;
  created: string[];
}

/**
 * Looks up every key in one pass, then inserts exactly the ones missing.
 * Must run inside the caller's write transaction: two writers resolving the
 * same new key outside one would race on the UNIQUE constraint.
 */
export function resolveNaturalKeys(
  db: Database.Database,
  lookup: LookupTable,
  keys: Iterable<string>,
): ResolvedKeys {
  const unique = [...new Set(keys)];
  const ids = new Map<string, number>();

  for (const batch of chunk(unique)) {
    const rows = db
      .prepare<string[], { id: number; natural_key: string }>(
        `SELECT id, ${lookup.keyColumn} AS natural_key FROM ${lookup.table}
         WHERE ${lookup.keyColumn} IN (${placeholders(batch.length)})`,
      )
      .all(...batch);
    for (const row of rows) {
      ids.set(row.natural_key, row.id);
    }
  }

  const insert = db.prepare<[string]>(`INSERT INTO ${lookup.table} (${lookup.keyColumn}) VALUES (?)`);
  const created: string[] = [];
  for (const key of unique) {
    if (ids.has(key)) continue;
    const result = insert.run(key);
    ids.set(key, Number(result.lastInsertRowid));
    created.push(key);
  }

  return { ids, created };
}

/** Resolved ids in the order the keys were given. */
export function idsFor(resolved: ResolvedKeys, keys: Iterable<string>): number[] {
  const ids: number[] = [];
  for (const key of keys) {
    const id = resolved.ids.get(key);
    if (id === undefined) {
      throw new Error(`Natural key "${key}" was not resolved`);
    }
    ids.push(id);
  }
  return ids;
}
