import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

const ensureDir = (filePath: string) => {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

/** Opens (creating if needed) the SQLite store. ":memory:" is passed through untouched. */
export const openDatabase = (dbPath: string): Database.Database => {
  if (dbPath === ":memory:") {
    return configure(new Database(dbPath));
  }
  const absolutePath = path.resolve(process.cwd(), dbPath);
  ensureDir(absolutePath);
  return configure(new Database(absolutePath));
};

const configure = (db: Database.Database): Database.Database => {
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  db.pragma("synchronous = NORMAL");

  // Join tables reference video, crawl and the lookup tables
  db.pragma("foreign_keys = ON");

  return db;
};
