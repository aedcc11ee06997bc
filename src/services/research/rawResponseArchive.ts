import fs from "node:fs";
import path from "node:path";
import type { Logger } from "pino";

/**
 * Writes each raw response body to `<dir>/<timestamp>.json` for audit and
 * replay. Files are created exclusively; a same-millisecond collision gets a
 * numeric suffix rather than overwriting.
 */
export class RawResponseArchive {
  constructor(
    private readonly outputDir: string,
    private readonly logger: Logger,
  ) {
    if (!fs.existsSync(outputDir)) {
      fs.mkdirSync(outputDir, { recursive: true });
    }
  }

  store(body: string, capturedAt: Date = new Date()): string {
    const stamp = capturedAt.toISOString().replace(/:/g, "-");
    for (let suffix = 0; ; suffix++) {
      const fileName = suffix === 0 ? `${stamp}.json` : `${stamp}_${suffix}.json`;
      const filePath = path.join(this.outputDir, fileName);
      try {
        fs.writeFileSync(filePath, body, { encoding: "utf8", flag: "wx" });
        this.logger.debug({ filePath }, "Stored raw API response");
        return filePath;
      } catch (error) {
        if (!isAlreadyExists(error)) {
          throw error;
        }
      }
    }
  }
}

const isAlreadyExists = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "EEXIST";
