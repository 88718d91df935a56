import fs from "node:fs";
import path from "node:path";
import type { Logger } from "./logger.js";

export interface CursorStore {
  /** `""` when no post has been processed yet. */
  read(): Promise<string>;
  write(cursor: string): Promise<void>;
}

function isMissingFile(err: unknown): boolean {
  // fs errors may come from another realm, so no instanceof check
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

export class FileCursorStore implements CursorStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger
  ) {}

  async read(): Promise<string> {
    try {
      return fs.readFileSync(this.filePath, "utf8").trim();
    } catch (err) {
      if (isMissingFile(err)) {
        this.logger.info({ path: this.filePath }, "No cursor file yet, starting fresh");
        return "";
      }
      throw err;
    }
  }

  async write(cursor: string): Promise<void> {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });

    // Rename over the target so readers see the old value or the new one, never half of it
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(tmp, cursor, "utf8");
      fs.renameSync(tmp, this.filePath);
    } catch (err) {
      fs.rmSync(tmp, { force: true });
      throw err;
    }
  }
}
