/**
 * Output directory handling: safe names and write-then-rename persistence
 */

import * as fs from "fs";
import * as path from "path";
import { PersistenceFailedError, errorMessage } from "./errors";

const MAX_NAME_LENGTH = 100;

/**
 * Convert a report name to a safe file stem
 */
export function sanitizeFilename(name: string): string {
  const safe = name
    .replace(/[^A-Za-z0-9._-]+/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "")
    .substring(0, MAX_NAME_LENGTH);
  return safe || "report";
}

/**
 * Hands out file stems that are unique within one run. A stem also claims its
 * `{stem}_page{N}` names, since a multi-page report writes those.
 */
export class FileNameAllocator {
  private used = new Set<string>();

  allocate(name: string): string {
    const base = sanitizeFilename(name);
    let candidate = base;
    for (let n = 2; this.isTaken(candidate.toLowerCase()); n++) {
      candidate = `${base}_${n}`;
    }
    this.used.add(candidate.toLowerCase());
    return candidate;
  }

  private isTaken(stem: string): boolean {
    if (this.used.has(stem)) {
      return true;
    }
    for (const used of this.used) {
      if (isPageStem(stem, used) || isPageStem(used, stem)) {
        return true;
      }
    }
    return false;
  }
}

function isPageStem(stem: string, reportStem: string): boolean {
  const prefix = `${reportStem}_page`;
  return stem.startsWith(prefix) && /^\d+$/.test(stem.slice(prefix.length));
}

export class ArtifactWriter {
  readonly outDir: string;
  private stagingDir: string;
  private counter = 0;

  constructor(outDir: string) {
    this.outDir = path.resolve(outDir);
    this.stagingDir = path.join(this.outDir, ".staging");
  }

  async prepare(): Promise<void> {
    await this.guard("output directory", () => fs.promises.mkdir(this.stagingDir, { recursive: true }));
  }

  /**
   * Absolute path for a file that is not yet part of the output
   */
  stagingPath(fileName: string): string {
    this.counter++;
    return path.join(this.stagingDir, `${process.pid}-${this.counter}-${fileName}`);
  }

  /**
   * Move a staged file to its final name
   */
  async commitFile(stagingPath: string, fileName: string): Promise<string> {
    const finalPath = path.join(this.outDir, fileName);
    await this.guard(fileName, () => fs.promises.rename(stagingPath, finalPath));
    return finalPath;
  }

  /**
   * Write text to a temporary file and rename it into place
   */
  async writeText(fileName: string, content: string): Promise<string> {
    const finalPath = path.join(this.outDir, fileName);
    const tempPath = this.stagingPath(`${fileName}.tmp`);

    await this.guard(fileName, async () => {
      await fs.promises.writeFile(tempPath, content, "utf8");
      await fs.promises.rename(tempPath, finalPath);
    });

    return finalPath;
  }

  async discard(stagingPath: string): Promise<void> {
    await fs.promises.rm(stagingPath, { force: true });
  }

  /**
   * Remove leftovers of reports that never reached persistence
   */
  async cleanup(): Promise<void> {
    await fs.promises.rm(this.stagingDir, { recursive: true, force: true });
  }

  private async guard(target: string, write: () => Promise<unknown>): Promise<void> {
    try {
      await write();
    } catch (error) {
      throw new PersistenceFailedError(`Could not write ${target}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
