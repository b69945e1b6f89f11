import * as fs from "node:fs/promises";
import path from "node:path";
import { IoError } from "./errors.js";

export interface Fs {
  readFile(path: string): Promise<string>;
  writeFile(path: string, contents: string): Promise<void>;
}

/** Files relative to a base directory, failures become `IoError`s naming the path */
export class LocalFs implements Fs {
  private baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  resolve(filePath: string): string {
    return path.join(this.baseDir, filePath);
  }

  async readFile(filePath: string): Promise<string> {
    const fullPath = this.resolve(filePath);

    try {
      return await fs.readFile(fullPath, "utf8");
    } catch (e) {
      throw new IoError("read", fullPath, e);
    }
  }

  async writeFile(filePath: string, contents: string): Promise<void> {
    const fullPath = this.resolve(filePath);

    try {
      await fs.writeFile(fullPath, contents);
    } catch (e) {
      throw new IoError("write", fullPath, e);
    }
  }
}

/** Writes every rendered license, replacing existing files, returns the names written */
export async function writeLicenseFiles(
  outputFs: Fs,
  rendered: ReadonlyMap<string, string>
): Promise<string[]> {
  const written = [];

  for (const [name, contents] of rendered) {
    await outputFs.writeFile(name, contents);
    written.push(name);
  }

  return written;
}
