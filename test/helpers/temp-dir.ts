import type { ExecutionContext } from "ava";
import fs from "fs-extra";
import os from "node:os";
import path from "node:path";

/** A temporary directory removed when the test finishes */
export async function tempDir(t: ExecutionContext): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "apply-license-"));
  t.teardown(() => fs.remove(dir));

  return dir;
}
