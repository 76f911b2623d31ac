import fs from "node:fs/promises";

import fse from "fs-extra";

import type { FileProbe } from "../app/ports.js";
import { isErrnoException } from "../core/utils.js";

export function createFsProbe(): FileProbe {
  return {
    exists: (filePath) => fse.pathExists(filePath),
    mtimeMs: statMtime,
  };
}

async function statMtime(filePath: string): Promise<number | null> {
  try {
    const stat = await fs.stat(filePath);
    return stat.mtimeMs;
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return null;
    throw err;
  }
}
