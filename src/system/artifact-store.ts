import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import type { ArtifactStore } from "../app/ports.js";
import type { ArtifactSpec } from "../core/artifacts.js";
import { formatErrorMessage } from "../core/error-format.js";
import { ArtifactWriteError } from "../core/errors.js";
import { isErrnoException } from "../core/utils.js";

import { resolveOwnership, type Ownership } from "./identity.js";

export type OwnershipResolver = (
  owner: string | null,
  group: string | null,
) => Promise<Ownership | null>;

// =============================================================================
// FILESYSTEM ARTIFACT STORE
// =============================================================================

/**
 * Artifacts are staged in a temp file beside the target, given their mode and
 * owner, then published with link(2) (create) or rename(2) (replace). Readers
 * never observe partial content.
 */
export class FsArtifactStore implements ArtifactStore {
  constructor(private readonly resolveOwner: OwnershipResolver = resolveOwnership) {}

  async createExclusive(spec: ArtifactSpec): Promise<boolean> {
    if (await fse.pathExists(spec.path)) return false;

    const ownership = await this.resolveOwner(spec.owner, spec.group);
    const tmpPath = stagingPath(spec.path);

    try {
      await this.stage(tmpPath, spec.defaultContent, spec.mode, ownership);
      try {
        await fs.link(tmpPath, spec.path);
      } catch (err) {
        // Another writer published first; its file wins.
        if (isErrnoException(err) && err.code === "EEXIST") return false;
        throw err;
      }
      return true;
    } catch (err) {
      throw new ArtifactWriteError(
        `Failed to create ${spec.path}: ${formatErrorMessage(err)}`,
        spec.path,
        err,
      );
    } finally {
      await discardStaging(tmpPath);
    }
  }

  async replace(spec: ArtifactSpec, content: string): Promise<void> {
    const ownership = await this.resolveOwner(spec.owner, spec.group);
    const tmpPath = stagingPath(spec.path);

    try {
      await this.stage(tmpPath, content, spec.mode, ownership);
      await fs.rename(tmpPath, spec.path);
    } catch (err) {
      throw new ArtifactWriteError(
        `Failed to write ${spec.path}: ${formatErrorMessage(err)}`,
        spec.path,
        err,
      );
    } finally {
      await discardStaging(tmpPath);
    }
  }

  async read(filePath: string): Promise<string | null> {
    if (!(await fse.pathExists(filePath))) return null;
    return fse.readFile(filePath, "utf8");
  }

  private async stage(
    tmpPath: string,
    content: string,
    mode: number,
    ownership: Ownership | null,
  ): Promise<void> {
    await fse.ensureDir(path.dirname(tmpPath));
    await fs.writeFile(tmpPath, content, { encoding: "utf8", flag: "wx", mode });
    // writeFile's mode is filtered by the umask.
    await fs.chmod(tmpPath, mode);
    if (ownership) {
      await fs.chown(tmpPath, ownership.uid, ownership.gid);
    }
  }
}

async function discardStaging(tmpPath: string): Promise<void> {
  if (await fse.pathExists(tmpPath)) {
    await fse.remove(tmpPath);
  }
}

function stagingPath(target: string): string {
  const suffix = randomUUID().slice(0, 8);
  return path.join(path.dirname(target), `.${path.basename(target)}.${suffix}.tmp`);
}
