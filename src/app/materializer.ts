/*
Purpose: make sure the proxy-variable and sharding-map artifacts exist.
Assumptions: existing artifacts belong to whoever wrote them; only absent files are created.
Usage: const result = await materializeArtifacts(ctx);
*/

import {
  ARTIFACT_LABELS,
  buildArtifactSpecs,
  planArtifact,
  type ArtifactKind,
  type ArtifactSpec,
} from "../core/artifacts.js";
import { formatErrorMessage } from "../core/error-format.js";
import {
  ArtifactWriteError,
  ConfigError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";
import { logEvent } from "../core/logger.js";
import { formatFileMode } from "../core/utils.js";

import type { KeeperContext } from "./context.js";
import type { ArtifactStore, FileProbe } from "./ports.js";
import { sendReload, type ReloadOutcome } from "./reload.js";

// =============================================================================
// TYPES
// =============================================================================

export type EnsureArtifactResult = {
  created: boolean;
  reloadRequested: boolean;
};

export type ArtifactOutcome = {
  kind: ArtifactKind;
  path: string;
  created: boolean;
};

export type MaterializeResult = {
  artifacts: ArtifactOutcome[];
  reload: ReloadOutcome | null;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Create the artifact with its default content, owner and mode when absent.
 * An existing file is left byte-for-byte alone, whatever its content.
 */
export async function ensureArtifact(
  spec: ArtifactSpec,
  ports: { files: FileProbe; artifacts: ArtifactStore },
): Promise<EnsureArtifactResult> {
  const plan = planArtifact({ exists: await ports.files.exists(spec.path) }, spec);

  let created = false;
  let reloadRequested = false;
  for (const effect of plan.effects) {
    if (effect.type === "create_file") {
      created = await ports.artifacts.createExclusive(effect.spec);
    } else if (created) {
      reloadRequested = true;
    }
  }

  return { created, reloadRequested };
}

export async function materializeArtifacts(ctx: KeeperContext): Promise<MaterializeResult> {
  const specs = buildArtifactSpecs(ctx.config);
  const outcomes: ArtifactOutcome[] = [];
  const reloadReasons: string[] = [];
  let failure: UserFacingError | null = null;

  logEvent(ctx.logger, "materialize.start", { artifact_count: specs.length });

  for (const spec of specs) {
    try {
      const result = await ensureArtifact(spec, ctx.ports);
      outcomes.push({ kind: spec.kind, path: spec.path, created: result.created });
      if (result.reloadRequested) {
        reloadReasons.push(`${spec.kind}.created`);
      }

      logEvent(ctx.logger, result.created ? "artifact.created" : "artifact.kept", {
        kind: spec.kind,
        path: spec.path,
        ...(result.created ? { mode: formatFileMode(spec.mode) } : {}),
      });
    } catch (err) {
      logEvent(ctx.logger, "artifact.failed", {
        kind: spec.kind,
        path: spec.path,
        message: formatErrorMessage(err),
      });
      failure = toArtifactUserError(spec, err);
      break;
    }
  }

  // Files created before a failure still need the proxy to pick them up.
  const reload = reloadReasons.length > 0 ? await sendReload(ctx, reloadReasons) : null;

  logEvent(ctx.logger, "materialize.complete", {
    created: outcomes.filter((o) => o.created).map((o) => o.kind),
    reload: reload?.status ?? "none",
    failed: failure !== null,
  });

  if (failure) {
    throw failure;
  }

  return { artifacts: outcomes, reload };
}

// =============================================================================
// HELPERS
// =============================================================================

function toArtifactUserError(spec: ArtifactSpec, err: unknown): UserFacingError {
  const label = ARTIFACT_LABELS[spec.kind];

  if (err instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: `Cannot resolve ownership for the ${label} file.`,
      message: err.message,
      hint: "Create the service account, or set artifacts.owner / artifacts.group to null.",
      cause: err,
    });
  }

  const artifactPath = err instanceof ArtifactWriteError ? err.artifactPath : spec.path;
  const reason = formatErrorMessage(err instanceof ArtifactWriteError ? err.cause : err);
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.artifact,
    title: `Could not create the ${label} file.`,
    message: `Writing ${artifactPath} failed: ${reason}`,
    hint: "Run as a user that may write the directory and change file ownership (usually root).",
    next: "Re-run: shard-keeper ensure",
    cause: err,
  });
}
