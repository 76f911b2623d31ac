/*
Purpose: regenerate both artifacts from the sharding layout in the config.
Assumptions: unlike the materializer, this owns the artifact content and replaces it.
Usage: const result = await generateShardingArtifacts(ctx);
*/

import { buildArtifactSpecs, type ArtifactKind, type ArtifactSpec } from "../core/artifacts.js";
import { DEFAULT_UPSTREAM_PORT, DEFAULT_UPSTREAM_PREFIX } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import {
  ArtifactWriteError,
  ConfigError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";
import { logEvent } from "../core/logger.js";
import {
  buildShardLayout,
  listAssignments,
  renderDefaultProxyVars,
  renderProxyVars,
  renderShardMap,
  type ShardLayout,
} from "../core/sharding.js";

import type { KeeperContext } from "./context.js";
import { sendReload, type ReloadOutcome } from "./reload.js";

export type GeneratedFile = {
  kind: ArtifactKind;
  path: string;
  changed: boolean;
};

export type GenerateResult = {
  files: GeneratedFile[];
  assignments: number;
  reload: ReloadOutcome | null;
};

export async function generateShardingArtifacts(ctx: KeeperContext): Promise<GenerateResult> {
  const layout = resolveLayout(ctx);
  const outputs = renderOutputs(layout);
  const specs = buildArtifactSpecs(ctx.config);

  logEvent(ctx.logger, "generate.start", {
    sharding: layout !== null,
    assignments: layout ? listAssignments(layout).length : 0,
  });

  const files: GeneratedFile[] = [];
  for (const spec of specs) {
    const content = outputs[spec.kind];
    if (content === null) {
      logEvent(ctx.logger, "generate.untouched", { kind: spec.kind, path: spec.path });
      continue;
    }
    const changed = await writeIfChanged(ctx, spec, content);
    files.push({ kind: spec.kind, path: spec.path, changed });
  }

  const reasons = files.filter((f) => f.changed).map((f) => `${f.kind}.generated`);
  const reload = reasons.length > 0 ? await sendReload(ctx, reasons) : null;

  logEvent(ctx.logger, "generate.complete", {
    changed: files.filter((f) => f.changed).map((f) => f.kind),
    reload: reload?.status ?? "none",
  });

  return {
    files,
    assignments: layout ? listAssignments(layout).length : 0,
    reload,
  };
}

// =============================================================================
// HELPERS
// =============================================================================

function resolveLayout(ctx: KeeperContext): ShardLayout | null {
  const sharding = ctx.config.sharding;
  if (!sharding) return null;

  try {
    return buildShardLayout(sharding);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Sharding layout is invalid.",
      message: err.message,
      hint:
        "Each host may appear in exactly one shard group; bare names need sharding.host_suffix.",
      next: "Edit the sharding section of the config, then re-run: shard-keeper generate",
      cause: err,
    });
  }
}

/** Without a sharding section only the default upstream line is written. */
function renderOutputs(layout: ShardLayout | null): Record<ArtifactKind, string | null> {
  if (!layout) {
    return {
      proxy_vars: renderDefaultProxyVars(DEFAULT_UPSTREAM_PREFIX, DEFAULT_UPSTREAM_PORT),
      shard_map: null,
    };
  }

  return {
    proxy_vars: renderProxyVars(layout),
    shard_map: renderShardMap(layout),
  };
}

async function writeIfChanged(
  ctx: KeeperContext,
  spec: ArtifactSpec,
  content: string,
): Promise<boolean> {
  const current = await ctx.ports.artifacts.read(spec.path);
  if (current === content) {
    logEvent(ctx.logger, "generate.unchanged", { kind: spec.kind, path: spec.path });
    return false;
  }

  try {
    await ctx.ports.artifacts.replace(spec, content);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.artifact,
      title: `Could not write ${spec.path}.`,
      message: formatErrorMessage(err instanceof ArtifactWriteError ? err.cause : err),
      hint: "Run as a user that may write the directory and change file ownership (usually root).",
      cause: err,
    });
  }

  logEvent(ctx.logger, "generate.written", {
    kind: spec.kind,
    path: spec.path,
    bytes: Buffer.byteLength(content, "utf8"),
  });
  return true;
}
