/*
Purpose: run the generation script of the deployment that owns it, once per trigger change.
Assumptions: the script regenerates the artifacts itself; this module treats it as opaque.
Usage: const result = await evaluateDeployments(ctx, { force: false }); if (hasFailures(result)) ...
*/

import { ARTIFACT_KINDS, buildArtifactSpecs, type ArtifactKind } from "../core/artifacts.js";
import {
  buildDeploymentRoots,
  probeScriptPresence,
  resolveDeploymentState,
  shouldRunRoot,
  type DeploymentRoot,
  type DeploymentRootName,
  type DeploymentState,
  type ScriptPresence,
} from "../core/deployment.js";
import { formatErrorMessage } from "../core/error-format.js";
import { ScriptInvocationError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { logEvent } from "../core/logger.js";
import { checkTrigger, type TriggerStatus } from "../core/trigger.js";
import { truncateText } from "../core/utils.js";

import type { KeeperContext } from "./context.js";
import { sendReload, type ReloadOutcome } from "./reload.js";

// =============================================================================
// TYPES
// =============================================================================

export type RootOutcome =
  | { root: DeploymentRootName; scriptPath: string; status: "skipped"; reason: string }
  | { root: DeploymentRootName; scriptPath: string; status: "ran"; durationMs: number }
  | { root: DeploymentRootName; scriptPath: string; status: "failed"; error: UserFacingError };

export type WatchResult = {
  trigger: TriggerStatus | "forced";
  state: DeploymentState | null;
  outcomes: RootOutcome[];
  changedArtifacts: ArtifactKind[];
  reload: ReloadOutcome | null;
};

export type EvaluateOptions = {
  force?: boolean;
};

const OUTPUT_PREVIEW_LIMIT = 2000;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function evaluateDeployments(
  ctx: KeeperContext,
  opts: EvaluateOptions = {},
): Promise<WatchResult> {
  const { files, triggerStore, clock } = ctx.ports;
  const triggerPath = ctx.config.trigger;

  const mtimeMs = await files.mtimeMs(triggerPath);
  const check = checkTrigger(triggerPath, mtimeMs, await triggerStore.read());

  if (check.status !== "modified" && !opts.force) {
    logEvent(ctx.logger, `trigger.${check.status}`, { path: triggerPath });
    return {
      trigger: check.status,
      state: null,
      outcomes: [],
      changedArtifacts: [],
      reload: null,
    };
  }

  logEvent(ctx.logger, opts.force ? "trigger.forced" : "trigger.modified", {
    path: triggerPath,
    mtime_ms: mtimeMs,
  });

  const roots = buildDeploymentRoots(ctx.config);
  const presence = await probeScriptPresence(roots, (p) => files.exists(p));
  const state = resolveDeploymentState(presence);
  logEvent(ctx.logger, "deployment.state", {
    state,
    current: presence.current,
    next: presence.next,
  });

  const before = await readArtifacts(ctx);
  const outcomes: RootOutcome[] = [];
  for (const root of roots) {
    outcomes.push(await evaluateRoot(ctx, root, state, presence));
  }
  const after = await readArtifacts(ctx);

  const changedArtifacts = ARTIFACT_KINDS.filter((kind) => after[kind] !== before[kind]);
  const reloadReasons = changedArtifacts.map((kind) => `${kind}.changed`);
  const reload = reloadReasons.length > 0 ? await sendReload(ctx, reloadReasons) : null;

  // Every evaluation past the gate consumes the trigger edge; failures wait for --force.
  if (mtimeMs !== null) {
    await triggerStore.write({
      path: triggerPath,
      mtime_ms: mtimeMs,
      evaluated_at: clock.isoNow(),
    });
  }

  return {
    trigger: opts.force ? "forced" : check.status,
    state,
    outcomes,
    changedArtifacts,
    reload,
  };
}

export function hasFailures(result: WatchResult): boolean {
  return result.outcomes.some((o) => o.status === "failed");
}

// =============================================================================
// ROOT EVALUATION
// =============================================================================

async function evaluateRoot(
  ctx: KeeperContext,
  root: DeploymentRoot,
  state: DeploymentState,
  presence: ScriptPresence,
): Promise<RootOutcome> {
  const base = { root: root.name, scriptPath: root.scriptPath };

  if (!shouldRunRoot(state, root.name)) {
    const reason = presence[root.name]
      ? "superseded by the next deployment"
      : "generation script not present";
    logEvent(ctx.logger, "script.skip", { root: root.name, reason });
    return { ...base, status: "skipped", reason };
  }

  try {
    const durationMs = await runRootScript(ctx, root);
    return { ...base, status: "ran", durationMs };
  } catch (err) {
    logEvent(ctx.logger, "script.fail", { root: root.name, message: formatErrorMessage(err) });
    return { ...base, status: "failed", error: toScriptUserError(root, err) };
  }
}

async function runRootScript(ctx: KeeperContext, root: DeploymentRoot): Promise<number> {
  // The guard saw the script a moment ago; if it is gone now the deployment moved under us.
  if (!(await ctx.ports.files.exists(root.scriptPath))) {
    throw new ScriptInvocationError(
      `Generation script ${root.scriptPath} disappeared before it could run.`,
      root.scriptPath,
      null,
    );
  }

  logEvent(ctx.logger, "script.start", { root: root.name, script: root.scriptPath });
  const result = await ctx.ports.scripts.run(root.scriptPath, { cwd: root.rootPath });

  const stdout = truncateText(result.stdout, OUTPUT_PREVIEW_LIMIT);
  const stderr = truncateText(result.stderr, OUTPUT_PREVIEW_LIMIT);
  logEvent(ctx.logger, result.exitCode === 0 ? "script.complete" : "script.exit", {
    root: root.name,
    exit_code: result.exitCode,
    duration_ms: result.durationMs,
    stdout: stdout.text,
    stdout_truncated: stdout.truncated,
    stderr: stderr.text,
    stderr_truncated: stderr.truncated,
  });

  if (result.exitCode !== 0) {
    const detail = result.stderr.trim();
    throw new ScriptInvocationError(
      `${root.scriptPath} exited with ${result.exitCode}${detail ? `: ${detail}` : "."}`,
      root.scriptPath,
      result.exitCode,
    );
  }

  return result.durationMs;
}

// =============================================================================
// HELPERS
// =============================================================================

async function readArtifacts(ctx: KeeperContext): Promise<Record<ArtifactKind, string | null>> {
  const snapshot: Record<ArtifactKind, string | null> = { proxy_vars: null, shard_map: null };
  for (const spec of buildArtifactSpecs(ctx.config)) {
    snapshot[spec.kind] = await ctx.ports.artifacts.read(spec.path);
  }
  return snapshot;
}

function toScriptUserError(root: DeploymentRoot, err: unknown): UserFacingError {
  const missing = err instanceof ScriptInvocationError && err.exitCode === null;

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.script,
    title: `Sharding generation failed for the ${root.name} deployment.`,
    message: formatErrorMessage(err),
    hint: missing
      ? `Check that ${root.rootPath} is a complete deployment; it changed during evaluation.`
      : `Run ${root.scriptPath} by hand from ${root.rootPath} to see its full output.`,
    next: "Fix the script, then re-run: shard-keeper evaluate --force",
    cause: err,
  });
}
