import type { KeeperContext } from "../app/context.js";
import { evaluateDeployments, hasFailures, type WatchResult } from "../app/watcher.js";
import type { DeploymentState } from "../core/deployment.js";

import { printError, printReloadOutcome, type CliOutputOptions } from "./output.js";

const STATE_LABELS: Record<DeploymentState, string> = {
  no_deployment: "no deployment carries a generation script",
  current_active: "current deployment owns generation",
  transitioning: "deployment in progress; next deployment owns generation",
  next_active: "next deployment owns generation",
};

export async function evaluateCommand(
  ctx: KeeperContext,
  opts: CliOutputOptions & { force?: boolean },
): Promise<WatchResult> {
  const result = await evaluateDeployments(ctx, { force: opts.force });

  if (result.trigger === "unchanged") {
    console.log(`Trigger ${ctx.config.trigger} unchanged since last evaluation; nothing to do.`);
    return result;
  }
  if (result.trigger === "missing") {
    console.log(`Trigger ${ctx.config.trigger} does not exist; nothing to do.`);
    return result;
  }

  if (result.state) {
    console.log(`Deployment state: ${result.state} (${STATE_LABELS[result.state]})`);
  }

  for (const outcome of result.outcomes) {
    if (outcome.status === "ran") {
      console.log(`  ${outcome.root}: ran ${outcome.scriptPath} (${outcome.durationMs}ms)`);
    } else if (outcome.status === "skipped") {
      console.log(`  ${outcome.root}: skipped (${outcome.reason})`);
    } else {
      console.log(`  ${outcome.root}: FAILED`);
    }
  }

  for (const outcome of result.outcomes) {
    if (outcome.status === "failed") {
      printError(outcome.error, opts);
    }
  }

  if (result.changedArtifacts.length > 0) {
    console.log(`Changed artifacts: ${result.changedArtifacts.join(", ")}`);
  }
  printReloadOutcome(result.reload, opts);

  if (hasFailures(result)) {
    console.log("Failed scripts are not retried until the trigger changes or --force is given.");
  }

  return result;
}
