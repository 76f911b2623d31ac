import path from "node:path";

import type { KeeperContext } from "../app/context.js";
import { ARTIFACT_LABELS, buildArtifactSpecs } from "../core/artifacts.js";
import {
  buildDeploymentRoots,
  probeScriptPresence,
  resolveDeploymentState,
  rootsToRun,
} from "../core/deployment.js";
import { readJsonlEvents, type JsonObject } from "../core/logger.js";
import { checkTrigger } from "../core/trigger.js";

const RECENT_EVENT_LIMIT = 5;

export async function statusCommand(
  ctx: KeeperContext,
  opts: { configPath: string; usingDefaults: boolean },
): Promise<void> {
  const { files, triggerStore } = ctx.ports;
  const configNote = opts.usingDefaults ? " (not found; using built-in defaults)" : "";
  console.log(`Config: ${opts.configPath}${configNote}`);
  console.log("");

  const roots = buildDeploymentRoots(ctx.config);
  const presence = await probeScriptPresence(roots, (p) => files.exists(p));
  const state = resolveDeploymentState(presence);
  const toRun = rootsToRun(state);

  console.log(`Deployment state: ${state}`);
  for (const root of roots) {
    const present = presence[root.name] ? "present" : "absent";
    const marker = toRun.includes(root.name) ? " <- runs on next trigger" : "";
    console.log(`  ${root.name.padEnd(7)} ${root.scriptPath} (${present})${marker}`);
  }
  console.log("");

  console.log("Artifacts:");
  for (const spec of buildArtifactSpecs(ctx.config)) {
    const present = (await files.exists(spec.path)) ? "present" : "absent";
    console.log(`  ${ARTIFACT_LABELS[spec.kind].padEnd(15)} ${spec.path} (${present})`);
  }
  console.log("");

  const previous = await triggerStore.read();
  const check = checkTrigger(ctx.config.trigger, await files.mtimeMs(ctx.config.trigger), previous);
  console.log(`Trigger: ${ctx.config.trigger} (${check.status})`);
  console.log(`  Last evaluation: ${previous?.evaluated_at ?? "never"}`);
  console.log("");

  printRecentEvents(ctx.config.logFile);
}

function printRecentEvents(logFile: string): void {
  const events = readJsonlEvents(logFile).slice(-RECENT_EVENT_LIMIT);
  console.log(`Recent events (${path.basename(logFile)}):`);
  if (events.length === 0) {
    console.log("  (none)");
    return;
  }
  for (const event of events) {
    console.log(`  ${formatEvent(event)}`);
  }
}

function formatEvent(event: JsonObject): string {
  const ts = typeof event.ts === "string" ? event.ts : "?";
  const type = typeof event.type === "string" ? event.type : "?";
  return `${ts}  ${type}`;
}
