import path from "node:path";

import type { KeeperConfig } from "./config.js";

// =============================================================================
// TYPES
// =============================================================================

export const DEPLOYMENT_ROOT_NAMES = ["current", "next"] as const;

export type DeploymentRootName = (typeof DEPLOYMENT_ROOT_NAMES)[number];

export type DeploymentRoot = {
  name: DeploymentRootName;
  rootPath: string;
  scriptPath: string;
};

export type ScriptPresence = Record<DeploymentRootName, boolean>;

/**
 * Which deployment owns sharding generation right now.
 *
 * - no_deployment: neither root carries the generation script.
 * - current_active: only "current" does.
 * - transitioning: both do; the staged "next" root takes over.
 * - next_active: only "next" does.
 */
export type DeploymentState = "no_deployment" | "current_active" | "transitioning" | "next_active";

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildDeploymentRoots(config: KeeperConfig): DeploymentRoot[] {
  return DEPLOYMENT_ROOT_NAMES.map((name) => {
    const rootPath = config.deployments[name];
    return { name, rootPath, scriptPath: path.join(rootPath, config.deployments.script) };
  });
}

export function resolveDeploymentState(presence: ScriptPresence): DeploymentState {
  if (presence.current && presence.next) return "transitioning";
  if (presence.current) return "current_active";
  if (presence.next) return "next_active";
  return "no_deployment";
}

export function rootsToRun(state: DeploymentState): DeploymentRootName[] {
  switch (state) {
    case "current_active":
      return ["current"];
    case "transitioning":
    case "next_active":
      return ["next"];
    case "no_deployment":
      return [];
  }
}

export function shouldRunRoot(state: DeploymentState, name: DeploymentRootName): boolean {
  return rootsToRun(state).includes(name);
}

export async function probeScriptPresence(
  roots: DeploymentRoot[],
  exists: (filePath: string) => Promise<boolean>,
): Promise<ScriptPresence> {
  const presence: ScriptPresence = { current: false, next: false };
  for (const root of roots) {
    presence[root.name] = await exists(root.scriptPath);
  }
  return presence;
}
