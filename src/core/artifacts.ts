import type { KeeperConfig } from "./config.js";

// =============================================================================
// TYPES
// =============================================================================

export const ARTIFACT_KINDS = ["proxy_vars", "shard_map"] as const;

export type ArtifactKind = (typeof ARTIFACT_KINDS)[number];

export type ArtifactSpec = {
  kind: ArtifactKind;
  path: string;
  owner: string | null;
  group: string | null;
  mode: number;
  defaultContent: string;
  /** Always false: an existing artifact is never replaced by the materializer. */
  replace: false;
};

export type ArtifactState = {
  exists: boolean;
};

export type ArtifactEffect =
  | { type: "create_file"; spec: ArtifactSpec }
  | { type: "notify_reload"; kind: ArtifactKind };

export type ArtifactPlan = {
  action: "create" | "keep";
  effects: ArtifactEffect[];
};

// =============================================================================
// DEFAULT CONTENT
// =============================================================================

export const PROXY_VARS_DEFAULT_CONTENT = "set $tornado_server http://tornado;\n";
export const SHARD_MAP_DEFAULT_CONTENT = "{}\n";

export const ARTIFACT_LABELS: Record<ArtifactKind, string> = {
  proxy_vars: "proxy variables",
  shard_map: "sharding map",
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildArtifactSpecs(config: KeeperConfig): ArtifactSpec[] {
  const shared = {
    owner: config.artifacts.owner,
    group: config.artifacts.group,
    mode: config.artifacts.mode,
    replace: false as const,
  };

  return [
    {
      ...shared,
      kind: "proxy_vars",
      path: config.artifacts.proxyVars,
      defaultContent: PROXY_VARS_DEFAULT_CONTENT,
    },
    {
      ...shared,
      kind: "shard_map",
      path: config.artifacts.shardMap,
      defaultContent: SHARD_MAP_DEFAULT_CONTENT,
    },
  ];
}

/**
 * Decide what ensuring an artifact means for the given on-disk state.
 * Pure: the caller applies the effects.
 */
export function planArtifact(state: ArtifactState, spec: ArtifactSpec): ArtifactPlan {
  if (state.exists) {
    return { action: "keep", effects: [] };
  }

  return {
    action: "create",
    effects: [
      { type: "create_file", spec },
      { type: "notify_reload", kind: spec.kind },
    ],
  };
}
