import path from "node:path";

import { z } from "zod";

import { parseFileMode } from "./utils.js";

// =============================================================================
// DEFAULTS (reference deployment)
// =============================================================================

export const DEFAULT_CURRENT_ROOT = "/home/zulip/deployments/current";
export const DEFAULT_NEXT_ROOT = "/home/zulip/deployments/next";
export const DEFAULT_SCRIPT_SUFFIX = "scripts/lib/sharding.py";
export const DEFAULT_TRIGGER_PATH = "/etc/zulip/zulip.conf";
export const DEFAULT_STATE_DIR = "/var/lib/shard-keeper";
export const DEFAULT_PROXY_VARS_PATH = "/etc/zulip/nginx_sharding.conf";
export const DEFAULT_SHARD_MAP_PATH = "/etc/zulip/sharding.json";
export const DEFAULT_SERVICE_ACCOUNT = "zulip";
export const DEFAULT_ARTIFACT_MODE = "0640";
export const DEFAULT_RELOAD_COMMAND = ["service", "nginx", "reload"];
export const DEFAULT_UPSTREAM_PREFIX = "http://tornado";
export const DEFAULT_UPSTREAM_PORT = 9800;

// =============================================================================
// SCHEMA
// =============================================================================

const AbsolutePath = z
  .string()
  .min(1)
  .refine((value) => path.isAbsolute(value), { message: "Expected an absolute path" });

const RelativePath = z
  .string()
  .min(1)
  .refine((value) => !path.isAbsolute(value), {
    message: "Expected a path relative to the deployment root",
  });

const Port = z.number().int().min(1).max(65535);

const HOST_LABEL = "[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?";
const HOSTNAME_PATTERN = new RegExp(`^${HOST_LABEL}(?:\\.${HOST_LABEL})*$`);
const HOST_SUFFIX_PATTERN = new RegExp(`^\\.?${HOST_LABEL}(?:\\.${HOST_LABEL})*$`);

const Hostname = z
  .string()
  .regex(HOSTNAME_PATTERN, { message: 'Expected a hostname such as "chat.example.com"' });

export const DeploymentsSchema = z
  .object({
    current: AbsolutePath.default(DEFAULT_CURRENT_ROOT),
    next: AbsolutePath.default(DEFAULT_NEXT_ROOT),
    script: RelativePath.default(DEFAULT_SCRIPT_SUFFIX),
  })
  .strict();

export const ArtifactsSchema = z
  .object({
    proxy_vars: AbsolutePath.default(DEFAULT_PROXY_VARS_PATH),
    shard_map: AbsolutePath.default(DEFAULT_SHARD_MAP_PATH),
    owner: z.string().min(1).nullable().default(DEFAULT_SERVICE_ACCOUNT),
    group: z.string().min(1).nullable().default(DEFAULT_SERVICE_ACCOUNT),
    mode: z
      .string()
      .default(DEFAULT_ARTIFACT_MODE)
      .refine((value) => parseFileMode(value) !== null, {
        message: 'Expected an octal file mode such as "0640"',
      }),
  })
  .strict();

export const ReloadSchema = z
  .object({
    command: z.array(z.string().min(1)).min(1).default(DEFAULT_RELOAD_COMMAND),
  })
  .strict();

export const ShardGroupSchema = z
  .object({
    port: Port,
    hosts: z.array(Hostname).min(1),
  })
  .strict();

export const ShardingSchema = z
  .object({
    upstream_prefix: z.string().min(1).default(DEFAULT_UPSTREAM_PREFIX),
    default_port: Port.default(DEFAULT_UPSTREAM_PORT),
    host_suffix: z
      .string()
      .regex(HOST_SUFFIX_PATTERN, { message: 'Expected a domain such as "example.com"' })
      .optional(),
    shards: z.array(ShardGroupSchema).default([]),
  })
  .strict();

export const KeeperConfigSchema = z
  .object({
    deployments: DeploymentsSchema.default({}),
    trigger: AbsolutePath.default(DEFAULT_TRIGGER_PATH),
    state_dir: AbsolutePath.default(DEFAULT_STATE_DIR),
    log_file: AbsolutePath.optional(),
    artifacts: ArtifactsSchema.default({}),
    reload: ReloadSchema.default({}),
    sharding: ShardingSchema.optional(),
  })
  .strict();

export type ParsedKeeperConfig = z.infer<typeof KeeperConfigSchema>;
export type ShardingConfig = z.infer<typeof ShardingSchema>;

/**
 * Resolved configuration passed explicitly to every component.
 * Differs from the parsed shape only in derived fields (numeric mode, log path).
 */
export type KeeperConfig = {
  deployments: { current: string; next: string; script: string };
  trigger: string;
  stateDir: string;
  logFile: string;
  artifacts: {
    proxyVars: string;
    shardMap: string;
    owner: string | null;
    group: string | null;
    mode: number;
  };
  reload: { command: string[] };
  sharding: ShardingConfig | null;
};

export function resolveKeeperConfig(parsed: ParsedKeeperConfig): KeeperConfig {
  return {
    deployments: { ...parsed.deployments },
    trigger: parsed.trigger,
    stateDir: parsed.state_dir,
    logFile: parsed.log_file ?? path.join(parsed.state_dir, "shard-keeper.jsonl"),
    artifacts: {
      proxyVars: parsed.artifacts.proxy_vars,
      shardMap: parsed.artifacts.shard_map,
      owner: parsed.artifacts.owner,
      group: parsed.artifacts.group,
      mode: parseFileMode(parsed.artifacts.mode) ?? parseInt(DEFAULT_ARTIFACT_MODE, 8),
    },
    reload: { command: [...parsed.reload.command] },
    sharding: parsed.sharding ?? null,
  };
}

export function getDefaultConfig(): KeeperConfig {
  return resolveKeeperConfig(KeeperConfigSchema.parse({}));
}

export function triggerStatePath(config: KeeperConfig): string {
  return path.join(config.stateDir, "trigger-state.json");
}
