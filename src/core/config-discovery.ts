import fs from "node:fs";
import path from "node:path";

import {
  DEFAULT_ARTIFACT_MODE,
  DEFAULT_CURRENT_ROOT,
  DEFAULT_NEXT_ROOT,
  DEFAULT_PROXY_VARS_PATH,
  DEFAULT_RELOAD_COMMAND,
  DEFAULT_SCRIPT_SUFFIX,
  DEFAULT_SERVICE_ACCOUNT,
  DEFAULT_SHARD_MAP_PATH,
  DEFAULT_STATE_DIR,
  DEFAULT_TRIGGER_PATH,
} from "./config.js";

export const SYSTEM_CONFIG_PATH = "/etc/shard-keeper/config.yaml";
export const CONFIG_ENV_VAR = "SHARD_KEEPER_CONFIG";

export type ConfigSource = "explicit" | "env" | "system";

export type ConfigResolution = {
  configPath: string;
  source: ConfigSource;
  exists: boolean;
};

export type InitResult = {
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

export function resolveConfigPath(args: {
  explicitPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): ConfigResolution {
  const cwd = args.cwd ?? process.cwd();
  const env = args.env ?? process.env;

  if (args.explicitPath) {
    const configPath = path.resolve(cwd, args.explicitPath);
    return { configPath, source: "explicit", exists: fs.existsSync(configPath) };
  }

  const fromEnv = env[CONFIG_ENV_VAR]?.trim();
  if (fromEnv) {
    const configPath = path.resolve(cwd, fromEnv);
    return { configPath, source: "env", exists: fs.existsSync(configPath) };
  }

  return {
    configPath: SYSTEM_CONFIG_PATH,
    source: "system",
    exists: fs.existsSync(SYSTEM_CONFIG_PATH),
  };
}

export function initConfigFile(args: { configPath: string; force?: boolean }): InitResult {
  const configPath = path.resolve(args.configPath);
  const hasConfig = fs.existsSync(configPath);
  const force = args.force ?? false;

  if (hasConfig && !force) {
    return { configPath, status: "exists" };
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, buildDefaultConfigYaml(), "utf8");
  return { configPath, status: hasConfig ? "overwritten" : "created" };
}

export function buildDefaultConfigYaml(): string {
  return [
    "# shard-keeper config. Paths must be absolute unless noted.",
    "deployments:",
    `  current: ${DEFAULT_CURRENT_ROOT}`,
    `  next: ${DEFAULT_NEXT_ROOT}`,
    "  # Relative to each deployment root.",
    `  script: ${DEFAULT_SCRIPT_SUFFIX}`,
    "",
    "# Deployments are re-evaluated only after this file changes.",
    `trigger: ${DEFAULT_TRIGGER_PATH}`,
    `state_dir: ${DEFAULT_STATE_DIR}`,
    "",
    "artifacts:",
    `  proxy_vars: ${DEFAULT_PROXY_VARS_PATH}`,
    `  shard_map: ${DEFAULT_SHARD_MAP_PATH}`,
    `  owner: ${DEFAULT_SERVICE_ACCOUNT}`,
    `  group: ${DEFAULT_SERVICE_ACCOUNT}`,
    `  mode: "${DEFAULT_ARTIFACT_MODE}"`,
    "",
    "reload:",
    `  command: ${JSON.stringify(DEFAULT_RELOAD_COMMAND)}`,
    "",
    "# Used by `shard-keeper generate`.",
    "# sharding:",
    "#   host_suffix: example.com",
    "#   shards:",
    "#     - port: 9801",
    "#       hosts: [realm-a, realm-b.example.org]",
    "",
  ].join("\n");
}
