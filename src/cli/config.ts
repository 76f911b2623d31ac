import { getDefaultConfig, type KeeperConfig } from "../core/config.js";
import { loadKeeperConfig } from "../core/config-loader.js";
import { resolveConfigPath, type ConfigSource } from "../core/config-discovery.js";

export type CliConfig = {
  config: KeeperConfig;
  configPath: string;
  source: ConfigSource;
  usingDefaults: boolean;
};

/**
 * Load the config the way every command does: an explicit or env path must
 * exist; the system path falls back to built-in defaults when absent.
 */
export function loadConfigForCli(args: {
  explicitConfigPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}): CliConfig {
  const resolved = resolveConfigPath({
    explicitPath: args.explicitConfigPath,
    cwd: args.cwd,
    env: args.env,
  });

  if (!resolved.exists && resolved.source === "system") {
    return {
      config: getDefaultConfig(),
      configPath: resolved.configPath,
      source: resolved.source,
      usingDefaults: true,
    };
  }

  return {
    config: loadKeeperConfig(resolved.configPath),
    configPath: resolved.configPath,
    source: resolved.source,
    usingDefaults: false,
  };
}
