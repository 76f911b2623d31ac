import { initConfigFile, resolveConfigPath } from "../core/config-discovery.js";

export function initCommand(opts: { configPath?: string; force?: boolean }): void {
  const target = resolveConfigPath({ explicitPath: opts.configPath });
  const result = initConfigFile({ configPath: target.configPath, force: opts.force });

  if (result.status === "created") {
    console.log(`Created shard-keeper config at ${result.configPath}`);
    console.log(`Edit ${result.configPath} to set deployment roots, artifacts and reload command.`);
    return;
  }

  if (result.status === "overwritten") {
    console.log(`Overwrote shard-keeper config at ${result.configPath}`);
    console.log(`Review ${result.configPath} for your deployment settings.`);
    return;
  }

  console.log(`Config already exists at ${result.configPath} (use --force to overwrite).`);
}
