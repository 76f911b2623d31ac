import { Command } from "commander";

import { buildKeeperContext, type KeeperContext } from "./app/context.js";
import { hasFailures } from "./app/watcher.js";
import { loadConfigForCli, type CliConfig } from "./cli/config.js";
import { ensureCommand } from "./cli/ensure.js";
import { evaluateCommand } from "./cli/evaluate.js";
import { generateCommand } from "./cli/generate.js";
import { initCommand } from "./cli/init.js";
import { printError, type CliOutputOptions } from "./cli/output.js";
import { runCommand } from "./cli/run.js";
import { statusCommand } from "./cli/status.js";

type GlobalOptions = {
  config?: string;
  debug: boolean;
  color: boolean;
};

type ForceOptions = {
  force: boolean;
};

// =============================================================================
// PROGRAM
// =============================================================================

export function buildCli(): Command {
  const program = new Command();

  program
    .name("shard-keeper")
    .description("Keep the proxy sharding artifacts present and regenerated across deployments")
    .option(
      "--config <path>",
      "Path to shard-keeper config (default: /etc/shard-keeper/config.yaml)",
    )
    .option("--debug", "Show error codes, causes and stack traces", false)
    .option("--no-color", "Disable colored output");

  program
    .command("init")
    .description("Write a default shard-keeper config")
    .option("--force", "Overwrite an existing config", false)
    .action((opts: ForceOptions) => {
      initCommand({ configPath: globals(program).config, force: opts.force });
    });

  program
    .command("ensure")
    .description("Create the proxy variable and sharding map files when absent")
    .action(async () => {
      const { ctx, output } = prepare(program);
      await ensureCommand(ctx, output);
    });

  program
    .command("evaluate")
    .description("Run the generation script of the active deployment when the trigger changed")
    .option("--force", "Evaluate even when the trigger is unchanged", false)
    .action(async (opts: ForceOptions) => {
      const { ctx, output } = prepare(program);
      const result = await evaluateCommand(ctx, { ...output, force: opts.force });
      if (hasFailures(result)) {
        process.exitCode = 1;
      }
    });

  program
    .command("run")
    .description("Ensure the artifacts, then evaluate the deployments")
    .option("--force", "Evaluate even when the trigger is unchanged", false)
    .action(async (opts: ForceOptions) => {
      const { ctx, output } = prepare(program);
      const result = await runCommand(ctx, { ...output, force: opts.force });
      if (hasFailures(result.watch)) {
        process.exitCode = 1;
      }
    });

  program
    .command("generate")
    .description("Render both artifacts from the sharding layout in the config")
    .action(async () => {
      const { ctx, output } = prepare(program);
      await generateCommand(ctx, output);
    });

  program
    .command("status")
    .description("Show deployment, artifact and trigger state")
    .action(async () => {
      const { ctx, cli } = prepare(program);
      await statusCommand(ctx, { configPath: cli.configPath, usingDefaults: cli.usingDefaults });
    });

  return program;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    const opts = globals(program);
    printError(err, { debug: opts.debug, color: opts.color });
    process.exitCode = 1;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function globals(program: Command): GlobalOptions {
  return program.opts<GlobalOptions>();
}

function prepare(program: Command): {
  ctx: KeeperContext;
  cli: CliConfig;
  output: CliOutputOptions;
} {
  const opts = globals(program);
  const cli = loadConfigForCli({ explicitConfigPath: opts.config });
  const ctx = buildKeeperContext({ config: cli.config });
  return { ctx, cli, output: { debug: opts.debug, color: opts.color } };
}
