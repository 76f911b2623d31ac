import type { KeeperContext } from "../app/context.js";
import { generateShardingArtifacts, type GenerateResult } from "../app/generator.js";
import { ARTIFACT_LABELS } from "../core/artifacts.js";

import { printReloadOutcome, type CliOutputOptions } from "./output.js";

export async function generateCommand(
  ctx: KeeperContext,
  opts: CliOutputOptions = {},
): Promise<GenerateResult> {
  const result = await generateShardingArtifacts(ctx);

  if (!ctx.config.sharding) {
    console.log("No sharding section configured; writing the default upstream only.");
  } else {
    console.log(`Sharding layout: ${result.assignments} host assignment(s).`);
  }

  for (const file of result.files) {
    const state = file.changed ? "updated" : "unchanged";
    console.log(`  ${ARTIFACT_LABELS[file.kind]}: ${file.path} (${state})`);
  }
  printReloadOutcome(result.reload, opts);

  return result;
}
