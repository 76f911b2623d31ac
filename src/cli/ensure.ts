import { ARTIFACT_LABELS } from "../core/artifacts.js";
import type { KeeperContext } from "../app/context.js";
import { materializeArtifacts, type MaterializeResult } from "../app/materializer.js";

import { printReloadOutcome, type CliOutputOptions } from "./output.js";

export async function ensureCommand(
  ctx: KeeperContext,
  opts: CliOutputOptions = {},
): Promise<MaterializeResult> {
  const result = await materializeArtifacts(ctx);

  for (const artifact of result.artifacts) {
    const verb = artifact.created ? "Created" : "Kept   ";
    console.log(`${verb} ${ARTIFACT_LABELS[artifact.kind]}: ${artifact.path}`);
  }
  printReloadOutcome(result.reload, opts);

  return result;
}
