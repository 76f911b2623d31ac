import type { KeeperContext } from "../app/context.js";
import type { MaterializeResult } from "../app/materializer.js";
import type { WatchResult } from "../app/watcher.js";

import { ensureCommand } from "./ensure.js";
import { evaluateCommand } from "./evaluate.js";
import type { CliOutputOptions } from "./output.js";

/**
 * One service pass: seed missing artifacts, then evaluate the deployments.
 * A materializer failure stops the pass before any script runs.
 */
export async function runCommand(
  ctx: KeeperContext,
  opts: CliOutputOptions & { force?: boolean },
): Promise<{ ensure: MaterializeResult; watch: WatchResult }> {
  const ensure = await ensureCommand(ctx, opts);
  console.log("");
  const watch = await evaluateCommand(ctx, opts);
  return { ensure, watch };
}
