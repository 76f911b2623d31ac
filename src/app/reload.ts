import { formatErrorMessage } from "../core/error-format.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { logEvent } from "../core/logger.js";

import type { KeeperContext } from "./context.js";

export type ReloadOutcome = { status: "sent" } | { status: "failed"; error: UserFacingError };

/**
 * Signal the proxy once for a batch of changes. A delivery failure is
 * returned, never thrown: the artifact changes that caused it still stand.
 */
export async function sendReload(ctx: KeeperContext, reasons: string[]): Promise<ReloadOutcome> {
  const command = ctx.config.reload.command.join(" ");

  try {
    await ctx.ports.reload.notify();
  } catch (err) {
    logEvent(ctx.logger, "reload.failed", {
      command,
      reasons,
      message: formatErrorMessage(err),
    });
    return {
      status: "failed",
      error: new UserFacingError({
        code: USER_FACING_ERROR_CODES.notification,
        title: "Proxy reload failed.",
        message: `Could not signal the proxy to reload (${command}).`,
        hint: "The generated files are in place; the proxy still serves the old configuration.",
        next: `Reload the proxy manually: ${command}`,
        cause: err,
      }),
    };
  }

  logEvent(ctx.logger, "reload.sent", { command, reasons });
  return { status: "sent" };
}
