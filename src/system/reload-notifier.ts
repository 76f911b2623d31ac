import { execa } from "execa";

import type { ReloadNotifier } from "../app/ports.js";
import { NotificationDeliveryError } from "../core/errors.js";

export function createCommandReloadNotifier(command: string[]): ReloadNotifier {
  const [file, ...args] = command;

  return {
    async notify(): Promise<void> {
      if (!file) {
        throw new NotificationDeliveryError("Reload command is empty.");
      }

      const res = await execa(file, args, { reject: false, stdio: "pipe" });
      const exitCode = res.exitCode ?? -1;
      if (exitCode !== 0) {
        const detail =
          (res.stderr ?? "").trim() || (res.stdout ?? "").trim() || `exit code ${exitCode}`;
        throw new NotificationDeliveryError(`${command.join(" ")} failed: ${detail}`);
      }
    },
  };
}
