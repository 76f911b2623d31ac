import fse from "fs-extra";

import type { TriggerStore } from "../app/ports.js";
import { ConfigError } from "../core/errors.js";
import { TriggerStateSchema, type TriggerState } from "../core/trigger.js";

export class JsonTriggerStore implements TriggerStore {
  constructor(readonly filePath: string) {}

  async read(): Promise<TriggerState | null> {
    if (!(await fse.pathExists(this.filePath))) return null;

    const raw: unknown = await fse.readJson(this.filePath);
    const parsed = TriggerStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(
        `Trigger state at ${this.filePath} is malformed. Delete it to force a re-evaluation.`,
        parsed.error,
      );
    }
    return parsed.data;
  }

  async write(state: TriggerState): Promise<void> {
    await fse.outputJson(this.filePath, state, { spaces: 2 });
  }
}
