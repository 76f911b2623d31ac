import { z } from "zod";

export const TriggerStateSchema = z
  .object({
    path: z.string().min(1),
    mtime_ms: z.number().nonnegative(),
    evaluated_at: z.string().min(1),
  })
  .strict();

export type TriggerState = z.infer<typeof TriggerStateSchema>;

export type TriggerStatus = "modified" | "unchanged" | "missing";

export type TriggerCheck = {
  status: TriggerStatus;
  path: string;
  mtimeMs: number | null;
  previous: TriggerState | null;
};

/**
 * Edge-trigger gate: modified means the trigger changed since the last
 * recorded evaluation (or was never recorded, or the trigger path moved).
 */
export function checkTrigger(
  triggerPath: string,
  mtimeMs: number | null,
  previous: TriggerState | null,
): TriggerCheck {
  const base = { path: triggerPath, mtimeMs, previous };

  if (mtimeMs === null) {
    return { ...base, status: "missing" };
  }

  if (previous && previous.path === triggerPath && previous.mtime_ms === mtimeMs) {
    return { ...base, status: "unchanged" };
  }

  return { ...base, status: "modified" };
}
