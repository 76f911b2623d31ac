import { execa } from "execa";

import type { ScriptRunner, ScriptRunResult } from "../app/ports.js";

/**
 * Runs a deployment's generation script with no arguments and waits for it.
 * A launch failure (missing file, no exec bit) surfaces as exit code -1.
 */
export function createExecaScriptRunner(env: NodeJS.ProcessEnv = process.env): ScriptRunner {
  return {
    async run(scriptPath: string, opts: { cwd: string }): Promise<ScriptRunResult> {
      const startedAt = Date.now();
      const res = await execa(scriptPath, [], {
        cwd: opts.cwd,
        reject: false,
        stdio: "pipe",
        env,
      });

      const exitCode = res.exitCode ?? -1;
      const stderr = res.stderr ?? "";

      return {
        exitCode,
        stdout: res.stdout ?? "",
        stderr: exitCode === -1 && stderr.length === 0 ? `Failed to launch ${scriptPath}` : stderr,
        durationMs: Date.now() - startedAt,
      };
    },
  };
}
