import { afterEach, describe, expect, it, vi } from "vitest";

import { execaResult, type ExecaCall } from "./__tests__/execa.js";
import { createExecaScriptRunner } from "./script-runner.js";

const { execaMock } = vi.hoisted(() => ({
  execaMock: vi.fn<ExecaCall>(),
}));

vi.mock("execa", () => ({
  execa: execaMock,
}));

afterEach(() => {
  execaMock.mockReset();
});

describe("createExecaScriptRunner", () => {
  it("runs the script without arguments from the deployment root", async () => {
    execaMock.mockResolvedValueOnce(execaResult({ stdout: "wrote sharding.json" }));
    const runner = createExecaScriptRunner({ PATH: "/usr/bin" });

    const result = await runner.run("/srv/next/scripts/lib/sharding.py", { cwd: "/srv/next" });

    expect(execaMock).toHaveBeenCalledWith("/srv/next/scripts/lib/sharding.py", [], {
      cwd: "/srv/next",
      reject: false,
      stdio: "pipe",
      env: { PATH: "/usr/bin" },
    });
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("wrote sharding.json");
  });

  it("passes a nonzero exit through with its stderr", async () => {
    execaMock.mockResolvedValueOnce(
      execaResult({ stderr: "Traceback: bad config", exitCode: 1 }),
    );
    const runner = createExecaScriptRunner();

    const result = await runner.run("/srv/current/sharding.py", { cwd: "/srv/current" });

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe("Traceback: bad config");
  });

  it("reports a script that could not be launched", async () => {
    // A spawn failure under reject: false resolves without an exit code.
    execaMock.mockResolvedValueOnce(execaResult({ exitCode: undefined, failed: true }));
    const runner = createExecaScriptRunner();

    const result = await runner.run("/srv/current/sharding.py", { cwd: "/srv/current" });

    expect(result.exitCode).toBe(-1);
    expect(result.stderr).toBe("Failed to launch /srv/current/sharding.py");
  });
});
