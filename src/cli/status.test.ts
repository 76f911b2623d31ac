import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  CURRENT_SCRIPT,
  NEXT_SCRIPT,
  TRIGGER,
  createHarness,
  makeTestConfig,
} from "../app/__tests__/fakes.js";

import { statusCommand } from "./status.js";

describe("statusCommand", () => {
  let tmpDir: string;
  let logged: string[];

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "shard-keeper-status-"));
    logged = [];
    vi.spyOn(console, "log").mockImplementation((line?: unknown) => {
      logged.push(String(line ?? ""));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reports state without creating the state directory", async () => {
    const stateDir = path.join(tmpDir, "state");
    const h = createHarness(stateDir, makeTestConfig(stateDir));
    h.fs.put(CURRENT_SCRIPT);

    await statusCommand(h.ctx, {
      configPath: "/etc/shard-keeper/config.yaml",
      usingDefaults: true,
    });

    expect(fs.existsSync(stateDir)).toBe(false);
    expect(logged).toContain("Deployment state: current_active");
    expect(logged).toContain(`  current ${CURRENT_SCRIPT} (present) <- runs on next trigger`);
    expect(logged).toContain(`  next    ${NEXT_SCRIPT} (absent)`);
    expect(logged).toContain(`Trigger: ${TRIGGER} (missing)`);
    expect(logged).toContain("  Last evaluation: never");
    expect(logged.slice(-2)).toEqual(["Recent events (shard-keeper.jsonl):", "  (none)"]);
  });

  it("lists recent events and skips a torn line", async () => {
    const h = createHarness(tmpDir);
    fs.writeFileSync(
      h.ctx.config.logFile,
      '{"ts":"2026-01-01T00:00:00.000Z","type":"reload.sent","run_id":"r"}\n{"ts":"2026',
    );

    await statusCommand(h.ctx, { configPath: "/tmp/config.yaml", usingDefaults: false });

    expect(logged.slice(-2)).toEqual([
      "Recent events (shard-keeper.jsonl):",
      "  2026-01-01T00:00:00.000Z  reload.sent",
    ]);
  });
});
