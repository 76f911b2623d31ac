import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  CURRENT_SCRIPT,
  PROXY_VARS,
  SHARD_MAP,
  TRIGGER,
  createHarness,
  type TestHarness,
} from "../app/__tests__/fakes.js";

import { evaluateCommand } from "./evaluate.js";
import { runCommand } from "./run.js";

describe("runCommand", () => {
  let tmpDir: string;
  let h: TestHarness;
  let logged: string[];

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "shard-keeper-cli-"));
    h = createHarness(tmpDir);
    logged = [];
    vi.spyOn(console, "log").mockImplementation((line?: unknown) => {
      logged.push(String(line ?? ""));
    });
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("seeds the artifacts then runs the active deployment", async () => {
    h.fs.put(TRIGGER, "[machine]\n");
    h.fs.put(CURRENT_SCRIPT);

    const result = await runCommand(h.ctx, { color: false });

    expect(result.ensure.artifacts.every((a) => a.created)).toBe(true);
    expect(logged).toEqual([
      `Created proxy variables: ${PROXY_VARS}`,
      `Created sharding map: ${SHARD_MAP}`,
      "Proxy reload requested.",
      "",
      "Deployment state: current_active (current deployment owns generation)",
      `  current: ran ${CURRENT_SCRIPT} (5ms)`,
      "  next: skipped (generation script not present)",
    ]);
  });

  it("does not evaluate when seeding fails", async () => {
    h.fs.put(TRIGGER, "[machine]\n");
    h.fs.put(CURRENT_SCRIPT);
    h.artifacts.failWith = new Error("EROFS: read-only file system");

    await expect(runCommand(h.ctx, {})).rejects.toThrow(
      `Writing ${PROXY_VARS} failed: EROFS: read-only file system`,
    );
    expect(h.scripts.calls).toEqual([]);
  });
});

describe("evaluateCommand", () => {
  let tmpDir: string;
  let h: TestHarness;
  let logged: string[];

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "shard-keeper-cli-"));
    h = createHarness(tmpDir);
    logged = [];
    vi.spyOn(console, "log").mockImplementation((line?: unknown) => {
      logged.push(String(line ?? ""));
    });
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("explains a missing trigger", async () => {
    await evaluateCommand(h.ctx, {});

    expect(logged).toEqual([`Trigger ${TRIGGER} does not exist; nothing to do.`]);
  });

  it("prints the failure and how to retry it", async () => {
    h.fs.put(TRIGGER, "[machine]\n");
    h.fs.put(CURRENT_SCRIPT);
    h.scripts.on(CURRENT_SCRIPT, () => ({ exitCode: 1 }));
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);

    await evaluateCommand(h.ctx, { color: false });

    expect(logged).toContain("  current: FAILED");
    expect(logged[logged.length - 1]).toBe(
      "Failed scripts are not retried until the trigger changes or --force is given.",
    );
    expect(errors).toHaveBeenCalledWith(
      "Error: Sharding generation failed for the current deployment.",
    );
  });
});
