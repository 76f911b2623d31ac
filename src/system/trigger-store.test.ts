import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigError } from "../core/errors.js";

import { createFsProbe } from "./file-probe.js";
import { JsonTriggerStore } from "./trigger-store.js";

describe("JsonTriggerStore", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "shard-keeper-trigger-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("returns null before the first evaluation", async () => {
    const store = new JsonTriggerStore(path.join(tmpDir, "state", "trigger-state.json"));

    await expect(store.read()).resolves.toBeNull();
  });

  it("round-trips the recorded state", async () => {
    const store = new JsonTriggerStore(path.join(tmpDir, "state", "trigger-state.json"));
    const state = {
      path: "/etc/zulip/zulip.conf",
      mtime_ms: 1700000000123.5,
      evaluated_at: "2026-01-01T00:00:00.000Z",
    };

    await store.write(state);

    await expect(store.read()).resolves.toEqual(state);
  });

  it("rejects a malformed state file", async () => {
    const filePath = path.join(tmpDir, "trigger-state.json");
    fs.writeFileSync(filePath, JSON.stringify({ path: "/etc/zulip/zulip.conf" }));

    await expect(new JsonTriggerStore(filePath).read()).rejects.toThrow(ConfigError);
  });
});

describe("createFsProbe", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "shard-keeper-probe-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reports existence and modification time", async () => {
    const probe = createFsProbe();
    const filePath = path.join(tmpDir, "zulip.conf");

    await expect(probe.exists(filePath)).resolves.toBe(false);
    await expect(probe.mtimeMs(filePath)).resolves.toBeNull();

    fs.writeFileSync(filePath, "[machine]\n");
    fs.utimesSync(filePath, 1700000000, 1700000000);

    await expect(probe.exists(filePath)).resolves.toBe(true);
    await expect(probe.mtimeMs(filePath)).resolves.toBe(1700000000000);
  });
});
