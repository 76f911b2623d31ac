import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { getDefaultConfig } from "./config.js";
import { loadKeeperConfig, parseKeeperConfig } from "./config-loader.js";
import { UserFacingError } from "./errors.js";

describe("loadKeeperConfig", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "shard-keeper-config-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("fills defaults around the keys that are set", () => {
    const configPath = path.join(tmpDir, "config.yaml");
    fs.writeFileSync(
      configPath,
      [
        "deployments:",
        "  current: /srv/app/current",
        "state_dir: /var/lib/keeper",
        "artifacts:",
        '  mode: "0600"',
        "  owner: null",
        "reload:",
        "  command: [systemctl, reload, nginx]",
        "",
      ].join("\n"),
    );

    const config = loadKeeperConfig(configPath);

    expect(config.deployments).toEqual({
      current: "/srv/app/current",
      next: "/home/zulip/deployments/next",
      script: "scripts/lib/sharding.py",
    });
    expect(config.logFile).toBe("/var/lib/keeper/shard-keeper.jsonl");
    expect(config.artifacts.mode).toBe(0o600);
    expect(config.artifacts.owner).toBeNull();
    expect(config.artifacts.group).toBe("zulip");
    expect(config.reload.command).toEqual(["systemctl", "reload", "nginx"]);
    expect(config.sharding).toBeNull();
  });

  it("reports a missing file with the init command", () => {
    const configPath = path.join(tmpDir, "absent.yaml");

    const err = captureError(() => loadKeeperConfig(configPath));

    expect(err.title).toBe("Config file missing.");
    expect(err.next).toBe(`Run: shard-keeper init --config ${configPath}`);
  });
});

describe("parseKeeperConfig", () => {
  it("treats an empty document as all defaults", () => {
    expect(parseKeeperConfig("", "/etc/shard-keeper/config.yaml")).toEqual(getDefaultConfig());
  });

  it("rejects invalid YAML", () => {
    const err = captureError(() => parseKeeperConfig("deployments: [", "/tmp/c.yaml"));

    expect(err.title).toBe("Config file is not valid YAML.");
  });

  it("lists every invalid key", () => {
    const source = ["trigger: relative/path", "artifacts:", "  mode: rw-r-----", "extra: 1"].join(
      "\n",
    );

    const err = captureError(() => parseKeeperConfig(source, "/tmp/c.yaml"));

    expect(err.title).toBe("Config file is invalid.");
    expect(err.message.split("\n")).toEqual([
      "/tmp/c.yaml failed validation:",
      "  - trigger: Expected an absolute path",
      '  - artifacts.mode: Expected an octal file mode such as "0640"',
      "  - <root>: Unrecognized keys: extra",
    ]);
  });
});

describe("sharding hosts", () => {
  it("accepts hostnames and a dotted suffix", () => {
    const source = [
      "sharding:",
      "  host_suffix: .example.org",
      "  shards:",
      "    - port: 9801",
      "      hosts: [chat, chat-2.example.com]",
    ].join("\n");

    const config = parseKeeperConfig(source, "/tmp/c.yaml");

    expect(config.sharding?.shards).toEqual([
      { port: 9801, hosts: ["chat", "chat-2.example.com"] },
    ]);
  });

  it("rejects blank hosts and hosts that would break the proxy config", () => {
    const source = [
      "sharding:",
      "  shards:",
      "    - port: 9801",
      `      hosts: ["  ", "a'b.example.com", "chat.example.com"]`,
    ].join("\n");

    const err = captureError(() => parseKeeperConfig(source, "/tmp/c.yaml"));

    expect(err.message.split("\n")).toEqual([
      "/tmp/c.yaml failed validation:",
      '  - sharding.shards.0.hosts.0: Expected a hostname such as "chat.example.com"',
      '  - sharding.shards.0.hosts.1: Expected a hostname such as "chat.example.com"',
    ]);
  });
});

function captureError(fn: () => unknown): UserFacingError {
  try {
    fn();
  } catch (err) {
    if (err instanceof UserFacingError) return err;
    throw err;
  }
  throw new Error("Expected a UserFacingError");
}
