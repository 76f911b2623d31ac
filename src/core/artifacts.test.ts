import { describe, expect, it } from "vitest";

import {
  PROXY_VARS_DEFAULT_CONTENT,
  SHARD_MAP_DEFAULT_CONTENT,
  buildArtifactSpecs,
  planArtifact,
} from "./artifacts.js";
import { getDefaultConfig } from "./config.js";
import { parseShardMap } from "./sharding.js";

describe("buildArtifactSpecs", () => {
  it("describes both artifacts with the service account and mode 0640", () => {
    const [proxyVars, shardMap] = buildArtifactSpecs(getDefaultConfig());

    expect(proxyVars).toEqual({
      kind: "proxy_vars",
      path: "/etc/zulip/nginx_sharding.conf",
      owner: "zulip",
      group: "zulip",
      mode: 0o640,
      defaultContent: "set $tornado_server http://tornado;\n",
      replace: false,
    });
    expect(shardMap?.path).toBe("/etc/zulip/sharding.json");
    expect(shardMap?.defaultContent).toBe("{}\n");
  });
});

describe("planArtifact", () => {
  const [spec] = buildArtifactSpecs(getDefaultConfig());

  it("creates an absent artifact and requests a reload", () => {
    if (!spec) throw new Error("expected an artifact spec");

    expect(planArtifact({ exists: false }, spec)).toEqual({
      action: "create",
      effects: [
        { type: "create_file", spec },
        { type: "notify_reload", kind: "proxy_vars" },
      ],
    });
  });

  it("keeps an existing artifact with no effects", () => {
    if (!spec) throw new Error("expected an artifact spec");

    expect(planArtifact({ exists: true }, spec)).toEqual({ action: "keep", effects: [] });
  });
});

describe("default content", () => {
  it("seeds the proxy variable file with the bare upstream", () => {
    expect(PROXY_VARS_DEFAULT_CONTENT).toBe("set $tornado_server http://tornado;\n");
  });

  it("seeds the sharding map with an empty mapping", () => {
    expect(parseShardMap(SHARD_MAP_DEFAULT_CONTENT)).toEqual({});
  });
});
