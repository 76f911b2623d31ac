import { describe, expect, it } from "vitest";

import type { ShardingConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import {
  buildShardLayout,
  listAssignments,
  parseShardMap,
  renderProxyVars,
  renderShardMap,
} from "./sharding.js";

function sharding(overrides: Partial<ShardingConfig> = {}): ShardingConfig {
  return {
    upstream_prefix: "http://tornado",
    default_port: 9800,
    shards: [],
    ...overrides,
  };
}

describe("buildShardLayout", () => {
  it("qualifies bare hosts with the suffix", () => {
    const layout = buildShardLayout(
      sharding({
        host_suffix: ".example.org",
        shards: [{ port: 9801, hosts: ["a", "b.example.com"] }],
      }),
    );

    expect(listAssignments(layout)).toEqual([
      { host: "a.example.org", port: 9801 },
      { host: "b.example.com", port: 9801 },
    ]);
  });

  it("rejects a bare host without a suffix", () => {
    expect(() => buildShardLayout(sharding({ shards: [{ port: 9801, hosts: ["a"] }] }))).toThrow(
      ConfigError,
    );
  });

  it("rejects a host assigned twice", () => {
    const config = sharding({
      shards: [
        { port: 9801, hosts: ["a.example.com"] },
        { port: 9802, hosts: ["a.example.com"] },
      ],
    });

    expect(() => buildShardLayout(config)).toThrow(
      "Host a.example.com is assigned to both port 9801 and port 9802.",
    );
  });
});

describe("renderProxyVars", () => {
  it("renders only the default upstream for an empty layout", () => {
    expect(renderProxyVars(buildShardLayout(sharding()))).toBe(
      "set $tornado_server http://tornado9800;\n",
    );
  });

  it("routes each host to its shard port", () => {
    const layout = buildShardLayout(
      sharding({ shards: [{ port: 9801, hosts: ["chat.example.com"] }] }),
    );

    expect(renderProxyVars(layout)).toBe(
      "set $tornado_server http://tornado9800;\n" +
        "if ($host = 'chat.example.com') {\n" +
        "    set $tornado_server http://tornado9801;\n" +
        "}\n" +
        "\n",
    );
  });
});

describe("renderShardMap", () => {
  it("renders an empty layout as the seeded empty mapping", () => {
    expect(renderShardMap(buildShardLayout(sharding()))).toBe("{}\n");
  });

  it("renders host to port pairs in config order", () => {
    const layout = buildShardLayout(
      sharding({
        shards: [
          { port: 9802, hosts: ["z.example.com"] },
          { port: 9801, hosts: ["a.example.com"] },
        ],
      }),
    );

    const rendered = renderShardMap(layout);

    expect(rendered).toBe('{"z.example.com": 9802, "a.example.com": 9801}\n');
    expect(parseShardMap(rendered)).toEqual({ "z.example.com": 9802, "a.example.com": 9801 });
  });
});

describe("parseShardMap", () => {
  it("parses the empty mapping", () => {
    expect(parseShardMap("{}\n")).toEqual({});
  });

  it("rejects non-object documents and non-integer ports", () => {
    expect(() => parseShardMap("[]")).toThrow("Sharding map must be a JSON object.");
    expect(() => parseShardMap('{"a.example.com": "9801"}')).toThrow(
      "Sharding map entry for a.example.com is not an integer port.",
    );
  });
});
