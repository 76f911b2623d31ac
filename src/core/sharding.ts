/*
Purpose: render the proxy-variable and sharding-map files from a sharding layout.
Assumptions: hosts are ASCII hostnames; group order in the config is the output order.
Usage: const layout = buildShardLayout(config.sharding); renderProxyVars(layout); renderShardMap(layout).
*/

import type { ShardingConfig } from "./config.js";
import { ConfigError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ShardAssignment = {
  host: string;
  port: number;
};

export type ShardLayout = {
  upstreamPrefix: string;
  defaultPort: number;
  groups: Array<{ port: number; hosts: string[] }>;
};

// =============================================================================
// LAYOUT
// =============================================================================

export function buildShardLayout(sharding: ShardingConfig): ShardLayout {
  const seen = new Map<string, number>();
  const groups: ShardLayout["groups"] = [];

  for (const group of sharding.shards) {
    const hosts: string[] = [];
    for (const entry of group.hosts) {
      const host = qualifyHost(entry, sharding.host_suffix);
      const existing = seen.get(host);
      if (existing !== undefined) {
        throw new ConfigError(
          `Host ${host} is assigned to both port ${existing} and port ${group.port}.`,
        );
      }
      seen.set(host, group.port);
      hosts.push(host);
    }
    groups.push({ port: group.port, hosts });
  }

  return {
    upstreamPrefix: sharding.upstream_prefix,
    defaultPort: sharding.default_port,
    groups,
  };
}

export function listAssignments(layout: ShardLayout): ShardAssignment[] {
  return layout.groups.flatMap((group) => group.hosts.map((host) => ({ host, port: group.port })));
}

function qualifyHost(entry: string, suffix: string | undefined): string {
  const host = entry.trim();
  if (host.includes(".")) return host;

  if (!suffix) {
    throw new ConfigError(
      `Shard host "${host}" has no domain and sharding.host_suffix is not set.`,
    );
  }
  return `${host}.${suffix.replace(/^\./, "")}`;
}

// =============================================================================
// RENDERING
// =============================================================================

export function renderDefaultProxyVars(upstreamPrefix: string, defaultPort: number): string {
  return `set $tornado_server ${upstreamPrefix}${defaultPort};\n`;
}

export function renderProxyVars(layout: ShardLayout): string {
  let out = renderDefaultProxyVars(layout.upstreamPrefix, layout.defaultPort);

  for (const group of layout.groups) {
    for (const host of group.hosts) {
      out += [
        `if ($host = '${host}') {`,
        `    set $tornado_server ${layout.upstreamPrefix}${group.port};`,
        "}",
        "",
      ].join("\n");
    }
    out += "\n";
  }

  return out;
}

/**
 * Compact mapping with ", " and ": " separators, e.g. {"a.example.com": 9801}.
 * The empty layout renders as "{}\n", the same bytes the materializer seeds.
 */
export function renderShardMap(layout: ShardLayout): string {
  const entries = listAssignments(layout).map(
    ({ host, port }) => `${JSON.stringify(host)}: ${port}`,
  );
  return `{${entries.join(", ")}}\n`;
}

export function parseShardMap(content: string): Record<string, number> {
  const parsed: unknown = JSON.parse(content);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError("Sharding map must be a JSON object.");
  }

  const map: Record<string, number> = {};
  for (const [host, port] of Object.entries(parsed)) {
    if (typeof port !== "number" || !Number.isInteger(port)) {
      throw new ConfigError(`Sharding map entry for ${host} is not an integer port.`);
    }
    map[host] = port;
  }
  return map;
}
