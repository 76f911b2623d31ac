import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";
import type { ZodIssue } from "zod";

import {
  KeeperConfigSchema,
  getDefaultConfig,
  resolveKeeperConfig,
  type KeeperConfig,
} from "./config.js";
import { ConfigError, USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadKeeperConfig(configPath: string): KeeperConfig {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config file missing.",
      message: `No config file found at ${resolved}.`,
      hint: "Check the --config path or SHARD_KEEPER_CONFIG.",
      next: `Run: shard-keeper init --config ${resolved}`,
      cause: new ConfigError(`Config file not found: ${resolved}`),
    });
  }

  return parseKeeperConfig(fs.readFileSync(resolved, "utf8"), resolved);
}

export function parseKeeperConfig(source: string, configPath: string): KeeperConfig {
  let raw: unknown;
  try {
    raw = parseYaml(source);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config file is not valid YAML.",
      message: `Failed to parse ${configPath}.`,
      hint: "Fix the YAML syntax error reported below (run with --debug for details).",
      cause: new ConfigError(`YAML parse error in ${configPath}`, err),
    });
  }

  // An empty file parses to null: treat it as "all defaults".
  if (raw === null || raw === undefined) {
    return getDefaultConfig();
  }

  const result = KeeperConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatConfigIssues(result.error.issues);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config file is invalid.",
      message: [`${configPath} failed validation:`, ...issues.map((i) => `  - ${i}`)].join("\n"),
      hint: `Edit ${configPath} and fix the listed keys.`,
      cause: new ConfigError(`Invalid config at ${configPath}`, result.error),
    });
  }

  return resolveKeeperConfig(result.data);
}

export function formatConfigIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}
