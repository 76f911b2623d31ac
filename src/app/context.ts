/**
 * KeeperContext + composition root for shard-keeper commands.
 * Purpose: centralize run-scoped config and injected ports to avoid globals.
 * Assumptions: ports are thin adapters over system modules and are overrideable for tests.
 * Usage: buildKeeperContext({ config }) and pass the context to materialize/evaluate/generate.
 */

import { randomUUID } from "node:crypto";

import { triggerStatePath, type KeeperConfig } from "../core/config.js";
import { JsonlLogger } from "../core/logger.js";
import { isoNow } from "../core/utils.js";
import { FsArtifactStore } from "../system/artifact-store.js";
import { createFsProbe } from "../system/file-probe.js";
import { createCommandReloadNotifier } from "../system/reload-notifier.js";
import { createExecaScriptRunner } from "../system/script-runner.js";
import { JsonTriggerStore } from "../system/trigger-store.js";

import type { KeeperPorts } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type KeeperContext = {
  runId: string;
  config: KeeperConfig;
  ports: KeeperPorts;
  logger: JsonlLogger;
};

export type BuildKeeperContextInput = {
  config: KeeperConfig;
  ports?: Partial<KeeperPorts>;
  runId?: string;
  logger?: JsonlLogger;
};

// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export function createDefaultPorts(config: KeeperConfig): KeeperPorts {
  return {
    files: createFsProbe(),
    artifacts: new FsArtifactStore(),
    scripts: createExecaScriptRunner(),
    reload: createCommandReloadNotifier(config.reload.command),
    triggerStore: new JsonTriggerStore(triggerStatePath(config)),
    clock: { isoNow },
  };
}

// =============================================================================
// COMPOSITION ROOT
// =============================================================================

export function buildKeeperContext(input: BuildKeeperContextInput): KeeperContext {
  const runId = input.runId ?? randomUUID();
  const ports: KeeperPorts = {
    ...createDefaultPorts(input.config),
    ...input.ports,
  };
  const logger =
    input.logger ?? new JsonlLogger(input.config.logFile, { runId, now: ports.clock.isoNow });

  return { runId, config: input.config, ports, logger };
}
