/**
 * Port interfaces for shard-keeper runs.
 * Purpose: keep the watcher and materializer independent of the filesystem and subprocesses.
 * Assumptions: adapters are thin; fakes in __tests__/fakes.ts implement the same surface.
 * Usage: createDefaultPorts() in context.ts, or pass partial overrides to buildKeeperContext.
 */

import type { ArtifactSpec } from "../core/artifacts.js";
import type { TriggerState } from "../core/trigger.js";

// =============================================================================
// TYPES
// =============================================================================

export interface FileProbe {
  exists(filePath: string): Promise<boolean>;
  /** Modification time in milliseconds, or null when the file does not exist. */
  mtimeMs(filePath: string): Promise<number | null>;
}

export interface ArtifactStore {
  /**
   * Atomically create the artifact if absent. Resolves to false when the
   * path already exists; existing files are never touched.
   */
  createExclusive(spec: ArtifactSpec): Promise<boolean>;
  /** Atomically replace the artifact content, applying owner and mode. */
  replace(spec: ArtifactSpec, content: string): Promise<void>;
  read(filePath: string): Promise<string | null>;
}

export type ScriptRunResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
};

export interface ScriptRunner {
  run(scriptPath: string, opts: { cwd: string }): Promise<ScriptRunResult>;
}

export interface ReloadNotifier {
  notify(): Promise<void>;
}

export interface TriggerStore {
  read(): Promise<TriggerState | null>;
  write(state: TriggerState): Promise<void>;
}

export interface Clock {
  isoNow(): string;
}

export type KeeperPorts = {
  files: FileProbe;
  artifacts: ArtifactStore;
  scripts: ScriptRunner;
  reload: ReloadNotifier;
  triggerStore: TriggerStore;
  clock: Clock;
};
