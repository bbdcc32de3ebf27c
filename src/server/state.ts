/**
 * MCP Server State Management
 *
 * Holds the current grant graph, server configuration and the
 * visualization job registry. FAIL FAST: graph access throws immediately
 * if no graph has been built or loaded.
 *
 * @module server/state
 */

import { existsSync } from 'fs';
import { resolve } from 'path';
import type { GrantGraphStore } from '../services/grant-graph/graph-store.js';
import { loadSnapshot, saveSnapshot, SnapshotFormatError } from '../services/grant-graph/snapshot-codec.js';
import { VisualizationJobRegistry } from '../services/visualization/job-registry.js';
import { graphNotLoadedError, pathNotFoundError, snapshotInvalidError } from './errors.js';
import { ServerConfigSchema, type ServerConfig, type ServerState } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Default server configuration
 */
const defaultConfig: ServerConfig = ServerConfigSchema.parse({});

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Global server state
 * Mutable state for the current graph and configuration
 */
export const state: ServerState = {
  currentGraph: null,
  currentSource: null,
  loadedAt: null,
  config: { ...defaultConfig },
};

let _jobRegistry: VisualizationJobRegistry | null = null;

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Require a graph to be loaded - FAIL FAST if not
 *
 * @throws MCPError with GRAPH_NOT_LOADED if no graph is loaded
 */
export function requireGraph(): GrantGraphStore {
  if (!state.currentGraph) {
    throw graphNotLoadedError();
  }
  return state.currentGraph;
}

export function hasGraph(): boolean {
  return state.currentGraph !== null;
}

/**
 * Replace the current graph. Queries already running keep the store they
 * started with; the store itself is never mutated after construction.
 */
export function setGraph(graph: GrantGraphStore, source: string): void {
  state.currentGraph = graph;
  state.currentSource = source;
  state.loadedAt = new Date().toISOString();
}

export function clearGraph(): void {
  state.currentGraph = null;
  state.currentSource = null;
  state.loadedAt = null;
}

/**
 * Load a snapshot and make it current
 *
 * @throws MCPError with PATH_NOT_FOUND if the file does not exist
 * @throws MCPError with SNAPSHOT_INVALID if the file is corrupt or foreign
 */
export function loadGraphFromSnapshot(snapshotPath?: string): GrantGraphStore {
  const filePath = resolve(snapshotPath ?? state.config.snapshotPath);
  if (!existsSync(filePath)) {
    throw pathNotFoundError(filePath);
  }
  let graph: GrantGraphStore;
  try {
    graph = loadSnapshot(filePath);
  } catch (error) {
    if (error instanceof SnapshotFormatError) {
      throw snapshotInvalidError(filePath, error.message, error.issues);
    }
    throw error;
  }
  setGraph(graph, filePath);
  return graph;
}

/**
 * Save the current graph
 *
 * @returns absolute path written
 * @throws MCPError with GRAPH_NOT_LOADED if no graph is loaded
 */
export function saveCurrentGraph(snapshotPath?: string): string {
  const graph = requireGraph();
  const filePath = resolve(snapshotPath ?? state.config.snapshotPath);
  saveSnapshot(graph, filePath);
  return filePath;
}

// ═══════════════════════════════════════════════════════════════════════════════
// VISUALIZATION JOBS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Job registry bound to the current graph and configured output directory.
 * Created on first use.
 */
export function getJobRegistry(): VisualizationJobRegistry {
  if (!_jobRegistry) {
    _jobRegistry = new VisualizationJobRegistry({
      outputDir: resolve(state.config.outputDir),
      retentionMs: state.config.jobRetentionMs,
      getGraph: () => state.currentGraph,
    });
  }
  return _jobRegistry;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Get current server configuration
 */
export function getConfig(): ServerConfig {
  return { ...state.config };
}

/**
 * Update server configuration. The job registry is rebuilt on next use so
 * output directory and retention changes take effect; jobs already
 * submitted stay with the old registry.
 */
export function updateConfig(updates: Partial<ServerConfig>): void {
  state.config = ServerConfigSchema.parse({ ...state.config, ...updates });
  _jobRegistry = null;
}

/** Environment variables that override configuration keys */
const ENV_OVERRIDES = {
  GRANT_GRAPH_SNAPSHOT: 'snapshotPath',
  GRANT_GRAPH_OUTPUT_DIR: 'outputDir',
  GRANT_GRAPH_MAX_DEPTH: 'maxDepth',
  GRANT_GRAPH_JOB_RETENTION_MS: 'jobRetentionMs',
} as const satisfies Record<string, keyof ServerConfig>;

const NUMERIC_KEYS: ReadonlySet<keyof ServerConfig> = new Set<keyof ServerConfig>(['maxDepth', 'jobRetentionMs']);

/**
 * Apply environment overrides on top of the current configuration
 *
 * @returns names of the variables that were applied
 * @throws ZodError when an override has an invalid value
 */
export function applyEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): string[] {
  const updates: Record<string, string | number> = {};
  const applied: string[] = [];
  for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
    const raw = env[variable];
    if (raw === undefined || raw.trim() === '') continue;
    updates[key] = NUMERIC_KEYS.has(key) ? Number(raw) : raw;
    applied.push(variable);
  }
  if (applied.length > 0) {
    state.config = ServerConfigSchema.parse({ ...state.config, ...updates });
    _jobRegistry = null;
  }
  return applied;
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  state.config = { ...defaultConfig };
  _jobRegistry = null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTING)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all server state - ONLY USE IN TESTS
 */
export function resetState(): void {
  clearGraph();
  _jobRegistry = null;
  state.config = { ...defaultConfig };
}
