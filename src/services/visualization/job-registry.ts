/**
 * Visualization Job Registry
 *
 * Owns background rendering jobs. A job is submitted with a center node
 * and depth, runs on the event loop, and reports discrete progress events
 * (starting, then in_progress repeatedly, then complete or error). Callers
 * poll with get(), stream with subscribe(), or await waitFor().
 *
 * Each job writes only its own output slot, so concurrent jobs never share
 * state. There is no cancellation. Terminal jobs are evicted after the
 * retention window, checked lazily on submit and get.
 *
 * @module services/visualization/job-registry
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { GrantGraphStore } from '../grant-graph/graph-store.js';
import { extractNeighborhood } from '../grant-graph/neighborhood.js';
import {
  renderNeighborhoodHtml,
  toVisualEdge,
  toVisualNode,
  visualizationFileName,
  type VisualEdge,
  type VisualNode,
} from './renderer.js';

const NODE_PROGRESS_INTERVAL = 50;
const EDGE_PROGRESS_INTERVAL = 100;

export type JobStatus = 'starting' | 'in_progress' | 'complete' | 'error';

export type JobStage =
  | 'init'
  | 'extract'
  | 'analyze'
  | 'create'
  | 'nodes'
  | 'edges'
  | 'save'
  | 'finalize'
  | 'complete'
  | 'error';

export interface ProgressEvent {
  job_id: string;
  status: JobStatus;
  stage: JobStage;
  progress: number;
  message: string;
  total_nodes: number;
  url: string;
}

export interface VisualizationJob {
  id: string;
  center: string;
  depth: number;
  url: string;
  output_path: string;
  created_at: string;
  finished_at: string | null;
  latest: ProgressEvent;
  events: ProgressEvent[];
}

export type ProgressListener = (event: ProgressEvent) => void;

export interface JobRegistryOptions {
  /** Directory that receives the generated pages */
  outputDir: string;
  /** Graph the jobs render from, read when each job starts */
  getGraph: () => GrantGraphStore | null;
  /** How long terminal jobs stay queryable */
  retentionMs: number;
  /** Public URL prefix for generated pages */
  urlPrefix?: string;
}

interface JobEntry {
  job: VisualizationJob;
  listeners: Set<ProgressListener>;
  done: Promise<ProgressEvent>;
  finishedAtMs: number | null;
}

export function isTerminal(status: JobStatus): boolean {
  return status === 'complete' || status === 'error';
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export class VisualizationJobRegistry {
  private readonly jobs = new Map<string, JobEntry>();

  constructor(private readonly options: JobRegistryOptions) {}

  /**
   * Start a job. Returns immediately; the job runs in the background.
   */
  submit(center: string, depth: number): { job_id: string; url: string } {
    this.evictExpired();

    const id = uuidv4();
    const fileName = visualizationFileName(center, depth);
    const url = `${this.options.urlPrefix ?? '/static'}/${encodeURIComponent(fileName)}`;
    const initial: ProgressEvent = {
      job_id: id,
      status: 'starting',
      stage: 'init',
      progress: 0,
      message: 'Initializing...',
      total_nodes: 0,
      url,
    };

    const job: VisualizationJob = {
      id,
      center,
      depth,
      url,
      output_path: join(this.options.outputDir, fileName),
      created_at: new Date().toISOString(),
      finished_at: null,
      latest: initial,
      events: [initial],
    };

    const entry: JobEntry = {
      job,
      listeners: new Set(),
      finishedAtMs: null,
      done: Promise.resolve(initial),
    };
    this.jobs.set(id, entry);
    entry.done = this.run(entry);

    console.error(`[Visualization] Job ${id} submitted for "${center}" at depth ${depth}`);
    return { job_id: id, url };
  }

  get(jobId: string): VisualizationJob | undefined {
    this.evictExpired();
    return this.jobs.get(jobId)?.job;
  }

  list(): VisualizationJob[] {
    this.evictExpired();
    return [...this.jobs.values()].map((entry) => entry.job);
  }

  /**
   * Register a progress listener. Events already emitted are replayed
   * first, so a late subscriber still sees the whole sequence.
   *
   * @returns unsubscribe function, or null when the job is unknown
   */
  subscribe(jobId: string, listener: ProgressListener): (() => void) | null {
    const entry = this.jobs.get(jobId);
    if (!entry) return null;

    for (const event of entry.job.events) {
      listener(event);
    }
    if (!isTerminal(entry.job.latest.status)) {
      entry.listeners.add(listener);
    }
    return () => {
      entry.listeners.delete(listener);
    };
  }

  /**
   * Resolves with the terminal event. Never rejects: failures arrive as an
   * `error` event.
   *
   * @returns null when the job is unknown
   */
  waitFor(jobId: string): Promise<ProgressEvent> | null {
    return this.jobs.get(jobId)?.done ?? null;
  }

  /** Drop terminal jobs older than the retention window */
  evictExpired(now: number = Date.now()): number {
    let evicted = 0;
    for (const [id, entry] of this.jobs) {
      if (entry.finishedAtMs !== null && now - entry.finishedAtMs >= this.options.retentionMs) {
        this.jobs.delete(id);
        evicted++;
      }
    }
    return evicted;
  }

  get size(): number {
    return this.jobs.size;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Execution
  // ─────────────────────────────────────────────────────────────────────────────

  private emit(
    entry: JobEntry,
    status: JobStatus,
    stage: JobStage,
    progress: number,
    message: string,
    totalNodes?: number
  ): ProgressEvent {
    const event: ProgressEvent = {
      job_id: entry.job.id,
      status,
      stage,
      progress,
      message,
      total_nodes: totalNodes ?? entry.job.latest.total_nodes,
      url: entry.job.url,
    };
    entry.job.latest = event;
    entry.job.events.push(event);

    for (const listener of entry.listeners) {
      try {
        listener(event);
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        console.error(`[Visualization] Progress listener for job ${entry.job.id} failed: ${detail}`);
      }
    }

    if (isTerminal(status)) {
      entry.finishedAtMs = Date.now();
      entry.job.finished_at = new Date(entry.finishedAtMs).toISOString();
      entry.listeners.clear();
    }
    return event;
  }

  private async run(entry: JobEntry): Promise<ProgressEvent> {
    try {
      await this.render(entry);
      console.error(`[Visualization] Job ${entry.job.id} complete: ${entry.job.output_path}`);
      return this.emit(entry, 'complete', 'complete', 100, 'Visualization complete!');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Visualization] Job ${entry.job.id} failed: ${message}`);
      return this.emit(entry, 'error', 'error', 0, message);
    }
  }

  private async render(entry: JobEntry): Promise<void> {
    const { center, depth } = entry.job;
    await yieldToEventLoop();

    this.emit(entry, 'in_progress', 'extract', 10, 'Extracting subgraph...');
    const graph = this.options.getGraph();
    if (!graph) {
      throw new Error('No grant graph is loaded');
    }
    const neighborhood = extractNeighborhood(graph, center, depth);
    if (!neighborhood) {
      throw new Error(`No subgraph found for node: ${center}`);
    }
    const totalNodes = neighborhood.nodes.length;
    this.emit(entry, 'in_progress', 'extract', 30, `Extracted ${totalNodes} nodes`, totalNodes);
    await yieldToEventLoop();

    this.emit(entry, 'in_progress', 'analyze', 40, 'Analyzing graph structure...', totalNodes);
    const centerType = neighborhood.nodes.find((node) => node.id === center)?.type ?? 'Unknown';

    this.emit(entry, 'in_progress', 'create', 50, 'Creating network visualization...', totalNodes);
    await yieldToEventLoop();

    this.emit(entry, 'in_progress', 'nodes', 60, 'Adding nodes to visualization...', totalNodes);
    const nodes: VisualNode[] = [];
    neighborhood.nodes.forEach((node, index) => {
      nodes.push(toVisualNode(node, center));
      if (index % NODE_PROGRESS_INTERVAL === 0) {
        const progress = 60 + Math.floor((index / totalNodes) * 15);
        this.emit(entry, 'in_progress', 'nodes', progress, `Adding nodes... (${index}/${totalNodes})`, totalNodes);
      }
    });
    await yieldToEventLoop();

    this.emit(entry, 'in_progress', 'edges', 75, 'Adding connections...', totalNodes);
    const totalEdges = neighborhood.edges.length;
    const edges: VisualEdge[] = [];
    neighborhood.edges.forEach((edge, index) => {
      edges.push(toVisualEdge(edge));
      if (index % EDGE_PROGRESS_INTERVAL === 0) {
        const progress = 75 + Math.floor((index / Math.max(totalEdges, 1)) * 15);
        this.emit(entry, 'in_progress', 'edges', progress, `Adding edges... (${index}/${totalEdges})`, totalNodes);
      }
    });

    this.emit(entry, 'in_progress', 'save', 90, 'Saving visualization...', totalNodes);
    const html = renderNeighborhoodHtml(
      neighborhood,
      {
        title: `${centerType}: ${center}`,
        description: `Interactive network visualization showing connections at depth ${depth}`,
      },
      { nodes, edges }
    );
    await mkdir(this.options.outputDir, { recursive: true });
    await writeFile(entry.job.output_path, html, 'utf-8');

    this.emit(entry, 'in_progress', 'finalize', 95, 'Finalizing...', totalNodes);
  }
}
