/**
 * Grant Graph Builder
 *
 * Single sequential pass over award records. Each record upserts its Award
 * node and then connects people, organization (with state and county),
 * programs and technology areas. Each connection step only depends on its
 * own source field being present.
 *
 * @module services/grant-graph/graph-builder
 */

import type { AwardRecord } from '../../models/grant-graph.js';
import { countyIdentifier, parsePeople, splitDelimitedList } from './entity-normalizer.js';
import { GrantGraphStore, type NodeTypeCounts, type RelationshipCounts } from './graph-store.js';

const PROGRESS_INTERVAL = 500;
const MISSING_TEXT = 'N/A';

export interface BuildOptions {
  /** Store to populate. A fresh store is created when omitted. */
  store?: GrantGraphStore;
  /** Called every PROGRESS_INTERVAL rows with (processed, total) */
  onProgress?: (processed: number, total: number) => void;
}

export interface BuildResult {
  store: GrantGraphStore;
  rows_processed: number;
  rows_skipped: number;
  node_counts: NodeTypeCounts;
  edge_counts: RelationshipCounts;
  total_nodes: number;
  total_edges: number;
}

function present(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

function textOr(value: string | undefined, fallback: string): string {
  return present(value) ? value : fallback;
}

/**
 * Apply one record to the store.
 *
 * @returns false when the record has no award identifier and was skipped
 */
export function ingestRecord(store: GrantGraphStore, record: AwardRecord): boolean {
  if (!present(record.awardId)) {
    return false;
  }
  const awardId = record.awardId.trim();

  store.upsertNode({
    id: awardId,
    type: 'Award',
    attributes: {
      title: textOr(record.title, MISSING_TEXT),
      amount: record.amount ?? null,
      award_date: textOr(record.awardDate, MISSING_TEXT),
      start_date: textOr(record.startDate, MISSING_TEXT),
      end_date: textOr(record.endDate, MISSING_TEXT),
      active: textOr(record.active, MISSING_TEXT),
      url: textOr(record.url, ''),
    },
  });

  if (present(record.people)) {
    for (const person of parsePeople(record.people)) {
      store.upsertNode({ id: person.name, type: 'Person', attributes: { role: person.role } });
      store.upsertEdge(person.name, awardId, person.role === 'PI' ? 'LEADS' : 'CO_LEADS');
    }
  }

  if (present(record.organization)) {
    const organization = record.organization.trim();
    const state = present(record.state) ? record.state.trim() : undefined;
    store.upsertNode({ id: organization, type: 'Organization', attributes: {} });
    store.upsertEdge(awardId, organization, 'AWARDED_TO');

    if (state) {
      store.upsertNode({ id: state, type: 'State', attributes: {} });
      store.upsertEdge(organization, state, 'LOCATED_IN_STATE');
    }

    if (present(record.county)) {
      const county = countyIdentifier(record.county.trim(), state);
      store.upsertNode({ id: county, type: 'County', attributes: { state: state ?? MISSING_TEXT } });
      store.upsertEdge(organization, county, 'LOCATED_IN_COUNTY');
    }
  }

  if (present(record.programs)) {
    for (const program of splitDelimitedList(record.programs)) {
      store.upsertNode({ id: program, type: 'Program', attributes: {} });
      store.upsertEdge(awardId, program, 'FUNDED_BY');
    }
  }

  if (present(record.technologyAreas)) {
    for (const area of splitDelimitedList(record.technologyAreas)) {
      store.upsertNode({ id: area, type: 'Technology_Area', attributes: {} });
      store.upsertEdge(awardId, area, 'INVOLVES_TECH');
    }
  }

  return true;
}

/**
 * Build a graph from a full set of records. Rows without an award
 * identifier are skipped and counted, never fatal.
 */
export function buildGrantGraph(records: readonly AwardRecord[], options: BuildOptions = {}): BuildResult {
  const store = options.store ?? new GrantGraphStore();
  let skipped = 0;

  records.forEach((record, index) => {
    if (index % PROGRESS_INTERVAL === 0) {
      options.onProgress?.(index, records.length);
    }
    if (!ingestRecord(store, record)) {
      skipped++;
    }
  });

  if (skipped > 0) {
    console.error(`[GraphBuilder] Skipped ${skipped} row(s) without an award identifier`);
  }
  console.error(
    `[GraphBuilder] Built graph: ${store.nodeCount} nodes, ${store.edgeCount} edges from ${records.length} rows`
  );

  return {
    store,
    rows_processed: records.length - skipped,
    rows_skipped: skipped,
    node_counts: store.getNodeCounts(),
    edge_counts: store.getRelationshipCounts(),
    total_nodes: store.nodeCount,
    total_edges: store.edgeCount,
  };
}
