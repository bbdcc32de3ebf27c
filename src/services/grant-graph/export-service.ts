/**
 * Grant Graph Export
 *
 * Write-only exports for external tools: GraphML for Gephi/yEd and a
 * statistics JSON document. Snapshots for reloading live in the codec.
 *
 * @module services/grant-graph/export-service
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { GraphNode } from '../../models/grant-graph.js';
import type { GrantGraphStore } from './graph-store.js';
import { computeStatistics, type GraphStatistics } from './graph-queries.js';

interface GraphMLKey {
  id: string;
  for: 'node' | 'edge';
  name: string;
  type: 'string' | 'double';
}

const GRAPHML_KEYS: readonly GraphMLKey[] = [
  { id: 'd0', for: 'node', name: 'type', type: 'string' },
  { id: 'd1', for: 'node', name: 'title', type: 'string' },
  { id: 'd2', for: 'node', name: 'amount', type: 'string' },
  { id: 'd3', for: 'node', name: 'award_date', type: 'string' },
  { id: 'd4', for: 'node', name: 'start_date', type: 'string' },
  { id: 'd5', for: 'node', name: 'end_date', type: 'string' },
  { id: 'd6', for: 'node', name: 'active', type: 'string' },
  { id: 'd7', for: 'node', name: 'url', type: 'string' },
  { id: 'd8', for: 'node', name: 'role', type: 'string' },
  { id: 'd9', for: 'node', name: 'state', type: 'string' },
  { id: 'd10', for: 'edge', name: 'relationship', type: 'string' },
];

const KEY_BY_NAME = new Map(GRAPHML_KEYS.map((key) => [`${key.for}:${key.name}`, key.id]));

// Characters XML 1.0 does not allow, even as references
const XML_INVALID_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;

export function escapeXml(value: string): string {
  return value
    .replace(XML_INVALID_CHARS, '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function dataElement(scope: 'node' | 'edge', name: string, value: string): string {
  const key = KEY_BY_NAME.get(`${scope}:${name}`);
  return key ? `<data key="${key}">${escapeXml(value)}</data>` : '';
}

function nodeData(node: GraphNode): string[] {
  const data = [dataElement('node', 'type', node.type)];
  for (const [name, value] of Object.entries(node.attributes)) {
    // Null amounts are omitted
    if (value === null || value === undefined) continue;
    data.push(dataElement('node', name, String(value)));
  }
  return data;
}

/** Render the whole store as a GraphML document */
export function toGraphML(store: GrantGraphStore): string {
  const lines: string[] = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<graphml xmlns="http://graphml.graphdrawing.org/xmlns">',
  ];
  for (const key of GRAPHML_KEYS) {
    lines.push(`  <key id="${key.id}" for="${key.for}" attr.name="${key.name}" attr.type="${key.type}"/>`);
  }
  lines.push('  <graph edgedefault="directed">');

  for (const node of store.getAllNodes()) {
    lines.push(`    <node id="${escapeXml(node.id)}">${nodeData(node).join('')}</node>`);
  }

  store.getAllEdges().forEach((edge, index) => {
    lines.push(
      `    <edge id="e${index}" source="${escapeXml(edge.source)}" target="${escapeXml(edge.target)}">` +
        `${dataElement('edge', 'relationship', edge.relationship)}</edge>`
    );
  });

  lines.push('  </graph>', '</graphml>');
  return lines.join('\n') + '\n';
}

export function exportGraphML(store: GrantGraphStore, filePath: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, toGraphML(store), 'utf-8');
  console.error(`[Export] GraphML written to ${filePath}`);
}

export function exportStatistics(store: GrantGraphStore, filePath: string): GraphStatistics {
  const statistics = computeStatistics(store);
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, JSON.stringify(statistics, null, 2), 'utf-8');
  console.error(`[Export] Statistics written to ${filePath}`);
  return statistics;
}
