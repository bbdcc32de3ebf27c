/**
 * Neighborhood Renderer
 *
 * Turns an extracted neighborhood into display data (colors, labels,
 * sizes, tooltips) and emits either a standalone vis-network HTML page or
 * a Mermaid flowchart.
 *
 * @module services/visualization/renderer
 */

import { NODE_TYPES, parseAmount, type GraphEdge, type GraphNode, type NodeType } from '../../models/grant-graph.js';
import type { Neighborhood } from '../grant-graph/neighborhood.js';

export const NODE_COLORS: Readonly<Record<NodeType, string>> = {
  Award: '#FF6B6B',
  Person: '#4ECDC4',
  Organization: '#45B7D1',
  State: '#96CEB4',
  County: '#FFEAA7',
  Program: '#DFE6E9',
  Technology_Area: '#A29BFE',
};

export const FALLBACK_COLOR = '#95A5A6';

const LEGEND: ReadonlyArray<{ type: NodeType; label: string; description: string }> = [
  { type: 'Award', label: 'Awards', description: 'Grant awards' },
  { type: 'Person', label: 'People', description: 'PIs and Co-PIs' },
  { type: 'Organization', label: 'Organizations', description: 'Institutions' },
  { type: 'State', label: 'States', description: 'US States' },
  { type: 'County', label: 'Counties', description: 'Geographic regions' },
  { type: 'Program', label: 'Programs', description: 'Funding programs' },
  { type: 'Technology_Area', label: 'Technology Areas', description: 'Tech focus' },
];

const CENTER_SIZE = 30;
const AWARD_SIZE = 20;
const DEFAULT_SIZE = 15;
const MAX_LABEL_LENGTH = 30;

export interface VisualNode {
  id: string;
  label: string;
  title: string;
  color: string;
  size: number;
}

export interface VisualEdge {
  from: string;
  to: string;
  label: string;
  title: string;
}

export interface RenderOptions {
  title?: string;
  description?: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DISPLAY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

export function colorFor(type: string): string {
  for (const nodeType of NODE_TYPES) {
    if (nodeType === type) return NODE_COLORS[nodeType];
  }
  return FALLBACK_COLOR;
}

export function nodeLabel(node: GraphNode): string {
  if (node.type === 'Award') {
    return `Award: ${node.id.slice(0, 15)}...`;
  }
  return node.id.length < MAX_LABEL_LENGTH ? node.id : `${node.id.slice(0, 27)}...`;
}

function formatUsd(amount: number): string {
  return amount.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

export function nodeTooltip(node: GraphNode): string {
  if (node.type === 'Award') {
    const title = escapeHtml(node.attributes.title.slice(0, 100));
    const amount = formatUsd(parseAmount(node.attributes.amount));
    return `<b>Award ID:</b> ${escapeHtml(node.id)}<br><b>Title:</b> ${title}...<br><b>Amount:</b> $${amount}`;
  }
  return `<b>${node.type}:</b> ${escapeHtml(node.id)}`;
}

export function nodeSize(node: GraphNode, center: string): number {
  if (node.id === center) return CENTER_SIZE;
  return node.type === 'Award' ? AWARD_SIZE : DEFAULT_SIZE;
}

export function toVisualNode(node: GraphNode, center: string): VisualNode {
  return {
    id: node.id,
    label: nodeLabel(node),
    title: nodeTooltip(node),
    color: colorFor(node.type),
    size: nodeSize(node, center),
  };
}

export function toVisualEdge(edge: GraphEdge): VisualEdge {
  return { from: edge.source, to: edge.target, label: edge.relationship, title: edge.relationship };
}

/**
 * Output file name for a neighborhood: path separators and spaces become
 * underscores, commas are dropped, and the center part is cut to 50
 * characters.
 */
export function visualizationFileName(center: string, depth: number): string {
  const safe = center.replace(/[/\\ ]/g, '_').replace(/,/g, '').slice(0, 50);
  return `viz_${safe}_${depth}.html`;
}

export function countNodeTypes(nodes: readonly GraphNode[]): Partial<Record<NodeType, number>> {
  const counts: Partial<Record<NodeType, number>> = {};
  for (const node of nodes) {
    counts[node.type] = (counts[node.type] ?? 0) + 1;
  }
  return counts;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HTML
// ═══════════════════════════════════════════════════════════════════════════════

/** JSON that is safe inside a <script> element */
function scriptJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

function legendHtml(counts: Partial<Record<NodeType, number>>): string {
  return LEGEND.map(
    (entry) =>
      `    <div class="legend-item"><div class="legend-color" style="background-color: ${NODE_COLORS[entry.type]};"></div>` +
      `<span><strong>${entry.label}</strong> - ${entry.description} (${counts[entry.type] ?? 0})</span></div>`
  ).join('\n');
}

/**
 * Standalone HTML page for a neighborhood. Display data can be passed in
 * when the caller already mapped it (the job runner reports progress while
 * mapping); otherwise it is derived here.
 */
export function renderNeighborhoodHtml(
  neighborhood: Neighborhood,
  options: RenderOptions = {},
  visual?: { nodes: VisualNode[]; edges: VisualEdge[] }
): string {
  const { center } = neighborhood;
  const nodes = visual?.nodes ?? neighborhood.nodes.map((node) => toVisualNode(node, center));
  const edges = visual?.edges ?? neighborhood.edges.map(toVisualEdge);
  const counts = countNodeTypes(neighborhood.nodes);
  const centerType = neighborhood.nodes.find((node) => node.id === center)?.type ?? 'Unknown';

  const title = escapeHtml(options.title ?? `Grant Graph: ${center}`);
  const description = options.description
    ? escapeHtml(options.description)
    : `Interactive network visualization centered on ${centerType}: <strong>${escapeHtml(center)}</strong>`;
  const centerDisplay = escapeHtml(center.length > 40 ? `${center.slice(0, 40)}...` : center);
  const typeCount = Object.keys(counts).length;

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${title}</title>
<script src="https://unpkg.com/vis-network/standalone/umd/vis-network.min.js"></script>
<style>
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; margin: 0; }
  .info-panel { background: linear-gradient(135deg, #667eea 0%, #764ba2 100%); color: white; padding: 20px 30px; }
  .info-panel h1 { margin: 0 0 10px 0; font-size: 28px; }
  .stats-grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(200px, 1fr)); gap: 15px; margin-top: 15px; }
  .stat-box { background: rgba(255,255,255,0.15); padding: 12px; border-radius: 8px; }
  .stat-label { font-size: 11px; text-transform: uppercase; letter-spacing: 1px; opacity: 0.8; }
  .stat-value { font-size: 20px; font-weight: 700; }
  .legend { background: #f8f9fa; padding: 15px 30px; border-bottom: 1px solid #dee2e6; font-size: 13px; }
  .legend-items { display: flex; flex-wrap: wrap; gap: 15px; }
  .legend-item { display: flex; align-items: center; gap: 8px; }
  .legend-color { width: 16px; height: 16px; border-radius: 50%; border: 2px solid #dee2e6; }
  #network { width: 100%; height: 750px; }
</style>
</head>
<body>
<div class="info-panel">
  <h1>${title}</h1>
  <p>${description}</p>
  <div class="stats-grid">
    <div class="stat-box"><div class="stat-label">Total Nodes</div><div class="stat-value">${neighborhood.nodes.length}</div></div>
    <div class="stat-box"><div class="stat-label">Total Connections</div><div class="stat-value">${neighborhood.edges.length}</div></div>
    <div class="stat-box"><div class="stat-label">Center Node</div><div class="stat-value">${centerDisplay}</div></div>
  </div>
</div>
<div class="legend">
  <div class="legend-title">Node Types (${typeCount} types, ${neighborhood.nodes.length} total)</div>
  <div class="legend-items">
${legendHtml(counts)}
  </div>
</div>
<div id="network"></div>
<script>
  const nodes = new vis.DataSet(${scriptJson(nodes)});
  const edges = new vis.DataSet(${scriptJson(edges)});
  new vis.Network(document.getElementById('network'), { nodes, edges }, {
    edges: { arrows: 'to' },
    physics: { barnesHut: { gravitationalConstant: -8000, centralGravity: 0.3, springLength: 100 } },
  });
</script>
</body>
</html>
`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MERMAID
// ═══════════════════════════════════════════════════════════════════════════════

function mermaidText(value: string): string {
  return value.replace(/"/g, '#quot;');
}

/** Mermaid `graph LR` text with one class per node type */
export function renderNeighborhoodMermaid(neighborhood: Neighborhood): string {
  const ids = new Map<string, string>();
  neighborhood.nodes.forEach((node, index) => ids.set(node.id, `n${index}`));

  const lines = ['graph LR'];
  for (const node of neighborhood.nodes) {
    lines.push(`  ${ids.get(node.id)}["${mermaidText(nodeLabel(node))}"]:::${node.type}`);
  }
  for (const edge of neighborhood.edges) {
    const from = ids.get(edge.source);
    const to = ids.get(edge.target);
    if (from && to) {
      lines.push(`  ${from} -->|${edge.relationship}| ${to}`);
    }
  }
  for (const type of NODE_TYPES) {
    lines.push(`  classDef ${type} fill:${NODE_COLORS[type]}`);
  }
  return lines.join('\n');
}
