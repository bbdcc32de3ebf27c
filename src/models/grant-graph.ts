/**
 * Grant Graph Model
 *
 * Node and edge types for the award graph. Each node type carries a fixed
 * attribute schema; the node identifier doubles as its display name.
 *
 * @module models/grant-graph
 */

// ═══════════════════════════════════════════════════════════════════════════════
// VOCABULARIES
// ═══════════════════════════════════════════════════════════════════════════════

export const NODE_TYPES = [
  'Award',
  'Person',
  'Organization',
  'State',
  'County',
  'Program',
  'Technology_Area',
] as const;

export type NodeType = (typeof NODE_TYPES)[number];

export const RELATIONSHIP_TYPES = [
  'LEADS',
  'CO_LEADS',
  'AWARDED_TO',
  'LOCATED_IN_STATE',
  'LOCATED_IN_COUNTY',
  'FUNDED_BY',
  'INVOLVES_TECH',
] as const;

export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

export const PERSON_ROLES = ['PI', 'CoPI'] as const;

export type PersonRole = (typeof PERSON_ROLES)[number];

/** Node types the neighborhood extractor shows but never expands through */
export const TERMINAL_NODE_TYPES: ReadonlySet<NodeType> = new Set<NodeType>(['State', 'County']);

// ═══════════════════════════════════════════════════════════════════════════════
// ATTRIBUTES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Raw funding amount as ingested. Numeric cells become numbers; anything
 * else is kept verbatim so aggregations can coerce it to 0.
 */
export type FundingAmount = number | string | null;

export interface AwardAttributes {
  title: string;
  amount: FundingAmount;
  award_date: string;
  start_date: string;
  end_date: string;
  active: string;
  url: string;
}

export interface PersonAttributes {
  /** Role seen on the first award that introduced this person */
  role: PersonRole;
}

export interface CountyAttributes {
  /** Owning state name, or 'N/A' when the source row had none */
  state: string;
}

export type EmptyAttributes = Record<string, never>;

export interface NodeAttributeMap {
  Award: AwardAttributes;
  Person: PersonAttributes;
  Organization: EmptyAttributes;
  State: EmptyAttributes;
  County: CountyAttributes;
  Program: EmptyAttributes;
  Technology_Area: EmptyAttributes;
}

// ═══════════════════════════════════════════════════════════════════════════════
// NODES AND EDGES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Tagged node variant. `GraphNode<'Award'>` narrows to the award shape;
 * plain `GraphNode` is the union of every type.
 */
export type GraphNode<T extends NodeType = NodeType> = {
  [K in T]: {
    id: string;
    type: K;
    attributes: NodeAttributeMap[K];
  };
}[T];

export interface GraphEdge {
  source: string;
  target: string;
  relationship: RelationshipType;
}

export function isNodeOfType<T extends NodeType>(
  node: GraphNode | undefined,
  type: T
): node is Extract<GraphNode, { type: T }> {
  return node !== undefined && node.type === type;
}

/**
 * Strict-ish funding parse. Strips currency symbols, thousands separators
 * and whitespace.
 *
 * @returns null when the value is absent or not a finite number
 */
export function tryParseAmount(value: FundingAmount | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  const cleaned = value.replace(/[$,\s]/g, '');
  if (cleaned.length === 0) return null;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

/** Permissive funding coercion: anything unparseable counts as 0 */
export function parseAmount(value: FundingAmount | undefined): number {
  return tryParseAmount(value) ?? 0;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SOURCE RECORDS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One row of the award export. Every field except the amount is optional
 * text; blank cells arrive as undefined.
 */
export interface AwardRecord {
  awardId?: string;
  title?: string;
  amount?: FundingAmount;
  awardDate?: string;
  startDate?: string;
  endDate?: string;
  active?: string;
  url?: string;
  people?: string;
  organization?: string;
  state?: string;
  county?: string;
  programs?: string;
  technologyAreas?: string;
}
