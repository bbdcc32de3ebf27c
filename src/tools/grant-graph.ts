/**
 * Grant Graph Query MCP Tools
 *
 * Tools: grant_graph_summary, grant_graph_search, grant_graph_node,
 *        grant_graph_connections, grant_graph_paths,
 *        grant_graph_most_connected, grant_graph_organization_stats,
 *        grant_graph_technology_stats, grant_graph_state_stats,
 *        grant_graph_collaborations, grant_graph_funding_range,
 *        grant_graph_neighborhood
 *
 * All tools are read-only over the current graph.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/grant-graph
 */

import { z } from 'zod';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';
import {
  validateInput,
  OptionalNodeTypeFilter,
  OptionalRelationshipFilter,
} from '../utils/validation.js';
import { getConfig, requireGraph, state } from '../server/state.js';
import { successResult } from '../server/types.js';
import { nodeNotFoundError, validationError } from '../server/errors.js';
import {
  findConnections,
  findPaths,
  getGraphSummary,
  getMostConnectedNodes,
  getNodeDetails,
  queryByFundingRange,
  searchNodes,
} from '../services/grant-graph/graph-queries.js';
import {
  findCollaborators,
  rankOrganizations,
  rankStates,
  rankTechnologies,
} from '../services/grant-graph/aggregate-queries.js';
import { extractNeighborhood } from '../services/grant-graph/neighborhood.js';
import { countNodeTypes, renderNeighborhoodMermaid } from '../services/visualization/renderer.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const SummaryInput = z.object({});

const SearchInput = z.object({
  query: z.string().min(1).describe('Search text (case-insensitive partial match on node name)'),
  node_type: OptionalNodeTypeFilter.describe('Filter by node type'),
  limit: z.number().int().min(1).max(500).optional().describe('Maximum results (default: 20)'),
});

const NodeInput = z.object({
  node_id: z.string().min(1).describe('Exact node ID/name'),
});

const ConnectionsInput = z.object({
  source_node: z.string().min(1).describe('Source node ID'),
  target_node: z
    .string()
    .optional()
    .describe('Target node ID (omit to list every outgoing connection)'),
  relationship_type: OptionalRelationshipFilter.describe('Filter by relationship type'),
});

const PathsInput = z.object({
  source_node: z.string().min(1).describe('Start node ID'),
  target_node: z.string().min(1).describe('End node ID'),
  max_length: z.number().int().min(1).max(5).default(3).describe('Maximum edges per path'),
  max_paths: z.number().int().min(1).max(500).default(100).describe('Maximum paths returned'),
});

const MostConnectedInput = z.object({
  node_type: OptionalNodeTypeFilter.describe('Restrict ranking to one node type'),
  top_n: z.number().int().min(1).max(200).default(10),
  by: z.enum(['total', 'in', 'out']).default('total').describe('Degree to rank by'),
});

const OrganizationStatsInput = z.object({
  min_awards: z.number().int().min(0).default(0).describe('Minimum number of awards'),
  min_funding: z.number().min(0).default(0).describe('Minimum total funding in USD'),
  limit: z.number().int().min(1).default(50).describe('Maximum number of results'),
});

const TechnologyStatsInput = z.object({
  min_awards: z.number().int().min(0).default(0).describe('Minimum number of awards'),
  min_funding: z.number().min(0).default(0).describe('Minimum total funding in USD'),
  limit: z.number().int().min(1).optional().describe('Maximum number of results (default: all)'),
});

const StateStatsInput = z.object({
  min_awards: z.number().int().min(0).default(0).describe('Minimum number of awards'),
  min_funding: z.number().min(0).default(0).describe('Minimum total funding in USD'),
  limit: z.number().int().min(1).default(55).describe('Maximum number of results'),
});

const CollaborationsInput = z.object({
  person_name: z.string().min(1).describe('Exact Person node name'),
});

const FundingRangeInput = z
  .object({
    min_amount: z.number().min(0).describe('Minimum funding amount in USD'),
    max_amount: z.number().min(0).describe('Maximum funding amount in USD'),
    limit: z.number().int().min(1).default(50).describe('Maximum number of results'),
  })
  .refine((input) => input.min_amount <= input.max_amount, {
    message: 'min_amount must not exceed max_amount',
    path: ['min_amount'],
  });

const NeighborhoodInput = z.object({
  node_id: z.string().min(1).describe('Center node ID'),
  depth: z.number().int().min(1).optional().describe('Expansion rounds (default: server default depth)'),
  include_mermaid: z.boolean().default(true).describe('Include a Mermaid flowchart of the subgraph'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Resolve a requested depth against configuration
 *
 * @throws MCPError with VALIDATION_ERROR when depth exceeds maxDepth
 */
export function resolveDepth(requested: number | undefined): number {
  const config = getConfig();
  const depth = requested ?? config.defaultDepth;
  if (depth > config.maxDepth) {
    throw validationError(`depth ${depth} exceeds the maximum of ${config.maxDepth}`, {
      depth,
      maxDepth: config.maxDepth,
    });
  }
  return depth;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle grant_graph_summary - Node and relationship histograms
 */
async function handleSummary(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(SummaryInput, params);
    const graph = requireGraph();

    return formatResponse(
      successResult({
        ...getGraphSummary(graph),
        source: state.currentSource,
        loaded_at: state.loadedAt,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle grant_graph_search - Substring search over node names
 */
async function handleSearch(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SearchInput, params);
    const graph = requireGraph();

    const results = searchNodes(graph, input.query, input.node_type, input.limit ?? getConfig().searchLimit);
    return formatResponse(successResult({ count: results.length, results }));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle grant_graph_node - Node attributes with labelled connections
 */
async function handleNode(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(NodeInput, params);
    const graph = requireGraph();

    const details = getNodeDetails(graph, input.node_id);
    if (!details) {
      throw nodeNotFoundError(input.node_id);
    }
    return formatResponse(successResult(details));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle grant_graph_connections - Outgoing labelled edges
 */
async function handleConnections(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConnectionsInput, params);
    const graph = requireGraph();

    const result = findConnections(
      graph,
      input.source_node,
      input.target_node || undefined,
      input.relationship_type
    );
    if (!result) {
      throw nodeNotFoundError(input.source_node);
    }
    return formatResponse(successResult(result));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle grant_graph_paths - Simple directed paths between two nodes
 */
async function handlePaths(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(PathsInput, params);
    const graph = requireGraph();

    const paths = findPaths(graph, input.source_node, input.target_node, input.max_length, input.max_paths);
    if (!paths) {
      const missing = graph.hasNode(input.source_node) ? input.target_node : input.source_node;
      throw nodeNotFoundError(missing);
    }
    return formatResponse(
      successResult({
        source: input.source_node,
        target: input.target_node,
        count: paths.length,
        paths,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle grant_graph_most_connected - Degree ranking
 */
async function handleMostConnected(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(MostConnectedInput, params);
    const graph = requireGraph();

    const nodes = getMostConnectedNodes(graph, input.node_type, input.top_n, input.by);
    return formatResponse(successResult({ by: input.by, count: nodes.length, nodes }));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle grant_graph_organization_stats - Awards, funding and researchers per organization
 */
async function handleOrganizationStats(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(OrganizationStatsInput, params);
    const graph = requireGraph();

    const matched = rankOrganizations(graph, { min_awards: input.min_awards, min_funding: input.min_funding });
    return formatResponse(
      successResult({ count: matched.length, organizations: matched.slice(0, input.limit) })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle grant_graph_technology_stats - Awards and funding per technology area
 */
async function handleTechnologyStats(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(TechnologyStatsInput, params);
    const graph = requireGraph();

    const matched = rankTechnologies(graph, { min_awards: input.min_awards, min_funding: input.min_funding });
    const technologies = input.limit === undefined ? matched : matched.slice(0, input.limit);
    return formatResponse(successResult({ count: matched.length, technologies }));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle grant_graph_state_stats - Organizations, awards and funding per state
 */
async function handleStateStats(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(StateStatsInput, params);
    const graph = requireGraph();

    const matched = rankStates(graph, { min_awards: input.min_awards, min_funding: input.min_funding });
    return formatResponse(successResult({ count: matched.length, states: matched.slice(0, input.limit) }));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle grant_graph_collaborations - People sharing awards with a person
 */
async function handleCollaborations(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(CollaborationsInput, params);
    const graph = requireGraph();

    const collaborators = findCollaborators(graph, input.person_name);
    if (!collaborators) {
      throw nodeNotFoundError(input.person_name, 'Person');
    }
    return formatResponse(
      successResult({ person: input.person_name, count: collaborators.length, collaborators })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle grant_graph_funding_range - Awards within a funding range
 */
async function handleFundingRange(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(FundingRangeInput, params);
    const graph = requireGraph();

    return formatResponse(
      successResult(queryByFundingRange(graph, input.min_amount, input.max_amount, input.limit))
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle grant_graph_neighborhood - Bounded subgraph around a node
 */
async function handleNeighborhood(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(NeighborhoodInput, params);
    const graph = requireGraph();
    const depth = resolveDepth(input.depth);

    const neighborhood = extractNeighborhood(graph, input.node_id, depth);
    if (!neighborhood) {
      throw nodeNotFoundError(input.node_id);
    }

    return formatResponse(
      successResult({
        center: neighborhood.center,
        depth: neighborhood.depth,
        total_nodes: neighborhood.nodes.length,
        total_edges: neighborhood.edges.length,
        node_types: countNodeTypes(neighborhood.nodes),
        nodes: neighborhood.nodes.map((node) => ({ id: node.id, type: node.type })),
        edges: neighborhood.edges,
        mermaid: input.include_mermaid ? renderNeighborhoodMermaid(neighborhood) : undefined,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Grant graph query tools collection for MCP server registration
 */
export const grantGraphTools: Record<string, ToolDefinition> = {
  grant_graph_summary: {
    description: 'Get overall statistics about the grant graph: node counts by type and edge counts by relationship',
    inputSchema: SummaryInput.shape,
    handler: handleSummary,
  },
  grant_graph_search: {
    description:
      'Search for nodes by partial, case-insensitive name match, optionally filtered by node type',
    inputSchema: SearchInput.shape,
    handler: handleSearch,
  },
  grant_graph_node: {
    description: 'Get a node with its attributes and every incoming and outgoing labelled connection',
    inputSchema: NodeInput.shape,
    handler: handleNode,
  },
  grant_graph_connections: {
    description: 'List outgoing connections from a node, optionally to one target and/or of one relationship type',
    inputSchema: ConnectionsInput.shape,
    handler: handleConnections,
  },
  grant_graph_paths: {
    description: 'Find simple directed paths between two nodes, up to a maximum number of edges',
    inputSchema: PathsInput.shape,
    handler: handlePaths,
  },
  grant_graph_most_connected: {
    description: 'Rank nodes by total, incoming or outgoing connection count',
    inputSchema: MostConnectedInput.shape,
    handler: handleMostConnected,
  },
  grant_graph_organization_stats: {
    description:
      'Statistics for organizations: award count, total funding and distinct researchers, highest funding first',
    inputSchema: OrganizationStatsInput.shape,
    handler: handleOrganizationStats,
  },
  grant_graph_technology_stats: {
    description: 'Statistics for technology areas: award count, total and average funding, most awards first',
    inputSchema: TechnologyStatsInput.shape,
    handler: handleTechnologyStats,
  },
  grant_graph_state_stats: {
    description:
      'Statistics for states: organizations, awards and funding aggregated through located organizations',
    inputSchema: StateStatsInput.shape,
    handler: handleStateStats,
  },
  grant_graph_collaborations: {
    description: 'Find people who share at least one award with a given person',
    inputSchema: CollaborationsInput.shape,
    handler: handleCollaborations,
  },
  grant_graph_funding_range: {
    description: 'Find awards whose funding amount lies within a range, largest first',
    inputSchema: FundingRangeInput.innerType().shape,
    handler: handleFundingRange,
  },
  grant_graph_neighborhood: {
    description:
      'Extract the subgraph around a node. State and County nodes are shown but never expanded through',
    inputSchema: NeighborhoodInput.shape,
    handler: handleNeighborhood,
  },
};
