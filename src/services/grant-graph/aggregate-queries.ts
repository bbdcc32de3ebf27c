/**
 * Aggregate Query Engine
 *
 * Read-only statistics over fixed relationship patterns. Funding amounts
 * are coerced with parseAmount, so unparseable values add 0 and never
 * abort an aggregation.
 *
 * @module services/grant-graph/aggregate-queries
 */

import { parseAmount, type GraphNode } from '../../models/grant-graph.js';
import type { GrantGraphStore } from './graph-store.js';

export interface OrganizationStats {
  name: string;
  awards: number;
  total_funding: number;
  researchers: number;
}

export interface TechnologyStats {
  name: string;
  awards: number;
  total_funding: number;
  avg_funding: number;
}

export interface StateStats {
  name: string;
  organizations: number;
  awards: number;
  total_funding: number;
}

export interface StatsFilter {
  min_awards?: number;
  min_funding?: number;
  limit?: number;
}

type AwardNode = Extract<GraphNode, { type: 'Award' }>;

function sumFunding(awards: readonly AwardNode[]): number {
  return awards.reduce((total, award) => total + parseAmount(award.attributes.amount), 0);
}

function awardsOfOrganization(store: GrantGraphStore, organization: string): AwardNode[] {
  return store.getPredecessorsOfType(organization, 'Award', ['AWARDED_TO']);
}

// ═══════════════════════════════════════════════════════════════════════════════
// PER-ENTITY STATISTICS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Award count, funding and distinct researchers for every organization,
 * keyed by organization name in graph order.
 */
export function getOrganizationStatistics(store: GrantGraphStore): Map<string, OrganizationStats> {
  const result = new Map<string, OrganizationStats>();

  for (const organization of store.getNodesByType('Organization')) {
    const awards = awardsOfOrganization(store, organization.id);
    const researchers = new Set<string>();
    for (const award of awards) {
      for (const person of store.getPredecessorsOfType(award.id, 'Person', ['LEADS', 'CO_LEADS'])) {
        researchers.add(person.id);
      }
    }

    result.set(organization.id, {
      name: organization.id,
      awards: awards.length,
      total_funding: sumFunding(awards),
      researchers: researchers.size,
    });
  }

  return result;
}

export function getTechnologyStatistics(store: GrantGraphStore): Map<string, TechnologyStats> {
  const result = new Map<string, TechnologyStats>();

  for (const area of store.getNodesByType('Technology_Area')) {
    const awards = store.getPredecessorsOfType(area.id, 'Award', ['INVOLVES_TECH']);
    const totalFunding = sumFunding(awards);
    result.set(area.id, {
      name: area.id,
      awards: awards.length,
      total_funding: totalFunding,
      avg_funding: awards.length > 0 ? totalFunding / awards.length : 0,
    });
  }

  return result;
}

/**
 * Per-state totals aggregated through each located organization. An award
 * made to two organizations in the same state is counted once per
 * organization; this approximation is kept as-is.
 */
export function getStateStatistics(store: GrantGraphStore): Map<string, StateStats> {
  const result = new Map<string, StateStats>();

  for (const state of store.getNodesByType('State')) {
    const organizations = store.getPredecessorsOfType(state.id, 'Organization', ['LOCATED_IN_STATE']);
    let awardCount = 0;
    let totalFunding = 0;
    for (const organization of organizations) {
      const awards = awardsOfOrganization(store, organization.id);
      awardCount += awards.length;
      totalFunding += sumFunding(awards);
    }

    result.set(state.id, {
      name: state.id,
      organizations: organizations.length,
      awards: awardCount,
      total_funding: totalFunding,
    });
  }

  return result;
}

/**
 * Other people sharing at least one award with `person`.
 *
 * @returns null when `person` is not a Person node
 */
export function findCollaborators(store: GrantGraphStore, person: string): string[] | null {
  if (!store.getNodeOfType(person, 'Person')) {
    return null;
  }

  const collaborators = new Set<string>();
  for (const edge of store.getOutgoingEdges(person, ['LEADS', 'CO_LEADS'])) {
    for (const colleague of store.getPredecessorsOfType(edge.target, 'Person', ['LEADS', 'CO_LEADS'])) {
      if (colleague.id !== person) {
        collaborators.add(colleague.id);
      }
    }
  }
  return [...collaborators];
}

// ═══════════════════════════════════════════════════════════════════════════════
// RANKED VIEWS
// ═══════════════════════════════════════════════════════════════════════════════

function applyFilter<T extends { awards: number; total_funding: number }>(
  rows: Iterable<T>,
  filter: StatsFilter,
  compare: (a: T, b: T) => number
): T[] {
  const minAwards = filter.min_awards ?? 0;
  const minFunding = filter.min_funding ?? 0;
  const matched = [...rows]
    .filter((row) => row.awards >= minAwards && row.total_funding >= minFunding)
    .sort(compare);
  return filter.limit === undefined ? matched : matched.slice(0, filter.limit);
}

const byFundingDesc = (a: { total_funding: number }, b: { total_funding: number }): number =>
  b.total_funding - a.total_funding;

const byAwardsDesc = (a: { awards: number }, b: { awards: number }): number => b.awards - a.awards;

/** Organizations passing the thresholds, highest funding first */
export function rankOrganizations(store: GrantGraphStore, filter: StatsFilter = {}): OrganizationStats[] {
  return applyFilter(getOrganizationStatistics(store).values(), filter, byFundingDesc);
}

/** Technology areas passing the thresholds, most awards first */
export function rankTechnologies(store: GrantGraphStore, filter: StatsFilter = {}): TechnologyStats[] {
  return applyFilter(getTechnologyStatistics(store).values(), filter, byAwardsDesc);
}

/** States passing the thresholds, highest funding first */
export function rankStates(store: GrantGraphStore, filter: StatsFilter = {}): StateStats[] {
  return applyFilter(getStateStatistics(store).values(), filter, byFundingDesc);
}
