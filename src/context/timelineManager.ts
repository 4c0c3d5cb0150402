/**
 * Timeline manager
 *
 * Story events only carry a relative order; "happens before" relations form a
 * precedence graph that must stay acyclic.
 */

import type { StoryKnowledge, TimelineEvent, TimelineRelation } from '../types/knowledge.js';

/**
 * Adjacency list: event id -> relations leaving it
 */
export type PrecedenceGraph = Map<string, TimelineRelation[]>;

export function buildPrecedenceGraph(relations: readonly TimelineRelation[]): PrecedenceGraph {
  const graph: PrecedenceGraph = new Map();
  for (const relation of relations) {
    addRelation(graph, relation);
  }
  return graph;
}

export function addRelation(graph: PrecedenceGraph, relation: TimelineRelation): void {
  const edges = graph.get(relation.before) ?? [];
  edges.push(relation);
  graph.set(relation.before, edges);
}

/**
 * Relations along a path from `from` to `to`, or null when `to` is unreachable.
 * Breadth-first, so the path is a shortest one.
 */
export function findPath(graph: PrecedenceGraph, from: string, to: string): TimelineRelation[] | null {
  if (from === to) return [];

  const via = new Map<string, TimelineRelation>();
  const queue = [from];
  const seen = new Set([from]);

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const edge of graph.get(current) ?? []) {
      if (seen.has(edge.after)) continue;
      seen.add(edge.after);
      via.set(edge.after, edge);
      if (edge.after === to) {
        const path: TimelineRelation[] = [];
        let step: TimelineRelation | undefined = edge;
        while (step) {
          path.unshift(step);
          step = step.before === from ? undefined : via.get(step.before);
        }
        return path;
      }
      queue.push(edge.after);
    }
  }
  return null;
}

/**
 * The existing chain that a new `before -> after` relation would close into a
 * cycle, or null when the relation is consistent.
 */
export function conflictingChain(
  graph: PrecedenceGraph,
  before: string,
  after: string
): TimelineRelation[] | null {
  return findPath(graph, after, before);
}

export function hasRelation(relations: readonly TimelineRelation[], before: string, after: string): boolean {
  return relations.some((relation) => relation.before === before && relation.after === after);
}

/**
 * "a < b < c" for a chain of relations
 */
export function formatChain(chain: readonly TimelineRelation[]): string {
  if (chain.length === 0) return '';
  return [chain[0].before, ...chain.map((relation) => relation.after)].join(' < ');
}

export function getEvent(knowledge: StoryKnowledge, id: string): TimelineEvent | undefined {
  return knowledge.timeline.find((event) => event.id === id);
}

