/**
 * Consistency checker
 *
 * Compares the facts a draft StageResult proposes with committed knowledge.
 * The committed fact is ground truth and the new one the candidate; both are
 * recorded and nothing is resolved here.
 */

import { nanoid } from 'nanoid';
import type { BlockingSeverity } from '../config.js';
import { entityKey, normalizeAttributeKey, type StoryKnowledge, type TimelineRelation } from '../types/knowledge.js';
import type {
  Contradiction,
  ContradictionSeverity,
  StageResult,
  ValidationOutcome,
} from '../types/project.js';
import { DEFAULT_EQUIVALENCE_RULES, valuesEquivalent, type EquivalenceRule } from './equivalence.js';
import { findEntity } from './knowledgeStore.js';
import { addRelation, buildPrecedenceGraph, conflictingChain, formatChain } from './timelineManager.js';

export type ValidationOptions = {
  rules?: readonly EquivalenceRule[];
  newId?: () => string;
};

type DraftResult = Pick<StageResult, 'id' | 'facts'>;

const SEVERITY_RANK: Record<ContradictionSeverity, number> = {
  warning: 1,
  critical: 2,
};

function checkAttributes(
  draft: DraftResult,
  knowledge: StoryKnowledge,
  rules: readonly EquivalenceRule[],
  newId: () => string
): Contradiction[] {
  const contradictions: Contradiction[] = [];
  // First value this stage proposed, per entity + attribute
  const proposedHere = new Map<string, string>();

  for (const proposed of draft.facts.entities) {
    const entity = findEntity(knowledge, proposed.category, proposed.name);
    const entityName = entity?.name ?? proposed.name;
    const key = entity ? entityKey(entity.category, entity.name) : entityKey(proposed.category, proposed.name);

    for (const [rawAttribute, rawValue] of Object.entries(proposed.attributes)) {
      const attribute = normalizeAttributeKey(rawAttribute);
      const value = rawValue.trim();
      if (!attribute || !value) continue;

      const record = entity?.attributes[attribute];
      const slot = `${key}|${attribute}`;
      const earlier = proposedHere.get(slot);
      if (earlier === undefined) proposedHere.set(slot, value);

      let previous: { value: string; stageResultId: string } | null = null;
      if (record && !valuesEquivalent(record.value, value, rules, attribute)) {
        previous = { value: record.value, stageResultId: record.assertedBy };
      } else if (!record && earlier !== undefined && !valuesEquivalent(earlier, value, rules, attribute)) {
        previous = { value: earlier, stageResultId: draft.id };
      }
      if (!previous) continue;

      contradictions.push({
        id: newId(),
        stageResultId: draft.id,
        kind: 'attribute',
        severity: 'warning',
        entity: entityName,
        attribute,
        previous,
        proposed: { value, stageResultId: draft.id },
        description: `${entityName}.${attribute} was "${previous.value}", now "${value}"`,
      });
    }
  }

  return contradictions;
}

function assertingResult(chain: readonly TimelineRelation[], draftId: string): string {
  return chain.find((relation) => relation.assertedBy !== draftId)?.assertedBy ?? chain[0]?.assertedBy ?? draftId;
}

function checkTimeline(draft: DraftResult, knowledge: StoryKnowledge, newId: () => string): Contradiction[] {
  const contradictions: Contradiction[] = [];
  const graph = buildPrecedenceGraph(knowledge.precedence);

  for (const event of draft.facts.events) {
    const pairs: [string, string][] = [
      ...event.before.map((other): [string, string] => [event.id, other]),
      ...event.after.map((other): [string, string] => [other, event.id]),
    ];

    for (const [before, after] of pairs) {
      const chain = conflictingChain(graph, before, after);
      if (!chain) {
        addRelation(graph, { before, after, assertedBy: draft.id });
        continue;
      }

      const established = chain.length > 0 ? formatChain(chain) : `${after} < ${before}`;
      contradictions.push({
        id: newId(),
        stageResultId: draft.id,
        kind: 'timeline',
        severity: 'critical',
        events: [before, after],
        previous: { value: established, stageResultId: assertingResult(chain, draft.id) },
        proposed: { value: `${before} < ${after}`, stageResultId: draft.id },
        description: `"${before}" placed before "${after}", but ${established} is already established`,
      });
    }
  }

  return contradictions;
}

/**
 * Contradictions between a draft StageResult's proposed facts and the knowledge
 * committed before it
 */
export function validate(
  stageResult: DraftResult,
  knowledge: StoryKnowledge,
  options: ValidationOptions = {}
): Contradiction[] {
  const rules = options.rules ?? DEFAULT_EQUIVALENCE_RULES;
  const newId = options.newId ?? (() => `ctr_${nanoid(10)}`);
  return [
    ...checkAttributes(stageResult, knowledge, rules, newId),
    ...checkTimeline(stageResult, knowledge, newId),
  ];
}

export function validationOutcome(contradictions: readonly Contradiction[]): ValidationOutcome {
  return contradictions.length > 0 ? 'flagged' : 'pass';
}

/**
 * Contradictions at or above the blocking threshold
 */
export function blockingContradictions(
  contradictions: readonly Contradiction[],
  threshold: BlockingSeverity
): Contradiction[] {
  if (threshold === 'never') return [];
  const minimum = SEVERITY_RANK[threshold];
  return contradictions.filter((contradiction) => SEVERITY_RANK[contradiction.severity] >= minimum);
}
