/**
 * Pipeline state transitions
 *
 * idle -> concept_pending -> outline_pending -> chapter_pending(1..N) -> complete
 * Any pending state may move to failed; failed re-enters its stage.
 */

import { InvalidTransitionError, type ErrorKind } from '../errors.js';
import {
  CONCEPT_STAGE,
  OUTLINE_STAGE,
  chapterStage,
  describeStage,
  sameStage,
  type Contradiction,
  type PipelineState,
  type Project,
  type StageKind,
} from '../types/project.js';

/**
 * Stage the next `advanceStage` generates, or null when the project is complete
 */
export function pendingStage(state: PipelineState): StageKind | null {
  switch (state.status) {
    case 'idle':
    case 'concept_pending':
      return CONCEPT_STAGE;
    case 'outline_pending':
      return OUTLINE_STAGE;
    case 'chapter_pending':
      return chapterStage(state.chapter);
    case 'failed':
      return state.failure.stage;
    case 'complete':
      return null;
  }
}

/**
 * Pending state that generates `stage`
 */
export function stateFor(stage: StageKind): PipelineState {
  switch (stage.kind) {
    case 'concept':
      return { status: 'concept_pending' };
    case 'outline':
      return { status: 'outline_pending' };
    case 'chapter':
      return { status: 'chapter_pending', chapter: stage.index };
  }
}

/**
 * State once `stage` has been committed
 */
export function stateAfter(stage: StageKind, chapterCount: number): PipelineState {
  switch (stage.kind) {
    case 'concept':
      return { status: 'outline_pending' };
    case 'outline':
      return { status: 'chapter_pending', chapter: 1 };
    case 'chapter':
      return stage.index >= chapterCount
        ? { status: 'complete' }
        : { status: 'chapter_pending', chapter: stage.index + 1 };
  }
}

export function failedState(args: {
  stage: StageKind;
  kind: ErrorKind;
  message: string;
  attempts: number;
  at: string;
  contradictions?: Contradiction[];
}): PipelineState {
  const { stage, kind, message, attempts, at, contradictions } = args;
  return {
    status: 'failed',
    failure: contradictions ? { kind, message, stage, attempts, at, contradictions } : { kind, message, stage, attempts, at },
  };
}

/**
 * Index into `project.results` from which `stage` and everything after it are
 * dropped by regeneration.
 *
 * @throws InvalidTransitionError when the stage has neither been generated nor is pending
 */
export function regenerationCut(project: Project, stage: StageKind): number {
  if (stage.kind === 'chapter' && (stage.index < 1 || stage.index > project.settings.chapterCount)) {
    throw new InvalidTransitionError(
      `${describeStage(stage)} is outside this project's ${project.settings.chapterCount} chapters`
    );
  }

  const existing = project.results.findIndex((result) => sameStage(result.stage, stage));
  if (existing >= 0) return existing;

  const pending = pendingStage(project.state);
  if (pending && sameStage(pending, stage)) return project.results.length;

  throw new InvalidTransitionError(`${describeStage(stage)} has not been generated yet`);
}
