/**
 * Pipeline domain model.
 *
 * A pipeline run is one execution of the Build or Revise flow for a single
 * task request. Its state only moves forward; Failed is absorbing.
 */

import { TypedError } from './errors';
import { Round } from './task';

/** Pipeline states across both flows. */
export enum PipelineState {
  Received = 'Received',
  Authenticated = 'Authenticated',
  ArtifactsDecoded = 'ArtifactsDecoded',
  Generated = 'Generated',
  RepositoryProvisioned = 'RepositoryProvisioned',
  Published = 'Published',
  RepositoryLocated = 'RepositoryLocated',
  Regenerated = 'Regenerated',
  RepositoryUpdated = 'RepositoryUpdated',
  NotificationScheduled = 'NotificationScheduled',
  Completed = 'Completed',
  Failed = 'Failed',
}

/** Forward sequence of the Build flow (round 1). */
export const BUILD_SEQUENCE: readonly PipelineState[] = [
  PipelineState.Received,
  PipelineState.Authenticated,
  PipelineState.ArtifactsDecoded,
  PipelineState.Generated,
  PipelineState.RepositoryProvisioned,
  PipelineState.Published,
  PipelineState.NotificationScheduled,
  PipelineState.Completed,
];

/** Forward sequence of the Revise flow (round 2). */
export const REVISE_SEQUENCE: readonly PipelineState[] = [
  PipelineState.Received,
  PipelineState.Authenticated,
  PipelineState.ArtifactsDecoded,
  PipelineState.RepositoryLocated,
  PipelineState.Regenerated,
  PipelineState.RepositoryUpdated,
  PipelineState.NotificationScheduled,
  PipelineState.Completed,
];

function buildTransitions(sequence: readonly PipelineState[]): Partial<Record<PipelineState, PipelineState[]>> {
  const transitions: Partial<Record<PipelineState, PipelineState[]>> = {};
  sequence.forEach((state, i) => {
    const next = sequence[i + 1];
    if (next === undefined) {
      transitions[state] = [];
    } else {
      transitions[state] = [next, PipelineState.Failed];
    }
  });
  transitions[PipelineState.Failed] = [];
  return transitions;
}

/** Valid state transitions per round. */
export const VALID_PIPELINE_TRANSITIONS: Record<Round, Partial<Record<PipelineState, PipelineState[]>>> = {
  [Round.Build]: buildTransitions(BUILD_SEQUENCE),
  [Round.Revise]: buildTransitions(REVISE_SEQUENCE),
};

/**
 * Stage reported in a failure: the state the run was trying to enter, or
 * Admission when the task was already in flight.
 */
export type FailureStage = Exclude<PipelineState, PipelineState.Failed | PipelineState.Completed> | 'Admission';

export interface PipelineSuccess {
  outcome: 'success';
  taskId: string;
  round: Round;
  repositoryUrl: string;
  /** Null when publishing failed and the result was degraded. */
  pagesUrl: string | null;
  commitSha: string;
  degraded: boolean;
  warnings: string[];
}

export interface PipelineFailure {
  outcome: 'failure';
  taskId: string;
  round: Round;
  stage: FailureStage;
  /** Specific variant, e.g. "NotFound", "TooLarge", "AdmissionError". */
  kind: string;
  error: TypedError;
}

export type PipelineResult = PipelineSuccess | PipelineFailure;

/** One entry of a run's state history. */
export interface StateTransitionRecord {
  from: PipelineState;
  to: PipelineState;
  at: string;
}

/** Wire shape of the synchronous response and the notification body. */
export type BoundaryResponse =
  | {
      status: 'success';
      message: string;
      repo_url: string;
      pages_url: string | null;
      commit_sha: string;
      degraded: boolean;
      warnings: string[];
    }
  | {
      status: 'error';
      message: string;
      code: string;
    };

/** Render a pipeline result in the boundary's wire format. */
export function toBoundaryResponse(result: PipelineResult): BoundaryResponse {
  if (result.outcome === 'success') {
    return {
      status: 'success',
      message: result.round === Round.Build
        ? 'Repository created and published'
        : 'Repository updated and redeployed',
      repo_url: result.repositoryUrl,
      pages_url: result.pagesUrl,
      commit_sha: result.commitSha,
      degraded: result.degraded,
      warnings: result.warnings,
    };
  }
  return {
    status: 'error',
    message: result.error.message,
    code: result.error.code,
  };
}
