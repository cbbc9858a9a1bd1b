/**
 * Pipeline controller: the core orchestration engine.
 *
 * Runs one task request through the Build (round 1) or Revise (round 2)
 * stage sequence: authenticate, admit, decode attachments, generate, push,
 * publish, notify. Every run ends in exactly one PipelineResult; failures
 * are returned as values, never thrown to the caller.
 */

import { v4 as uuid } from 'uuid';
import {
  ArtifactPolicy,
  ArtifactSet,
  DEFAULT_ARTIFACT_POLICY,
  mergeAttachments,
  validateArtifactSet,
} from '../domain/artifact';
import {
  TypedError,
  admissionError,
  artifactPolicyError,
  attachmentError,
  authError,
  categoryForCode,
  generationError,
  internalError,
  maskSecretsInMessage,
  provisionError,
  publishError,
} from '../domain/errors';
import { NotificationPayload } from '../domain/notification';
import {
  BUILD_SEQUENCE,
  FailureStage,
  PipelineFailure,
  PipelineResult,
  PipelineState,
  PipelineSuccess,
  REVISE_SEQUENCE,
  toBoundaryResponse,
} from '../domain/pipeline';
import { RepositoryHandle } from '../domain/repository';
import { DecodedAttachment, Round, TaskRequest } from '../domain/task';
import { DEFAULT_FETCHER_OPTIONS, FetcherOptions } from '../attachments/fetcher';
import { resolveAttachments } from '../attachments/resolver';
import { GenerationChain, GenerationChainError } from '../collaborators/code-generation';
import { ProvisionError, RepositoryProvisioner } from '../collaborators/repository';
import { PagesPublisher, PublishError } from '../collaborators/pages';
import { NotificationDispatcher } from '../notifications/dispatcher';
import { validateSecret } from '../security/secret-validator';
import { Logger, logger as rootLogger } from '../logger';
import { RetryPolicy, TimeoutError, withTimeout } from './retry';
import { PipelineStateTracker } from './state-machine';
import { TaskRegistry } from './task-registry';

/** What happens when publishing fails after a successful push. */
export type PublishFailurePolicy = 'degrade' | 'fail';

/** States a stage body can fail to enter. */
type StageState = Exclude<FailureStage, 'Admission'>;

/** The part of the dispatcher the controller needs. */
export type NotificationSink = Pick<NotificationDispatcher, 'deliver'>;

export interface PipelineDependencies {
  registry: TaskRegistry;
  generation: GenerationChain;
  provisioner: RepositoryProvisioner;
  publisher: PagesPublisher;
  notifications: NotificationSink;
  logger?: Logger;
}

export interface PipelineSettings {
  /** Expected request secret. When unset every request is rejected. */
  sharedSecret?: string;
  /** Credentials masked out of every user-visible message. */
  maskedSecrets: string[];
  /** Retry policy for repository host calls; only retryable ProvisionErrors are retried. */
  provisionRetryPolicy: RetryPolicy;
  provisionTimeoutMs: number;
  publishTimeoutMs: number;
  attachments: FetcherOptions;
  /** Fail the run when any attachment cannot be decoded. */
  requireAllAttachments: boolean;
  /** Commit decoded attachments next to the generated files. */
  includeAttachments: boolean;
  artifactPolicy: ArtifactPolicy;
  publishFailurePolicy: PublishFailurePolicy;
}

export const DEFAULT_PIPELINE_SETTINGS: Readonly<PipelineSettings> = {
  maskedSecrets: [],
  provisionRetryPolicy: new RetryPolicy({
    baseDelayMs: 1000,
    multiplier: 2,
    maxAttempts: 3,
    maxDelayMs: 30_000,
    jitter: 0.2,
    isRetryable: () => false,
  }),
  provisionTimeoutMs: 30_000,
  publishTimeoutMs: 15_000,
  attachments: DEFAULT_FETCHER_OPTIONS,
  requireAllAttachments: false,
  includeAttachments: true,
  artifactPolicy: DEFAULT_ARTIFACT_POLICY,
  publishFailurePolicy: 'degrade',
};

/** A stage failure on its way to becoming a PipelineFailure. */
export class PipelineStageError extends Error {
  constructor(
    readonly stage: FailureStage,
    readonly kind: string,
    readonly typedError: TypedError,
  ) {
    super(typedError.message);
    this.name = 'PipelineStageError';
  }
}

/** Mutable state of one run. */
interface RunContext {
  request: TaskRequest;
  runId: string;
  tracker: PipelineStateTracker;
  log: Logger;
  warnings: string[];
}

interface PushOutcome {
  handle: RepositoryHandle;
  pagesUrl: string | null;
}

export class PipelineController {
  private readonly settings: PipelineSettings;
  private readonly provisionRetry: RetryPolicy;
  private readonly log: Logger;

  constructor(
    private readonly deps: PipelineDependencies,
    settings: Partial<PipelineSettings> = {},
  ) {
    this.settings = { ...DEFAULT_PIPELINE_SETTINGS, ...settings };
    this.provisionRetry = this.settings.provisionRetryPolicy.with({
      isRetryable: (error) => error instanceof ProvisionError && error.retryable,
    });
    this.log = (deps.logger ?? rootLogger).child({ component: 'pipeline' });
  }

  /** Run a task request to completion. Never rejects. */
  async run(request: TaskRequest): Promise<PipelineResult> {
    const runId = `run_${uuid()}`;
    const ctx: RunContext = {
      request,
      runId,
      tracker: new PipelineStateTracker(request.round),
      log: this.log.child({ taskId: request.taskId, round: request.round, runId }),
      warnings: [],
    };

    // Authentication and admission happen before the first await, so the
    // check-and-set on the registry cannot interleave with another run.
    if (!validateSecret(request.secret, this.settings.sharedSecret)) {
      ctx.log.warn('Rejected request with invalid secret');
      ctx.tracker.fail();
      return this.failure(ctx, new PipelineStageError(
        PipelineState.Authenticated,
        'AuthenticationError',
        authError('Invalid or missing secret'),
      ));
    }
    this.advance(ctx, PipelineState.Authenticated);

    if (!this.deps.registry.tryAcquire(request.taskId, runId)) {
      ctx.log.warn('Rejected request for a task already in flight');
      ctx.tracker.fail();
      return this.failure(ctx, new PipelineStageError('Admission', 'AdmissionError', admissionError(request.taskId)));
    }

    ctx.log.info('Pipeline run started');
    let result: PipelineResult;
    try {
      const attachments = await this.decodeAttachments(ctx);
      const outcome = request.round === Round.Revise
        ? await this.revise(ctx, attachments)
        : await this.build(ctx, attachments);
      result = this.success(ctx, outcome);
    } catch (error) {
      const stageError = this.normalize(ctx, error);
      ctx.tracker.fail();
      result = this.failure(ctx, stageError);
    } finally {
      this.deps.registry.release(request.taskId, runId);
    }

    this.notify(ctx, result);
    if (result.outcome === 'success') {
      this.advance(ctx, PipelineState.Completed);
      ctx.log.info('Pipeline run completed', {
        repositoryUrl: result.repositoryUrl,
        commitSha: result.commitSha,
        degraded: result.degraded,
        path: this.statePath(ctx),
      });
    }
    return result;
  }

  private async build(ctx: RunContext, attachments: DecodedAttachment[]): Promise<PushOutcome> {
    const artifacts = await this.generate(ctx, PipelineState.Generated, attachments);

    const handle = await this.stage(ctx, PipelineState.RepositoryProvisioned, () =>
      this.callProvisioner('Repository provisioning', () =>
        this.deps.provisioner.createAndPush(ctx.request.taskId, artifacts),
      ),
    );
    ctx.log.info('Repository provisioned', { repository: `${handle.owner}/${handle.name}`, commitSha: handle.headCommit });

    const pagesUrl = await this.publish(ctx, handle, this.settings.publishFailurePolicy);
    this.advance(ctx, PipelineState.Published);
    return { handle, pagesUrl };
  }

  private async revise(ctx: RunContext, attachments: DecodedAttachment[]): Promise<PushOutcome> {
    const existing = await this.stage(ctx, PipelineState.RepositoryLocated, async () => {
      const located = await this.callProvisioner('Repository lookup', () =>
        this.deps.provisioner.locate(ctx.request.taskId),
      );
      return this.callProvisioner('Repository read', () => this.deps.provisioner.readArtifacts(located));
    });

    const artifacts = await this.generate(ctx, PipelineState.Regenerated, attachments, existing);

    const handle = await this.stage(ctx, PipelineState.RepositoryUpdated, () =>
      this.callProvisioner('Repository update', () =>
        this.deps.provisioner.locateAndPush(ctx.request.taskId, artifacts),
      ),
    );
    ctx.log.info('Repository updated', { repository: `${handle.owner}/${handle.name}`, commitSha: handle.headCommit });

    // Revise has no publish state; the URL lookup always degrades.
    const pagesUrl = await this.publish(ctx, handle, 'degrade');
    return { handle, pagesUrl };
  }

  private async decodeAttachments(ctx: RunContext): Promise<DecodedAttachment[]> {
    const { decoded, failures } = await resolveAttachments(ctx.request.attachments, this.settings.attachments);

    if (failures.length > 0) {
      const [first] = failures;
      if (this.settings.requireAllAttachments && first) {
        throw new PipelineStageError(
          PipelineState.ArtifactsDecoded,
          first.kind,
          attachmentError(first.kind, first.message, { attachment: first.attachment, failures: failures.length }),
        );
      }
      for (const failure of failures) {
        ctx.warnings.push(`Attachment "${failure.attachment}" skipped: ${failure.message}`);
        ctx.log.warn('Attachment skipped', { attachment: failure.attachment, kind: failure.kind });
      }
    }

    this.advance(ctx, PipelineState.ArtifactsDecoded);
    return decoded;
  }

  private async generate(
    ctx: RunContext,
    target: PipelineState.Generated | PipelineState.Regenerated,
    attachments: DecodedAttachment[],
    existingArtifacts?: ArtifactSet,
  ): Promise<ArtifactSet> {
    const outcome = await this.stage(ctx, target, () =>
      this.deps.generation.generate({
        brief: ctx.request.brief,
        checks: ctx.request.checks,
        attachments,
        existingArtifacts,
      }),
    );
    if (outcome.backendIndex > 0) {
      ctx.warnings.push(`Generated with fallback backend "${outcome.backend}"`);
    }

    let artifacts = outcome.artifacts;
    if (this.settings.includeAttachments && attachments.length > 0) {
      const merged = mergeAttachments(artifacts, attachments);
      for (const skipped of merged.skipped) {
        ctx.warnings.push(`Attachment "${skipped.name}" not committed: ${skipped.reason}`);
      }
      artifacts = merged.artifacts;
    }

    const violations = validateArtifactSet(artifacts, this.settings.artifactPolicy);
    if (violations.length > 0) {
      throw new PipelineStageError(
        target,
        'InvalidArtifactSet',
        artifactPolicyError(`Generated artifact set is not publishable: ${violations.join('; ')}`, violations),
      );
    }

    ctx.log.info('Artifacts generated', { backend: outcome.backend, files: artifacts.size });
    this.advance(ctx, target);
    return artifacts;
  }

  /**
   * Publish, applying the failure policy. Returns null when degraded.
   * The push has already landed, so every rejection counts as a publish failure.
   */
  private async publish(ctx: RunContext, handle: RepositoryHandle, policy: PublishFailurePolicy): Promise<string | null> {
    try {
      return await withTimeout(
        () => this.deps.publisher.publish(handle),
        this.settings.publishTimeoutMs,
        'Publishing',
      );
    } catch (error) {
      const failure = this.toPublishError(ctx, error);
      const message = this.mask(failure.message);
      if (policy === 'fail') {
        throw new PipelineStageError(PipelineState.Published, 'PublishError', publishError(message));
      }
      ctx.warnings.push(`Publishing failed: ${message}`);
      ctx.log.warn('Publishing failed, result degraded', { error: message });
      return null;
    }
  }

  private toPublishError(ctx: RunContext, error: unknown): PublishError {
    if (error instanceof PublishError) return error;
    if (error instanceof TimeoutError) return new PublishError(error.message);
    ctx.log.error('Publisher raised an unexpected error', {
      error: error instanceof Error ? this.mask(`${error.name}: ${error.message}`) : this.mask(String(error)),
    });
    return new PublishError('Static site host request failed');
  }

  /** Run one stage body; any error it throws is attributed to `target`. */
  private async stage<T>(ctx: RunContext, target: StageState, body: () => Promise<T>): Promise<T> {
    try {
      const value = await body();
      // Generation stages advance after their own post-checks.
      if (target !== PipelineState.Generated && target !== PipelineState.Regenerated) {
        this.advance(ctx, target);
      }
      return value;
    } catch (error) {
      throw this.normalize(ctx, error, target);
    }
  }

  private async callProvisioner<T>(label: string, call: () => Promise<T>): Promise<T> {
    return this.provisionRetry.execute(
      async () => {
        try {
          return await withTimeout(call, this.settings.provisionTimeoutMs, label);
        } catch (error) {
          if (error instanceof TimeoutError) {
            throw new ProvisionError('NetworkFailure', error.message);
          }
          throw error;
        }
      },
      {
        onRetry: ({ attempt, delayMs, error }) => {
          this.log.warn(`${label} failed, retrying`, {
            attempt,
            delayMs,
            error: error instanceof Error ? this.mask(error.message) : 'unknown error',
          });
        },
      },
    );
  }

  /** Convert anything thrown during a run into a stage error. */
  private normalize(ctx: RunContext, error: unknown, stage?: FailureStage): PipelineStageError {
    if (error instanceof PipelineStageError) {
      return error;
    }
    const failedStage = stage ?? this.nextStage(ctx);

    if (error instanceof ProvisionError) {
      return new PipelineStageError(
        failedStage,
        error.kind,
        provisionError(error.kind, this.mask(error.message), error.retryable),
      );
    }
    if (error instanceof GenerationChainError) {
      const kind = error.exhausted ? 'Transient' : 'Fatal';
      const detail = error.failures.map((f) => `${f.backend}: ${f.message}`).join('; ');
      ctx.log.error('Generation failed', { detail: this.mask(detail) });
      return new PipelineStageError(failedStage, kind, generationError(kind, error.message, error.exhausted));
    }
    if (error instanceof PublishError) {
      return new PipelineStageError(failedStage, 'PublishError', publishError(this.mask(error.message)));
    }

    ctx.log.error('Unexpected error during pipeline run', {
      stage: failedStage,
      error: error instanceof Error ? this.mask(error.message) : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return new PipelineStageError(failedStage, 'InternalError', internalError());
  }

  /** The state after the current one in this run's flow. */
  private nextStage(ctx: RunContext): FailureStage {
    const sequence = ctx.request.round === Round.Revise ? REVISE_SEQUENCE : BUILD_SEQUENCE;
    const next = sequence[sequence.indexOf(ctx.tracker.state) + 1];
    if (next === undefined || next === PipelineState.Completed || next === PipelineState.Failed) {
      return PipelineState.NotificationScheduled;
    }
    return next;
  }

  private advance(ctx: RunContext, target: PipelineState): void {
    const from = ctx.tracker.state;
    ctx.tracker.advance(target);
    ctx.log.debug('State transition', { from, to: target });
  }

  /** States entered so far, in order. */
  private statePath(ctx: RunContext): PipelineState[] {
    return ctx.tracker.getHistory().map((t) => t.to);
  }

  private success(ctx: RunContext, outcome: PushOutcome): PipelineSuccess {
    return {
      outcome: 'success',
      taskId: ctx.request.taskId,
      round: ctx.request.round,
      repositoryUrl: outcome.handle.htmlUrl,
      pagesUrl: outcome.pagesUrl,
      commitSha: outcome.handle.headCommit,
      degraded: outcome.pagesUrl === null,
      warnings: ctx.warnings.map((w) => this.mask(w)),
    };
  }

  private failure(ctx: RunContext, error: PipelineStageError): PipelineFailure {
    const typedError: TypedError = { ...error.typedError, message: this.mask(error.typedError.message) };
    ctx.log.warn('Pipeline run failed', {
      stage: error.stage,
      kind: error.kind,
      code: typedError.code,
      category: categoryForCode(typedError.code),
      path: this.statePath(ctx),
    });
    return {
      outcome: 'failure',
      taskId: ctx.request.taskId,
      round: ctx.request.round,
      stage: error.stage,
      kind: error.kind,
      error: typedError,
    };
  }

  /** Schedule the run's single notification. */
  private notify(ctx: RunContext, result: PipelineResult): void {
    if (result.outcome === 'success') {
      this.advance(ctx, PipelineState.NotificationScheduled);
    }

    const payload: NotificationPayload = {
      ...toBoundaryResponse(result),
      email: ctx.request.email,
      task: ctx.request.taskId,
      round: ctx.request.round,
      nonce: ctx.request.nonce,
    };
    this.deps.notifications.deliver(ctx.request.callbackUrl, payload, ctx.request.nonce);
    ctx.log.info('Notification scheduled', { outcome: result.outcome });
  }

  private mask(message: string): string {
    return maskSecretsInMessage(message, [this.settings.sharedSecret, ...this.settings.maskedSecrets]);
  }
}
