/**
 * Code generation collaborator contract and the ordered backend chain.
 *
 * Generation is total: a revise request receives the existing artifact set
 * and must return a complete replacement, never a diff.
 */

import { ArtifactSet } from '../domain/artifact';
import { DecodedAttachment } from '../domain/task';
import { Logger, logger as rootLogger } from '../logger';
import { RetryPolicy, TimeoutError, withTimeout } from '../engine/retry';

export interface GenerationRequest {
  brief: string;
  checks: readonly string[];
  attachments: readonly DecodedAttachment[];
  /** Present on revise: the artifact set currently in the repository. */
  existingArtifacts?: ArtifactSet;
}

export interface CodeGenerationClient {
  /** Backend identifier used in logs and warnings. */
  readonly name: string;
  /** Produce a complete artifact set; reject with GenerationError. */
  generate(request: GenerationRequest): Promise<ArtifactSet>;
}

/** Failure reported by a generation backend. */
export class GenerationError extends Error {
  readonly transient: boolean;

  constructor(message: string, options?: { transient?: boolean }) {
    super(message);
    this.name = 'GenerationError';
    this.transient = options?.transient ?? false;
  }
}

export interface GenerationChainOptions {
  /** Applied per backend; only transient errors are retried. */
  retryPolicy: RetryPolicy;
  /** Timeout for a single backend call. Exceeding it counts as transient. */
  timeoutMs: number;
  logger?: Logger;
}

export interface GenerationOutcome {
  artifacts: ArtifactSet;
  /** Name of the backend that produced the set. */
  backend: string;
  /** Position of that backend in the chain (0 = primary). */
  backendIndex: number;
}

/** Thrown by the chain when no backend produced an artifact set. */
export class GenerationChainError extends Error {
  constructor(
    message: string,
    /** True when every backend failed transiently; false when one failed fatally. */
    readonly exhausted: boolean,
    readonly failures: ReadonlyArray<{ backend: string; message: string; transient: boolean }>,
  ) {
    super(message);
    this.name = 'GenerationChainError';
  }
}

/**
 * Ordered list of generation backends. The first success wins. A transient
 * failure (after the backend's own retries) moves on to the next backend; a
 * non-transient failure ends the chain immediately.
 */
export class GenerationChain {
  private readonly logger: Logger;
  private readonly retryPolicy: RetryPolicy;

  constructor(
    private readonly backends: readonly CodeGenerationClient[],
    private readonly options: GenerationChainOptions,
  ) {
    if (backends.length === 0) {
      throw new RangeError('GenerationChain requires at least one backend');
    }
    this.logger = (options.logger ?? rootLogger).child({ collaborator: 'generation' });
    this.retryPolicy = options.retryPolicy.with({
      isRetryable: (error) => error instanceof GenerationError && error.transient,
    });
  }

  async generate(request: GenerationRequest): Promise<GenerationOutcome> {
    const failures: Array<{ backend: string; message: string; transient: boolean }> = [];

    for (const [index, backend] of this.backends.entries()) {
      try {
        const artifacts = await this.retryPolicy.execute(
          () => this.callBackend(backend, request),
          {
            onRetry: ({ attempt, delayMs, error }) => {
              this.logger.warn('Generation attempt failed, retrying', {
                backend: backend.name,
                attempt,
                delayMs,
                error: error instanceof Error ? error.message : 'unknown error',
              });
            },
          },
        );
        return { artifacts, backend: backend.name, backendIndex: index };
      } catch (error) {
        if (!(error instanceof GenerationError)) {
          throw error;
        }
        failures.push({ backend: backend.name, message: error.message, transient: error.transient });
        if (!error.transient) {
          this.logger.error('Generation backend rejected the request', { backend: backend.name, error: error.message });
          throw new GenerationChainError(`Generation failed on backend "${backend.name}"`, false, failures);
        }
        this.logger.warn('Generation backend unavailable, trying next backend', {
          backend: backend.name,
          error: error.message,
          remaining: this.backends.length - index - 1,
        });
      }
    }

    throw new GenerationChainError('All generation backends failed', true, failures);
  }

  private async callBackend(backend: CodeGenerationClient, request: GenerationRequest): Promise<ArtifactSet> {
    try {
      return await withTimeout(() => backend.generate(request), this.options.timeoutMs, `Generation (${backend.name})`);
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new GenerationError(error.message, { transient: true });
      }
      throw error;
    }
  }
}
