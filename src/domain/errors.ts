/**
 * Typed error model for machine-actionable error handling.
 *
 * Pipeline failures are returned as typed values rather than thrown out of
 * the controller, so the HTTP boundary and the notification payload can both
 * be built from the same structure.
 */

/** Error taxonomy classes surfaced in logs and failure results. */
export type ErrorCategory =
  | 'AuthenticationError'
  | 'ValidationError'
  | 'AdmissionError'
  | 'GenerationError'
  | 'ProvisionError'
  | 'PublishError'
  | 'NotificationError'
  | 'InternalError';

/** Typed suggested fix that a caller can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and notifications. */
export interface TypedError {
  /** Namespaced error code (e.g., "PROVISION.NOT_FOUND"). */
  code: string;
  /** Human-readable error message. Never carries credentials or provider bodies. */
  message: string;
  /** Whether the same request is expected to succeed later without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/**
 * Convert a PascalCase error kind into the SCREAMING_SNAKE code segment.
 * `NameCollisionExhausted` → `NAME_COLLISION_EXHAUSTED`.
 */
export function kindToCodeSegment(kind: string): string {
  return kind
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toUpperCase();
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
  });
}

export function attachmentError(kind: string, message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: `VALIDATION.ATTACHMENT.${kindToCodeSegment(kind)}`,
    message,
    retryable: false,
    details,
  });
}

export function artifactPolicyError(message: string, violations: string[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.ARTIFACT_SET',
    message,
    retryable: false,
    details: { violations },
    suggestedFixes: [
      { type: 'REVISE_BRIEF', params: {}, description: 'The generated file set did not meet the publishing policy; resubmit the task.' },
    ],
  });
}

export function authError(message: string): TypedError {
  return createTypedError({
    code: 'AUTH.UNAUTHENTICATED',
    message,
    retryable: false,
  });
}

export function admissionError(taskId: string): TypedError {
  return createTypedError({
    code: 'ADMISSION.IN_FLIGHT',
    message: `Task "${taskId}" is already being processed`,
    retryable: true,
    details: { taskId },
    suggestedFixes: [
      { type: 'WAIT_AND_RETRY', params: {}, description: 'Resubmit after the in-flight run for this task has completed.' },
    ],
  });
}

export function generationError(kind: string, message: string, retryable = false): TypedError {
  return createTypedError({
    code: `GENERATION.${kindToCodeSegment(kind)}`,
    message,
    retryable,
  });
}

export function provisionError(kind: string, message: string, retryable = false): TypedError {
  const fixes: SuggestedFix[] = [];
  if (kind === 'NotFound') {
    fixes.push({ type: 'SUBMIT_ROUND_ONE', params: {}, description: 'Run a round 1 build for this task before requesting a revision.' });
  } else if (kind === 'AuthenticationRejected') {
    fixes.push({ type: 'CHECK_API_KEY', params: {}, description: 'The repository host rejected the configured token.' });
  } else if (retryable) {
    fixes.push({ type: 'WAIT_AND_RETRY', params: { delayMs: 5000 } });
  }
  return createTypedError({
    code: `PROVISION.${kindToCodeSegment(kind)}`,
    message,
    retryable,
    suggestedFixes: fixes,
  });
}

export function publishError(message: string): TypedError {
  return createTypedError({
    code: 'PUBLISH.FAILED',
    message,
    retryable: true,
  });
}

export function internalError(): TypedError {
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message: 'Internal error while processing the task',
    retryable: false,
  });
}

export function rateLimitError(retryAfterMs?: number): TypedError {
  return createTypedError({
    code: 'RATE_LIMIT.EXCEEDED',
    message: 'Rate limit exceeded',
    retryable: true,
    details: retryAfterMs ? { retryAfterMs } : undefined,
    suggestedFixes: [
      { type: 'WAIT_AND_RETRY', params: { delayMs: retryAfterMs ?? 1000 } },
    ],
  });
}

/** Map a typed error code back to its taxonomy class. */
export function categoryForCode(code: string): ErrorCategory {
  const domain = code.split('.')[0];
  switch (domain) {
    case 'AUTH':
      return 'AuthenticationError';
    case 'VALIDATION':
      return 'ValidationError';
    case 'ADMISSION':
      return 'AdmissionError';
    case 'GENERATION':
      return 'GenerationError';
    case 'PROVISION':
      return 'ProvisionError';
    case 'PUBLISH':
      return 'PublishError';
    case 'NOTIFICATION':
      return 'NotificationError';
    default:
      return 'InternalError';
  }
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace each occurrence of any of the given secret values in a message
 * with its masked form. Empty secrets are ignored.
 */
export function maskSecretsInMessage(message: string, secrets: ReadonlyArray<string | undefined>): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex metacharacters in the secret
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  status: 'error';
  message: string;
  code: string;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { status: 'error', message: error.message, code: error.code };
}
