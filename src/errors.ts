/**
 * @fileoverview Error Taxonomy
 *
 * Two layers of errors flow through the library:
 *
 * - {@link NetworkError}: what went wrong on the wire. Produced by
 *   {@link classifyError} from Supabase/PostgREST error objects, fetch
 *   failures and timeouts. Only its transient kinds are retried.
 * - {@link PlannerError}: what the caller sees. A closed set of kinds
 *   shared by every feature, carrying the feature label, the original
 *   cause and a user-facing message.
 *
 * Repositories throw `PlannerError`s; stores put them into their `error`
 * state unchanged. Wrapping never discards the underlying cause.
 */

import { isRecord } from './utils';

// =============================================================================
// Transport Errors
// =============================================================================

export type NetworkErrorKind =
  | 'noConnection'
  | 'timeout'
  | 'serverError'
  | 'rateLimited'
  | 'unauthorized'
  | 'badRequest'
  | 'conflict'
  | 'notFound'
  | 'unknown';

/** Kinds that are expected to succeed on a later attempt. */
const RETRYABLE_KINDS: ReadonlySet<NetworkErrorKind> = new Set([
  'noConnection',
  'timeout',
  'serverError',
  'rateLimited'
]);

export class NetworkError extends Error {
  readonly kind: NetworkErrorKind;
  readonly status?: number;
  readonly code?: string;

  constructor(
    kind: NetworkErrorKind,
    message: string,
    options: { status?: number; code?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'NetworkError';
    this.kind = kind;
    this.status = options.status;
    this.code = options.code;
  }

  get isRetryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

/**
 * Extract a raw message from the error shapes we meet (Error, PostgREST
 * `{ message, details, hint, code }`, wrapper objects, primitives).
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (isRecord(error)) {
    if (typeof error.message === 'string' && error.message) {
      let msg = error.message;
      if (typeof error.details === 'string' && error.details) {
        msg += ` - ${error.details}`;
      }
      if (typeof error.hint === 'string' && error.hint) {
        msg += ` (${error.hint})`;
      }
      return msg;
    }
    if (typeof error.error === 'string' && error.error) {
      return error.error;
    }
    try {
      return JSON.stringify(error);
    } catch {
      return '[Unable to parse error]';
    }
  }

  return String(error);
}

function readCode(error: unknown): string | undefined {
  if (!isRecord(error)) return undefined;
  if (typeof error.code === 'string') return error.code;
  if (typeof error.code === 'number') return String(error.code);
  return undefined;
}

function readStatus(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  if (typeof error.status === 'number') return error.status;
  if (typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

/**
 * Classify any thrown value or Supabase error object as a {@link NetworkError}.
 *
 * Order matters: specific PostgREST/PostgreSQL codes are checked before
 * HTTP statuses, which are checked before message heuristics.
 */
export function classifyError(error: unknown): NetworkError {
  if (error instanceof NetworkError) return error;

  const code = readCode(error);
  const status = readStatus(error);
  const message = extractErrorMessage(error);
  const msg = message.toLowerCase();
  const make = (kind: NetworkErrorKind) =>
    new NetworkError(kind, message, { status, code, cause: error });

  // PGRST116: `.single()` matched zero rows
  if (code === 'PGRST116' || code === '404' || status === 404) {
    return make('notFound');
  }

  if (
    code === 'PGRST301' ||
    code === 'PGRST302' ||
    code === '42501' ||
    status === 401 ||
    status === 403 ||
    msg.includes('jwt') ||
    msg.includes('unauthorized') ||
    msg.includes('permission denied')
  ) {
    return make('unauthorized');
  }

  if (code === '23505' || code === 'PGRST409' || status === 409 || msg.includes('duplicate key')) {
    return make('conflict');
  }

  /* Class 22 (data exception) and 23 (integrity constraint) SQLSTATEs,
     PostgREST request errors, and 400/422 responses are caller mistakes. */
  if (
    (code !== undefined && /^2[23]/.test(code)) ||
    (code !== undefined && /^PGRST[12]\d\d$/.test(code)) ||
    status === 400 ||
    status === 422
  ) {
    return make('badRequest');
  }

  if (status === 429 || msg.includes('rate limit') || msg.includes('too many requests')) {
    return make('rateLimited');
  }

  if (
    (status !== undefined && status >= 500 && status < 600) ||
    /\b50[0234]\b/.test(msg) ||
    msg.includes('unavailable')
  ) {
    return make('serverError');
  }

  if (msg.includes('timeout') || msg.includes('timed out')) {
    return make('timeout');
  }

  if (
    msg.includes('fetch') ||
    msg.includes('network') ||
    msg.includes('connection') ||
    msg.includes('offline') ||
    msg.includes('econnrefused') ||
    msg.includes('enotfound')
  ) {
    return make('noConnection');
  }

  return make('unknown');
}

// =============================================================================
// Planner Errors
// =============================================================================

export type PlannerErrorKind =
  | 'fetchFailed'
  | 'createFailed'
  | 'updateFailed'
  | 'deleteFailed'
  | 'validationFailed'
  | 'unauthorized'
  | 'notFound';

export class PlannerError extends Error {
  readonly kind: PlannerErrorKind;
  /** Feature label, e.g. `'guest'` or `'payment schedule'`. */
  readonly feature: string;

  constructor(kind: PlannerErrorKind, feature: string, cause?: unknown) {
    super(
      cause === undefined
        ? `${feature} ${kind}`
        : `${feature} ${kind}: ${extractErrorMessage(cause)}`,
      { cause }
    );
    this.name = 'PlannerError';
    this.kind = kind;
    this.feature = feature;
  }

  /** Message suitable for an alert or toast. */
  get userMessage(): string {
    switch (this.kind) {
      case 'fetchFailed':
        return `Couldn't load your ${this.feature} data. Check your connection and try again.`;
      case 'createFailed':
        return `Couldn't add the ${this.feature}. Please try again.`;
      case 'updateFailed':
        return `Couldn't save changes to the ${this.feature}. Please try again.`;
      case 'deleteFailed':
        return `Couldn't delete the ${this.feature}. Please try again.`;
      case 'validationFailed':
        return `Some ${this.feature} details are invalid. Please review and try again.`;
      case 'unauthorized':
        return 'No couple selected. Please select your wedding couple to continue.';
      case 'notFound':
        return `That ${this.feature} no longer exists. It may have been deleted.`;
    }
  }

  /** The transport classification of the cause, when there is one. */
  get networkError(): NetworkError | null {
    return this.cause === undefined ? null : classifyError(this.cause);
  }
}

/**
 * Wrap an error as a {@link PlannerError} of the given operation kind.
 *
 * A `PlannerError` passes through unchanged. Transport errors that name a
 * business condition keep that condition whatever the operation was:
 * unauthorized stays `unauthorized`, a missing row is `notFound`, a rejected
 * payload or constraint violation is `validationFailed`.
 */
export function toPlannerError(
  kind: PlannerErrorKind,
  feature: string,
  error: unknown
): PlannerError {
  if (error instanceof PlannerError) return error;

  switch (classifyError(error).kind) {
    case 'unauthorized':
      return new PlannerError('unauthorized', feature, error);
    case 'notFound':
      return new PlannerError('notFound', feature, error);
    case 'badRequest':
    case 'conflict':
      return new PlannerError('validationFailed', feature, error);
    default:
      return new PlannerError(kind, feature, error);
  }
}
