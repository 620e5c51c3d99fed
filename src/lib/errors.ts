import type { ErrorClassification, OrchestratorState } from '@app-types/transfer';
import type { LeafSystem } from '@app-types/clients';

export class ApplicationError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      statusCode?: number;
      code?: string;
      details?: Record<string, unknown>;
    } = {}
  ) {
    super(message);
    this.name = 'ApplicationError';
    this.statusCode = options.statusCode ?? 500;
    this.code = options.code ?? 'internal_error';
    this.details = options.details;
  }
}

export class NotFoundError extends ApplicationError {
  constructor(idempotencyKey: string) {
    super(`Transfer ${idempotencyKey} not found`, {
      statusCode: 404,
      code: 'transfer_not_found',
      details: { idempotencyKey }
    });
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends ApplicationError {
  constructor(idempotencyKey: string, differingFields: string[]) {
    super('Idempotency key already used for a different request', {
      statusCode: 409,
      code: 'idempotency_conflict',
      details: { idempotencyKey, differingFields }
    });
    this.name = 'ConflictError';
  }
}

export class VersionConflictError extends ApplicationError {
  constructor(idempotencyKey: string, expectedVersion: number) {
    super(`Transfer ${idempotencyKey} changed since version ${expectedVersion}`, {
      statusCode: 409,
      code: 'version_conflict',
      details: { idempotencyKey, expectedVersion }
    });
    this.name = 'VersionConflictError';
  }
}

export class TerminalRecordError extends ApplicationError {
  constructor(idempotencyKey: string) {
    super(`Transfer ${idempotencyKey} already reached a terminal outcome`, {
      statusCode: 409,
      code: 'transfer_terminal',
      details: { idempotencyKey }
    });
    this.name = 'TerminalRecordError';
  }
}

export class InvariantViolationError extends ApplicationError {
  constructor(idempotencyKey: string, violation: string) {
    super(`Transfer ${idempotencyKey} write rejected: ${violation}`, {
      statusCode: 500,
      code: 'transfer_invariant_violation',
      details: { idempotencyKey, violation }
    });
    this.name = 'InvariantViolationError';
  }
}

export class CancellationRefusedError extends ApplicationError {
  constructor(idempotencyKey: string, state: OrchestratorState) {
    super(`Transfer ${idempotencyKey} cannot be cancelled in state ${state}`, {
      statusCode: 409,
      code: 'cancellation_refused',
      details: { idempotencyKey, state }
    });
    this.name = 'CancellationRefusedError';
  }
}

type ExternalClassification = Extract<ErrorClassification, 'TRANSIENT' | 'PERMANENT' | 'RATE_LIMITED'>;

/**
 * A failed call to a leaf system, already classified. Leaf clients throw it
 * directly when they know the cause; anything else is classified by
 * `classifyError`.
 */
export class ExternalCallError extends ApplicationError {
  public readonly classification: ExternalClassification;
  public readonly system: LeafSystem;
  public readonly retryAfterMs?: number;

  constructor(
    message: string,
    options: {
      classification: ExternalClassification;
      system: LeafSystem;
      code?: string;
      statusCode?: number;
      retryAfterMs?: number;
      details?: Record<string, unknown>;
    }
  ) {
    super(message, {
      statusCode: options.statusCode ?? 502,
      code: options.code ?? 'external_call_failed',
      details: options.details
    });
    this.name = 'ExternalCallError';
    this.classification = options.classification;
    this.system = options.system;
    this.retryAfterMs = options.retryAfterMs;
  }
}

export class QuoteExpiredError extends ExternalCallError {
  constructor(requotes: number) {
    super(`Conversion quote expired after ${requotes} re-quotes`, {
      classification: 'TRANSIENT',
      system: 'quote',
      code: 'quote_expired',
      details: { requotes }
    });
    this.name = 'QuoteExpiredError';
  }
}
