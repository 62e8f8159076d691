/**
 * Error taxonomy shared by every package.
 *
 *   PreconditionError  missing/empty argument, bad roster, misuse of an API
 *   SessionStateError  operation needs an active session
 *   ResolutionError    route decision is malformed or names an unknown agent
 *   TemplateError      prompt template failed to parse or render
 *
 * None of these are retried. Cancellation is not part of the taxonomy: it
 * propagates as the AbortSignal's reason and is recognised with isAbortError().
 */

export type ErrorCode = 'PRECONDITION' | 'SESSION_STATE' | 'RESOLUTION' | 'TEMPLATE';

/** Identifiers attached to an error for diagnosis */
export interface ErrorContext {
  operation?: string;
  sessionId?: string;
  agentId?: string;
  messageId?: string;
  [key: string]: string | number | boolean | undefined;
}

export class SwitchboardError extends Error {
  readonly code: ErrorCode;
  readonly context: ErrorContext;

  constructor(code: ErrorCode, message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SwitchboardError';
    this.code = code;
    this.context = context;
  }
}

export class PreconditionError extends SwitchboardError {
  constructor(message: string, context?: ErrorContext, options?: { cause?: unknown }) {
    super('PRECONDITION', message, context, options);
    this.name = 'PreconditionError';
  }
}

export class SessionStateError extends SwitchboardError {
  constructor(message: string, context?: ErrorContext) {
    super('SESSION_STATE', message, context);
    this.name = 'SessionStateError';
  }
}

export class ResolutionError extends SwitchboardError {
  constructor(message: string, context?: ErrorContext, options?: { cause?: unknown }) {
    super('RESOLUTION', message, context, options);
    this.name = 'ResolutionError';
  }
}

export class TemplateError extends SwitchboardError {
  constructor(message: string, context?: ErrorContext, options?: { cause?: unknown }) {
    super('TEMPLATE', message, context, options);
    this.name = 'TemplateError';
  }
}

/**
 * True for the reason an AbortSignal carries once it fires. Provider adapters
 * replace the SDKs' own abort errors with that reason.
 */
export function isAbortError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('name' in err)) return false;
  return err.name === 'AbortError';
}

