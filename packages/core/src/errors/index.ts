/**
 * Error hierarchy for the validation core.
 *
 * Expected validation failures are never errors: they surface as data through
 * `errors` / `isValid`. The classes here describe programming mistakes in an
 * owning component and the outcomes of an async submit.
 */

interface ErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
  cause?: unknown;
  field?: string | undefined;
}

/**
 * Base error carrying a stable code and structured context
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly field?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: ErrorContext) {
    super(message, context?.cause === undefined ? undefined : { cause: context.cause });
    this.timestamp = new Date().toISOString();
    this.field = context?.field;
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      field: this.field,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
    };
  }
}

export type ConfigurationErrorCode =
  | 'RULES_SEALED'
  | 'RULES_MUTATED'
  | 'REENTRANT_VALIDATION'
  | 'DUPLICATE_FIELD'
  | 'UNKNOWN_FIELD'
  | 'SELF_DEPENDENCY'
  | 'INVALID_RULE';

/**
 * Contract violation by the owning component: rules changed after exposure,
 * re-entrant validation, or a malformed validator graph. Fails fast.
 */
export class ConfigurationError extends DomainError {
  readonly severity = 'error' as const;

  constructor(
    public readonly code: ConfigurationErrorCode,
    message: string,
    context?: ErrorContext
  ) {
    super(message, context);
  }
}

/**
 * A rule's check threw instead of returning a boolean
 */
export class RuleExecutionError extends DomainError {
  readonly code = 'RULE_EXECUTION_FAILED';
  readonly severity = 'error' as const;

  constructor(
    public readonly ruleMessage: string,
    cause: unknown,
    context?: Omit<ErrorContext, 'cause'>
  ) {
    super(`Rule "${ruleMessage}" threw during evaluation: ${getErrorMessage(cause)}`, { ...context, cause });
  }
}

/**
 * Submit rejected because at least one field is invalid
 */
export class ValidationFailedError extends DomainError {
  readonly code = 'VALIDATION_FAILED';
  readonly severity = 'warning' as const;

  constructor(public readonly fieldErrors: Readonly<Record<string, readonly string[]>>) {
    const fields = Object.keys(fieldErrors);
    super(`Validation failed for ${fields.length} field(s): ${fields.join(', ')}`);
  }
}

/**
 * Submit aborted through its AbortSignal before the action settled
 */
export class SubmitCancelledError extends DomainError {
  readonly code = 'SUBMIT_CANCELLED';
  readonly severity = 'warning' as const;

  constructor(reason?: unknown) {
    super('Submit was cancelled', reason === undefined ? undefined : { cause: reason });
  }
}

/**
 * The submit action itself rejected
 */
export class SubmitActionError extends DomainError {
  readonly code = 'SUBMIT_ACTION_FAILED';
  readonly severity = 'error' as const;

  constructor(cause: unknown) {
    super(`Submit action failed: ${getErrorMessage(cause)}`, { cause });
  }
}

export type SubmitError = ValidationFailedError | SubmitCancelledError | SubmitActionError;

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

export function isConfigurationError(error: unknown, code?: ConfigurationErrorCode): error is ConfigurationError {
  return error instanceof ConfigurationError && (code === undefined || error.code === code);
}
