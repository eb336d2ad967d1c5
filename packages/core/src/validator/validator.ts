/**
 * Cross-field validation orchestrator
 *
 * Owns a registry of named fields and a dependency graph
 * (dependent -> dependencies). A change to a dependency's value schedules a
 * revalidation of each dependent through the dependent's own validate(), so
 * the single-entry consistency of errors/isValid is kept.
 *
 * Scheduling follows units of work: inside batch() every dependent is
 * revalidated once, after the unit ends; outside a batch each value change is
 * its own unit and revalidates immediately after the change is applied.
 */

import type { Unsubscribe } from '@validatable/events';
import { getLogger } from '@validatable/logger';
import { err, ok, type Result } from 'neverthrow';

import {
  ConfigurationError,
  SubmitActionError,
  SubmitCancelledError,
  ValidationFailedError,
  type SubmitError,
} from '../errors/index.js';
import { raceAgainstSignal } from '../utils/abort.js';
import type { ValidatableField } from '../validatable/validatable-value.js';

export interface ValidatorOptions {
  /** Label used in log output */
  name?: string | undefined;
}

export interface SubmitOptions {
  signal?: AbortSignal | undefined;
}

export type SubmitAction<T> = (signal: AbortSignal | undefined) => Promise<T>;

const logger = getLogger('validatable:validator');

export class Validator {
  readonly name: string;

  private readonly fields = new Map<string, ValidatableField>();
  private readonly dependencies = new Map<string, Set<string>>();
  private readonly dependents = new Map<string, Set<string>>();
  private readonly subscriptions = new Map<string, Unsubscribe>();
  private readonly scheduled = new Set<string>();
  private depth = 0;

  constructor(options: ValidatorOptions = {}) {
    this.name = options.name ?? 'validator';
  }

  get fieldNames(): string[] {
    return [...this.fields.keys()];
  }

  field(name: string): ValidatableField | undefined {
    return this.fields.get(name);
  }

  /**
   * @throws ConfigurationError DUPLICATE_FIELD when the name is taken
   */
  register(name: string, field: ValidatableField): this {
    if (this.fields.has(name)) {
      throw new ConfigurationError('DUPLICATE_FIELD', `Field "${name}" is already registered`, { field: name });
    }
    this.fields.set(name, field);
    return this;
  }

  /**
   * Declare that validating `dependent` reads the current value of `dependency`.
   * Subscribing to the dependency makes it live, which fixes its rules.
   *
   * @throws ConfigurationError SELF_DEPENDENCY or UNKNOWN_FIELD
   */
  dependsOn(dependent: string, dependency: string): this {
    this.requireField(dependent);
    const dependencyField = this.requireField(dependency);
    if (dependent === dependency) {
      throw new ConfigurationError('SELF_DEPENDENCY', `Field "${dependent}" cannot depend on itself`, {
        field: dependent,
      });
    }

    const edges = this.dependencies.get(dependent) ?? new Set<string>();
    if (edges.has(dependency)) return this;
    edges.add(dependency);
    this.dependencies.set(dependent, edges);

    const reverse = this.dependents.get(dependency) ?? new Set<string>();
    reverse.add(dependent);
    this.dependents.set(dependency, reverse);

    if (!this.subscriptions.has(dependency)) {
      this.subscriptions.set(
        dependency,
        dependencyField.subscribe('value', () => this.onDependencyChanged(dependency))
      );
    }

    logger.debug({ validator: this.name, dependent, dependency }, 'Registered field dependency');
    return this;
  }

  dependenciesOf(name: string): string[] {
    return [...(this.dependencies.get(name) ?? [])];
  }

  dependentsOf(name: string): string[] {
    return [...(this.dependents.get(name) ?? [])];
  }

  /**
   * Run `fn` as one unit of work. Dependents of every dependency changed
   * inside it are revalidated once each when the outermost batch ends.
   */
  batch<R>(fn: () => R): R {
    this.depth++;
    try {
      return fn();
    } finally {
      this.depth--;
      if (this.depth === 0) {
        this.flush();
      }
    }
  }

  /** Validate every field in registration order. No short circuit. */
  validateAll(): boolean {
    let valid = true;
    for (const field of this.fields.values()) {
      if (!field.validate()) {
        valid = false;
      }
    }
    return valid;
  }

  get isValid(): boolean {
    for (const field of this.fields.values()) {
      if (!field.isValid) return false;
    }
    return true;
  }

  /** Current errors of each field that has any */
  errorsByField(): Record<string, readonly string[]> {
    const result: Record<string, readonly string[]> = {};
    for (const [name, field] of this.fields) {
      if (field.errors.length > 0) {
        result[name] = field.errors;
      }
    }
    return result;
  }

  /**
   * Validate everything, then run `action` if all fields are valid.
   *
   * Aborting `signal` discards the action's outcome. Field state is only ever
   * touched by the synchronous validateAll() that precedes the action.
   */
  async submit<T>(action: SubmitAction<T>, options: SubmitOptions = {}): Promise<Result<T, SubmitError>> {
    const { signal } = options;
    if (signal?.aborted) {
      return err(new SubmitCancelledError(signal.reason));
    }

    if (!this.validateAll()) {
      const fieldErrors = this.errorsByField();
      logger.info({ validator: this.name, fields: Object.keys(fieldErrors) }, 'Submit blocked by validation errors');
      return err(new ValidationFailedError(fieldErrors));
    }

    try {
      const value = signal ? await raceAgainstSignal(action(signal), signal) : await action(undefined);
      return ok(value);
    } catch (error) {
      if (signal?.aborted) {
        logger.debug({ validator: this.name }, 'Submit cancelled; result discarded');
        return err(new SubmitCancelledError(signal.reason));
      }
      logger.warn({ validator: this.name, error }, 'Submit action failed');
      return err(new SubmitActionError(error));
    }
  }

  dispose(): void {
    for (const unsubscribe of this.subscriptions.values()) {
      unsubscribe();
    }
    this.subscriptions.clear();
    this.scheduled.clear();
  }

  private requireField(name: string): ValidatableField {
    const field = this.fields.get(name);
    if (!field) {
      throw new ConfigurationError('UNKNOWN_FIELD', `Field "${name}" is not registered`, { field: name });
    }
    return field;
  }

  private onDependencyChanged(dependency: string): void {
    for (const dependent of this.dependents.get(dependency) ?? []) {
      this.scheduled.add(dependent);
    }
    if (this.depth === 0) {
      this.flush();
    }
  }

  /**
   * Revalidate every scheduled dependent, even when one of them throws; the
   * first failure is rethrown once all of them have run. Outside a batch this
   * runs inside the dependency's change dispatch, so the failure reaches the
   * dependency's `onSubscriberError` (or its error log) instead of the caller
   * of `setValue`.
   */
  private flush(): void {
    const failures: unknown[] = [];
    while (this.scheduled.size > 0) {
      // Registration order keeps revalidation deterministic
      const due = this.fieldNames.filter((name) => this.scheduled.has(name));
      this.scheduled.clear();
      for (const name of due) {
        logger.debug({ validator: this.name, field: name }, 'Revalidating dependent field');
        try {
          this.requireField(name).validate();
        } catch (error) {
          logger.warn({ validator: this.name, field: name, error }, 'Dependent revalidation failed');
          failures.push(error);
        }
      }
    }
    if (failures.length > 0) {
      throw failures[0];
    }
  }
}
