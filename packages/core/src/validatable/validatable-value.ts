import type { ChangeHandler, Unsubscribe } from '@validatable/events';
import { getLogger } from '@validatable/logger';

import { ConfigurationError, RuleExecutionError } from '../errors/index.js';
import { Observable, type ObservableOptions, type PropertyDescriptors } from '../observable/observable.js';
import type { Rule } from '../rules/rule.js';
import { sameElements, structuralEquals, type Equality } from '../utils/equality.js';

export interface ValidatableState<T> {
  value: T;
  errors: readonly string[];
  isValid: boolean;
}

export type ValidatableProperty = keyof ValidatableState<unknown>;

/**
 * The part of a ValidatableValue that does not depend on its value type.
 * Validator works against this so fields of different types share one registry.
 */
export interface ValidatableField {
  readonly name: string | undefined;
  readonly errors: readonly string[];
  readonly isValid: boolean;
  readonly firstError: string | undefined;
  validate(): boolean;
  subscribe(property: ValidatableProperty, handler: ChangeHandler<ValidatableProperty>): Unsubscribe;
}

export interface ValidatableValueOptions<T> extends ObservableOptions<ValidatableProperty> {
  /** Label used in log output and error context */
  name?: string | undefined;
  /** Initial rules, evaluated in this order */
  rules?: readonly Rule<T>[] | undefined;
  /** Decides whether setValue is a real change. Default: structural equality */
  equals?: Equality<T> | undefined;
  /** Run validate() after every real change made through setValue. Default: false */
  validateOnChange?: boolean | undefined;
}

const logger = getLogger('validatable:core');

/**
 * A value under validation: the raw value, its ordered rules and the derived
 * `errors` / `isValid` state of the last completed validation pass.
 *
 * `validate()` is the only way `errors` and `isValid` change, and it commits
 * both together.
 */
export class ValidatableValue<T> extends Observable<ValidatableState<T>> implements ValidatableField {
  readonly name: string | undefined;

  protected readonly properties: PropertyDescriptors<ValidatableState<T>> = {
    value: { read: () => this.current, equals: (a, b) => this.equals(a, b) },
    errors: { read: () => this.errorList, equals: sameElements },
    isValid: { read: () => this.valid },
  };

  private current: T;
  private readonly ruleList: Rule<T>[] = [];
  private errorList: readonly string[] = [];
  private valid = true;

  private readonly equals: Equality<T>;
  private readonly validateOnChange: boolean;

  // Bumped by addRule; a pass that sees it move was evaluated against a changing rule list
  private ruleGeneration = 0;
  private activePass: number | undefined;
  private passCount = 0;

  constructor(initialValue: T, options: ValidatableValueOptions<T> = {}) {
    super(options);
    this.name = options.name;
    this.current = initialValue;
    this.equals = options.equals ?? structuralEquals;
    this.validateOnChange = options.validateOnChange ?? false;

    for (const rule of options.rules ?? []) {
      this.addRule(rule);
    }
  }

  get value(): T {
    return this.current;
  }

  get rules(): readonly Rule<T>[] {
    return [...this.ruleList];
  }

  get errors(): readonly string[] {
    return this.errorList;
  }

  get isValid(): boolean {
    return this.valid;
  }

  get firstError(): string | undefined {
    return this.errorList[0];
  }

  /**
   * Append a rule. Rules are fixed once the object has a subscriber.
   * @throws ConfigurationError RULES_SEALED after the first subscription
   */
  addRule(rule: Rule<T>): this {
    if (this.isLive) {
      throw new ConfigurationError('RULES_SEALED', 'Rules cannot be added after the value has subscribers', {
        field: this.name,
      });
    }
    this.ruleList.push(rule);
    this.ruleGeneration++;
    return this;
  }

  /**
   * Evaluate every rule in order against the current value and commit the
   * messages of the failing ones. Returns the new `isValid`.
   *
   * @throws ConfigurationError REENTRANT_VALIDATION when called from inside a running pass
   * @throws ConfigurationError RULES_MUTATED when rules were added during the pass
   * @throws RuleExecutionError when a rule's check throws
   */
  validate(): boolean {
    if (this.activePass !== undefined) {
      throw new ConfigurationError('REENTRANT_VALIDATION', 'validate() was called while a validation pass was running', {
        field: this.name,
        additionalContext: { activePass: this.activePass },
      });
    }

    const failures = this.evaluate();
    return this.batch(() => this.commit(failures));
  }

  /**
   * Replace the value. A value equal to the current one is ignored.
   */
  setValue(next: T): void {
    if (this.equals(this.current, next)) return;

    this.batch(() => {
      const previous = this.current;
      this.current = next;
      this.recordChange('value', previous);

      if (this.validateOnChange) {
        this.validate();
      }
    });
  }

  private evaluate(): string[] {
    const pass = ++this.passCount;
    const generation = this.ruleGeneration;
    this.activePass = pass;

    try {
      const failures: string[] = [];
      for (const rule of [...this.ruleList]) {
        let passed: boolean;
        try {
          passed = rule.check(this.current);
        } catch (error) {
          if (error instanceof ConfigurationError) throw error;
          throw new RuleExecutionError(rule.message, error, { field: this.name });
        }
        if (!passed) {
          failures.push(rule.message);
        }
      }

      if (generation !== this.ruleGeneration) {
        throw new ConfigurationError('RULES_MUTATED', 'Rules were changed while a validation pass was running', {
          field: this.name,
          additionalContext: { expectedGeneration: generation, actualGeneration: this.ruleGeneration },
        });
      }

      logger.debug(
        { field: this.name ?? '(unnamed)', pass, ruleCount: this.ruleList.length, errorCount: failures.length },
        'Validation pass completed'
      );
      return failures;
    } finally {
      this.activePass = undefined;
    }
  }

  private commit(failures: string[]): boolean {
    const previousErrors = this.errorList;
    const previousValid = this.valid;

    this.errorList = Object.freeze(failures);
    this.valid = failures.length === 0;

    this.recordChange('isValid', previousValid);
    this.recordChange('errors', previousErrors);
    return this.valid;
  }
}
