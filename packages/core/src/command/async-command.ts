import { getLogger } from '@validatable/logger';

import { getErrorMessage } from '../errors/index.js';
import { Observable, type ObservableOptions, type PropertyDescriptors } from '../observable/observable.js';

export interface AsyncCommandState {
  isExecuting: boolean;
  lastError: Error | undefined;
}

export type AsyncCommandProperty = keyof AsyncCommandState;

export interface AsyncCommandOptions extends ObservableOptions<AsyncCommandProperty> {
  /** Label used in log output */
  name?: string | undefined;
  /** Extra gate checked before each execution */
  canExecute?: (() => boolean) | undefined;
  /** Called with every failure of the command body */
  onError?: ((error: Error) => void) | undefined;
}

const logger = getLogger('validatable:command');

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}

/**
 * Bindable async action.
 *
 * An execution is a chain of synchronous segments separated by awaits. The
 * command publishes per segment: `isExecuting` turns true in the first one,
 * and `isExecuting` / `lastError` settle together in the last one. The body
 * batches its own segments.
 */
export class AsyncCommand extends Observable<AsyncCommandState> {
  readonly name: string;

  protected readonly properties: PropertyDescriptors<AsyncCommandState> = {
    isExecuting: { read: () => this.executing },
    lastError: { read: () => this.failure },
  };

  private executing = false;
  private failure: Error | undefined;
  private readonly gate: (() => boolean) | undefined;
  private readonly onError: ((error: Error) => void) | undefined;

  constructor(
    private readonly body: (signal: AbortSignal | undefined) => Promise<void>,
    options: AsyncCommandOptions = {}
  ) {
    super(options);
    this.name = options.name ?? 'command';
    this.gate = options.canExecute;
    this.onError = options.onError;
  }

  get isExecuting(): boolean {
    return this.executing;
  }

  get lastError(): Error | undefined {
    return this.failure;
  }

  canExecute(): boolean {
    return !this.executing && (this.gate?.() ?? true);
  }

  /**
   * Resolves true when the body completed, false when it failed or the command
   * could not start. Never rejects.
   */
  async execute(signal?: AbortSignal): Promise<boolean> {
    if (!this.canExecute()) {
      logger.debug({ command: this.name, executing: this.executing }, 'Command not executable; skipped');
      return false;
    }

    this.batch(() => {
      const previous = this.executing;
      this.executing = true;
      this.recordChange('isExecuting', previous);
    });

    let error: Error | undefined;
    try {
      await this.body(signal);
    } catch (caught) {
      error = toError(caught);
      logger.warn({ command: this.name, error }, 'Command failed');
    }

    this.batch(() => {
      const wasExecuting = this.executing;
      const previousFailure = this.failure;
      this.executing = false;
      this.failure = error;
      this.recordChange('isExecuting', wasExecuting);
      this.recordChange('lastError', previousFailure);
    });

    if (error) {
      this.reportError(error);
      return false;
    }
    return true;
  }

  private reportError(error: Error): void {
    if (!this.onError) return;
    try {
      this.onError(error);
    } catch (handlerError) {
      logger.error({ command: this.name, error: handlerError }, 'Command onError handler threw');
    }
  }
}
