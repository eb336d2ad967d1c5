import { getLogger } from '@validatable/logger';

export type PropertyId = string | symbol;

export interface PropertyChangedEvent<TKey extends PropertyId = PropertyId> {
  /** Identifier of the property whose value changed */
  property: TKey;
  /** The object that owns the property */
  source: object;
}

export type ChangeHandler<TKey extends PropertyId = PropertyId> = (event: PropertyChangedEvent<TKey>) => void;

export type Unsubscribe = () => void;

export interface ChangeChannelOptions<TKey extends PropertyId = PropertyId> {
  /**
   * Receives handler failures. Errors are isolated per handler: the remaining
   * handlers for the same event still run and nothing propagates to the publisher.
   * Default: log at error level under the `validatable:events` category.
   */
  onError?: ((error: unknown, event: PropertyChangedEvent<TKey>) => void) | undefined;
}

const logger = getLogger('validatable:events');

function describeProperty(property: PropertyId): string {
  return typeof property === 'symbol' ? property.toString() : property;
}

/**
 * Property-keyed publish/subscribe channel.
 *
 * **Guarantees:**
 * - Synchronous delivery: publish() returns after every handler has run
 * - Per-property ordering: handlers run in subscription order, property handlers before wildcard handlers
 * - Error isolation: a throwing handler is reported and does not stop the others
 * - Stable dispatch: handlers added or removed during a publish take effect on the next one
 */
export class ChangeChannel<TKey extends PropertyId = PropertyId> {
  private readonly handlers = new Map<TKey, ChangeHandler<TKey>[]>();
  private wildcardHandlers: ChangeHandler<TKey>[] = [];
  private readonly onError: (error: unknown, event: PropertyChangedEvent<TKey>) => void;

  constructor(options: ChangeChannelOptions<TKey> = {}) {
    this.onError =
      options.onError ??
      ((error, event) => {
        logger.error(
          { error, property: describeProperty(event.property) },
          'Change subscriber threw; remaining subscribers still notified'
        );
      });
  }

  get hasSubscribers(): boolean {
    return this.wildcardHandlers.length > 0 || this.handlers.size > 0;
  }

  subscriberCount(property?: TKey): number {
    if (property === undefined) {
      let total = this.wildcardHandlers.length;
      for (const list of this.handlers.values()) {
        total += list.length;
      }
      return total;
    }
    return this.handlers.get(property)?.length ?? 0;
  }

  subscribe(property: TKey, handler: ChangeHandler<TKey>): Unsubscribe {
    const list = this.handlers.get(property);
    // Copy-on-write keeps in-flight dispatch loops on their own snapshot
    this.handlers.set(property, list ? [...list, handler] : [handler]);

    let active = true;
    return () => {
      if (!active) return;
      active = false;
      const current = this.handlers.get(property);
      if (!current) return;
      const index = current.indexOf(handler);
      if (index < 0) return;
      const next = [...current.slice(0, index), ...current.slice(index + 1)];
      if (next.length === 0) {
        this.handlers.delete(property);
      } else {
        this.handlers.set(property, next);
      }
    };
  }

  subscribeAll(handler: ChangeHandler<TKey>): Unsubscribe {
    this.wildcardHandlers = [...this.wildcardHandlers, handler];

    let active = true;
    return () => {
      if (!active) return;
      active = false;
      const index = this.wildcardHandlers.indexOf(handler);
      if (index >= 0) {
        this.wildcardHandlers = [...this.wildcardHandlers.slice(0, index), ...this.wildcardHandlers.slice(index + 1)];
      }
    };
  }

  publish(event: PropertyChangedEvent<TKey>): void {
    const propertyHandlers = this.handlers.get(event.property) ?? [];
    const wildcardHandlers = this.wildcardHandlers;

    for (const handler of propertyHandlers) {
      this.dispatch(handler, event);
    }
    for (const handler of wildcardHandlers) {
      this.dispatch(handler, event);
    }
  }

  clear(): void {
    this.handlers.clear();
    this.wildcardHandlers = [];
  }

  private dispatch(handler: ChangeHandler<TKey>, event: PropertyChangedEvent<TKey>): void {
    try {
      handler(event);
    } catch (error) {
      try {
        this.onError(error, event);
      } catch (reportError) {
        // A failing error reporter must not break delivery either
        logger.error({ error: reportError }, 'Change channel onError handler threw');
      }
    }
  }
}
