import {
  ChangeChannel,
  type ChangeChannelOptions,
  type ChangeHandler,
  type PropertyId,
  type Unsubscribe,
} from '@validatable/events';

export type ObservableLifecycle = 'constructing' | 'live';

export type ObservableKey<TProps extends object> = Extract<keyof TProps, PropertyId>;

export interface PropertyDescriptor<V> {
  read: () => V;
  /** Default: Object.is */
  equals?: ((a: V, b: V) => boolean) | undefined;
}

export type PropertyDescriptors<TProps extends object> = {
  readonly [K in keyof TProps]: PropertyDescriptor<TProps[K]>;
};

export interface ObservableOptions<TKey extends PropertyId> {
  /** Receives subscriber failures; defaults to the channel's logging reporter */
  onSubscriberError?: ChangeChannelOptions<TKey>['onError'];
}

/**
 * Base class for objects that publish property-level change notifications.
 *
 * Lifecycle is `constructing -> live`. The object turns live on its first
 * subscription; changes recorded before that are dropped, since nobody can be
 * listening yet.
 *
 * Every public operation of a subclass runs inside `batch()`. Changes recorded
 * in a batch are compared against the property's value at the start of the
 * outermost batch and published once each, in first-change order, when it
 * ends. An async operation gets one batch per synchronous segment.
 */
export abstract class Observable<TProps extends object> {
  private readonly channel: ChangeChannel<ObservableKey<TProps>>;
  private lifecycle: ObservableLifecycle = 'constructing';
  private depth = 0;
  private readonly pending = new Map<ObservableKey<TProps>, () => void>();

  /** How each published property is read and compared */
  protected abstract readonly properties: PropertyDescriptors<TProps>;

  protected constructor(options: ObservableOptions<ObservableKey<TProps>> = {}) {
    this.channel = new ChangeChannel<ObservableKey<TProps>>({ onError: options.onSubscriberError });
  }

  get isLive(): boolean {
    return this.lifecycle === 'live';
  }

  subscribe(property: ObservableKey<TProps>, handler: ChangeHandler<ObservableKey<TProps>>): Unsubscribe {
    this.lifecycle = 'live';
    return this.channel.subscribe(property, handler);
  }

  subscribeAll(handler: ChangeHandler<ObservableKey<TProps>>): Unsubscribe {
    this.lifecycle = 'live';
    return this.channel.subscribeAll(handler);
  }

  /**
   * Note that `property` may have changed from `previous`. Outside a batch the
   * change is its own unit and is published immediately.
   */
  protected recordChange<K extends ObservableKey<TProps>>(property: K, previous: TProps[K]): void {
    if (this.lifecycle === 'constructing') return;

    if (this.depth === 0) {
      this.publishIfChanged(property, previous);
      return;
    }

    if (!this.pending.has(property)) {
      this.pending.set(property, () => this.publishIfChanged(property, previous));
    }
  }

  protected batch<R>(fn: () => R): R {
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

  private flush(): void {
    while (this.pending.size > 0) {
      const publishers = [...this.pending.values()];
      this.pending.clear();
      for (const publish of publishers) {
        publish();
      }
    }
  }

  private publishIfChanged<K extends ObservableKey<TProps>>(property: K, previous: TProps[K]): void {
    const descriptor: PropertyDescriptor<TProps[K]> = this.properties[property];
    const equals = descriptor.equals ?? Object.is;
    if (equals(previous, descriptor.read())) return;
    this.channel.publish({ property, source: this });
  }
}
