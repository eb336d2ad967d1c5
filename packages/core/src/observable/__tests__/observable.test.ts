import type { PropertyChangedEvent } from '@validatable/events';
import { describe, expect, it, vi } from 'vitest';

import { Observable, type ObservableOptions, type PropertyDescriptors } from '../observable.js';

interface CounterState {
  count: number;
  label: string;
}

type CounterProperty = keyof CounterState;

/** Minimal observable used to exercise the base class contract */
class Counter extends Observable<CounterState> {
  protected readonly properties: PropertyDescriptors<CounterState> = {
    count: { read: () => this.countValue },
    label: { read: () => this.labelValue, equals: (a, b) => a.toLowerCase() === b.toLowerCase() },
  };

  private countValue = 0;
  private labelValue = 'counter';

  constructor(initialCount = 0, options: ObservableOptions<CounterProperty> = {}) {
    super(options);
    this.setCount(initialCount);
  }

  get count(): number {
    return this.countValue;
  }

  setCount(next: number): void {
    const previous = this.countValue;
    this.countValue = next;
    this.recordChange('count', previous);
  }

  incrementTimes(times: number): void {
    this.batch(() => {
      for (let i = 0; i < times; i++) {
        this.setCount(this.countValue + 1);
      }
    });
  }

  bounce(): void {
    this.batch(() => {
      this.setCount(this.countValue + 1);
      this.setCount(this.countValue - 1);
    });
  }

  rename(label: string): void {
    this.batch(() => {
      const previous = this.labelValue;
      this.labelValue = label;
      this.recordChange('label', previous);
    });
  }

  update(count: number, label: string): void {
    this.batch(() => {
      this.rename(label);
      this.setCount(count);
    });
  }

  failAfterIncrement(): void {
    this.batch(() => {
      this.setCount(this.countValue + 1);
      throw new Error('operation failed');
    });
  }

  /** Two synchronous segments separated by an await */
  async incrementInSegments(): Promise<void> {
    this.incrementTimes(2);
    await Promise.resolve();
    this.incrementTimes(3);
  }
}

function record(counter: Counter): CounterProperty[] {
  const received: CounterProperty[] = [];
  counter.subscribeAll((event: PropertyChangedEvent<CounterProperty>) => received.push(event.property));
  return received;
}

describe('Observable', () => {
  describe('lifecycle', () => {
    it('starts constructing and turns live on the first subscription', () => {
      const counter = new Counter(5);
      expect(counter.isLive).toBe(false);

      counter.subscribe('count', vi.fn());
      expect(counter.isLive).toBe(true);
    });

    it('publishes nothing for changes made before the first subscription', () => {
      const counter = new Counter(5);
      counter.setCount(6);

      const received = record(counter);
      expect(received).toEqual([]);
      expect(counter.count).toBe(6);
    });
  });

  describe('notifications', () => {
    it('publishes a single change outside a batch immediately', () => {
      const counter = new Counter();
      const received = record(counter);

      counter.setCount(1);

      expect(received).toEqual(['count']);
    });

    it('publishes nothing when the value is unchanged', () => {
      const counter = new Counter(3);
      const received = record(counter);

      counter.setCount(3);

      expect(received).toEqual([]);
    });

    it('coalesces repeated changes inside one operation into one notification', () => {
      const counter = new Counter();
      const handler = vi.fn();
      counter.subscribe('count', handler);

      counter.incrementTimes(5);

      expect(handler).toHaveBeenCalledOnce();
      expect(counter.count).toBe(5);
    });

    it('publishes after the operation completes, with the final value visible', () => {
      const counter = new Counter();
      const seen: number[] = [];
      counter.subscribe('count', () => seen.push(counter.count));

      counter.incrementTimes(3);

      expect(seen).toEqual([3]);
    });

    it('publishes nothing when a property returns to its starting value', () => {
      const counter = new Counter(2);
      const received = record(counter);

      counter.bounce();

      expect(received).toEqual([]);
    });

    it('uses the property equality to decide whether a change is real', () => {
      const counter = new Counter();
      const received = record(counter);

      counter.rename('COUNTER');
      counter.rename('total');

      expect(received).toEqual(['label']);
    });

    it('publishes properties in first-change order when nested batches end', () => {
      const counter = new Counter();
      const received = record(counter);

      counter.update(7, 'sum');

      expect(received).toEqual(['label', 'count']);
    });

    it('still publishes recorded changes when the operation throws', () => {
      const counter = new Counter();
      const received = record(counter);

      expect(() => counter.failAfterIncrement()).toThrow('operation failed');
      expect(received).toEqual(['count']);
    });

    it('lets a subscriber change the object again without losing notifications', () => {
      const counter = new Counter();
      const seen: number[] = [];
      counter.subscribe('count', () => {
        seen.push(counter.count);
        if (counter.count < 3) {
          counter.incrementTimes(1);
        }
      });

      counter.incrementTimes(1);

      expect(seen).toEqual([1, 2, 3]);
    });
  });

  describe('segments', () => {
    it('publishes once per changed property per synchronous segment', async () => {
      const counter = new Counter();
      const seen: number[] = [];
      counter.subscribe('count', () => seen.push(counter.count));

      const pending = counter.incrementInSegments();
      expect(seen).toEqual([2]);

      await pending;
      expect(seen).toEqual([2, 5]);
    });
  });

  describe('subscriber failures', () => {
    it('reports a throwing subscriber and keeps notifying the others', () => {
      const onSubscriberError = vi.fn();
      const counter = new Counter(0, { onSubscriberError });
      const calls: string[] = [];

      counter.subscribe('count', () => {
        throw new Error('binding failed');
      });
      counter.subscribe('count', () => calls.push('second ran'));
      counter.setCount(1);

      expect(calls).toEqual(['second ran']);
      expect(onSubscriberError).toHaveBeenCalledWith(expect.objectContaining({ message: 'binding failed' }), {
        property: 'count',
        source: counter,
      });
    });
  });
});
