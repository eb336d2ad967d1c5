import { describe, expect, it, vi } from 'vitest';

import { AsyncCommand, type AsyncCommandProperty } from '../async-command.js';

function record(command: AsyncCommand): AsyncCommandProperty[] {
  const received: AsyncCommandProperty[] = [];
  command.subscribeAll((event) => received.push(event.property));
  return received;
}

function deferred() {
  let resolve: () => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<void>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('AsyncCommand', () => {
  it('publishes isExecuting in the first segment and settles it in the last', async () => {
    const gate = deferred();
    const command = new AsyncCommand(() => gate.promise, { name: 'save' });
    const received = record(command);

    const running = command.execute();
    expect(command.isExecuting).toBe(true);
    expect(received).toEqual(['isExecuting']);

    gate.resolve();
    await expect(running).resolves.toBe(true);

    expect(command.isExecuting).toBe(false);
    expect(command.lastError).toBeUndefined();
    expect(received).toEqual(['isExecuting', 'isExecuting']);
  });

  it('passes the signal through to the body', async () => {
    const body = vi.fn((_signal: AbortSignal | undefined) => Promise.resolve());
    const command = new AsyncCommand(body);
    const controller = new AbortController();

    await command.execute(controller.signal);

    expect(body).toHaveBeenCalledWith(controller.signal);
  });

  it('records a failure as lastError and resolves false', async () => {
    const onError = vi.fn();
    const command = new AsyncCommand(() => Promise.reject(new Error('network down')), { onError });
    const received = record(command);

    await expect(command.execute()).resolves.toBe(false);

    expect(command.lastError?.message).toBe('network down');
    expect(command.isExecuting).toBe(false);
    expect(received).toEqual(['isExecuting', 'isExecuting', 'lastError']);
    expect(onError).toHaveBeenCalledWith(command.lastError);
  });

  it('wraps a non-Error rejection in an Error', async () => {
    const command = new AsyncCommand(() => Promise.reject('quota exceeded'));

    await command.execute();

    expect(command.lastError).toBeInstanceOf(Error);
    expect(command.lastError?.message).toBe('quota exceeded');
  });

  it('clears lastError after a later success', async () => {
    let fail = true;
    const command = new AsyncCommand(() => (fail ? Promise.reject(new Error('first try')) : Promise.resolve()));

    await command.execute();
    fail = false;
    await command.execute();

    expect(command.lastError).toBeUndefined();
  });

  it('does not start while an execution is in flight', async () => {
    const gate = deferred();
    const body = vi.fn(() => gate.promise);
    const command = new AsyncCommand(body);

    const first = command.execute();
    expect(command.canExecute()).toBe(false);
    await expect(command.execute()).resolves.toBe(false);

    gate.resolve();
    await first;

    expect(body).toHaveBeenCalledOnce();
    expect(command.canExecute()).toBe(true);
  });

  it('respects the canExecute gate', async () => {
    let allowed = false;
    const body = vi.fn(() => Promise.resolve());
    const command = new AsyncCommand(body, { canExecute: () => allowed });

    await expect(command.execute()).resolves.toBe(false);
    expect(body).not.toHaveBeenCalled();

    allowed = true;
    await expect(command.execute()).resolves.toBe(true);
    expect(body).toHaveBeenCalledOnce();
  });

  it('does not reject when the onError handler throws', async () => {
    const gate = deferred();
    const command = new AsyncCommand(() => gate.promise, {
      onError: () => {
        throw new Error('toast failed');
      },
    });

    const running = command.execute();
    gate.reject(new Error('save failed'));

    await expect(running).resolves.toBe(false);
    expect(command.lastError?.message).toBe('save failed');
  });

  it('publishes nothing before it has a subscriber', async () => {
    const command = new AsyncCommand(() => Promise.resolve());
    await command.execute();

    const received = record(command);

    expect(received).toEqual([]);
    expect(command.isLive).toBe(true);
  });
});
