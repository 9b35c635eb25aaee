import { describe, it, expect, vi } from 'vitest';
import {
  AlertCoordinator, AlertState, AlertContext, NotificationChannel, NotificationError,
  candleDedup, sessionDedup, getDedupPolicy, formatAlertMessage, truncateMessage,
} from '../src/alerts';
import type { TriggerResult } from '../src/scanner/types';

function result(symbol: string, triggered: boolean, candleTime = 1): TriggerResult {
  return { symbol, triggered, lastClose: 100, candleTime };
}

function fakeChannel(name: string, notify: NotificationChannel['notify'] = async () => {}) {
  const spy = vi.fn(notify);
  const channel: NotificationChannel = { name, notify: spy };
  return { channel, spy };
}

function context(formulaText = 'Close > Open'): AlertContext {
  return { formulaText, alertState: new AlertState() };
}

describe('formatAlertMessage', () => {
  it('puts the formula above the joined symbols', () => {
    expect(formatAlertMessage('Close > Open', ['A', 'B'])).toBe('Close > Open\nTriggered: A, B');
  });

  it('truncates with a marker', () => {
    expect(truncateMessage('abcdef', 4)).toBe('abc…');
    expect(truncateMessage('abc', 4)).toBe('abc');
  });
});

describe('AlertCoordinator (session dedup)', () => {
  it('alerts once per continuous trigger and re-alerts after it clears', async () => {
    const { channel, spy } = fakeChannel('chat');
    const coordinator = new AlertCoordinator({ channels: [channel] });
    const ctx = context();

    const batch1 = await coordinator.processCycle(ctx, [result('X', true)]);
    expect(batch1.symbols).toEqual(['X']);
    expect(ctx.alertState.has('X')).toBe(true);

    const batch2 = await coordinator.processCycle(ctx, [result('X', true, 2)]);
    expect(batch2.symbols).toEqual([]);
    expect(batch2.message).toBeNull();

    const batch3 = await coordinator.processCycle(ctx, [result('X', false, 3)]);
    expect(batch3.symbols).toEqual([]);
    expect(ctx.alertState.has('X')).toBe(false);

    const batch4 = await coordinator.processCycle(ctx, [result('X', true, 4)]);
    expect(batch4.symbols).toEqual(['X']);

    expect(spy).toHaveBeenCalledTimes(2);
  });

  it('sends one consolidated, sorted message per cycle', async () => {
    const { channel, spy } = fakeChannel('chat');
    const coordinator = new AlertCoordinator({ channels: [channel] });

    const batch = await coordinator.processCycle(context('Close > Open'), [
      result('TCS.NS', true),
      result('INFY.NS', false),
      result('ITC.NS', true),
    ]);

    expect(batch.symbols).toEqual(['ITC.NS', 'TCS.NS']);
    expect(batch.message).toBe('Close > Open\nTriggered: ITC.NS, TCS.NS');
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('Close > Open\nTriggered: ITC.NS, TCS.NS');
    expect(batch.deliveries).toEqual([{ channel: 'chat', ok: true }]);
  });

  it('only announces the newly triggered symbols', async () => {
    const { channel, spy } = fakeChannel('chat');
    const coordinator = new AlertCoordinator({ channels: [channel] });
    const ctx = context();

    await coordinator.processCycle(ctx, [result('A', true)]);
    const batch = await coordinator.processCycle(ctx, [result('A', true), result('B', true)]);

    expect(batch.symbols).toEqual(['B']);
    expect(spy).toHaveBeenLastCalledWith('Close > Open\nTriggered: B');
    expect(ctx.alertState.symbols()).toEqual(['A', 'B']);
  });

  it('does not notify when nothing triggered', async () => {
    const { channel, spy } = fakeChannel('chat');
    const coordinator = new AlertCoordinator({ channels: [channel] });

    const batch = await coordinator.processCycle(context(), [result('A', false), result('B', false)]);

    expect(batch).toEqual({ symbols: [], message: null, deliveries: [] });
    expect(spy).not.toHaveBeenCalled();
  });

  it('keeps the marker of a symbol missing from a cycle', async () => {
    const coordinator = new AlertCoordinator({ channels: [] });
    const ctx = context();

    await coordinator.processCycle(ctx, [result('X', true)]);
    await coordinator.processCycle(ctx, []);
    expect(ctx.alertState.has('X')).toBe(true);

    const batch = await coordinator.processCycle(ctx, [result('X', true)]);
    expect(batch.symbols).toEqual([]);
  });

  it('exposes its channel names', () => {
    const coordinator = new AlertCoordinator({ channels: [fakeChannel('chat').channel, fakeChannel('email').channel] });
    expect(coordinator.channelNames).toEqual(['chat', 'email']);
  });

  it('marks symbols notified even with no channels configured', async () => {
    const coordinator = new AlertCoordinator({ channels: [] });
    const ctx = context();

    const batch = await coordinator.processCycle(ctx, [result('A', true)]);

    expect(batch.symbols).toEqual(['A']);
    expect(batch.deliveries).toEqual([]);
    expect(ctx.alertState.has('A')).toBe(true);
  });
});

describe('AlertCoordinator (candle dedup)', () => {
  it('re-alerts when the latest candle advances', async () => {
    const { channel, spy } = fakeChannel('chat');
    const coordinator = new AlertCoordinator({ channels: [channel], policy: candleDedup });
    const ctx = context();

    expect((await coordinator.processCycle(ctx, [result('X', true, 100)])).symbols).toEqual(['X']);
    expect((await coordinator.processCycle(ctx, [result('X', true, 100)])).symbols).toEqual([]);
    expect((await coordinator.processCycle(ctx, [result('X', true, 200)])).symbols).toEqual(['X']);
    expect(ctx.alertState.candleTimeOf('X')).toBe(200);

    await coordinator.processCycle(ctx, [result('X', false, 300)]);
    expect(ctx.alertState.has('X')).toBe(false);
    expect(spy).toHaveBeenCalledTimes(2);
  });
});

describe('getDedupPolicy', () => {
  it('maps names to policies', () => {
    expect(getDedupPolicy('session')).toBe(sessionDedup);
    expect(getDedupPolicy('candle')).toBe(candleDedup);
  });
});

describe('channel isolation', () => {
  it('still notifies email when chat fails, and does not throw', async () => {
    const chat = fakeChannel('chat', async () => {
      throw new NotificationError('chat', 'HTTP 500', 500);
    });
    const email = fakeChannel('email');
    const coordinator = new AlertCoordinator({ channels: [chat.channel, email.channel] });
    const ctx = context();

    const batch = await coordinator.processCycle(ctx, [result('A', true)]);

    expect(chat.spy).toHaveBeenCalledTimes(1);
    expect(email.spy).toHaveBeenCalledTimes(1);
    expect(batch.deliveries).toEqual([
      { channel: 'chat', ok: false, error: 'chat: HTTP 500' },
      { channel: 'email', ok: true },
    ]);
    expect(ctx.alertState.has('A')).toBe(true);
  });

  it('isolates a channel that throws synchronously', async () => {
    const broken = fakeChannel('broken', () => {
      throw new Error('boom');
    });
    const email = fakeChannel('email');
    const coordinator = new AlertCoordinator({ channels: [broken.channel, email.channel] });

    const batch = await coordinator.processCycle(context(), [result('A', true)]);

    expect(email.spy).toHaveBeenCalledTimes(1);
    expect(batch.deliveries).toEqual([
      { channel: 'broken', ok: false, error: 'boom' },
      { channel: 'email', ok: true },
    ]);
  });
});
