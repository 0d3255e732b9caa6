import { describe, it, expect } from 'vitest';
import { storeWith, tripFixture } from './__tests__/fixtures';
import { AuditTrail } from './audit-trail';
import { UpdateBudgetCommand } from './commands';
import { EventBusImpl } from './event-bus';
import { CommandInvoker } from './invoker';
import { silentLogger } from './logger';

const fixedNow = () => new Date('2026-05-01T12:00:00.000Z');

describe('AuditTrail', () => {
  it('records executed, rejected and cleared transitions in order', () => {
    const events = new EventBusImpl();
    const audit = new AuditTrail(events, silentLogger(), { now: fixedNow });
    const store = storeWith(tripFixture());
    const invoker = new CommandInvoker({ events });

    invoker.execute(new UpdateBudgetCommand(store, { tripId: 7, budget: 20 }));
    invoker.redo();
    invoker.clear();

    expect(audit.entries()).toEqual([
      {
        at: '2026-05-01T12:00:00.000Z',
        event: 'history:executed',
        kind: 'UpdateBudget',
        summary: 'executed: Set budget of trip 7 to 20',
      },
      {
        at: '2026-05-01T12:00:00.000Z',
        event: 'history:rejected',
        kind: null,
        summary: 'redo rejected (HISTORY_EXHAUSTED): Nothing to redo',
      },
      { at: '2026-05-01T12:00:00.000Z', event: 'history:cleared', kind: null, summary: 'history cleared' },
    ]);
  });

  it('drops the oldest record past its limit', () => {
    const events = new EventBusImpl();
    const audit = new AuditTrail(events, silentLogger(), { limit: 2 });

    events.emit('history:cleared');
    events.emit('history:evicted', { kind: 'UpdateBudget', label: 'a' });
    events.emit('history:pruned', { discarded: [] });

    expect(audit.entries().map((r) => r.summary)).toEqual(['evicted: a', 'discarded 0 redo entries']);
  });

  it('stops recording after detach', () => {
    const events = new EventBusImpl();
    const audit = new AuditTrail(events, silentLogger());

    audit.detach();
    events.emit('history:cleared');

    expect(audit.entries()).toEqual([]);
    expect(events.listenerCount('history:cleared')).toBe(0);
  });

  it('rejects a non-positive limit', () => {
    expect(() => new AuditTrail(new EventBusImpl(), silentLogger(), { limit: 0 })).toThrow(RangeError);
  });
});
