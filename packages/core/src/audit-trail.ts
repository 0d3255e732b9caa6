/**
 * @module audit-trail
 * Records every history transition published on the event bus, newest last,
 * and logs each one at info level.
 */

import type { CommandKind, EventBus, EventMap } from '@trip-planner/types';
import type { Logger } from './logger';

export interface AuditRecord {
  /** ISO-8601 time the event was seen. */
  at: string;
  event: keyof EventMap;
  kind: CommandKind | null;
  summary: string;
}

export interface AuditTrailOptions {
  /** Records kept before the oldest is dropped (default 200). */
  limit?: number;
  now?: () => Date;
}

export const DEFAULT_AUDIT_LIMIT = 200;

export class AuditTrail {
  private readonly records: AuditRecord[] = [];
  private readonly unsubscribers: Array<() => void>;
  private readonly limit: number;
  private readonly now: () => Date;

  constructor(events: EventBus, private readonly logger: Logger, options: AuditTrailOptions = {}) {
    this.limit = options.limit ?? DEFAULT_AUDIT_LIMIT;
    if (!Number.isInteger(this.limit) || this.limit < 1) {
      throw new RangeError(`Audit limit must be a positive integer, got ${this.limit}`);
    }
    this.now = options.now ?? (() => new Date());

    this.unsubscribers = [
      events.on('history:executed', (e) => this.add('history:executed', e.kind, `executed: ${e.label}`)),
      events.on('history:undone', (e) => this.add('history:undone', e.kind, `undone: ${e.label}`)),
      events.on('history:redone', (e) => this.add('history:redone', e.kind, `redone: ${e.label}`)),
      events.on('history:rejected', (e) =>
        this.add('history:rejected', e.kind, `${e.operation} rejected (${e.code}): ${e.message}`),
      ),
      events.on('history:evicted', (e) => this.add('history:evicted', e.kind, `evicted: ${e.label}`)),
      events.on('history:pruned', (e) =>
        this.add('history:pruned', null, `discarded ${e.discarded.length} redo entries`),
      ),
      events.on('history:cleared', () => this.add('history:cleared', null, 'history cleared')),
    ];
  }

  /** Recorded transitions, oldest first. */
  entries(): AuditRecord[] {
    return this.records.map((record) => ({ ...record }));
  }

  /** Stop listening. Records already taken are kept. */
  detach(): void {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
  }

  private add(event: keyof EventMap, kind: CommandKind | null, summary: string): void {
    this.records.push({ at: this.now().toISOString(), event, kind, summary });
    if (this.records.length > this.limit) this.records.shift();
    this.logger.info({ event, kind }, summary);
  }
}
