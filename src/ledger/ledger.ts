import crypto from 'crypto';
import { LedgerEvent, LedgerEventType, TradeRecord } from '../core/types';
import { appendLedgerEvent, appendTradeRow, readLedgerEvents, readTradeRows } from './storage';

export type RunStatus = 'IN_PROGRESS' | 'COMPLETED' | 'FAILED' | 'UNKNOWN';

export interface LedgerPaths {
  eventsFile: string;
  tradesFile: string;
}

export const makeEvent = (
  runId: string,
  type: LedgerEventType,
  details?: Record<string, unknown>,
  now: Date = new Date()
): LedgerEvent => ({
  id: crypto.randomUUID(),
  runId,
  timestamp: now.toISOString(),
  type,
  details
});

/**
 * Append-only run history: lifecycle events as JSONL, one CSV row per trade outcome.
 * Appends are synchronous, so writers in one process never interleave.
 */
export class Ledger {
  readonly eventsFile: string;
  readonly tradesFile: string;

  constructor(paths: LedgerPaths) {
    this.eventsFile = paths.eventsFile;
    this.tradesFile = paths.tradesFile;
  }

  appendEvent(event: LedgerEvent) {
    appendLedgerEvent(this.eventsFile, event);
  }

  recordTrade(record: TradeRecord) {
    appendTradeRow(this.tradesFile, record);
  }

  getEvents(): LedgerEvent[] {
    return readLedgerEvents(this.eventsFile);
  }

  getEventsForRun(runId: string): LedgerEvent[] {
    return this.getEvents().filter((e) => e.runId === runId);
  }

  getTrades(runId?: string): TradeRecord[] {
    const rows = readTradeRows(this.tradesFile);
    return runId ? rows.filter((r) => r.runId === runId) : rows;
  }

  getRunStatus(runId: string): RunStatus {
    const last = this.getEventsForRun(runId)
      .slice()
      .sort((a, b) => new Date(a.timestamp).getTime() - new Date(b.timestamp).getTime())
      .at(-1);
    if (!last) return 'UNKNOWN';
    switch (last.type) {
      case 'RUN_COMPLETED':
        return 'COMPLETED';
      case 'RUN_FAILED':
        return 'FAILED';
      default:
        return 'IN_PROGRESS';
    }
  }

  getRecentRuns(limit = 10): { runId: string; status: RunStatus }[] {
    const latest = new Map<string, number>();
    for (const evt of this.getEvents()) {
      const ts = new Date(evt.timestamp).getTime();
      if (ts >= (latest.get(evt.runId) ?? -Infinity)) latest.set(evt.runId, ts);
    }
    return Array.from(latest.entries())
      .sort(([, a], [, b]) => b - a)
      .slice(0, limit)
      .map(([runId]) => ({ runId, status: this.getRunStatus(runId) }));
  }
}
