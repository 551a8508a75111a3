import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { errorMessage } from '../core/errors';
import { ensureDir } from '../core/utils';
import { LedgerEvent, TradeRecord } from '../core/types';

export const TRADE_COLUMNS: (keyof TradeRecord)[] = [
  'timestamp',
  'runId',
  'phase',
  'symbol',
  'side',
  'quantity',
  'estimatedPrice',
  'estimatedValue',
  'status',
  'clientOrderId',
  'orderId',
  'reason'
];

const tradeRowSchema = z.object({
  timestamp: z.string(),
  runId: z.string(),
  phase: z.string(),
  symbol: z.string(),
  side: z.enum(['BUY', 'SELL']),
  quantity: z.coerce.number(),
  estimatedPrice: z.coerce.number(),
  estimatedValue: z.coerce.number(),
  status: z.enum([
    'DRY_RUN',
    'SUBMITTED',
    'FILLED',
    'PARTIALLY_FILLED',
    'CANCELLED',
    'REJECTED',
    'TIMEOUT',
    'ABORTED',
    'FAILED',
    'SKIPPED_INSUFFICIENT_FUNDS'
  ]),
  clientOrderId: z.string(),
  orderId: z.string(),
  reason: z.string()
});

const ledgerEventSchema = z.object({
  id: z.string(),
  runId: z.string(),
  timestamp: z.string(),
  type: z.enum(['RUN_STARTED', 'PHASE_CHANGED', 'SYMBOL_SKIPPED', 'ORDERS_CANCELLED', 'RUN_COMPLETED', 'RUN_FAILED']),
  details: z.record(z.unknown()).optional()
});

export const appendLedgerEvent = (file: string, event: LedgerEvent) => {
  ensureDir(path.dirname(file));
  fs.appendFileSync(file, `${JSON.stringify(event)}\n`);
};

export const readLedgerEvents = (file: string): LedgerEvent[] => {
  if (!fs.existsSync(file)) return [];
  const content = fs.readFileSync(file, 'utf-8');
  const lines = content.trim().length ? content.trim().split('\n') : [];
  return lines.flatMap((line) => {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (err) {
      console.warn(`Skipping unreadable ledger line in ${file}: ${errorMessage(err)}`);
      return [];
    }
    const parsed = ledgerEventSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`Skipping malformed ledger event in ${file}`);
      return [];
    }
    return [parsed.data];
  });
};

/** Appends one CSV row; the header is written only when the file is new or empty. */
export const appendTradeRow = (file: string, record: TradeRecord) => {
  ensureDir(path.dirname(file));
  const isNew = !fs.existsSync(file) || fs.statSync(file).size === 0;
  const csv = stringify([record], { header: isNew, columns: TRADE_COLUMNS });
  fs.appendFileSync(file, csv);
};

export const readTradeRows = (file: string): TradeRecord[] => {
  if (!fs.existsSync(file)) return [];
  const rows: unknown = parse(fs.readFileSync(file, 'utf-8'), { columns: true, skip_empty_lines: true });
  if (!Array.isArray(rows)) return [];
  return rows.flatMap((row) => {
    const parsed = tradeRowSchema.safeParse(row);
    return parsed.success ? [parsed.data] : [];
  });
};
