import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { ConfigError, errorMessage } from './errors';
import { targetEntrySchema, TargetEntry } from './schema';
import { TargetAllocation } from './types';
import { isRecord, sum } from './utils';

const entriesFromMap = (map: Record<string, unknown>): unknown[] =>
  Object.entries(map).map(([symbol, allocation]) => ({ symbol, allocation }));

/** `symbol,allocation_percentage` rows; a header row is optional. */
export const parseTargetsCsv = (content: string): unknown[] => {
  const rows: unknown = parse(content, { skip_empty_lines: true, trim: true, comment: '#' });
  if (!Array.isArray(rows)) return [];
  return rows.flatMap((row) => {
    if (!Array.isArray(row) || row.length < 2) return [];
    const [symbol, allocation] = row;
    if (typeof symbol === 'string' && symbol.toLowerCase() === 'symbol') return [];
    return [{ symbol, allocation }];
  });
};

/** `{target_allocation: {SYM: pct}}` or a plain `{SYM: pct}` map. */
export const parseTargetsJson = (content: string): unknown[] => {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError('Targets file is not valid JSON', [errorMessage(err)]);
  }
  if (!isRecord(raw)) throw new ConfigError('Targets JSON must be an object');
  const map = isRecord(raw.target_allocation) ? raw.target_allocation : raw;
  return entriesFromMap(map);
};

/**
 * Validates entries and checks the allocations sum to 100 within `tolerancePct`.
 * Order of first appearance is kept; a repeated symbol is an error.
 */
export const buildTargetAllocation = (entries: unknown[], tolerancePct = 1): TargetAllocation => {
  const issues: string[] = [];
  const valid: TargetEntry[] = [];
  entries.forEach((entry, i) => {
    const parsed = targetEntrySchema.safeParse(entry);
    if (!parsed.success) {
      issues.push(...parsed.error.issues.map((iss) => `row ${i + 1} ${iss.path.join('.')}: ${iss.message}`));
      return;
    }
    valid.push(parsed.data);
  });
  const targets: TargetAllocation = new Map();
  for (const entry of valid) {
    if (targets.has(entry.symbol)) {
      issues.push(`duplicate symbol ${entry.symbol}`);
      continue;
    }
    targets.set(entry.symbol, entry.allocation);
  }
  if (!issues.length && targets.size === 0) issues.push('no target symbols');
  if (issues.length) throw new ConfigError('Invalid target allocation', issues);

  const total = sum(Array.from(targets.values()));
  if (Math.abs(total - 100) > tolerancePct) {
    throw new ConfigError(`Target allocation sums to ${total.toFixed(2)}%, expected 100% ± ${tolerancePct}`);
  }
  return targets;
};

export const loadTargets = (filePath: string, tolerancePct = 1): TargetAllocation => {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Targets file not found: ${filePath}`);
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  const ext = path.extname(filePath).toLowerCase();
  let entries: unknown[];
  try {
    entries = ext === '.json' ? parseTargetsJson(content) : parseTargetsCsv(content);
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    throw new ConfigError(`Targets file unreadable: ${filePath}`, [errorMessage(err)]);
  }
  return buildTargetAllocation(entries, tolerancePct);
};
