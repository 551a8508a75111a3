import { z } from 'zod';

const retryPolicySchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  baseDelayMs: z.number().min(0).default(1000),
  jitter: z.number().min(0).max(1).default(0.25),
  maxDelayMs: z.number().positive().default(60_000),
  retryableStatuses: z.array(z.number().int()).default([429, 500, 502, 503, 504])
});

const isTimeZone = (tz: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
};

const operationOverrideSchema = z.object({
  minIntervalMs: z.number().min(0).optional(),
  maxRetries: z.number().int().min(0).optional(),
  baseDelayMs: z.number().min(0).optional()
});

export const configSchema = z.object({
  dryRun: z.boolean().default(true),
  currency: z.string().min(1).default('USD'),
  targetsFile: z.string().default('portfolio.csv'),
  allocationTolerancePct: z.number().min(0).default(1),
  api: z
    .object({
      baseUrl: z.string().url().default('https://api.broker.example.com'),
      requestTimeoutMs: z.number().int().positive().default(10_000),
      defaultMinIntervalMs: z.number().min(0).default(1000),
      retry: retryPolicySchema.default({}),
      operations: z.record(operationOverrideSchema).default({})
    })
    .default({}),
  marketData: z
    .object({
      prefer: z.enum(['auto', 'broker', 'market-data', 'public']).default('auto'),
      cacheTtlSeconds: z.number().min(0).default(60),
      useInstrumentId: z.boolean().default(true),
      publicFallback: z.boolean().default(true),
      positionFallback: z.boolean().default(true)
    })
    .default({}),
  instruments: z
    .object({
      categoryOrder: z
        .array(z.enum(['US_ETF', 'US_STOCK']))
        .min(1)
        .default(['US_ETF', 'US_STOCK'])
    })
    .default({}),
  planner: z
    .object({
      mode: z.enum(['total-value', 'threshold']).default('total-value'),
      threshold: z.number().min(0).default(0.05),
      minTradeValue: z.number().min(0).default(100)
    })
    .default({}),
  execution: z
    .object({
      pollIntervalMs: z.number().int().positive().default(5000),
      orderTimeoutMs: z.number().int().positive().default(300_000),
      orderType: z.enum(['MARKET', 'LIMIT']).default('MARKET'),
      limitOffsetPct: z.number().min(0).max(0.2).default(0.01),
      cancelOpenOrdersBeforeRun: z.boolean().default(false),
      cancelOnTimeout: z.boolean().default(false),
      tradingDaysOnly: z.boolean().default(true),
      marketTimeZone: z.string().refine(isTimeZone, 'unknown time zone').default('America/New_York'),
      postRunCheck: z.boolean().default(true)
    })
    .default({}),
  ledger: z
    .object({
      eventsFile: z.string().default('ledger/events.jsonl'),
      tradesFile: z.string().default('ledger/trades.csv')
    })
    .default({})
});

export type RebalancerConfig = z.infer<typeof configSchema>;
export type RebalancerConfigInput = z.input<typeof configSchema>;

export const parseConfig = (
  raw: unknown
): { success: true; value: RebalancerConfig } | { success: false; errors: string[] } => {
  const result = configSchema.safeParse(raw);
  if (result.success) {
    return { success: true, value: result.data };
  }
  const errors = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
  return { success: false, errors };
};

export const targetEntrySchema = z.object({
  symbol: z
    .string()
    .trim()
    .min(1)
    .transform((s) => s.toUpperCase()),
  allocation: z.coerce.number().min(0).max(100)
});

export type TargetEntry = z.infer<typeof targetEntrySchema>;
