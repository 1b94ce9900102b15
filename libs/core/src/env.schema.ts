import { z } from 'zod';

export const toInt = (def?: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === '') return def;
    const n = typeof v === 'number' ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number().int());

export const toFloat = (def?: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === '') return def;
    const n = typeof v === 'number' ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number());

export const toBool = (def?: boolean) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === '') return def;
    if (typeof v === 'boolean') return v;
    const s = String(v).trim().toLowerCase();
    if (['true', '1', 'yes', 'y', 'on'].includes(s)) return true;
    if (['false', '0', 'no', 'n', 'off'].includes(s)) return false;
    return v;
  }, z.boolean());

export const csv = (def: string[] = []) =>
  z.preprocess((v) => {
    if (v === undefined || v === null) return def;
    if (Array.isArray(v)) return v.map(String);
    const s = String(v).trim();
    if (!s) return def;
    return s
      .split(',')
      .map((x) => x.trim())
      .filter(Boolean);
  }, z.array(z.string()));

const lowerCsv = (def: string[] = []) => csv(def).transform((items) => items.map((x) => x.toLowerCase()));

const optionalText = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() === '' ? undefined : v),
  z.string().trim().optional(),
);

/**
 * Known keys are validated here. Per-venue keys (`<VENUE>_API_KEY`, `<VENUE>_TAKER_FEE`, ...)
 * pass through untouched and are read by `buildAppSettings`.
 */
export const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('production'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
    PORT: toInt(3001).pipe(z.number().int().min(1).max(65535)),

    ARB_ENABLED: toBool(true).default(true),
    ARB_SCAN_INTERVAL_SECONDS: toInt(10).pipe(z.number().int().min(1).max(3600)),
    ARB_CYCLE_DEADLINE_MS: toInt(8000).pipe(z.number().int().min(100).max(3_600_000)),
    ARB_MIN_PROFIT_PCT: toFloat(0.5).pipe(z.number().min(-100).max(1000)),
    ARB_MAX_SLIPPAGE_PCT: toFloat(0.5).pipe(z.number().min(0).max(100)),
    ARB_MAX_PROFIT_PCT: toFloat(20).pipe(z.number().min(0).max(10_000)),
    ARB_INITIAL_CAPITAL: toFloat(1000).pipe(z.number().positive()),
    ARB_MAX_QUOTE_AGE_MS: toInt(15_000).pipe(z.number().int().min(0)),
    ARB_RATE_LIMIT_COOLDOWN_SECONDS: toInt(60).pipe(z.number().int().min(0).max(86_400)),
    ARB_WITHDRAWAL_FEES: z.enum(['ignore', 'report']).default('ignore'),
    ARB_TARGET_PAIRS: csv([]).default([]),
    ARB_QUOTE_ASSET: z.string().trim().toUpperCase().default('USDT'),
    ARB_START_RANK: toInt(100).pipe(z.number().int().min(1)),
    ARB_END_RANK: toInt(1500).pipe(z.number().int().min(1)),

    UNIVERSE_REFRESH_SECONDS: toInt(3600).pipe(z.number().int().min(60).max(604_800)),
    UNIVERSE_MAX_PAIRS: toInt(200).pipe(z.number().int().min(1).max(5000)),

    VENUES_ENABLED: lowerCsv(['binance', 'kucoin']).default(['binance', 'kucoin']),
    ADDITIONAL_VENUES: lowerCsv([]).default([]),
    MARKET_DATA_REST_TIMEOUT_MS: toInt(5000).pipe(z.number().int().min(100).max(120_000)),

    CMC_API_KEY: optionalText,
    CMC_BASE_URL: z.string().trim().url().default('https://pro-api.coinmarketcap.com'),

    TELEGRAM_ENABLED: toBool(false).default(false),
    TELEGRAM_BOT_TOKEN: optionalText,
    TELEGRAM_CHAT_ID: optionalText,
    TELEGRAM_DISABLE_WEB_PAGE_PREVIEW: toBool(true).default(true),
  })
  .passthrough();

export const envSchemaWithRefinements = envSchema.superRefine((env, ctx) => {
  if (env.ARB_CYCLE_DEADLINE_MS >= env.ARB_SCAN_INTERVAL_SECONDS * 1000) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['ARB_CYCLE_DEADLINE_MS'],
      message: 'ARB_CYCLE_DEADLINE_MS must be shorter than ARB_SCAN_INTERVAL_SECONDS',
    });
  }

  if (env.ARB_MIN_PROFIT_PCT > env.ARB_MAX_PROFIT_PCT) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['ARB_MIN_PROFIT_PCT'],
      message: 'ARB_MIN_PROFIT_PCT must not exceed ARB_MAX_PROFIT_PCT',
    });
  }

  if (env.ARB_START_RANK > env.ARB_END_RANK) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['ARB_START_RANK'],
      message: 'ARB_START_RANK must not exceed ARB_END_RANK',
    });
  }

  if (env.ARB_TARGET_PAIRS.length === 0 && !env.CMC_API_KEY) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['CMC_API_KEY'],
      message: 'CMC_API_KEY is required when ARB_TARGET_PAIRS is empty',
    });
  }

  if (env.TELEGRAM_ENABLED) {
    if (!env.TELEGRAM_BOT_TOKEN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TELEGRAM_BOT_TOKEN'],
        message: 'TELEGRAM_BOT_TOKEN is required when TELEGRAM_ENABLED=true',
      });
    }
    if (!env.TELEGRAM_CHAT_ID) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TELEGRAM_CHAT_ID'],
        message: 'TELEGRAM_CHAT_ID is required when TELEGRAM_ENABLED=true',
      });
    }
  }

  if (env.VENUES_ENABLED.length + env.ADDITIONAL_VENUES.length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['VENUES_ENABLED'],
      message: 'at least one venue must be enabled',
    });
  }
});

export type Env = z.infer<typeof envSchemaWithRefinements>;
