import { z } from 'zod';
import { ConfigurationError } from './errors';
import { Env, envSchemaWithRefinements } from './env.schema';

export const APP_SETTINGS = Symbol('APP_SETTINGS');

export const NATIVE_VENUES = ['binance', 'kucoin', 'okx'] as const;
export type NativeVenue = (typeof NATIVE_VENUES)[number];
export type VenueFamily = NativeVenue | 'ccxt';

const PASSPHRASE_VENUES = new Set<string>(['kucoin', 'okx']);

export type SizeUnit = 'base' | 'quote';
export type WithdrawalFeeMode = 'ignore' | 'report';

export interface VenueCredentials {
  readonly apiKey: string;
  readonly apiSecret: string;
  readonly passphrase?: string;
}

export interface VenueSettings {
  readonly id: string;
  readonly family: VenueFamily;
  readonly credentials: VenueCredentials | null;
  readonly takerFee: number;
  readonly makerFee: number;
  /** requests per second; null means the family default */
  readonly requestRateCeiling: number | null;
  readonly restUrl: string | null;
  readonly sizeUnit: SizeUnit;
  readonly withdrawalFees: Readonly<Record<string, number>>;
}

export interface CycleSettings {
  readonly enabled: boolean;
  readonly scanIntervalMs: number;
  readonly deadlineMs: number;
  readonly rateLimitCooldownMs: number;
  readonly requestTimeoutMs: number;
}

export interface ScannerSettings {
  readonly minProfitPct: number;
  readonly maxSlippagePct: number;
  readonly maxProfitPct: number;
  readonly initialCapital: number;
  readonly maxQuoteAgeMs: number;
  readonly withdrawalFees: WithdrawalFeeMode;
}

export interface UniverseSettings {
  readonly staticPairs: readonly string[];
  readonly quoteAsset: string;
  readonly startRank: number;
  readonly endRank: number;
  readonly refreshMs: number;
  readonly maxPairs: number;
  readonly cmcApiKey: string | null;
  readonly cmcBaseUrl: string;
}

export interface TelegramSettings {
  readonly enabled: boolean;
  readonly botToken: string | null;
  readonly chatId: string | null;
  readonly disableWebPreview: boolean;
}

export interface AppSettings {
  readonly nodeEnv: Env['NODE_ENV'];
  readonly logLevel: Env['LOG_LEVEL'];
  readonly port: number;
  readonly cycle: CycleSettings;
  readonly scanner: ScannerSettings;
  readonly universe: UniverseSettings;
  readonly venues: readonly VenueSettings[];
  readonly telegram: TelegramSettings;
}

const emptyToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const venueKeysSchema = z.object({
  API_KEY: z.preprocess(emptyToUndefined, z.string().trim().optional()),
  API_SECRET: z.preprocess(emptyToUndefined, z.string().trim().optional()),
  API_PASSPHRASE: z.preprocess(emptyToUndefined, z.string().trim().optional()),
  TAKER_FEE: z.preprocess(emptyToUndefined, z.coerce.number().min(0).max(0.1).default(0.001)),
  MAKER_FEE: z.preprocess(emptyToUndefined, z.coerce.number().min(0).max(0.1).default(0.001)),
  RATE_LIMIT_RPS: z.preprocess(emptyToUndefined, z.coerce.number().positive().optional()),
  REST_URL: z.preprocess(emptyToUndefined, z.string().trim().url().optional()),
  SIZE_UNIT: z.preprocess(
    (v) => (typeof v === 'string' ? v.trim().toLowerCase() || undefined : v),
    z.enum(['base', 'quote']).default('base'),
  ),
  WITHDRAWAL_FEES: z.preprocess(emptyToUndefined, z.string().optional()),
});

export const venueEnvPrefix = (venueId: string): string =>
  `${venueId.toUpperCase().replace(/[^A-Z0-9]/g, '_')}_`;

/** `BTC:0.0005,ETH:0.004` → `{ BTC: 0.0005, ETH: 0.004 }` */
export const parseWithdrawalFees = (raw: string | undefined, key: string): Record<string, number> => {
  const fees: Record<string, number> = {};
  if (!raw) return fees;
  raw
    .split(',')
    .map((x) => x.trim())
    .filter(Boolean)
    .forEach((entry) => {
      const [asset, value] = entry.split(':').map((x) => x.trim());
      const amount = Number(value);
      if (!asset || !Number.isFinite(amount) || amount < 0) {
        throw new ConfigurationError(`invalid withdrawal fee entry "${entry}"`, key);
      }
      fees[asset.toUpperCase()] = amount;
    });
  return fees;
};

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

const readVenueSettings = (
  id: string,
  family: VenueFamily,
  raw: Record<string, unknown>,
): VenueSettings => {
  const prefix = venueEnvPrefix(id);
  const slice: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key.startsWith(prefix)) {
      slice[key.slice(prefix.length)] = value;
    }
  }

  const parsed = venueKeysSchema.safeParse(slice);
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error), `${prefix}*`);
  }
  const keys = parsed.data;

  let credentials: VenueCredentials | null = null;
  if (keys.API_KEY || keys.API_SECRET) {
    if (!keys.API_KEY || !keys.API_SECRET) {
      throw new ConfigurationError('API key and secret must be configured together', `${prefix}API_KEY`);
    }
    if (PASSPHRASE_VENUES.has(family) && !keys.API_PASSPHRASE) {
      throw new ConfigurationError(`${id} credentials require a passphrase`, `${prefix}API_PASSPHRASE`);
    }
    credentials = {
      apiKey: keys.API_KEY,
      apiSecret: keys.API_SECRET,
      ...(keys.API_PASSPHRASE ? { passphrase: keys.API_PASSPHRASE } : {}),
    };
  }

  return {
    id,
    family,
    credentials,
    takerFee: keys.TAKER_FEE,
    makerFee: keys.MAKER_FEE,
    requestRateCeiling: keys.RATE_LIMIT_RPS ?? null,
    restUrl: keys.REST_URL ?? null,
    sizeUnit: keys.SIZE_UNIT,
    withdrawalFees: parseWithdrawalFees(keys.WITHDRAWAL_FEES, `${prefix}WITHDRAWAL_FEES`),
  };
};

const isNativeVenue = (id: string): id is NativeVenue =>
  NATIVE_VENUES.some((venue) => venue === id);

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};

/**
 * Validates the raw environment once and returns the frozen settings value every
 * component receives. Throws `ConfigurationError` on any violation.
 */
export const buildAppSettings = (raw: Record<string, unknown>): AppSettings => {
  const result = envSchemaWithRefinements.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  const env = result.data;

  const venues: VenueSettings[] = [];
  const seen = new Set<string>();
  for (const id of env.VENUES_ENABLED) {
    if (!isNativeVenue(id)) {
      throw new ConfigurationError(
        `unknown native venue "${id}" (generic exchanges belong in ADDITIONAL_VENUES)`,
        'VENUES_ENABLED',
      );
    }
    if (seen.has(id)) continue;
    seen.add(id);
    venues.push(readVenueSettings(id, id, raw));
  }
  for (const id of env.ADDITIONAL_VENUES) {
    if (seen.has(id)) {
      throw new ConfigurationError(`venue "${id}" is configured twice`, 'ADDITIONAL_VENUES');
    }
    seen.add(id);
    venues.push(readVenueSettings(id, 'ccxt', raw));
  }

  return deepFreeze<AppSettings>({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    port: env.PORT,
    cycle: {
      enabled: env.ARB_ENABLED,
      scanIntervalMs: env.ARB_SCAN_INTERVAL_SECONDS * 1000,
      deadlineMs: env.ARB_CYCLE_DEADLINE_MS,
      rateLimitCooldownMs: env.ARB_RATE_LIMIT_COOLDOWN_SECONDS * 1000,
      requestTimeoutMs: env.MARKET_DATA_REST_TIMEOUT_MS,
    },
    scanner: {
      minProfitPct: env.ARB_MIN_PROFIT_PCT,
      maxSlippagePct: env.ARB_MAX_SLIPPAGE_PCT,
      maxProfitPct: env.ARB_MAX_PROFIT_PCT,
      initialCapital: env.ARB_INITIAL_CAPITAL,
      maxQuoteAgeMs: env.ARB_MAX_QUOTE_AGE_MS,
      withdrawalFees: env.ARB_WITHDRAWAL_FEES,
    },
    universe: {
      staticPairs: env.ARB_TARGET_PAIRS,
      quoteAsset: env.ARB_QUOTE_ASSET,
      startRank: env.ARB_START_RANK,
      endRank: env.ARB_END_RANK,
      refreshMs: env.UNIVERSE_REFRESH_SECONDS * 1000,
      maxPairs: env.UNIVERSE_MAX_PAIRS,
      cmcApiKey: env.CMC_API_KEY ?? null,
      cmcBaseUrl: env.CMC_BASE_URL,
    },
    venues,
    telegram: {
      enabled: env.TELEGRAM_ENABLED,
      botToken: env.TELEGRAM_BOT_TOKEN ?? null,
      chatId: env.TELEGRAM_CHAT_ID ?? null,
      disableWebPreview: env.TELEGRAM_DISABLE_WEB_PAGE_PREVIEW,
    },
  });
};
