import fs from 'fs';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { buildAppSettings, envSchema } from '@libs/core';

const readEnvExample = (): Record<string, string> => {
  const content = fs.readFileSync(path.join(process.cwd(), '.env.example'), 'utf8');
  const entries: Record<string, string> = {};

  content.split('\n').forEach((line) => {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      return;
    }

    const match = trimmed.match(/^([A-Z0-9_]+)=(.*)$/);
    if (match) {
      entries[match[1]] = match[2];
    }
  });

  return entries;
};

describe('.env.example alignment', () => {
  it('includes all env.schema keys', () => {
    const envKeys = new Set(Object.keys(readEnvExample()));
    const missing = Object.keys(envSchema.shape).filter((key) => !envKeys.has(key));

    expect(missing).toEqual([]);
  });

  it('is a valid configuration as written', () => {
    const settings = buildAppSettings(readEnvExample());

    expect(settings.venues.map((venue) => venue.id)).toEqual(['binance', 'kucoin', 'okx']);
    expect(settings.venues[1].withdrawalFees).toEqual({ BTC: 0.0005, ETH: 0.004 });
  });
});
