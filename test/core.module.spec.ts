import { NestFactory } from '@nestjs/core';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { APP_SETTINGS, AppSettings, ConfigurationError, CoreModule } from '@libs/core';

describe('CoreModule', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('builds the settings from the environment', async () => {
    vi.stubEnv('ARB_TARGET_PAIRS', 'BTC/USDT');
    vi.stubEnv('ARB_SCAN_INTERVAL_SECONDS', '10');
    vi.stubEnv('ARB_CYCLE_DEADLINE_MS', '8000');

    const app = await NestFactory.createApplicationContext(CoreModule, { logger: false, abortOnError: false });
    const settings = app.get<AppSettings>(APP_SETTINGS);
    await app.close();

    expect(settings.universe.staticPairs).toEqual(['BTC/USDT']);
    expect(settings.cycle.deadlineMs).toBe(8000);
  });

  it('fails application startup with a ConfigurationError', async () => {
    vi.stubEnv('ARB_TARGET_PAIRS', 'BTC/USDT');
    vi.stubEnv('ARB_SCAN_INTERVAL_SECONDS', '10');
    vi.stubEnv('ARB_CYCLE_DEADLINE_MS', '10000');

    const startup = NestFactory.createApplicationContext(CoreModule, { logger: false, abortOnError: false });

    await expect(startup).rejects.toThrow(ConfigurationError);
    await expect(startup).rejects.toThrow('ARB_CYCLE_DEADLINE_MS must be shorter than ARB_SCAN_INTERVAL_SECONDS');
  });
});
