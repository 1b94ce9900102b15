import { Telegram } from 'telegraf';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { buildAppSettings } from '@libs/core';
import { ArbitrageOpportunity, TradingPair } from '@libs/market-data';
import { formatOpportunityMessage, formatPrice, TelegramService } from '@libs/telegram';

const OPPORTUNITY: ArbitrageOpportunity = {
  pair: TradingPair.of('BTC', 'USDT'),
  buyVenue: 'binance',
  sellVenue: 'kucoin',
  buyPrice: 63000.5,
  sellPrice: 63700.25,
  grossSpreadPct: 1.5,
  netProfitPct: 1.1,
  realizableSize: 2.5,
  detectedAt: 1_700_000_000_000,
  cycle: 3,
  buyFeePct: 0.1,
  sellFeePct: 0.1,
  slippagePct: 0.2,
  tradeSize: 0.015873,
  estimatedProfit: 11,
};

describe('formatOpportunityMessage', () => {
  it('renders one line per field', () => {
    expect(formatOpportunityMessage(OPPORTUNITY).split('\n')).toEqual([
      '💹 <b>Arbitrage BTC/USDT</b>',
      '<b>Buy:</b> binance @ 63000.50',
      '<b>Sell:</b> kucoin @ 63700.25',
      '<b>Gross spread:</b> 1.50%',
      '<b>Net profit:</b> 1.10%',
      '<b>Size:</b> 0.01587 BTC (book 2.5000)',
      '<b>Est. profit:</b> 11.00 USDT',
      '<b>Time:</b> 2023-11-14T22:13:20.000Z',
    ]);
  });

  it('adds the withdrawal line when an estimate is present', () => {
    const message = formatOpportunityMessage({
      ...OPPORTUNITY,
      withdrawal: { asset: 'BTC', fee: 0.0005, costPct: 0.2, netAfterWithdrawalPct: 0.9 },
    });

    expect(message.split('\n')[7]).toBe('<b>After withdrawal:</b> 0.90% (fee 0.0005 BTC)');
  });

  it('escapes venue names', () => {
    const message = formatOpportunityMessage({ ...OPPORTUNITY, buyVenue: 'a<b>&c' });
    expect(message.split('\n')[1]).toBe('<b>Buy:</b> a&lt;b&gt;&amp;c @ 63000.50');
  });

  it('scales price precision to magnitude', () => {
    expect(formatPrice(12.5)).toBe('12.5000');
    expect(formatPrice(0.000123456)).toBe('0.0001235');
  });
});

describe('TelegramService', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages while disabled', async () => {
    const service = new TelegramService(buildAppSettings({ ARB_TARGET_PAIRS: 'BTC/USDT' }));

    expect(service.isEnabled).toBe(false);
    await expect(service.sendMessage('hello')).resolves.toBeNull();
  });

  it('is enabled with a token and chat id', () => {
    const service = new TelegramService(
      buildAppSettings({
        ARB_TARGET_PAIRS: 'BTC/USDT',
        TELEGRAM_ENABLED: 'true',
        TELEGRAM_BOT_TOKEN: 'test-token',
        TELEGRAM_CHAT_ID: '-100',
      }),
    );

    expect(service.isEnabled).toBe(true);
  });

  it('always sends HTML, the format the formatter renders', async () => {
    const send = vi.spyOn(Telegram.prototype, 'sendMessage').mockResolvedValue({
      message_id: 42,
      date: 0,
      chat: { id: -100, type: 'group', title: 'alerts' },
      text: 'hello',
    });
    const service = new TelegramService(
      buildAppSettings({
        ARB_TARGET_PAIRS: 'BTC/USDT',
        TELEGRAM_ENABLED: 'true',
        TELEGRAM_BOT_TOKEN: 'test-token',
        TELEGRAM_CHAT_ID: '-100',
        TELEGRAM_PARSE_MODE: 'MarkdownV2',
      }),
    );

    await expect(service.sendMessage(formatOpportunityMessage(OPPORTUNITY))).resolves.toBe(42);
    expect(send).toHaveBeenCalledWith('-100', formatOpportunityMessage(OPPORTUNITY), {
      parse_mode: 'HTML',
      link_preview_options: { is_disabled: true },
    });
  });
});
