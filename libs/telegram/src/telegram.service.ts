import { Inject, Injectable, Logger } from '@nestjs/common';
import { Telegraf } from 'telegraf';
import { APP_SETTINGS, AppSettings } from '@libs/core';

@Injectable()
export class TelegramService {
  private readonly logger = new Logger(TelegramService.name);
  private readonly bot: Telegraf | null;
  private readonly chatId: string | null;
  private readonly disableWebPreview: boolean;

  constructor(@Inject(APP_SETTINGS) settings: AppSettings) {
    const { telegram } = settings;
    this.chatId = telegram.chatId;
    this.disableWebPreview = telegram.disableWebPreview;
    this.bot = telegram.enabled && telegram.botToken ? new Telegraf(telegram.botToken) : null;
  }

  get isEnabled(): boolean {
    return this.bot !== null && this.chatId !== null;
  }

  async sendMessage(message: string): Promise<number | null> {
    if (!this.bot || !this.chatId) {
      this.logger.debug('Telegram is disabled; message dropped.');
      return null;
    }
    const response = await this.bot.telegram.sendMessage(this.chatId, message, {
      // messages are rendered as HTML by telegram.formatter
      parse_mode: 'HTML',
      link_preview_options: { is_disabled: this.disableWebPreview },
    });
    return response.message_id;
  }
}
