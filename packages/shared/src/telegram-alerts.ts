/**
 * Telegram trade notifier
 *
 * Usage:
 * const notifier = new TelegramTradeNotifier({ botToken, chatId });
 * await notifier.notify({ type: 'entry', position });
 */

import TelegramBot from 'node-telegram-bot-api';
import type { TradeEvent, TradeNotifier } from './types/notification.js';
import { escapeHtml } from './logger.js';

/**
 * Minimal surface of the bot used here
 */
export interface TelegramSender {
  sendMessage(chatId: string, text: string, options?: TelegramBot.SendMessageOptions): Promise<unknown>;
}

export interface TelegramNotifierConfig {
  botToken?: string;
  chatId: string;
  /** Label shown in every message */
  serviceName?: string;
  /** Prebuilt sender (tests) */
  sender?: TelegramSender;
}

const EXIT_LABEL: Record<string, string> = {
  stop_loss: 'Stop loss',
  trailing_stop: 'Trailing stop',
  take_profit: 'Take profit',
  max_holding_days: 'Max holding time',
  signal: 'Opposite signal',
  end_of_data: 'End of data',
};

function isoTime(unixSeconds: number): string {
  return new Date(unixSeconds * 1000).toISOString();
}

/**
 * Render a trade event as Telegram HTML
 */
export function formatTradeEvent(event: TradeEvent, serviceName: string): string {
  switch (event.type) {
    case 'entry': {
      const p = event.position;
      return [
        `📈 <b>Position Opened</b>`,
        ``,
        `<b>Service:</b> ${escapeHtml(serviceName)}`,
        `<b>Symbol:</b> ${escapeHtml(p.symbol)}`,
        `<b>Side:</b> ${p.side}`,
        `<b>Quantity:</b> ${p.quantity}`,
        `<b>Entry:</b> ${p.entryPrice.toFixed(2)}`,
        `<b>Stop:</b> ${p.stopLossPrice.toFixed(2)}`,
        `<b>Take profit:</b> ${p.takeProfitPrice.toFixed(2)}`,
        `<b>Time:</b> ${isoTime(p.entryTime)}`,
      ].join('\n');
    }
    case 'exit': {
      const t = event.trade;
      return [
        `${t.pnl >= 0 ? '✅' : '❌'} <b>Position Closed</b>`,
        ``,
        `<b>Service:</b> ${escapeHtml(serviceName)}`,
        `<b>Symbol:</b> ${escapeHtml(t.symbol)}`,
        `<b>Side:</b> ${t.side}`,
        `<b>Reason:</b> ${EXIT_LABEL[event.exitReason] ?? event.exitReason}`,
        `<b>Entry/Exit:</b> ${t.entryPrice.toFixed(2)} → ${t.exitPrice.toFixed(2)}`,
        `<b>PnL:</b> ${t.pnl.toFixed(2)} (${t.pnlPct.toFixed(2)}%)`,
        `<b>Time:</b> ${isoTime(t.exitTime)}`,
      ].join('\n');
    }
    case 'rejected': {
      const r = event.rejection;
      return [
        `⚠️ <b>Order Rejected</b>`,
        ``,
        `<b>Service:</b> ${escapeHtml(serviceName)}`,
        `<b>Symbol:</b> ${escapeHtml(r.symbol)}`,
        `<b>Order:</b> ${escapeHtml(r.orderId)}`,
        `<b>Reason:</b> ${escapeHtml(r.reason)}${r.message ? ` (${escapeHtml(r.message)})` : ''}`,
      ].join('\n');
    }
  }
}

/**
 * Sends trade lifecycle events to a Telegram chat
 */
export class TelegramTradeNotifier implements TradeNotifier {
  private readonly sender: TelegramSender;
  private readonly chatId: string;
  private readonly serviceName: string;

  constructor(config: TelegramNotifierConfig) {
    this.chatId = config.chatId;
    this.serviceName = config.serviceName ?? 'trader';

    if (config.sender) {
      this.sender = config.sender;
    } else if (config.botToken) {
      this.sender = new TelegramBot(config.botToken, { polling: false });
    } else {
      throw new Error('TelegramTradeNotifier needs a botToken or a sender');
    }
  }

  async notify(event: TradeEvent): Promise<void> {
    await this.sender.sendMessage(this.chatId, formatTradeEvent(event, this.serviceName), {
      parse_mode: 'HTML',
      disable_notification: event.type === 'entry',
    });
  }
}
