import axios from 'axios';
import { SendError } from './errors.js';
import { TELEGRAM_MESSAGE_LIMIT } from './renderer.js';

const API_BASE = 'https://api.telegram.org';
const REQUEST_TIMEOUT_MS = 30_000;

export interface InlineButton {
  text: string;
  url: string;
}

export interface SendOptions {
  parseMode?: 'HTML';
  disablePreview?: boolean;
  button?: InlineButton | null;
}

export interface MessagingGateway {
  /** Resolves once the platform accepted the message; throws SendError otherwise. */
  sendMessage(chatId: string, text: string, options?: SendOptions): Promise<void>;
}

interface TelegramResponse {
  ok: boolean;
  description?: string;
}

export class TelegramGateway implements MessagingGateway {
  constructor(
    private readonly botToken: string,
    private readonly timeoutMs: number = REQUEST_TIMEOUT_MS
  ) {}

  async sendMessage(chatId: string, text: string, options: SendOptions = {}): Promise<void> {
    if (text.length > TELEGRAM_MESSAGE_LIMIT) {
      throw new SendError(`Message to ${chatId} is ${text.length} characters (limit ${TELEGRAM_MESSAGE_LIMIT})`);
    }

    const payload: Record<string, unknown> = {
      chat_id: chatId,
      text,
      parse_mode: options.parseMode ?? 'HTML',
      disable_web_page_preview: options.disablePreview ?? true,
    };
    if (options.button) {
      payload.reply_markup = {
        inline_keyboard: [[{ text: options.button.text, url: options.button.url }]],
      };
    }

    let data: TelegramResponse;
    try {
      const res = await axios.post<TelegramResponse>(`${API_BASE}/bot${this.botToken}/sendMessage`, payload, {
        timeout: this.timeoutMs,
      });
      data = res.data;
    } catch (err) {
      throw new SendError(`Telegram sendMessage to ${chatId} failed: ${describeAxiosError(err)}`);
    }

    if (!data.ok) {
      throw new SendError(`Telegram rejected message to ${chatId}: ${data.description ?? 'unknown error'}`);
    }
  }
}

function describeAxiosError(err: unknown): string {
  if (axios.isAxiosError<TelegramResponse>(err)) {
    const description = err.response?.data?.description;
    const status = err.response?.status;
    if (status) return `HTTP ${status}${description ? ` ${description}` : ''}`;
    return err.code ?? err.message;
  }
  return err instanceof Error ? err.message : String(err);
}
