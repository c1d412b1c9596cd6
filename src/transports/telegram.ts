import type { PredictionBatch, PredictionTransport } from "../types.js";
import { formatBatchMessage } from "./format.js";

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string },
) => Promise<{ ok: boolean; status: number; text(): Promise<string> }>;

export interface TelegramTransportOptions {
  token: string;
  chatId: string;
  maxRequestsPerMinute?: number;
  fetchImpl?: FetchLike;
}

export class TelegramTransport implements PredictionTransport {
  readonly name = "telegram";
  private readonly token: string;
  private readonly chatId: string;
  private readonly maxRequestsPerMinute: number;
  private readonly fetchImpl: FetchLike;
  private readonly callTimes: number[] = [];

  constructor(options: TelegramTransportOptions) {
    this.token = options.token;
    this.chatId = options.chatId;
    this.maxRequestsPerMinute = options.maxRequestsPerMinute ?? 18;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  async sendBatch(batch: PredictionBatch): Promise<void> {
    await this.throttle();
    const primary = await this.sendMessage({
      chat_id: this.chatId,
      text: formatBatchMessage(batch, { markup: "telegram_html" }),
      parse_mode: "HTML",
      disable_web_page_preview: true,
    });
    if (primary.ok) {
      return;
    }

    // Fallback to plain text when Telegram rejects formatting.
    const fallback = await this.sendMessage({
      chat_id: this.chatId,
      text: formatBatchMessage(batch, { markup: "plain" }),
      disable_web_page_preview: true,
    });
    if (fallback.ok) {
      return;
    }

    throw new Error(
      `Telegram sendMessage failed (${fallback.status || primary.status}): ` +
        `${fallback.body || primary.body}`,
    );
  }

  private async sendMessage(payload: Record<string, unknown>): Promise<{
    ok: boolean;
    status: number;
    body: string;
  }> {
    const url = `https://api.telegram.org/bot${this.token}/sendMessage`;
    const response = await this.fetchImpl(url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(payload),
    });
    const body = await response.text();
    return { ok: response.ok, status: response.status, body };
  }

  private async throttle(): Promise<void> {
    if (this.maxRequestsPerMinute <= 0) {
      return;
    }

    const now = Date.now();
    const windowMs = 60_000;

    while (this.callTimes.length > 0 && now - this.callTimes[0] > windowMs) {
      this.callTimes.shift();
    }

    if (this.callTimes.length >= this.maxRequestsPerMinute) {
      const earliest = this.callTimes[0];
      const waitForMs = windowMs - (now - earliest) + 100;
      if (waitForMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, Math.min(waitForMs, 5_000)));
      }
    }

    this.callTimes.push(Date.now());
  }
}
