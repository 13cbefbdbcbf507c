import { z } from 'zod';

/**
 * Chat notifier configuration
 */
export interface NotifierConfig {
  /** Bot API base URL (default: https://api.telegram.org) */
  apiUrl?: string;

  /** Bot token, sent as part of the request path */
  botToken: string;

  /** Chat that receives the signal report */
  recipientId: string;

  /** Chat that receives errors and diagnostics */
  logId: string;

  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;

  /** Retry attempts, 0 or 1 (default: 0) */
  maxRetries?: number;

  /** Delay before the retry in ms (default: 1000) */
  retryDelayMs?: number;

  /** Override global fetch (for testing). */
  fetchFn?: typeof globalThis.fetch;
}

/**
 * Delivery result
 */
export interface NotifyResult {
  success: boolean;
  statusCode?: number;
  error?: string;
  attempts: number;
  durationMs: number;
}

/**
 * sendMessage request body
 */
export interface SendMessagePayload {
  chat_id: string;
  text: string;
  parse_mode: 'markdown';
}

const BotResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

export const DEFAULT_BOT_API_URL = 'https://api.telegram.org';

export function buildPayload(chatId: string, text: string): SendMessagePayload {
  return { chat_id: chatId, text, parse_mode: 'markdown' };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeBody(body: string): string | undefined {
  try {
    const parsed = BotResponseSchema.safeParse(JSON.parse(body));
    return parsed.success ? parsed.data.description : undefined;
  } catch {
    return undefined;
  }
}

/**
 * ChatNotifier - posts messages to a bot-style sendMessage endpoint
 */
export class ChatNotifier {
  private readonly config: Required<Omit<NotifierConfig, 'fetchFn'>>;
  private readonly doFetch: typeof globalThis.fetch;

  constructor(config: NotifierConfig) {
    this.config = {
      apiUrl: (config.apiUrl ?? DEFAULT_BOT_API_URL).replace(/\/+$/, ''),
      botToken: config.botToken,
      recipientId: config.recipientId,
      logId: config.logId,
      timeoutMs: config.timeoutMs ?? 10000,
      maxRetries: config.maxRetries ?? 0,
      retryDelayMs: config.retryDelayMs ?? 1000,
    };
    this.doFetch = config.fetchFn ?? ((input, init) => globalThis.fetch(input, init));

    if (this.config.maxRetries < 0 || this.config.maxRetries > 1) {
      throw new Error('Notifier maxRetries must be 0 or 1');
    }
  }

  /**
   * sendMessage endpoint. Contains the bot token: never log it.
   */
  private endpoint(): string {
    return `${this.config.apiUrl}/bot${this.config.botToken}/sendMessage`;
  }

  /**
   * Send a message to a chat. Never throws; failures are reported in the result.
   */
  async send(chatId: string, text: string): Promise<NotifyResult> {
    const startTime = Date.now();
    const body = JSON.stringify(buildPayload(chatId, text));

    let lastError: string | undefined;
    let lastStatusCode: number | undefined;
    let actualAttempts = 0;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      actualAttempts = attempt + 1;

      if (attempt > 0) {
        await sleep(this.config.retryDelayMs);
      }

      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

      try {
        const response = await this.doFetch(this.endpoint(), {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body,
          signal: controller.signal,
        });

        lastStatusCode = response.status;
        const description = describeBody(await response.text());

        if (response.ok) {
          return {
            success: true,
            statusCode: response.status,
            attempts: actualAttempts,
            durationMs: Date.now() - startTime,
          };
        }

        lastError = `HTTP ${response.status}: ${description ?? response.statusText}`;

        // Non-retryable status codes (4xx except 429)
        if (response.status >= 400 && response.status < 500 && response.status !== 429) {
          break;
        }
      } catch (error) {
        if (error instanceof Error) {
          lastError = error.name === 'AbortError' ? 'Request timed out' : error.message;
        } else {
          lastError = String(error);
        }
      } finally {
        clearTimeout(timeoutId);
      }
    }

    return {
      success: false,
      statusCode: lastStatusCode,
      error: lastError,
      attempts: actualAttempts,
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Send the signal report to the primary recipient
   */
  async sendReport(text: string): Promise<NotifyResult> {
    return this.send(this.config.recipientId, text);
  }

  /**
   * Send errors and diagnostics to the log destination
   */
  async sendLog(text: string): Promise<NotifyResult> {
    return this.send(this.config.logId, text);
  }
}

/**
 * Create a notifier from configuration
 */
export function createNotifier(config: NotifierConfig): ChatNotifier {
  return new ChatNotifier(config);
}
