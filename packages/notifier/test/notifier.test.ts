import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { ChatNotifier, buildPayload, createNotifier } from '../src/index.js';

function botResponse(status: number, body: unknown, statusText = ''): Response {
  return new Response(JSON.stringify(body), { status, statusText });
}

describe('Notifier', () => {
  describe('buildPayload', () => {
    it('sets markdown parse mode', () => {
      expect(buildPayload('42', 'hello')).toEqual({ chat_id: '42', text: 'hello', parse_mode: 'markdown' });
    });
  });

  describe('ChatNotifier', () => {
    let fetchMock: Mock<typeof fetch>;

    beforeEach(() => {
      fetchMock = vi.fn<typeof fetch>();
      vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
      vi.unstubAllGlobals();
    });

    function notifier(overrides: Partial<ConstructorParameters<typeof ChatNotifier>[0]> = {}): ChatNotifier {
      return createNotifier({
        apiUrl: 'https://bot.test/',
        botToken: 'test-token',
        recipientId: 'recipient',
        logId: 'log',
        ...overrides,
      });
    }

    function sentBody(index = 0): unknown {
      const init = fetchMock.mock.calls[index]?.[1];
      return JSON.parse(String(init?.body));
    }

    it('rejects more than one retry', () => {
      expect(() => notifier({ maxRetries: 2 })).toThrow('Notifier maxRetries must be 0 or 1');
    });

    it('posts JSON to the sendMessage endpoint', async () => {
      fetchMock.mockResolvedValueOnce(botResponse(200, { ok: true }));

      await notifier().send('chat-1', 'hi');

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, options] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe('https://bot.test/bottest-token/sendMessage');
      expect(options?.method).toBe('POST');
      expect(options?.headers).toEqual({ 'Content-Type': 'application/json' });
      expect(sentBody()).toEqual({ chat_id: 'chat-1', text: 'hi', parse_mode: 'markdown' });
    });

    it('sends reports to the recipient and diagnostics to the log chat', async () => {
      fetchMock
        .mockResolvedValueOnce(botResponse(200, { ok: true }))
        .mockResolvedValueOnce(botResponse(200, { ok: true }));

      const n = notifier();
      await n.sendReport('report');
      await n.sendLog('diagnostic');

      expect(sentBody(0)).toEqual({ chat_id: 'recipient', text: 'report', parse_mode: 'markdown' });
      expect(sentBody(1)).toEqual({ chat_id: 'log', text: 'diagnostic', parse_mode: 'markdown' });
    });

    it('returns success on 2xx', async () => {
      fetchMock.mockResolvedValueOnce(botResponse(200, { ok: true }));

      const result = await notifier().send('chat-1', 'hi');

      expect(result.success).toBe(true);
      expect(result.statusCode).toBe(200);
      expect(result.attempts).toBe(1);
      expect(result.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('reports the bot description on client errors without retrying', async () => {
      fetchMock.mockResolvedValue(botResponse(400, { ok: false, description: 'Bad Request: chat not found' }));

      const result = await notifier({ maxRetries: 1, retryDelayMs: 1 }).send('chat-1', 'hi');

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(result.success).toBe(false);
      expect(result.statusCode).toBe(400);
      expect(result.error).toBe('HTTP 400: Bad Request: chat not found');
    });

    it('does not put the bot token in error messages', async () => {
      fetchMock.mockResolvedValueOnce(botResponse(401, { ok: false, description: 'Unauthorized' }));

      const result = await notifier().send('chat-1', 'hi');

      expect(result.error).toBe('HTTP 401: Unauthorized');
    });

    it('retries once on server errors when configured', async () => {
      fetchMock
        .mockResolvedValueOnce(botResponse(502, {}, 'Bad Gateway'))
        .mockResolvedValueOnce(botResponse(200, { ok: true }));

      const result = await notifier({ maxRetries: 1, retryDelayMs: 1 }).send('chat-1', 'hi');

      expect(result.success).toBe(true);
      expect(result.attempts).toBe(2);
    });

    it('gives up after a single attempt by default', async () => {
      fetchMock.mockResolvedValueOnce(botResponse(503, {}, 'Service Unavailable'));

      const result = await notifier().send('chat-1', 'hi');

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(result.success).toBe(false);
      expect(result.error).toBe('HTTP 503: Service Unavailable');
    });

    it('reports network errors', async () => {
      fetchMock.mockRejectedValueOnce(new Error('socket hang up'));

      const result = await notifier().send('chat-1', 'hi');

      expect(result.success).toBe(false);
      expect(result.error).toBe('socket hang up');
      expect(result.statusCode).toBeUndefined();
    });

    it('reports timeouts', async () => {
      const abortError = new Error('Aborted');
      abortError.name = 'AbortError';
      fetchMock.mockRejectedValueOnce(abortError);

      const result = await notifier({ timeoutMs: 50 }).send('chat-1', 'hi');

      expect(result.error).toBe('Request timed out');
    });
  });
});
