import { describe, it, expect, vi } from 'vitest';
import { TokenPulseApiError, TokenPulseClient } from './index.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const SENTIMENT = {
  token: 'PEPE',
  timestamp: '2026-01-01T12:00:00.000Z',
  sentimentScore: 83.5,
  sentimentLabel: 'bullish',
  confidence: 0.5,
  sampleSize: 2,
  bullishCount: 2,
  neutralCount: 0,
  bearishCount: 0,
  avgLikes: 1.5,
  avgRetweets: 0,
  avgReplies: 0,
  trend: 'insufficient_data',
  trendStrength: 0,
  cached: true,
  source: 'cache',
  fallbackReason: null,
};

describe('TokenPulseClient', () => {
  it('should request a token with query options and return the validated payload', async () => {
    const fetchSpy = vi.spyOn(global, 'fetch').mockResolvedValue(jsonResponse({ success: true, data: SENTIMENT }));
    const client = new TokenPulseClient({ baseUrl: 'http://localhost:3001/' });

    const sentiment = await client.getSentiment('PEPE', { useCache: false });

    expect(sentiment.sentimentScore).toBe(83.5);
    expect(sentiment.cached).toBe(true);
    expect(fetchSpy).toHaveBeenCalledWith(
      'http://localhost:3001/api/v1/sentiment/PEPE?useCache=false',
      expect.objectContaining({ method: 'GET' })
    );
  });

  it('should send JSON bodies', async () => {
    const fetchSpy = vi
      .spyOn(global, 'fetch')
      .mockResolvedValue(jsonResponse({ success: true, data: { token: 'WIF', added: true, tokens: ['WIF'] } }, 201));
    const client = new TokenPulseClient({ baseUrl: 'http://localhost:3001' });

    const result = await client.trackToken('WIF');

    expect(result.tokens).toEqual(['WIF']);
    const init = fetchSpy.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"token":"WIF"}');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('should raise the API error with its code, status and extra fields', async () => {
    vi.spyOn(global, 'fetch').mockResolvedValue(
      jsonResponse(
        {
          success: false,
          error: { code: 'RATE_LIMITED', message: 'Too many requests. Please try again later.', retryAfter: 60 },
        },
        429
      )
    );
    const client = new TokenPulseClient({ baseUrl: 'http://localhost:3001' });

    const error = await client.getTrackedTokens().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TokenPulseApiError);
    if (!(error instanceof TokenPulseApiError)) return;
    expect(error.code).toBe('RATE_LIMITED');
    expect(error.status).toBe(429);
    expect(error.details).toEqual({ retryAfter: 60 });
  });

  it('should reject a payload that does not match the schema', async () => {
    vi.spyOn(global, 'fetch').mockResolvedValue(jsonResponse({ success: true, data: { tokens: 'PEPE' } }));
    const client = new TokenPulseClient({ baseUrl: 'http://localhost:3001' });

    await expect(client.getTrackedTokens()).rejects.toThrow('Unexpected response from /api/v1/tokens');
  });

  it('should reject a non-JSON body', async () => {
    vi.spyOn(global, 'fetch').mockResolvedValue(new Response('<html>bad gateway</html>', { status: 502 }));
    const client = new TokenPulseClient({ baseUrl: 'http://localhost:3001' });

    await expect(client.getHealth()).rejects.toThrow('Non-JSON response from /health');
  });
});
