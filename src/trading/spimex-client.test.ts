import { describe, it, expect, vi } from 'vitest';
import type { IsoDate } from '@/core/types.js';
import { BulletinDownloadError } from '@/core/errors.js';
import { createMockLogger } from '@/testing/fixtures/routes.js';
import { createSpimexClient } from './spimex-client.js';

const BASE_URL = 'https://spimex.test/upload/reports/oil_xls/oil_xls_';
const DAY = '2024-05-16' as IsoDate;

function createClient(fetchFn: ReturnType<typeof vi.fn>) {
  return createSpimexClient({
    baseUrl: BASE_URL,
    timeoutMs: 5000,
    logger: createMockLogger(),
    fetchFn: fetchFn as never,
  });
}

describe('SpimexClient', () => {
  it('builds the bulletin URL from the compact date', () => {
    const client = createClient(vi.fn());

    expect(client.bulletinUrl(DAY)).toBe(`${BASE_URL}20240516162000.xls`);
  });

  it('returns the bulletin bytes', async () => {
    const fetchFn = vi.fn().mockResolvedValue(new Response(new Uint8Array([1, 2, 3])));
    const client = createClient(fetchFn);

    const result = await client.downloadBulletin(DAY);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toEqual(Buffer.from([1, 2, 3]));
    }
    expect(fetchFn).toHaveBeenCalledWith(
      `${BASE_URL}20240516162000.xls`,
      expect.objectContaining({ signal: expect.any(AbortSignal) }),
    );
  });

  it('returns null when no bulletin was published', async () => {
    const client = createClient(vi.fn().mockResolvedValue(new Response(null, { status: 404 })));

    expect(await client.downloadBulletin(DAY)).toEqual({ ok: true, value: null });
  });

  it('fails on other error statuses', async () => {
    const client = createClient(vi.fn().mockResolvedValue(new Response(null, { status: 503 })));

    const result = await client.downloadBulletin(DAY);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(BulletinDownloadError);
      expect(result.error.message).toBe(
        `Bulletin download failed (${BASE_URL}20240516162000.xls): unexpected status 503`,
      );
    }
  });

  it('fails when the request itself fails', async () => {
    const client = createClient(vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    const result = await client.downloadBulletin(DAY);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('BULLETIN_DOWNLOAD_FAILED');
      expect(result.error.cause).toBeInstanceOf(TypeError);
    }
  });
});
