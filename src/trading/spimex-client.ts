/**
 * SPIMEX bulletin client: downloads the daily oil-section XLS report.
 *
 * Bulletins are published at `<base>YYYYMMDD162000.xls`. A 404 means no
 * trading took place that day (or the report is not out yet).
 */
import type { Result } from '@/core/result.js';
import { ok, err } from '@/core/result.js';
import { BulletinDownloadError, toError } from '@/core/errors.js';
import type { IsoDate } from '@/core/types.js';
import { compactDate } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';

// ─── Interface ──────────────────────────────────────────────────

export interface SpimexClient {
  /** URL of the bulletin for a trading day. */
  bulletinUrl(date: IsoDate): string;
  /** Download a bulletin; `null` when none was published for that day. */
  downloadBulletin(date: IsoDate): Promise<Result<Buffer | null, BulletinDownloadError>>;
}

export interface SpimexClientOptions {
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
  /** Injected for tests. Defaults to the global fetch. */
  fetchFn?: typeof fetch;
}

/** Suffix of every published bulletin: the 16:20 end-of-session report. */
const BULLETIN_SUFFIX = '162000.xls';

// ─── Factory ────────────────────────────────────────────────────

/** Create a SpimexClient over HTTP. */
export function createSpimexClient(options: SpimexClientOptions): SpimexClient {
  const { baseUrl, timeoutMs, logger } = options;
  const fetchFn = options.fetchFn ?? fetch;

  function bulletinUrl(date: IsoDate): string {
    return `${baseUrl}${compactDate(date)}${BULLETIN_SUFFIX}`;
  }

  return {
    bulletinUrl,

    async downloadBulletin(date: IsoDate): Promise<Result<Buffer | null, BulletinDownloadError>> {
      const url = bulletinUrl(date);

      let response: Response;
      try {
        response = await fetchFn(url, { signal: AbortSignal.timeout(timeoutMs) });
      } catch (error) {
        return err(new BulletinDownloadError(url, 'request failed', toError(error)));
      }

      if (response.status === 404) {
        logger.debug('No bulletin published', { component: 'spimex-client', date });
        return ok(null);
      }

      if (!response.ok) {
        return err(new BulletinDownloadError(url, `unexpected status ${response.status}`));
      }

      try {
        const buffer = Buffer.from(await response.arrayBuffer());
        logger.debug('Bulletin downloaded', {
          component: 'spimex-client',
          date,
          bytes: buffer.byteLength,
        });
        return ok(buffer);
      } catch (error) {
        return err(new BulletinDownloadError(url, 'body could not be read', toError(error)));
      }
    },
  };
}
