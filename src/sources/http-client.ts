/**
 * Minimal JSON-over-HTTP GET client shared by the remote sources.
 *
 * Maps the response onto a Lookup: 200 is `found`, 404 is `not-found`,
 * everything else (other statuses, network failures, timeouts, bodies
 * that are not JSON) is a `transport-error`.
 */
import { UpstreamError, toError } from '@/core/errors.js';
import type { Lookup } from '@/core/result.js';
import { found, notFound, transportError } from '@/core/result.js';
import type { Logger } from '@/observability/logger.js';

// ─── Types ──────────────────────────────────────────────────────

export interface JsonClientOptions {
  /** Name used in logs and error messages, e.g. "usage-api". */
  source: string;
  baseUrl: string;
  /** Sent as a Bearer token when present. */
  token?: string;
  timeoutMs: number;
  logger: Logger;
}

export interface JsonClient {
  /** GET `baseUrl + endpoint` and decode the JSON body. */
  get(endpoint: string): Promise<Lookup<unknown, UpstreamError>>;
}

/** Release the connection of a response whose body is not needed. */
async function discardBody(response: Response, logger: Logger, source: string): Promise<void> {
  if (!response.body || response.bodyUsed) return;
  try {
    await response.body.cancel();
  } catch (error) {
    logger.debug('Could not discard response body', {
      component: source,
      error: toError(error).message,
    });
  }
}

// ─── Factory ────────────────────────────────────────────────────

export function createJsonClient(options: JsonClientOptions): JsonClient {
  const { source, baseUrl, token, timeoutMs, logger } = options;

  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (token) {
    headers['Authorization'] = `Bearer ${token}`;
  }

  return {
    async get(endpoint: string): Promise<Lookup<unknown, UpstreamError>> {
      const url = baseUrl + endpoint;
      logger.debug('GET request', { component: source, url });

      let response: Response;
      try {
        response = await fetch(url, {
          method: 'GET',
          headers,
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (error) {
        const cause = toError(error);
        return transportError(
          new UpstreamError(source, `Request failed: ${cause.message}`, { url }, cause),
        );
      }

      if (response.status === 404) {
        await discardBody(response, logger, source);
        return notFound();
      }

      if (response.status !== 200) {
        if (response.status === 400) {
          const body = await response.text().catch(() => '');
          logger.error('Bad request', { component: source, url, body });
        } else {
          await discardBody(response, logger, source);
        }
        return transportError(
          new UpstreamError(source, `Status: ${String(response.status)}`, {
            url,
            status: response.status,
          }),
        );
      }

      try {
        return found(await response.json());
      } catch (error) {
        const cause = toError(error);
        return transportError(
          new UpstreamError(source, 'Response is not valid JSON', { url }, cause),
        );
      }
    },
  };
}
