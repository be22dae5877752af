/**
 * Dominos API Client
 *
 * Builds the locator and menu URLs, runs them through a transport and decodes
 * the JSON body. Every failure comes back as a tagged result: the caller
 * decides what "no data" means, nothing here throws past `fetchJson`.
 */

import { createComponentLogger } from '../../../lib/logger/structured-logger.js';
import { fetchAndRead, UpstreamFetchError, type FetchErrorKind } from '../../../utils/fetch-with-timeout.js';
import { DominosConfig, type DominosClientConfig } from '../config/dominos.config.js';
import { formatAddressLines, type Address } from '../models/address.js';
import type { PickupType } from '../models/store.js';

const log = createComponentLogger('DominosApiClient');

/**
 * Boundary to the network. Resolves with the response body text.
 */
export interface DominosTransport {
  get(url: string): Promise<string>;
}

export type DominosErrorKind = 'HTTP_ERROR' | FetchErrorKind;

export class DominosApiError extends Error {
  constructor(
    message: string,
    public readonly kind: DominosErrorKind,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'DominosApiError';
  }
}

export interface FetchTransportOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Default transport on top of global fetch
 */
export class FetchTransport implements DominosTransport {
  constructor(private readonly options: FetchTransportOptions = { timeoutMs: DominosConfig.timeoutMs }) {}

  async get(url: string): Promise<string> {
    let reply: { status: number; ok: boolean; body: string };
    try {
      reply = await fetchAndRead(
        url,
        {
          method: 'GET',
          headers: {
            'Accept': 'application/json',
            'Referer': `${new URL(url).origin}/en/pages/order/`,
          },
        },
        {
          timeoutMs: this.options.timeoutMs,
          provider: 'dominos',
          stage: 'dominos_api',
          signal: this.options.signal,
        },
        async (response) => ({ status: response.status, ok: response.ok, body: await response.text() })
      );
    } catch (err) {
      if (err instanceof UpstreamFetchError) {
        throw new DominosApiError(err.message, err.errorKind);
      }
      throw err;
    }

    if (!reply.ok) {
      throw new DominosApiError(
        `Dominos API failed: HTTP ${reply.status} - ${reply.body.substring(0, 200)}`,
        'HTTP_ERROR',
        reply.status
      );
    }

    return reply.body;
  }
}

export function buildStoreLocatorUrl(baseUrl: string, address: Address, pickupType: PickupType): string {
  const { lineOne, lineTwo } = formatAddressLines(address);
  const params = new URLSearchParams({
    s: lineOne,
    c: lineTwo,
    type: pickupType,
  });
  return `${baseUrl}/power/store-locator?${params}`;
}

export function buildMenuUrl(baseUrl: string, storeId: number, language: string): string {
  const params = new URLSearchParams({
    lang: language,
    structured: 'true',
  });
  return `${baseUrl}/power/store/${storeId}/menu?${params}`;
}

export type JsonDecodeResult =
  | { ok: true; data: unknown }
  | { ok: false; reason: 'not_json'; error: string };

export function decodeJson(body: string): JsonDecodeResult {
  try {
    return { ok: true, data: JSON.parse(body) };
  } catch (err) {
    return { ok: false, reason: 'not_json', error: err instanceof Error ? err.message : String(err) };
  }
}

export type JsonFetchResult =
  | { ok: true; data: unknown }
  | { ok: false; reason: 'not_json' | 'transport_error'; error: string };

export class DominosApiClient {
  constructor(
    private readonly transport: DominosTransport = new FetchTransport(),
    private readonly config: Pick<DominosClientConfig, 'baseUrl' | 'language'> = DominosConfig
  ) {}

  fetchStoreLocator(address: Address, pickupType: PickupType): Promise<JsonFetchResult> {
    return this.fetchJson(buildStoreLocatorUrl(this.config.baseUrl, address, pickupType), 'store_locator');
  }

  fetchMenu(storeId: number): Promise<JsonFetchResult> {
    return this.fetchJson(buildMenuUrl(this.config.baseUrl, storeId, this.config.language), 'menu');
  }

  private async fetchJson(url: string, endpoint: 'store_locator' | 'menu'): Promise<JsonFetchResult> {
    let body: string;
    try {
      body = await this.transport.get(url);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(
        {
          event: 'dominos_transport_failed',
          endpoint,
          kind: err instanceof DominosApiError ? err.kind : 'UNKNOWN',
          statusCode: err instanceof DominosApiError ? err.statusCode : undefined,
          error: message,
        },
        '[DominosApiClient] Request failed, treating as no data'
      );
      return { ok: false, reason: 'transport_error', error: message };
    }

    const decoded = decodeJson(body);
    if (!decoded.ok) {
      log.error(
        { event: 'dominos_json_parse_failed', endpoint, bodyLength: body.length, error: decoded.error },
        '[DominosApiClient] Failed to parse JSON from Dominos'
      );
    }
    return decoded;
  }
}
