/**
 * HTTP transport for archive and registry downloads
 */

import { SourceUnavailableError, extractErrorMessage } from '../errors.js';
import type { HttpAuth } from '../types/template.js';
import { DEFAULT_HTTP_TIMEOUT_MS } from '../constants.js';
import type { FetchFn, HttpTransportOptions } from './types.js';

export class HttpStatusError extends SourceUnavailableError {
  constructor(
    public readonly url: string,
    public readonly status: number,
    statusText: string
  ) {
    super(`GET ${url} failed: ${status} ${statusText}`.trim(), { url, status });
  }
}

export function authHeaders(auth?: HttpAuth): Record<string, string> {
  if (auth?.bearerToken) {
    return { Authorization: `Bearer ${auth.bearerToken}` };
  }
  if (auth?.basicAuth) {
    const { username, password } = auth.basicAuth;
    return { Authorization: `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}` };
  }
  return {};
}

export class HttpTransport {
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;

  constructor(options: HttpTransportOptions = {}) {
    this.fetchFn = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  }

  /**
   * GET a URL; network failures and non-2xx responses become SourceUnavailable
   */
  async get(url: string, headers: Record<string, string> = {}): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers,
        redirect: 'follow',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new SourceUnavailableError(`GET ${url} failed: ${extractErrorMessage(error)}`, { url }, error);
    }

    if (!response.ok) {
      throw new HttpStatusError(url, response.status, response.statusText);
    }
    return response;
  }

  async getBuffer(url: string, headers: Record<string, string> = {}): Promise<Buffer> {
    const response = await this.get(url, headers);
    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw new SourceUnavailableError(`Reading ${url} failed: ${extractErrorMessage(error)}`, { url }, error);
    }
  }

  async getJson(url: string, headers: Record<string, string> = {}): Promise<unknown> {
    const response = await this.get(url, { Accept: 'application/json', ...headers });
    try {
      const parsed: unknown = await response.json();
      return parsed;
    } catch (error) {
      throw new SourceUnavailableError(`Invalid JSON from ${url}: ${extractErrorMessage(error)}`, { url }, error);
    }
  }
}
