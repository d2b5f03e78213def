'use strict';

import * as http from 'http';
import * as https from 'https';

import { TransportError } from './errors';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import type { RouterScheme } from './types';
import { isRecord, tryParseJson } from './values';

const MAX_REDIRECTS = 3;

const TLS_ERROR_CODES = new Set([
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'EPROTO',
]);

export interface RouterTransport {
  fetch(app: string, method: string, params?: unknown[]): Promise<unknown>;
}

export interface RouterRpcClientOptions {
  /** Host name or IP address, optionally with a port. */
  host: string;
  /** Tried in order until one answers; the first that does is kept. */
  schemes: RouterScheme[];
  verifyTls: boolean;
  timeoutMs: number;
  username?: string;
  password?: string;
  logger?: Logger;
}

interface HttpResponse {
  statusCode: number;
  body: string;
  headers: http.IncomingHttpHeaders;
}

const DISCOVERY_APP = 'com.netdumasoftware.systeminfo';

const DISCOVERY_METHOD = 'get_system_info';

function isTlsFailure(error: NodeJS.ErrnoException): boolean {
  return Boolean(error.code && (TLS_ERROR_CODES.has(error.code) || error.code.startsWith('ERR_SSL_')));
}

export class RouterRpcClient implements RouterTransport {

  private requestId = 0;

  private readonly agent: https.Agent;

  private readonly logger: Logger;

  private discoveredBaseUrl: Promise<string> | null = null;

  constructor(private readonly options: RouterRpcClientOptions) {
    this.agent = new https.Agent({ rejectUnauthorized: options.verifyTls });
    this.logger = options.logger ?? silentLogger;
  }

  async fetch(app: string, method: string, params: unknown[] = []): Promise<unknown> {
    const baseUrl = await this.resolveBaseUrl();
    const response = await this.exchange(new URL(`/apps/${app}/rpc/`, `${baseUrl}/`), this.envelope(method, params));
    const { statusCode } = response;

    if (statusCode === 401) {
      throw this.unauthorized();
    }

    if (statusCode < 200 || statusCode >= 300) {
      throw TransportError.httpStatus(statusCode);
    }

    const parsed = tryParseJson(response.body);

    if (!isRecord(parsed)) {
      throw TransportError.malformed(`Response to ${method} is not a JSON-RPC object.`);
    }

    if (parsed.error !== undefined && parsed.error !== null) {
      throw TransportError.malformed(`RPC error from ${method}: ${JSON.stringify(parsed.error)}`);
    }

    if (!('result' in parsed)) {
      throw TransportError.malformed(`Response to ${method} has no result.`);
    }

    return parsed.result;
  }

  private envelope(method: string, params: unknown[]): string {
    this.requestId += 1;

    return JSON.stringify({
      jsonrpc: '2.0',
      id: this.requestId,
      clienttype: 'web',
      method,
      params,
    });
  }

  private unauthorized(): TransportError {
    return TransportError.httpStatus(401, this.options.username
      ? 'Router rejected the configured credentials.'
      : 'Router requires credentials. Set a username and password.');
  }

  /** Concurrent callers share one discovery; a failed discovery runs again on the next call. */
  private async resolveBaseUrl(): Promise<string> {
    if (!this.discoveredBaseUrl) {
      this.discoveredBaseUrl = this.discoverBaseUrl();
    }

    const pending = this.discoveredBaseUrl;
    try {
      return await pending;
    } catch (error) {
      if (this.discoveredBaseUrl === pending) {
        this.discoveredBaseUrl = null;
      }
      throw error;
    }
  }

  private async discoverBaseUrl(): Promise<string> {
    const { host, schemes } = this.options;

    if (schemes.length === 1) {
      return `${schemes[0]}://${host}`;
    }

    let lastError: TransportError | null = null;

    for (const scheme of schemes) {
      const baseUrl = `${scheme}://${host}`;
      const url = new URL(`/apps/${DISCOVERY_APP}/rpc/`, `${baseUrl}/`);

      try {
        const response = await this.exchange(url, this.envelope(DISCOVERY_METHOD, []));

        if (response.statusCode === 401 && !this.options.username) {
          throw this.unauthorized();
        }

        if (response.statusCode >= 200 && response.statusCode < 300) {
          this.logger.log(`Router RPC answers on ${baseUrl}.`);
          return baseUrl;
        }

        lastError = TransportError.httpStatus(response.statusCode);
      } catch (error) {
        if (!(error instanceof TransportError) || error.status === 401) {
          throw error;
        }

        lastError = error;
      }

      this.logger.log(`Router RPC did not answer on ${baseUrl}: ${lastError?.message ?? 'no response'}`);
    }

    const kind = lastError ? lastError.kind : 'unreachable';
    throw new TransportError(kind, `Router RPC did not answer over ${schemes.join(' or ')}. Last error: ${lastError?.message ?? 'none'}`, {
      status: lastError?.status ?? undefined,
      cause: lastError,
    });
  }

  /** Sends the request and follows redirects that stay on the same origin. */
  private async exchange(initial: URL, body: string): Promise<HttpResponse> {
    let url = initial;
    let response = await this.performHttpRequest(url, body);

    for (let hop = 0; response.statusCode >= 300 && response.statusCode < 400; hop += 1) {
      url = this.resolveRedirect(url, response, hop);
      this.logger.log(`Following router redirect to ${url.pathname}.`);
      response = await this.performHttpRequest(url, body);
    }

    return response;
  }

  private resolveRedirect(current: URL, response: HttpResponse, hop: number): URL {
    const locationHeader = response.headers.location;
    const location = Array.isArray(locationHeader) ? locationHeader[0] : locationHeader;

    if (!location) {
      throw TransportError.httpStatus(response.statusCode, `Router returned redirect (HTTP ${response.statusCode}) without a location.`);
    }

    let next: URL;
    try {
      next = new URL(location, current);
    } catch (error) {
      throw TransportError.httpStatus(response.statusCode, `Router returned an invalid redirect location "${location}".`);
    }

    // Credentials travel with every hop, so scheme, host and port must all match.
    if (next.origin !== current.origin) {
      throw TransportError.httpStatus(
        response.statusCode,
        `Router redirected to another origin (${next.origin}); refusing to follow.`,
      );
    }

    if (hop >= MAX_REDIRECTS) {
      throw TransportError.httpStatus(response.statusCode, `Router redirected more than ${MAX_REDIRECTS} times.`);
    }

    return next;
  }

  private performHttpRequest(url: URL, body: string): Promise<HttpResponse> {
    const { timeoutMs, username, password } = this.options;

    return new Promise((resolve, reject) => {
      const requestHeaders: Record<string, string> = {
        Connection: 'close',
        Accept: 'application/json',
        'Content-Type': 'application/json',
        'Content-Length': String(Buffer.byteLength(body, 'utf8')),
      };

      if (username && password) {
        requestHeaders.Authorization = `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
      }

      const options: https.RequestOptions = {
        method: 'POST',
        protocol: url.protocol,
        hostname: url.hostname,
        port: url.port ? Number(url.port) : undefined,
        path: `${url.pathname}${url.search}`,
        headers: requestHeaders,
      };

      if (url.protocol === 'https:') {
        options.agent = this.agent;
      }

      const transport = url.protocol === 'https:' ? https : http;

      const req = transport.request(options, (res) => {
        const chunks: Buffer[] = [];

        res.on('data', (chunk: Buffer | string) => {
          chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
        });

        res.on('end', () => {
          clearTimeout(timer);
          resolve({
            statusCode: res.statusCode ?? 0,
            body: Buffer.concat(chunks).toString('utf8'),
            headers: res.headers,
          });
        });

        res.on('error', (error: Error) => {
          clearTimeout(timer);
          reject(error instanceof TransportError ? error : TransportError.unreachable(error.message, error));
        });
      });

      // Covers the whole exchange, not only socket inactivity.
      const timer = setTimeout(() => {
        const error = TransportError.timeout(timeoutMs);
        reject(error);
        req.destroy(error);
      }, timeoutMs);

      req.on('error', (error: NodeJS.ErrnoException) => {
        clearTimeout(timer);

        if (error instanceof TransportError) {
          reject(error);
          return;
        }

        if (isTlsFailure(error)) {
          reject(TransportError.tls(`TLS handshake with router failed (${error.code}). Disable certificate verification for self-signed certificates.`, error));
          return;
        }

        if (error.code === 'ECONNRESET') {
          reject(TransportError.unreachable('Connection reset by router (ECONNRESET). Check host protocol/port and TLS setting.', error));
          return;
        }

        reject(TransportError.unreachable(`Router is unreachable: ${error.message}`, error));
      });

      req.end(body);
    });
  }

}
