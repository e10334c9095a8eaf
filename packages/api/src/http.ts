/**
 * Device HTTP Client
 *
 * Thin layer over `fetch` for the recorder's control endpoints. Maps
 * transport failures to DeviceCommunicationError and unexpected statuses
 * or payloads to DeviceProtocolError. Never retries.
 */

import type { z } from 'zod';
import { DeviceCommunicationError, DeviceProtocolError } from '@core/errors';
import { createLogger } from '@core/logger';

const logger = createLogger('http');

// ===== Configuration =====

export interface DeviceHttpConfig {
  /** Base URL of the device, e.g. "http://192.168.1.10/" */
  baseUrl: string;
  /** Per-request timeout in ms (default: 10000) */
  requestTimeoutMs?: number;
  /** Timeout for recording downloads in ms (default: 120000) */
  downloadTimeoutMs?: number;
}

const defaultConfig: Required<Omit<DeviceHttpConfig, 'baseUrl'>> = {
  requestTimeoutMs: 10_000,
  downloadTimeoutMs: 120_000,
};

type Method = 'GET' | 'PUT' | 'POST' | 'DELETE';

interface RequestOptions {
  body?: string;
  contentType?: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
}

export interface TextResponse {
  text: string;
  headers: Headers;
}

// ===== Client =====

export class DeviceHttp {
  private config: Required<DeviceHttpConfig>;

  constructor(config: DeviceHttpConfig) {
    this.config = { ...defaultConfig, ...config };
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  /**
   * Resolve a device path ("rest/rec/open" or "/rest/rec/measurements/1")
   */
  url(path: string): string {
    return new URL(path, this.config.baseUrl).toString();
  }

  private async send(method: Method, path: string, options: RequestOptions = {}): Promise<Response> {
    const url = this.url(path);
    const headers: Record<string, string> = {
      Accept: 'application/json, text/plain, */*',
      // The recorder caches aggressively without it
      'If-Modified-Since': 'Sat, 1 Jan 2005 00:00:00 GMT',
      ...options.headers,
    };
    if (options.contentType) {
      headers['Content-Type'] = options.contentType;
    }

    logger.debug(`${method} ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: options.body,
        signal: AbortSignal.timeout(options.timeoutMs ?? this.config.requestTimeoutMs),
      });
    } catch (err) {
      throw communicationError(method, url, err);
    }

    if (!response.ok) {
      const body = await readBodyForError(response);
      throw new DeviceProtocolError(
        `${method} ${url} failed with HTTP ${response.status}`,
        url,
        response.status,
        body
      );
    }
    return response;
  }

  /**
   * Send a request and return the response body as text.
   */
  async text(method: Method, path: string, options: RequestOptions = {}): Promise<TextResponse> {
    const response = await this.send(method, path, options);
    try {
      return { text: await response.text(), headers: response.headers };
    } catch (err) {
      throw communicationError(method, response.url || this.url(path), err);
    }
  }

  /**
   * Send a request whose response is JSON matching `schema`.
   */
  async json<T>(
    method: Method,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    const { data } = await this.jsonWithHeaders(method, path, schema, options);
    return data;
  }

  async jsonWithHeaders<T>(
    method: Method,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<{ data: T; headers: Headers }> {
    const { text, headers } = await this.text(method, path, options);
    const url = this.url(path);

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw new DeviceProtocolError(`${method} ${url} returned a non-JSON body`, url, undefined, text);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue.path.length > 0 ? issue.path.join('.') : 'body';
      throw new DeviceProtocolError(
        `${method} ${url} returned an unexpected payload (${where}: ${issue.message})`,
        url,
        undefined,
        text
      );
    }
    return { data: parsed.data, headers };
  }

  /**
   * Download a binary body.
   */
  async bytes(path: string): Promise<Uint8Array> {
    const response = await this.send('GET', path, { timeoutMs: this.config.downloadTimeoutMs });
    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (err) {
      throw communicationError('GET', this.url(path), err);
    }
  }
}

// ===== Error Mapping =====

function communicationError(method: string, url: string, err: unknown): DeviceCommunicationError {
  const reason =
    err instanceof Error && err.name === 'TimeoutError'
      ? 'timed out'
      : err instanceof Error
        ? err.message
        : String(err);
  return new DeviceCommunicationError(`${method} ${url} failed: ${reason}`, url, err);
}

async function readBodyForError(response: Response): Promise<string | undefined> {
  try {
    return await response.text();
  } catch {
    // Body unreadable; the status alone is reported
    return undefined;
  }
}
