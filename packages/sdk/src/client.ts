/**
 * Exposure REST client
 * JSON over undici with Exposure error mapping
 */

import { request, type Dispatcher } from 'undici';
import type { Logger } from 'pino';
import {
  CONTENT_TYPES,
  ERROR_CODES,
  EXPOSURE,
  HEADERS,
  moduleLogger,
  type JsonValue,
  type SdkConfig,
} from '@exposure/kernel';
import { Environment } from './environment.js';
import { ExposureError, ExposureResponseMessageSchema, type ExposureResponseMessage } from './errors.js';
import type { SessionToken } from './session-token.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryValue = string | number | boolean | undefined;

export interface ExposureRequestDescriptor {
  method: HttpMethod;
  /** Absolute URL, usually built from `environment.apiUrl` */
  url: string;
  /** Undefined values are left out of the query string */
  query?: Record<string, QueryValue>;
  /** Sent as JSON */
  body?: JsonValue;
  headers?: Record<string, string>;
  /** Send the session token. Default true. */
  authenticated?: boolean;
}

/**
 * Turns parsed JSON into a model. Any error thrown is reported as a
 * serialization failure.
 */
export type Decoder<T> = (json: unknown) => T;

export interface ExposureClientOptions {
  environment: Environment;
  sessionToken?: SessionToken;
  dispatcher?: Dispatcher;
  timeoutMs?: number;
  logger?: Logger;
}

interface TransportOptions {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  dispatcher?: Dispatcher;
  headersTimeout?: number;
  bodyTimeout?: number;
}

interface RawResponse {
  status: number;
  body: Uint8Array;
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

export function buildUrl(base: string, query: Record<string, QueryValue> = {}): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

export class ExposureClient {
  readonly environment: Environment;
  readonly sessionToken: SessionToken | undefined;
  readonly dispatcher: Dispatcher | undefined;
  readonly timeoutMs: number | undefined;
  readonly logger: Logger;
  private readonly log: Logger;

  constructor(options: ExposureClientOptions) {
    this.environment = options.environment;
    this.sessionToken = options.sessionToken;
    this.dispatcher = options.dispatcher;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? moduleLogger('sdk');
    this.log = moduleLogger('exposure-client', this.logger);
  }

  static fromConfig(
    config: SdkConfig,
    options: Omit<ExposureClientOptions, 'environment' | 'timeoutMs'> = {}
  ): ExposureClient {
    const clientOptions: ExposureClientOptions = { ...options, environment: Environment.fromConfig(config) };
    if (config.http.timeoutMs !== undefined) {
      clientOptions.timeoutMs = config.http.timeoutMs;
    }
    return new ExposureClient(clientOptions);
  }

  /**
   * Send a request and decode its JSON response.
   */
  async request<T>(descriptor: ExposureRequestDescriptor, decode: Decoder<T>): Promise<T> {
    const body = await this.requestData(descriptor);
    const json = this.parseJson(descriptor, body);
    try {
      return decode(json);
    } catch (error) {
      this.log.warn({ method: descriptor.method, url: descriptor.url, err: error }, 'response rejected by decoder');
      throw new ExposureError(ERROR_CODES.E_SERIALIZATION, `Unable to decode response of ${descriptor.url}`, {
        cause: error,
      });
    }
  }

  /**
   * Send a request and return the raw response body.
   */
  async requestData(descriptor: ExposureRequestDescriptor): Promise<Uint8Array> {
    const { status, body } = await this.send(descriptor);
    if (isSuccessStatus(status)) {
      return body;
    }

    const message = this.responseMessage(body);
    this.log.warn({ method: descriptor.method, url: descriptor.url, status, response: message }, 'request failed');
    if (message) {
      throw new ExposureError(ERROR_CODES.E_EXPOSURE_RESPONSE, `${message.httpCode}: ${message.message}`, {
        status,
        response: message,
      });
    }
    throw new ExposureError(ERROR_CODES.E_HTTP_STATUS, `Unacceptable status code ${status}`, { status });
  }

  /**
   * Send a request, ignoring the response body.
   */
  async requestEmpty(descriptor: ExposureRequestDescriptor): Promise<void> {
    await this.requestData(descriptor);
  }

  private async send(descriptor: ExposureRequestDescriptor): Promise<RawResponse> {
    const url = buildUrl(descriptor.url, descriptor.query);
    const options: TransportOptions = {
      method: descriptor.method,
      headers: this.headersFor(descriptor),
    };
    if (descriptor.body !== undefined) options.body = JSON.stringify(descriptor.body);
    if (this.dispatcher) options.dispatcher = this.dispatcher;
    if (this.timeoutMs !== undefined) {
      options.headersTimeout = this.timeoutMs;
      options.bodyTimeout = this.timeoutMs;
    }

    try {
      const response = await request(url, options);
      const body = new Uint8Array(await response.body.arrayBuffer());
      this.log.debug({ method: descriptor.method, url, status: response.statusCode }, 'response received');
      return { status: response.statusCode, body };
    } catch (error) {
      this.log.warn({ method: descriptor.method, url, err: error }, 'request did not complete');
      throw new ExposureError(ERROR_CODES.E_NETWORK_FAILURE, `Request to ${url} failed`, { cause: error });
    }
  }

  private headersFor(descriptor: ExposureRequestDescriptor): Record<string, string> {
    const headers: Record<string, string> = {
      'user-agent': EXPOSURE.userAgent,
      [HEADERS.accept]: CONTENT_TYPES.json,
    };
    if (descriptor.body !== undefined) {
      headers[HEADERS.contentType] = CONTENT_TYPES.json;
    }
    if (this.sessionToken && descriptor.authenticated !== false) {
      headers[HEADERS.authorization] = this.sessionToken.authorizationHeader;
    }
    return { ...headers, ...descriptor.headers };
  }

  private parseJson(descriptor: ExposureRequestDescriptor, body: Uint8Array): unknown {
    try {
      return JSON.parse(new TextDecoder().decode(body));
    } catch (error) {
      throw new ExposureError(ERROR_CODES.E_SERIALIZATION, `Response of ${descriptor.url} is not JSON`, {
        cause: error,
      });
    }
  }

  private responseMessage(body: Uint8Array): ExposureResponseMessage | undefined {
    if (body.length === 0) {
      return undefined;
    }
    try {
      const result = ExposureResponseMessageSchema.safeParse(JSON.parse(new TextDecoder().decode(body)));
      return result.success ? result.data : undefined;
    } catch {
      // not JSON: no structured message
      return undefined;
    }
  }
}
