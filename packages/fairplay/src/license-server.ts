import { request, type Dispatcher } from 'undici';
import type { Logger } from 'pino';
import { CONTENT_TYPES, EXPOSURE, FAIRPLAY, HEADERS, moduleLogger } from '@exposure/kernel';
import { encodeBase64 } from './base64.js';
import { parseLicenseEnvelope, type EnvelopePayloadTag } from './envelope.js';
import { FairplayError, type HandshakeStep } from './errors.js';
import type { LicenseServer } from './types.js';

export interface HttpLicenseServerOptions {
  /** undici dispatcher, e.g. an Agent or a MockAgent in tests */
  dispatcher?: Dispatcher;
  /** Applied to both header and body timeouts */
  timeoutMs?: number;
  /** Header carrying the play token on the CKC request. Default `AzukiApp`. */
  playTokenHeader?: string;
  logger?: Logger;
}

const PAYLOAD_TAG: Record<HandshakeStep, EnvelopePayloadTag> = {
  certificate: FAIRPLAY.certificateTag,
  contentKeyContext: FAIRPLAY.contentKeyContextTag,
};

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * License server transport over undici.
 */
export class HttpLicenseServer implements LicenseServer {
  private readonly dispatcher: Dispatcher | undefined;
  private readonly timeoutMs: number | undefined;
  private readonly playTokenHeader: string;
  private readonly log: Logger;

  constructor(options: HttpLicenseServerOptions = {}) {
    this.dispatcher = options.dispatcher;
    this.timeoutMs = options.timeoutMs;
    this.playTokenHeader = options.playTokenHeader ?? FAIRPLAY.playTokenHeader;
    this.log = moduleLogger('license-server', options.logger);
  }

  async fetchCertificate(url: string): Promise<Uint8Array> {
    return this.exchange('certificate', url, {
      method: 'GET',
      headers: { 'user-agent': EXPOSURE.userAgent },
    });
  }

  async fetchContentKeyContext(
    url: string,
    serverPlaybackContext: Uint8Array,
    playToken: string | undefined
  ): Promise<Uint8Array> {
    const headers: Record<string, string> = {
      'user-agent': EXPOSURE.userAgent,
      [HEADERS.contentType]: CONTENT_TYPES.octetStream,
    };
    if (playToken !== undefined) {
      headers[this.playTokenHeader] = playToken;
    }

    return this.exchange('contentKeyContext', url, {
      method: 'POST',
      headers,
      body: encodeBase64(serverPlaybackContext),
    });
  }

  private async exchange(
    step: HandshakeStep,
    url: string,
    init: { method: 'GET' | 'POST'; headers: Record<string, string>; body?: string }
  ): Promise<Uint8Array> {
    const { status, body } = await this.send(step, url, init);
    const envelope = parseLicenseEnvelope(body, PAYLOAD_TAG[step]);
    switch (envelope.type) {
      case 'serverError':
        throw new FairplayError({
          type: 'serverError',
          step,
          code: envelope.code,
          message: envelope.message,
        });
      case 'parseFailure':
        if (!isSuccessStatus(status)) {
          throw new FairplayError({ type: 'networkFailure', step, status });
        }
        throw new FairplayError({ type: 'parseFailure', step, detail: envelope.reason });
      case 'success':
        if (!isSuccessStatus(status)) {
          throw new FairplayError({ type: 'networkFailure', step, status });
        }
        if (envelope.data === undefined || envelope.data.length === 0) {
          throw new FairplayError({ type: 'invalidDataFormat', step });
        }
        this.log.debug({ step, bytes: envelope.data.length, ...envelope.metadata }, 'envelope decoded');
        return envelope.data;
    }
  }

  private async send(
    step: HandshakeStep,
    url: string,
    init: { method: 'GET' | 'POST'; headers: Record<string, string>; body?: string }
  ): Promise<{ status: number; body: string }> {
    try {
      const response = await request(url, { ...init, ...this.transportOptions() });
      return { status: response.statusCode, body: await response.body.text() };
    } catch (error) {
      this.log.warn({ step, url, err: error }, 'license server unreachable');
      throw new FairplayError({ type: 'networkFailure', step }, { cause: error });
    }
  }

  private transportOptions(): {
    dispatcher?: Dispatcher;
    headersTimeout?: number;
    bodyTimeout?: number;
  } {
    const options: { dispatcher?: Dispatcher; headersTimeout?: number; bodyTimeout?: number } = {};
    if (this.dispatcher) {
      options.dispatcher = this.dispatcher;
    }
    if (this.timeoutMs !== undefined) {
      options.headersTimeout = this.timeoutMs;
      options.bodyTimeout = this.timeoutMs;
    }
    return options;
  }
}
