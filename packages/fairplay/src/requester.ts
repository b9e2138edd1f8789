import type { Dispatcher } from 'undici';
import type { Logger } from 'pino';
import type { Entitlement } from '@exposure/entitlement';
import { FAIRPLAY, moduleLogger } from '@exposure/kernel';
import { HttpLicenseServer, type HttpLicenseServerOptions } from './license-server.js';
import { SerialQueue } from './serial-queue.js';
import { LicenseHandshakeSession } from './session.js';
import type { ContentKeyLoadingRequest, HandshakeOutcome, LicenseServer } from './types.js';

export interface FairplayRequesterOptions {
  /** URL scheme of claimed key requests. Default `skd`. */
  customScheme?: string;
  /** Replaces the undici transport entirely */
  licenseServer?: LicenseServer;
  dispatcher?: Dispatcher;
  timeoutMs?: number;
  playTokenHeader?: string;
  logger?: Logger;
  /** Called with the outcome of every claimed request */
  onOutcome?: (outcome: HandshakeOutcome, request: ContentKeyLoadingRequest) => void;
}

/**
 * Claims Fairplay key requests for one entitlement and answers them with
 * content key contexts from the license server.
 *
 * Claimed requests are served one at a time, in claim order.
 */
export class FairplayRequester {
  private readonly scheme: string;
  private readonly licenseServer: LicenseServer;
  private readonly queue = new SerialQueue();
  private readonly log: Logger;
  private readonly onOutcome: FairplayRequesterOptions['onOutcome'];

  constructor(
    readonly entitlement: Entitlement,
    options: FairplayRequesterOptions = {}
  ) {
    this.scheme = (options.customScheme ?? FAIRPLAY.customScheme).toLowerCase();
    this.log = moduleLogger('fairplay', options.logger);
    this.onOutcome = options.onOutcome;

    const serverOptions: HttpLicenseServerOptions = { logger: this.log };
    if (options.dispatcher) serverOptions.dispatcher = options.dispatcher;
    if (options.timeoutMs !== undefined) serverOptions.timeoutMs = options.timeoutMs;
    if (options.playTokenHeader !== undefined) serverOptions.playTokenHeader = options.playTokenHeader;
    this.licenseServer = options.licenseServer ?? new HttpLicenseServer(serverOptions);
  }

  /**
   * Whether a key request URL uses the configured DRM scheme.
   */
  claims(url: string | undefined): boolean {
    if (url === undefined || !URL.canParse(url)) {
      return false;
    }
    return new URL(url).protocol === `${this.scheme}:`;
  }

  /**
   * Claim a key request. Returns false without side effects for requests of
   * another scheme; otherwise queues the handshake and returns true at once.
   */
  canHandle(request: ContentKeyLoadingRequest): boolean {
    if (!this.claims(request.url)) {
      return false;
    }
    this.log.debug({ url: request.url }, 'claimed key request');
    void this.queue
      .enqueue(() => new LicenseHandshakeSession(this.entitlement, request, this.licenseServer, this.log).run())
      .then((outcome) => this.onOutcome?.(outcome, request))
      .catch((error: unknown) => {
        this.log.error({ err: error }, 'handshake task failed');
      });
    return true;
  }

  /** Lease renewals follow the same handshake as the initial request. */
  canHandleRenewal(request: ContentKeyLoadingRequest): boolean {
    return this.canHandle(request);
  }

  /** Resolves once every claimed request has reached a terminal state */
  drain(): Promise<void> {
    return this.queue.onIdle();
  }
}
