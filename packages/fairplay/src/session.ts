/**
 * License handshake for one platform key request
 *
 * certificate → server playback context → content key context → platform.
 * Every step runs strictly after the previous one. The platform is told the
 * outcome exactly once, unless it cancelled the request first, in which case
 * it is told nothing.
 */

import type { Logger } from 'pino';
import type { Entitlement } from '@exposure/entitlement';
import { FairplayError, type HandshakeStep } from './errors.js';
import type {
  ContentKeyLoadingRequest,
  HandshakeOutcome,
  HandshakeState,
  LicenseServer,
} from './types.js';

/**
 * Content identifier of a key request: the host of its URL, UTF-8 encoded.
 * Returns undefined for unparsable URLs and URLs without a host.
 */
export function contentIdentifierFor(url: string | undefined): Uint8Array | undefined {
  if (url === undefined || !URL.canParse(url)) {
    return undefined;
  }
  const host = new URL(url).hostname;
  return host.length > 0 ? new TextEncoder().encode(host) : undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.length > 0 ? value : undefined;
}

class Cancelled extends Error {}

function asNetworkFailure(error: unknown, step: HandshakeStep): FairplayError {
  return error instanceof FairplayError
    ? error
    : new FairplayError({ type: 'networkFailure', step }, { cause: error });
}

export class LicenseHandshakeSession {
  private current: HandshakeState = 'idle';
  private readonly certificateUrl: string | undefined;
  private readonly licenseAcquisitionUrl: string | undefined;

  constructor(
    private readonly entitlement: Entitlement,
    private readonly request: ContentKeyLoadingRequest,
    private readonly licenseServer: LicenseServer,
    private readonly log: Logger
  ) {
    this.certificateUrl = nonEmpty(entitlement.fairplay?.certificateUrl);
    this.licenseAcquisitionUrl = nonEmpty(entitlement.fairplay?.licenseAcquisitionUrl);
  }

  get state(): HandshakeState {
    return this.current;
  }

  /**
   * Drive the handshake to a terminal state. Handshake failures are reported
   * to the platform and returned as the `errored` outcome; the promise only
   * rejects when the session already ran.
   */
  async run(): Promise<HandshakeOutcome> {
    if (this.current !== 'idle') {
      throw new Error(`Handshake already ran (state ${this.current})`);
    }

    try {
      await this.perform();
    } catch (error) {
      // a step that fails after the platform cancelled is discarded like one that succeeds
      if (error instanceof Cancelled || this.request.isCancelled) {
        this.transition('cancelled');
        return { state: 'cancelled' };
      }
      // anything not already classified came from a platform callback
      const failure =
        error instanceof FairplayError
          ? error
          : new FairplayError({ type: 'serverPlaybackContext' }, { cause: error });
      this.transition('errored');
      this.log.warn({ code: failure.code, reason: failure.reason, err: failure }, 'handshake failed');
      this.request.finishLoadingWithError(failure);
      return { state: 'errored', error: failure };
    }

    this.transition('completed');
    this.request.finishLoading();
    return { state: 'completed' };
  }

  private async perform(): Promise<void> {
    this.checkCancelled();
    const contentIdentifier = contentIdentifierFor(this.request.url);
    if (!contentIdentifier) {
      throw new FairplayError({ type: 'invalidContentIdentifier' });
    }

    const certificate = await this.fetchCertificate();
    this.checkCancelled();
    this.transition('certificateReceived');

    const spc = await this.buildKeyRequest(certificate, contentIdentifier);
    this.checkCancelled();
    this.transition('keyRequestBuilt');

    const ckc = await this.fetchContentKeyContext(spc);
    this.checkCancelled();

    const dataRequest = this.request.dataRequest;
    if (!dataRequest) {
      throw new FairplayError({ type: 'missingDataRequest' });
    }
    try {
      dataRequest.respond(ckc);
    } catch (error) {
      throw new FairplayError({ type: 'contentKeyDelivery' }, { cause: error });
    }
  }

  private async fetchCertificate(): Promise<Uint8Array> {
    if (this.certificateUrl === undefined) {
      throw new FairplayError({ type: 'missingCertificateUrl' });
    }
    this.transition('certificateRequested');
    try {
      return await this.licenseServer.fetchCertificate(this.certificateUrl);
    } catch (error) {
      throw asNetworkFailure(error, 'certificate');
    }
  }

  private async buildKeyRequest(certificate: Uint8Array, contentIdentifier: Uint8Array): Promise<Uint8Array> {
    try {
      return await this.request.makeServerPlaybackContext(certificate, contentIdentifier);
    } catch (error) {
      throw new FairplayError({ type: 'serverPlaybackContext' }, { cause: error });
    }
  }

  private async fetchContentKeyContext(spc: Uint8Array): Promise<Uint8Array> {
    if (this.licenseAcquisitionUrl === undefined) {
      throw new FairplayError({ type: 'missingLicenseUrl' });
    }
    this.transition('keyContextRequested');
    try {
      return await this.licenseServer.fetchContentKeyContext(
        this.licenseAcquisitionUrl,
        spc,
        this.entitlement.playToken
      );
    } catch (error) {
      throw asNetworkFailure(error, 'contentKeyContext');
    }
  }

  private checkCancelled(): void {
    if (this.request.isCancelled) {
      throw new Cancelled();
    }
  }

  private transition(next: HandshakeState): void {
    this.log.debug({ from: this.current, to: next }, 'handshake state');
    this.current = next;
  }
}
