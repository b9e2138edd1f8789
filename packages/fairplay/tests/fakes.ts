import type { Entitlement } from '@exposure/entitlement';
import type { FairplayError } from '../src/errors.js';
import type { ContentKeyLoadingRequest, DataRequest } from '../src/types.js';

export const bytes = (value: string) => new TextEncoder().encode(value);
export const text = (data: Uint8Array) => new TextDecoder().decode(data);

export const CERTIFICATE_URL = 'https://license.example.com/fairplay/certificate';
export const LICENSE_URL = 'https://license.example.com/fairplay/license';

export function fairplayEntitlement(overrides: Partial<Entitlement> = {}): Entitlement {
  return {
    playToken: 'test-play-token',
    mediaLocator: 'https://cdn.example.com/asset/master.m3u8',
    fairplay: {
      secondaryMediaLocator: 'https://cdn.example.com/asset/secondary.m3u8',
      certificateUrl: CERTIFICATE_URL,
      licenseAcquisitionUrl: LICENSE_URL,
    },
    ...overrides,
  };
}

/**
 * In-memory stand-in for a platform key loading request.
 */
export class FakeKeyRequest implements ContentKeyLoadingRequest {
  isCancelled = false;
  dataRequest: DataRequest | undefined;
  readonly responses: Uint8Array[] = [];
  readonly errors: FairplayError[] = [];
  readonly spcInputs: Array<{ certificate: string; contentIdentifier: string }> = [];
  finished = 0;

  constructor(
    readonly url: string | undefined,
    private readonly buildSpc: (certificate: Uint8Array) => Promise<Uint8Array> | Uint8Array = () =>
      bytes('spc'),
    options: { withDataRequest?: boolean } = {}
  ) {
    if (options.withDataRequest ?? true) {
      this.dataRequest = { respond: (data) => this.responses.push(data) };
    }
  }

  makeServerPlaybackContext(certificate: Uint8Array, contentIdentifier: Uint8Array) {
    this.spcInputs.push({ certificate: text(certificate), contentIdentifier: text(contentIdentifier) });
    return this.buildSpc(certificate);
  }

  finishLoading(): void {
    this.finished++;
  }

  finishLoadingWithError(error: FairplayError): void {
    this.errors.push(error);
  }
}
