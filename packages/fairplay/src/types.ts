/**
 * Platform DRM capabilities and handshake contracts
 *
 * The media player owns the actual Fairplay primitives. The handshake only
 * sees them through these interfaces, so any player binding (or a test fake)
 * can drive it.
 */

import type { FairplayError } from './errors.js';

/**
 * Builds the server playback context (SPC) from the application certificate
 * and the content identifier.
 */
export interface ServerPlaybackContextProvider {
  makeServerPlaybackContext(
    certificate: Uint8Array,
    contentIdentifier: Uint8Array
  ): Promise<Uint8Array> | Uint8Array;
}

/**
 * Receives the content key context once it is available.
 */
export interface DataRequest {
  respond(data: Uint8Array): void;
}

export interface ContentKeyResponder {
  /** Absent when the platform no longer expects data for this request */
  readonly dataRequest: DataRequest | undefined;
  finishLoading(): void;
  finishLoadingWithError(error: FairplayError): void;
}

/**
 * A pending key request handed over by the platform.
 */
export interface ContentKeyLoadingRequest
  extends ServerPlaybackContextProvider,
    ContentKeyResponder {
  /** e.g. `skd://asset-key-host` */
  readonly url: string | undefined;
  readonly isCancelled: boolean;
}

export type HandshakeState =
  | 'idle'
  | 'certificateRequested'
  | 'certificateReceived'
  | 'keyRequestBuilt'
  | 'keyContextRequested'
  | 'completed'
  | 'errored'
  | 'cancelled';

export type HandshakeOutcome =
  | { state: 'completed' }
  | { state: 'errored'; error: FairplayError }
  | { state: 'cancelled' };

/**
 * License server transport. Both calls resolve with the decoded payload or
 * reject with a FairplayError.
 */
export interface LicenseServer {
  fetchCertificate(url: string): Promise<Uint8Array>;
  fetchContentKeyContext(
    url: string,
    serverPlaybackContext: Uint8Array,
    playToken: string | undefined
  ): Promise<Uint8Array>;
}
