/**
 * Exposure Fairplay
 * License acquisition for Fairplay Streaming key requests
 *
 * @packageDocumentation
 */

export { FairplayRequester, type FairplayRequesterOptions } from './requester.js';
export { LicenseHandshakeSession, contentIdentifierFor } from './session.js';
export { HttpLicenseServer, type HttpLicenseServerOptions } from './license-server.js';
export {
  parseLicenseEnvelope,
  type EnvelopeMetadata,
  type EnvelopePayloadTag,
  type LicenseEnvelope,
} from './envelope.js';
export { SerialQueue } from './serial-queue.js';
export { decodeBase64Permissive, encodeBase64 } from './base64.js';
export { FairplayError, type FairplayErrorReason, type HandshakeStep } from './errors.js';
export type {
  ContentKeyLoadingRequest,
  ContentKeyResponder,
  DataRequest,
  HandshakeOutcome,
  HandshakeState,
  LicenseServer,
  ServerPlaybackContextProvider,
} from './types.js';
