/**
 * Fairplay handshake errors
 */

import { ERROR_CODES, ExposureSdkError, type ErrorCode } from '@exposure/kernel';

/**
 * Network step a failure belongs to
 */
export type HandshakeStep = 'certificate' | 'contentKeyContext';

export type FairplayErrorReason =
  | { type: 'networkFailure'; step: HandshakeStep; status?: number }
  | { type: 'serverError'; step: HandshakeStep; code: number; message: string }
  | { type: 'parseFailure'; step: HandshakeStep; detail: string }
  | { type: 'invalidDataFormat'; step: HandshakeStep }
  | { type: 'invalidContentIdentifier' }
  | { type: 'missingCertificateUrl' }
  | { type: 'missingLicenseUrl' }
  | { type: 'serverPlaybackContext' }
  | { type: 'missingDataRequest' }
  | { type: 'contentKeyDelivery' };

const STEP_LABEL: Record<HandshakeStep, string> = {
  certificate: 'application certificate',
  contentKeyContext: 'content key context',
};

function describe(reason: FairplayErrorReason): { code: ErrorCode; message: string } {
  switch (reason.type) {
    case 'networkFailure':
      return {
        code: ERROR_CODES.E_FAIRPLAY_NETWORK_FAILURE,
        message:
          reason.status === undefined
            ? `Failed to fetch ${STEP_LABEL[reason.step]}`
            : `Failed to fetch ${STEP_LABEL[reason.step]}: HTTP ${reason.status}`,
      };
    case 'serverError':
      return {
        code: ERROR_CODES.E_FAIRPLAY_SERVER_ERROR,
        message: `License server rejected ${STEP_LABEL[reason.step]} request: ${reason.code} ${reason.message}`,
      };
    case 'parseFailure':
      return {
        code: ERROR_CODES.E_FAIRPLAY_PARSE_FAILURE,
        message: `Unrecognized ${STEP_LABEL[reason.step]} response: ${reason.detail}`,
      };
    case 'invalidDataFormat':
      return {
        code: ERROR_CODES.E_FAIRPLAY_INVALID_DATA_FORMAT,
        message: `${STEP_LABEL[reason.step]} payload is empty or not valid base64`,
      };
    case 'invalidContentIdentifier':
      return {
        code: ERROR_CODES.E_FAIRPLAY_INVALID_CONTENT_IDENTIFIER,
        message: 'Key request URL has no host to use as content identifier',
      };
    case 'missingCertificateUrl':
      return {
        code: ERROR_CODES.E_FAIRPLAY_MISSING_CERTIFICATE_URL,
        message: 'Entitlement has no Fairplay certificate URL',
      };
    case 'missingLicenseUrl':
      return {
        code: ERROR_CODES.E_FAIRPLAY_MISSING_LICENSE_URL,
        message: 'Entitlement has no Fairplay license acquisition URL',
      };
    case 'serverPlaybackContext':
      return {
        code: ERROR_CODES.E_FAIRPLAY_SERVER_PLAYBACK_CONTEXT,
        message: 'Platform failed to create the server playback context',
      };
    case 'missingDataRequest':
      return {
        code: ERROR_CODES.E_FAIRPLAY_MISSING_DATA_REQUEST,
        message: 'Loading request has no data request for the content key context',
      };
    case 'contentKeyDelivery':
      return {
        code: ERROR_CODES.E_FAIRPLAY_CONTENT_KEY_DELIVERY,
        message: 'Platform rejected the content key context',
      };
  }
}

/**
 * Terminal handshake failure. Platform DRM errors are kept untouched as
 * `cause`.
 */
export class FairplayError extends ExposureSdkError {
  readonly reason: FairplayErrorReason;

  constructor(reason: FairplayErrorReason, options?: { cause?: unknown }) {
    const { code, message } = describe(reason);
    super(code, message, options);
    this.name = 'FairplayError';
    this.reason = reason;
  }
}
