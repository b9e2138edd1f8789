/**
 * Exposure SDK Error Codes
 *
 * Every failure surfaced by the SDK carries one of these codes. None of them is
 * retriable: a failed license exchange or decode cannot succeed again without
 * new server state.
 */

import type { ErrorCategory, ErrorDefinition } from './types.js';

/**
 * Error code constants
 */
export const ERROR_CODES = {
  // Fairplay license handshake
  E_FAIRPLAY_NETWORK_FAILURE: 'E_FAIRPLAY_NETWORK_FAILURE',
  E_FAIRPLAY_SERVER_ERROR: 'E_FAIRPLAY_SERVER_ERROR',
  E_FAIRPLAY_PARSE_FAILURE: 'E_FAIRPLAY_PARSE_FAILURE',
  E_FAIRPLAY_INVALID_DATA_FORMAT: 'E_FAIRPLAY_INVALID_DATA_FORMAT',
  E_FAIRPLAY_INVALID_CONTENT_IDENTIFIER: 'E_FAIRPLAY_INVALID_CONTENT_IDENTIFIER',
  E_FAIRPLAY_MISSING_CERTIFICATE_URL: 'E_FAIRPLAY_MISSING_CERTIFICATE_URL',
  E_FAIRPLAY_MISSING_LICENSE_URL: 'E_FAIRPLAY_MISSING_LICENSE_URL',
  E_FAIRPLAY_SERVER_PLAYBACK_CONTEXT: 'E_FAIRPLAY_SERVER_PLAYBACK_CONTEXT',
  E_FAIRPLAY_MISSING_DATA_REQUEST: 'E_FAIRPLAY_MISSING_DATA_REQUEST',
  E_FAIRPLAY_CONTENT_KEY_DELIVERY: 'E_FAIRPLAY_CONTENT_KEY_DELIVERY',
  // Entitlement decoding
  E_ENTITLEMENT_NOT_OBJECT: 'E_ENTITLEMENT_NOT_OBJECT',
  // Exposure REST layer
  E_NETWORK_FAILURE: 'E_NETWORK_FAILURE',
  E_HTTP_STATUS: 'E_HTTP_STATUS',
  E_EXPOSURE_RESPONSE: 'E_EXPOSURE_RESPONSE',
  E_SERIALIZATION: 'E_SERIALIZATION',
  // Configuration
  E_INVALID_CONFIG: 'E_INVALID_CONFIG',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

function define(
  code: ErrorCode,
  title: string,
  description: string,
  category: ErrorCategory
): ErrorDefinition {
  return { code, title, description, category, retriable: false };
}

/**
 * Error definitions map
 */
export const ERRORS: Record<ErrorCode, ErrorDefinition> = {
  E_FAIRPLAY_NETWORK_FAILURE: define(
    'E_FAIRPLAY_NETWORK_FAILURE',
    'License Server Unreachable',
    'Transport failure or unacceptable HTTP status talking to the license server',
    'network'
  ),
  E_FAIRPLAY_SERVER_ERROR: define(
    'E_FAIRPLAY_SERVER_ERROR',
    'License Server Error',
    'License server answered with an <error> envelope',
    'server'
  ),
  E_FAIRPLAY_PARSE_FAILURE: define(
    'E_FAIRPLAY_PARSE_FAILURE',
    'Unrecognized License Response',
    'Response body matches neither the <fps> nor the <error> envelope',
    'parse'
  ),
  E_FAIRPLAY_INVALID_DATA_FORMAT: define(
    'E_FAIRPLAY_INVALID_DATA_FORMAT',
    'Invalid Payload Encoding',
    'Envelope payload did not decode to any bytes',
    'parse'
  ),
  E_FAIRPLAY_INVALID_CONTENT_IDENTIFIER: define(
    'E_FAIRPLAY_INVALID_CONTENT_IDENTIFIER',
    'Invalid Content Identifier',
    'Key request URL has no host to use as content identifier',
    'content_identifier'
  ),
  E_FAIRPLAY_MISSING_CERTIFICATE_URL: define(
    'E_FAIRPLAY_MISSING_CERTIFICATE_URL',
    'Missing Certificate URL',
    'Entitlement carries no Fairplay certificate URL',
    'configuration'
  ),
  E_FAIRPLAY_MISSING_LICENSE_URL: define(
    'E_FAIRPLAY_MISSING_LICENSE_URL',
    'Missing License URL',
    'Entitlement carries no Fairplay license acquisition URL',
    'configuration'
  ),
  E_FAIRPLAY_SERVER_PLAYBACK_CONTEXT: define(
    'E_FAIRPLAY_SERVER_PLAYBACK_CONTEXT',
    'Server Playback Context Failed',
    'Platform DRM primitive failed to build the SPC',
    'platform_drm'
  ),
  E_FAIRPLAY_MISSING_DATA_REQUEST: define(
    'E_FAIRPLAY_MISSING_DATA_REQUEST',
    'Missing Data Request',
    'Platform request has no pending data request to receive the CKC',
    'platform_drm'
  ),
  E_FAIRPLAY_CONTENT_KEY_DELIVERY: define(
    'E_FAIRPLAY_CONTENT_KEY_DELIVERY',
    'Content Key Delivery Failed',
    'Platform data request threw while receiving the CKC',
    'platform_drm'
  ),
  E_ENTITLEMENT_NOT_OBJECT: define(
    'E_ENTITLEMENT_NOT_OBJECT',
    'Invalid Entitlement',
    'Entitlement JSON top-level value is not an object',
    'decode'
  ),
  E_NETWORK_FAILURE: define(
    'E_NETWORK_FAILURE',
    'Network Failure',
    'Request to Exposure failed at the transport level',
    'network'
  ),
  E_HTTP_STATUS: define(
    'E_HTTP_STATUS',
    'Unacceptable Status',
    'Exposure answered with a non-2xx status and no response message',
    'network'
  ),
  E_EXPOSURE_RESPONSE: define(
    'E_EXPOSURE_RESPONSE',
    'Exposure Response Error',
    'Exposure answered with a structured { httpCode, message } error',
    'server'
  ),
  E_SERIALIZATION: define(
    'E_SERIALIZATION',
    'Serialization Failure',
    'Response body is not JSON or was rejected by the model decoder',
    'decode'
  ),
  E_INVALID_CONFIG: define(
    'E_INVALID_CONFIG',
    'Invalid Configuration',
    'SDK configuration failed validation',
    'configuration'
  ),
};

/**
 * Get error definition by code
 */
export function getError(code: string): ErrorDefinition | undefined {
  return isErrorCode(code) ? ERRORS[code] : undefined;
}

export function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERRORS, code);
}

/**
 * Base class of every error thrown or reported by the SDK.
 */
export class ExposureSdkError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly retryable: boolean;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExposureSdkError';
    this.code = code;
    this.category = ERRORS[code].category;
    this.retryable = ERRORS[code].retriable;
  }
}
