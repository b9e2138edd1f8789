/**
 * Exposure SDK Constants
 */

/**
 * Fairplay Streaming defaults
 */
export const FAIRPLAY = {
  /** URL scheme of FPS content key requests */
  customScheme: 'skd' as const,
  /** Header carrying the play token on content key context requests */
  playTokenHeader: 'AzukiApp' as const,
  /** Payload tag of the application certificate envelope */
  certificateTag: 'cert' as const,
  /** Payload tag of the content key context envelope */
  contentKeyContextTag: 'ckc' as const,
} as const;

/**
 * HTTP header names used against Exposure and the license server
 */
export const HEADERS = {
  authorization: 'authorization' as const,
  contentType: 'content-type' as const,
  accept: 'accept' as const,
} as const;

export const CONTENT_TYPES = {
  json: 'application/json' as const,
  octetStream: 'application/octet-stream' as const,
} as const;

/**
 * Exposure REST API layout
 */
export const EXPOSURE = {
  apiVersion: 'v1' as const,
  userAgent: 'exposure-sdk-node/0.4.0' as const,
} as const;
