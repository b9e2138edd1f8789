/**
 * @exposure/entitlement
 *
 * Playback entitlement model and its lenient decoder.
 */

export type { Entitlement, EntitlementDecodeResult } from './entitlement.js';
export {
  ENTITLEMENT_KEYS,
  decodeEntitlement,
  safeDecodeEntitlement,
  encodeEntitlement,
} from './entitlement.js';

export type { EntitlementType, ExpirationReason } from './enums.js';
export {
  ENTITLEMENT_TYPE_LITERALS,
  EXPIRATION_REASON_LITERALS,
  parseEntitlementType,
  parseExpirationReason,
  entitlementTypeToString,
  expirationReasonToString,
  isSameEntitlementType,
  isSameExpirationReason,
} from './enums.js';

export type { FairplayConfiguration, EDRMConfiguration } from './drm-config.js';
export {
  FairplayConfigurationSchema,
  EDRMConfigurationSchema,
  decodeFairplayConfiguration,
  decodeEDRMConfiguration,
} from './drm-config.js';

export { EntitlementDecodeError } from './errors.js';
