/**
 * Playback entitlement
 *
 * Decoded from the Exposure entitlement response. Every field is optional: the
 * server omits fields depending on the licensing outcome, and a field with an
 * unexpected JSON type is treated as omitted.
 */

import { z } from 'zod';
import type { JsonObject } from '@exposure/kernel';
import {
  parseEntitlementType,
  parseExpirationReason,
  entitlementTypeToString,
  expirationReasonToString,
  type EntitlementType,
  type ExpirationReason,
} from './enums.js';
import {
  decodeEDRMConfiguration,
  decodeFairplayConfiguration,
  type EDRMConfiguration,
  type FairplayConfiguration,
} from './drm-config.js';
import { EntitlementDecodeError } from './errors.js';

export interface Entitlement {
  /** Play token for the license server. Empty unless the status is SUCCESS. */
  readonly playToken?: string;
  readonly edrm?: EDRMConfiguration;
  readonly fairplay?: FairplayConfiguration;
  /** Media uid for EDRM, URL of the media for other formats */
  readonly mediaLocator?: string;
  readonly licenseExpiration?: string;
  readonly licenseExpirationReason?: ExpirationReason;
  readonly licenseActivation?: string;
  /** The player must have made its play call before this */
  readonly playTokenExpiration?: string;
  readonly entitlementType?: EntitlementType;
  readonly live?: boolean;
  /** Every analytics event of this playback is reported against this id */
  readonly playSessionId?: string;
  readonly ffEnabled?: boolean;
  readonly timeshiftEnabled?: boolean;
  readonly rwEnabled?: boolean;
  readonly minBitrate?: number;
  readonly maxBitrate?: number;
  readonly maxResHeight?: number;
  readonly airplayBlocked?: boolean;
  readonly mdnRequestRouterUrl?: string;
}

/**
 * Wire keys of the entitlement response
 */
export const ENTITLEMENT_KEYS = {
  playToken: 'playToken',
  edrm: 'edrmConfig',
  fairplay: 'fairplayConfig',
  mediaLocator: 'mediaLocator',
  licenseExpiration: 'licenseExpiration',
  licenseExpirationReason: 'licenseExpirationReason',
  licenseActivation: 'licenseActivation',
  playTokenExpiration: 'playTokenExpiration',
  entitlementType: 'entitlementType',
  live: 'live',
  playSessionId: 'playSessionId',
  ffEnabled: 'ffEnabled',
  timeshiftEnabled: 'timeshiftEnabled',
  rwEnabled: 'rwEnabled',
  minBitrate: 'minBitrate',
  maxBitrate: 'maxBitrate',
  maxResHeight: 'maxResHeight',
  airplayBlocked: 'airplayBlocked',
  mdnRequestRouterUrl: 'mdnRequestRouterUrl',
} as const satisfies Record<keyof Entitlement, string>;

const lenientString = z.string().optional().catch(undefined);
const lenientBoolean = z.boolean().optional().catch(undefined);
// fractional numbers truncate toward zero
const lenientInt = z
  .number()
  .finite()
  .transform((n) => Math.trunc(n))
  .optional()
  .catch(undefined);
const lenientEnumString = z.string().nullish().catch(undefined);

const EntitlementSchema = z
  .object({
    playToken: lenientString,
    edrmConfig: z.unknown().transform(decodeEDRMConfiguration),
    fairplayConfig: z.unknown().transform(decodeFairplayConfiguration),
    mediaLocator: lenientString,
    licenseExpiration: lenientString,
    licenseExpirationReason: lenientEnumString.transform(parseExpirationReason),
    licenseActivation: lenientString,
    playTokenExpiration: lenientString,
    entitlementType: lenientEnumString.transform(parseEntitlementType),
    live: lenientBoolean,
    playSessionId: lenientString,
    ffEnabled: lenientBoolean,
    timeshiftEnabled: lenientBoolean,
    rwEnabled: lenientBoolean,
    minBitrate: lenientInt,
    maxBitrate: lenientInt,
    maxResHeight: lenientInt,
    airplayBlocked: lenientBoolean,
    mdnRequestRouterUrl: lenientString,
  })
  .transform(
    (raw): Entitlement => ({
      playToken: raw.playToken,
      edrm: raw.edrmConfig,
      fairplay: raw.fairplayConfig,
      mediaLocator: raw.mediaLocator,
      licenseExpiration: raw.licenseExpiration,
      licenseExpirationReason: raw.licenseExpirationReason,
      licenseActivation: raw.licenseActivation,
      playTokenExpiration: raw.playTokenExpiration,
      entitlementType: raw.entitlementType,
      live: raw.live,
      playSessionId: raw.playSessionId,
      ffEnabled: raw.ffEnabled,
      timeshiftEnabled: raw.timeshiftEnabled,
      rwEnabled: raw.rwEnabled,
      minBitrate: raw.minBitrate,
      maxBitrate: raw.maxBitrate,
      maxResHeight: raw.maxResHeight,
      airplayBlocked: raw.airplayBlocked,
      mdnRequestRouterUrl: raw.mdnRequestRouterUrl,
    })
  );

/**
 * A plain object has prototype of Object.prototype or null. Arrays, Dates,
 * Maps and class instances are not entitlement payloads.
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export type EntitlementDecodeResult =
  | { ok: true; entitlement: Entitlement }
  | { ok: false; error: EntitlementDecodeError };

/**
 * Decode an entitlement without throwing.
 */
export function safeDecodeEntitlement(json: unknown): EntitlementDecodeResult {
  if (!isPlainObject(json)) {
    return { ok: false, error: new EntitlementDecodeError(describeType(json)) };
  }
  const result = EntitlementSchema.safeParse(json);
  if (!result.success) {
    // Every field schema catches its own failures, so this is only reachable
    // for objects zod refuses to walk.
    return { ok: false, error: new EntitlementDecodeError(describeType(json)) };
  }
  return { ok: true, entitlement: result.data };
}

/**
 * Decode an entitlement.
 *
 * @throws EntitlementDecodeError when `json` is not a JSON object
 */
export function decodeEntitlement(json: unknown): Entitlement {
  const result = safeDecodeEntitlement(json);
  if (!result.ok) {
    throw result.error;
  }
  return result.entitlement;
}

/**
 * Map an entitlement back to its wire shape. Absent fields are omitted.
 */
export function encodeEntitlement(entitlement: Entitlement): JsonObject {
  const json: JsonObject = {};
  const put = (key: string, value: string | number | boolean | JsonObject | undefined) => {
    if (value !== undefined) {
      json[key] = value;
    }
  };

  put(ENTITLEMENT_KEYS.playToken, entitlement.playToken);
  put(ENTITLEMENT_KEYS.edrm, entitlement.edrm && encodeEDRM(entitlement.edrm));
  put(ENTITLEMENT_KEYS.fairplay, entitlement.fairplay && { ...entitlement.fairplay });
  put(ENTITLEMENT_KEYS.mediaLocator, entitlement.mediaLocator);
  put(ENTITLEMENT_KEYS.licenseExpiration, entitlement.licenseExpiration);
  put(
    ENTITLEMENT_KEYS.licenseExpirationReason,
    entitlement.licenseExpirationReason && expirationReasonToString(entitlement.licenseExpirationReason)
  );
  put(ENTITLEMENT_KEYS.licenseActivation, entitlement.licenseActivation);
  put(ENTITLEMENT_KEYS.playTokenExpiration, entitlement.playTokenExpiration);
  put(
    ENTITLEMENT_KEYS.entitlementType,
    entitlement.entitlementType && entitlementTypeToString(entitlement.entitlementType)
  );
  put(ENTITLEMENT_KEYS.live, entitlement.live);
  put(ENTITLEMENT_KEYS.playSessionId, entitlement.playSessionId);
  put(ENTITLEMENT_KEYS.ffEnabled, entitlement.ffEnabled);
  put(ENTITLEMENT_KEYS.timeshiftEnabled, entitlement.timeshiftEnabled);
  put(ENTITLEMENT_KEYS.rwEnabled, entitlement.rwEnabled);
  put(ENTITLEMENT_KEYS.minBitrate, entitlement.minBitrate);
  put(ENTITLEMENT_KEYS.maxBitrate, entitlement.maxBitrate);
  put(ENTITLEMENT_KEYS.maxResHeight, entitlement.maxResHeight);
  put(ENTITLEMENT_KEYS.airplayBlocked, entitlement.airplayBlocked);
  put(ENTITLEMENT_KEYS.mdnRequestRouterUrl, entitlement.mdnRequestRouterUrl);
  return json;
}

function encodeEDRM(edrm: EDRMConfiguration): JsonObject {
  const json: JsonObject = { ownerId: edrm.ownerId, userToken: edrm.userToken };
  if (edrm.requestUrl !== undefined) json.requestUrl = edrm.requestUrl;
  if (edrm.adParameter !== undefined) json.adParameter = edrm.adParameter;
  return json;
}
