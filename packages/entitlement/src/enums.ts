/**
 * String-keyed entitlement enums
 *
 * Known wire literals map to fixed variants. Any other string is preserved in
 * an `other` variant so callers can branch on codes the server adds later.
 */

export type EntitlementType =
  | { type: 'tvod' }
  | { type: 'svod' }
  | { type: 'fvod' }
  | { type: 'other'; value: string };

export type ExpirationReason =
  | { type: 'success' }
  | { type: 'notEntitled' }
  | { type: 'geoBlocked' }
  | { type: 'downloadBlocked' }
  | { type: 'deviceBlocked' }
  | { type: 'licenseExpired' }
  | { type: 'notAvailableInFormat' }
  | { type: 'concurrentStreamsLimitReached' }
  | { type: 'notEnabled' }
  | { type: 'gapInEPG' }
  | { type: 'epgPlayMaxHours' }
  | { type: 'other'; reason: string };

type KnownEntitlementType = Exclude<EntitlementType['type'], 'other'>;
type KnownExpirationReason = Exclude<ExpirationReason['type'], 'other'>;

export const ENTITLEMENT_TYPE_LITERALS: Readonly<Record<KnownEntitlementType, string>> = {
  tvod: 'TVOD',
  svod: 'SVOD',
  fvod: 'FVOD',
};

export const EXPIRATION_REASON_LITERALS: Readonly<Record<KnownExpirationReason, string>> = {
  success: 'SUCCESS',
  notEntitled: 'NOT_ENTITLED',
  geoBlocked: 'GEO_BLOCKED',
  downloadBlocked: 'DOWNLOAD_BLOCKED',
  deviceBlocked: 'DEVICE_BLOCKED',
  licenseExpired: 'LICENSE_EXPIRED',
  notAvailableInFormat: 'NOT_AVAILABLE_IN_FORMAT',
  concurrentStreamsLimitReached: 'CONCURRENT_STREAMS_LIMIT_REACHED',
  notEnabled: 'NOT_ENABLED',
  gapInEPG: 'GAP_IN_EPG',
  epgPlayMaxHours: 'EPG_PLAY_MAX_HOURS',
};

function invert<K extends string>(literals: Readonly<Record<K, string>>, variants: readonly K[]): Map<string, K> {
  return new Map(variants.map((variant): [string, K] => [literals[variant], variant]));
}

const ENTITLEMENT_TYPE_BY_LITERAL = invert(ENTITLEMENT_TYPE_LITERALS, ['tvod', 'svod', 'fvod']);
const EXPIRATION_REASON_BY_LITERAL = invert(EXPIRATION_REASON_LITERALS, [
  'success',
  'notEntitled',
  'geoBlocked',
  'downloadBlocked',
  'deviceBlocked',
  'licenseExpired',
  'notAvailableInFormat',
  'concurrentStreamsLimitReached',
  'notEnabled',
  'gapInEPG',
  'epgPlayMaxHours',
]);

/**
 * Map a wire string to an EntitlementType. Absent input yields `undefined`,
 * never a default variant.
 */
export function parseEntitlementType(value: string | null | undefined): EntitlementType | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const known = ENTITLEMENT_TYPE_BY_LITERAL.get(value);
  return known ? { type: known } : { type: 'other', value };
}

/**
 * Map a wire string to an ExpirationReason. Absent input yields `undefined`,
 * never a default variant.
 */
export function parseExpirationReason(value: string | null | undefined): ExpirationReason | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const known = EXPIRATION_REASON_BY_LITERAL.get(value);
  return known ? { type: known } : { type: 'other', reason: value };
}

export function entitlementTypeToString(value: EntitlementType): string {
  return value.type === 'other' ? value.value : ENTITLEMENT_TYPE_LITERALS[value.type];
}

export function expirationReasonToString(value: ExpirationReason): string {
  return value.type === 'other' ? value.reason : EXPIRATION_REASON_LITERALS[value.type];
}

export function isSameEntitlementType(a: EntitlementType, b: EntitlementType): boolean {
  if (a.type === 'other' || b.type === 'other') {
    return a.type === 'other' && b.type === 'other' && a.value === b.value;
  }
  return a.type === b.type;
}

export function isSameExpirationReason(a: ExpirationReason, b: ExpirationReason): boolean {
  if (a.type === 'other' || b.type === 'other') {
    return a.type === 'other' && b.type === 'other' && a.reason === b.reason;
  }
  return a.type === b.type;
}
