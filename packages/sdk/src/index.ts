/**
 * Exposure SDK
 * REST client for entitlements, assets, EPG and analytics, plus Fairplay
 * playback preparation
 *
 * @packageDocumentation
 */

export { Environment } from './environment.js';
export { SessionToken } from './session-token.js';
export {
  ExposureClient,
  buildUrl,
  type Decoder,
  type ExposureClientOptions,
  type ExposureRequestDescriptor,
  type HttpMethod,
  type QueryValue,
} from './client.js';
export {
  ExposureError,
  ExposureResponseMessageSchema,
  type ExposureErrorDetails,
  type ExposureResponseMessage,
} from './errors.js';

export { fetchEntitlement, entitlementUrl } from './api/entitlement.js';
export { fetchAsset, fetchAssetList, type AssetListOptions } from './api/asset.js';
export {
  fetchEpgChannelList,
  fetchEpgProgram,
  type EpgChannelListOptions,
  type EpgProgramOptions,
} from './api/epg.js';

export {
  AssetSchema,
  AssetListSchema,
  LocalizedDataSchema,
  type Asset,
  type AssetList,
} from './models/asset.js';
export {
  ProgramSchema,
  ChannelEpgSchema,
  ChannelEpgListSchema,
  type Program,
  type ChannelEpg,
  type ChannelEpgList,
} from './models/epg.js';

export {
  AnalyticsBatch,
  persistedPayload,
  sendAnalyticsBatch,
  type AnalyticsBatchInit,
  type AnalyticsPayload,
} from './analytics/batch.js';
export type { ExposureAnalyticsProvider } from './analytics/provider.js';

export { preparePlayback, type PreparePlaybackOptions, type PreparedPlayback } from './playback.js';
export { toUtcString, millisecondsSince1970, dateFromMilliseconds } from './dates.js';
