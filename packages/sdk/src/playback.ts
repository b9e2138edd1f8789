import type { Entitlement } from '@exposure/entitlement';
import { FairplayRequester, type FairplayRequesterOptions } from '@exposure/fairplay';
import type { SdkConfig } from '@exposure/kernel';
import type { ExposureAnalyticsProvider } from './analytics/provider.js';
import { fetchEntitlement } from './api/entitlement.js';
import type { ExposureClient } from './client.js';

export interface PreparePlaybackOptions {
  analytics?: ExposureAnalyticsProvider;
  /** Fairplay settings, e.g. from `loadConfig().fairplay` */
  fairplay?: Partial<SdkConfig['fairplay']>;
  /** Passed through to the requester */
  onOutcome?: FairplayRequesterOptions['onOutcome'];
}

export interface PreparedPlayback {
  entitlement: Entitlement;
  /** Hand every key request of this playback to `requester.canHandle` */
  requester: FairplayRequester;
}

/**
 * Fetch the entitlement of an asset and build the Fairplay requester that
 * will answer its key requests.
 *
 * @throws ExposureError when the entitlement cannot be fetched
 */
export async function preparePlayback(
  client: ExposureClient,
  assetId: string,
  options: PreparePlaybackOptions = {}
): Promise<PreparedPlayback> {
  const log = client.logger.child({ module: 'playback', assetId });
  const { analytics } = options;

  const notify = (hook: string, call: (provider: ExposureAnalyticsProvider) => void) => {
    if (!analytics) return;
    try {
      call(analytics);
    } catch (error) {
      log.warn({ hook, err: error }, 'analytics hook failed');
    }
  };

  notify('onEntitlementRequested', (provider) => provider.onEntitlementRequested(assetId));
  const entitlement = await fetchEntitlement(client, assetId);
  log.debug({ playSessionId: entitlement.playSessionId }, 'entitlement received');

  const requesterOptions: FairplayRequesterOptions = { logger: client.logger };
  if (client.dispatcher) requesterOptions.dispatcher = client.dispatcher;
  if (client.timeoutMs !== undefined) requesterOptions.timeoutMs = client.timeoutMs;
  if (options.fairplay?.customScheme !== undefined) requesterOptions.customScheme = options.fairplay.customScheme;
  if (options.fairplay?.playTokenHeader !== undefined) {
    requesterOptions.playTokenHeader = options.fairplay.playTokenHeader;
  }
  if (options.onOutcome) requesterOptions.onOutcome = options.onOutcome;
  const requester = new FairplayRequester(entitlement, requesterOptions);

  notify('onHandshakeStarted', (provider) => provider.onHandshakeStarted(assetId, entitlement));
  const { playSessionId } = entitlement;
  if (playSessionId !== undefined) {
    notify('finalizePreparation', (provider) => provider.finalizePreparation(playSessionId, assetId, entitlement));
  }

  return { entitlement, requester };
}
