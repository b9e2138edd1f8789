import { decodeEntitlement, type Entitlement } from '@exposure/entitlement';
import type { ExposureClient } from '../client.js';

export function entitlementUrl(client: ExposureClient, assetId: string): string {
  return `${client.environment.apiUrl}/entitlement/${encodeURIComponent(assetId)}/play`;
}

/**
 * Request playback rights for an asset.
 *
 * @throws ExposureError on transport, status or serialization failures
 */
export async function fetchEntitlement(client: ExposureClient, assetId: string): Promise<Entitlement> {
  return client.request({ method: 'GET', url: entitlementUrl(client, assetId) }, decodeEntitlement);
}
