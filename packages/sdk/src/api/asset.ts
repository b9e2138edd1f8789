import type { ExposureClient } from '../client.js';
import { AssetListSchema, AssetSchema, type Asset, type AssetList } from '../models/asset.js';

export interface AssetListOptions {
  pageSize?: number;
  pageNumber?: number;
  onlyPublished?: boolean;
  /** Comma separated asset types, e.g. `MOVIE,TV_CHANNEL` */
  assetType?: string;
}

export async function fetchAsset(client: ExposureClient, assetId: string): Promise<Asset> {
  return client.request(
    { method: 'GET', url: `${client.environment.apiUrl}/content/asset/${encodeURIComponent(assetId)}` },
    (json) => AssetSchema.parse(json)
  );
}

export async function fetchAssetList(client: ExposureClient, options: AssetListOptions = {}): Promise<AssetList> {
  return client.request(
    {
      method: 'GET',
      url: `${client.environment.apiUrl}/content/asset`,
      query: {
        pageSize: options.pageSize,
        pageNumber: options.pageNumber,
        onlyPublished: options.onlyPublished,
        assetType: options.assetType,
      },
    },
    (json) => AssetListSchema.parse(json)
  );
}
