import { z } from 'zod';

/**
 * Per-locale presentation data of an asset.
 */
export const LocalizedDataSchema = z
  .object({
    locale: z.string(),
    title: z.string().optional().catch(undefined),
    sortingTitle: z.string().optional().catch(undefined),
    description: z.string().optional().catch(undefined),
    shortDescription: z.string().optional().catch(undefined),
    longDescription: z.string().optional().catch(undefined),
  })
  .passthrough();

/**
 * Content asset. Only `assetId` is required; fields this client does not
 * model are kept as received.
 */
export const AssetSchema = z
  .object({
    assetId: z.string(),
    type: z.string().optional().catch(undefined),
    originalTitle: z.string().optional().catch(undefined),
    duration: z.number().optional().catch(undefined),
    live: z.boolean().optional().catch(undefined),
    localized: z.array(LocalizedDataSchema).optional().catch(undefined),
    tags: z.array(z.unknown()).optional().catch(undefined),
  })
  .passthrough();

export type Asset = z.infer<typeof AssetSchema>;

export const AssetListSchema = z
  .object({
    items: z.array(AssetSchema).default([]),
    pageNumber: z.number().int().optional().catch(undefined),
    pageSize: z.number().int().optional().catch(undefined),
    totalCount: z.number().int().optional().catch(undefined),
  })
  .passthrough();

export type AssetList = z.infer<typeof AssetListSchema>;
