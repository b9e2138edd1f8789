import { z } from 'zod';
import { AssetSchema } from './asset.js';

export const ProgramSchema = z
  .object({
    programId: z.string(),
    assetId: z.string().optional().catch(undefined),
    channelId: z.string().optional().catch(undefined),
    startTime: z.string().optional().catch(undefined),
    endTime: z.string().optional().catch(undefined),
    asset: AssetSchema.optional().catch(undefined),
  })
  .passthrough();

export type Program = z.infer<typeof ProgramSchema>;

export const ChannelEpgSchema = z
  .object({
    channelId: z.string(),
    programs: z.array(ProgramSchema).default([]),
    totalHitsAllChannels: z.number().int().optional().catch(undefined),
  })
  .passthrough();

export type ChannelEpg = z.infer<typeof ChannelEpgSchema>;

export const ChannelEpgListSchema = z.array(ChannelEpgSchema);

export type ChannelEpgList = z.infer<typeof ChannelEpgListSchema>;
