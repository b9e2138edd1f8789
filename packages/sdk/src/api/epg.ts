import type { ExposureClient } from '../client.js';
import { millisecondsSince1970 } from '../dates.js';
import { ChannelEpgListSchema, ProgramSchema, type ChannelEpgList, type Program } from '../models/epg.js';

export interface EpgChannelListOptions {
  /** All channels when empty */
  channelIds?: string[];
  from?: Date;
  to?: Date;
  onlyPublished?: boolean;
  pageSize?: number;
  pageNumber?: number;
}

export interface EpgProgramOptions {
  /** Only return the program while it is on air */
  airing?: boolean;
  onlyPublished?: boolean;
}

const DEFAULT_PAGE_SIZE = 50;
const DEFAULT_PAGE_NUMBER = 1;

export async function fetchEpgChannelList(
  client: ExposureClient,
  options: EpgChannelListOptions = {}
): Promise<ChannelEpgList> {
  const channelIds = (options.channelIds ?? []).map(encodeURIComponent).join(',');
  return client.request(
    {
      method: 'GET',
      url: `${client.environment.apiUrl}/epg/${channelIds}`,
      query: {
        onlyPublished: options.onlyPublished ?? true,
        pageNumber: options.pageNumber ?? DEFAULT_PAGE_NUMBER,
        pageSize: options.pageSize ?? DEFAULT_PAGE_SIZE,
        from: options.from && millisecondsSince1970(options.from),
        to: options.to && millisecondsSince1970(options.to),
      },
    },
    (json) => ChannelEpgListSchema.parse(json)
  );
}

export async function fetchEpgProgram(
  client: ExposureClient,
  channelId: string,
  programId: string,
  options: EpgProgramOptions = {}
): Promise<Program> {
  const path = `/epg/${encodeURIComponent(channelId)}/program/${encodeURIComponent(programId)}`;
  return client.request(
    {
      method: 'GET',
      url: `${client.environment.apiUrl}${path}${options.airing ? '/airing' : ''}`,
      query: { onlyPublished: options.onlyPublished ?? true },
    },
    (json) => ProgramSchema.parse(json)
  );
}
