import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { MockAgent } from 'undici';
import { ERROR_CODES } from '@exposure/kernel';
import { fetchEntitlement, entitlementUrl } from '../src/api/entitlement.js';
import { fetchAsset, fetchAssetList } from '../src/api/asset.js';
import { fetchEpgChannelList, fetchEpgProgram } from '../src/api/epg.js';
import { API_PATH, FAIRPLAY_ENTITLEMENT, ORIGIN, clientFor, headerOf, mockAgent } from './fixtures.js';

describe('Exposure endpoints', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = mockAgent();
  });

  afterEach(async () => {
    await agent.close();
  });

  describe('fetchEntitlement', () => {
    it('builds the play URL', () => {
      expect(entitlementUrl(clientFor(agent), 'asset 1')).toBe(
        `${ORIGIN}${API_PATH}/entitlement/asset%201/play`
      );
    });

    it('requests and decodes the entitlement', async () => {
      let authorization: string | undefined;
      agent
        .get(ORIGIN)
        .intercept({ path: `${API_PATH}/entitlement/asset-1/play`, method: 'GET' })
        .reply(200, (options) => {
          authorization = headerOf(options.headers, 'authorization');
          return FAIRPLAY_ENTITLEMENT;
        });

      const entitlement = await fetchEntitlement(clientFor(agent), 'asset-1');

      expect(authorization).toBe('Bearer crmToken|account-1|user-1|field|1000');
      expect(entitlement.playToken).toBe('test-play-token');
      expect(entitlement.playSessionId).toBe('play-session-1');
      expect(entitlement.entitlementType).toEqual({ type: 'tvod' });
      expect(entitlement.fairplay?.certificateUrl).toBe('https://license.example.com/fairplay/certificate');
    });

    it('reports a non-object entitlement as a serialization failure', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: `${API_PATH}/entitlement/asset-1/play`, method: 'GET' })
        .reply(200, '[]');

      await expect(fetchEntitlement(clientFor(agent), 'asset-1')).rejects.toMatchObject({
        code: ERROR_CODES.E_SERIALIZATION,
      });
    });

    it('surfaces Exposure refusals', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: `${API_PATH}/entitlement/asset-1/play`, method: 'GET' })
        .reply(403, { httpCode: 403, message: 'NOT_ENTITLED' });

      await expect(fetchEntitlement(clientFor(agent), 'asset-1')).rejects.toMatchObject({
        code: ERROR_CODES.E_EXPOSURE_RESPONSE,
        response: { httpCode: 403, message: 'NOT_ENTITLED' },
      });
    });
  });

  describe('assets', () => {
    it('fetches one asset and keeps unmodelled fields', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: `${API_PATH}/content/asset/asset-1`, method: 'GET' })
        .reply(200, {
          assetId: 'asset-1',
          type: 'MOVIE',
          duration: 'not a number',
          localized: [{ locale: 'en', title: 'A Movie' }],
          productionYear: 2017,
        });

      const asset = await fetchAsset(clientFor(agent), 'asset-1');

      expect(asset).toEqual({
        assetId: 'asset-1',
        type: 'MOVIE',
        duration: undefined,
        localized: [{ locale: 'en', title: 'A Movie' }],
        productionYear: 2017,
      });
    });

    it('rejects an asset without id', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: `${API_PATH}/content/asset/asset-1`, method: 'GET' })
        .reply(200, { type: 'MOVIE' });

      await expect(fetchAsset(clientFor(agent), 'asset-1')).rejects.toMatchObject({
        code: ERROR_CODES.E_SERIALIZATION,
      });
    });

    it('lists assets with paging', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: `${API_PATH}/content/asset?pageSize=10&pageNumber=2`, method: 'GET' })
        .reply(200, { pageNumber: 2, pageSize: 10, totalCount: 11, items: [{ assetId: 'asset-11' }] });

      const list = await fetchAssetList(clientFor(agent), { pageSize: 10, pageNumber: 2 });

      expect(list.totalCount).toBe(11);
      expect(list.items.map((asset) => asset.assetId)).toEqual(['asset-11']);
    });
  });

  describe('epg', () => {
    it('fetches the channel list with filters', async () => {
      const from = new Date(Date.UTC(2024, 0, 1));
      const to = new Date(Date.UTC(2024, 0, 2));
      agent
        .get(ORIGIN)
        .intercept({
          path: `${API_PATH}/epg/channel-1,channel-2?onlyPublished=true&pageNumber=1&pageSize=50&from=${from.getTime()}&to=${to.getTime()}`,
          method: 'GET',
        })
        .reply(200, [
          { channelId: 'channel-1', programs: [{ programId: 'program-1', startTime: '2024-01-01T10:00:00Z' }] },
          { channelId: 'channel-2' },
        ]);

      const channels = await fetchEpgChannelList(clientFor(agent), {
        channelIds: ['channel-1', 'channel-2'],
        from,
        to,
      });

      expect(channels.map((channel) => channel.channelId)).toEqual(['channel-1', 'channel-2']);
      expect(channels[0]?.programs.map((program) => program.programId)).toEqual(['program-1']);
      expect(channels[1]?.programs).toEqual([]);
    });

    it('fetches an airing program', async () => {
      agent
        .get(ORIGIN)
        .intercept({
          path: `${API_PATH}/epg/channel-1/program/program-1/airing?onlyPublished=false`,
          method: 'GET',
        })
        .reply(200, { programId: 'program-1', channelId: 'channel-1', asset: { assetId: 'asset-1' } });

      const program = await fetchEpgProgram(clientFor(agent), 'channel-1', 'program-1', {
        airing: true,
        onlyPublished: false,
      });

      expect(program.programId).toBe('program-1');
      expect(program.asset?.assetId).toBe('asset-1');
    });

    it('fetches a program regardless of airing by default', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: `${API_PATH}/epg/channel-1/program/program-1?onlyPublished=true`, method: 'GET' })
        .reply(200, { programId: 'program-1' });

      const program = await fetchEpgProgram(clientFor(agent), 'channel-1', 'program-1');

      expect(program).toEqual({ programId: 'program-1' });
    });
  });
});
