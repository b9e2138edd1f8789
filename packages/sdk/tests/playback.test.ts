import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockAgent } from 'undici';
import type { Entitlement } from '@exposure/entitlement';
import type { ContentKeyLoadingRequest, FairplayError } from '@exposure/fairplay';
import type { ExposureAnalyticsProvider } from '../src/analytics/provider.js';
import { preparePlayback } from '../src/playback.js';
import { API_PATH, FAIRPLAY_ENTITLEMENT, ORIGIN, clientFor, mockAgent } from './fixtures.js';

function analyticsSpy() {
  const calls: string[] = [];
  const provider: ExposureAnalyticsProvider = {
    onEntitlementRequested: vi.fn((assetId: string) => {
      calls.push(`requested ${assetId}`);
    }),
    onHandshakeStarted: vi.fn((assetId: string, _entitlement: Entitlement) => {
      calls.push(`handshake ${assetId}`);
    }),
    finalizePreparation: vi.fn((playSessionId: string, assetId: string, _entitlement: Entitlement) => {
      calls.push(`finalize ${playSessionId} ${assetId}`);
    }),
  };
  return { provider, calls };
}

function keyRequest(url: string) {
  const responses: Uint8Array[] = [];
  const errors: FairplayError[] = [];
  let finished = 0;
  const request: ContentKeyLoadingRequest = {
    url,
    isCancelled: false,
    dataRequest: { respond: (data) => responses.push(data) },
    makeServerPlaybackContext: () => new TextEncoder().encode('spc'),
    finishLoading: () => {
      finished++;
    },
    finishLoadingWithError: (error) => {
      errors.push(error);
    },
  };
  return { request, responses, errors, finished: () => finished };
}

describe('preparePlayback', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = mockAgent();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('fetches the entitlement and reports each milestone', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: `${API_PATH}/entitlement/asset-1/play`, method: 'GET' })
      .reply(200, FAIRPLAY_ENTITLEMENT);
    const { provider, calls } = analyticsSpy();

    const { entitlement, requester } = await preparePlayback(clientFor(agent), 'asset-1', { analytics: provider });

    expect(entitlement.playSessionId).toBe('play-session-1');
    expect(requester.entitlement).toBe(entitlement);
    expect(calls).toEqual(['requested asset-1', 'handshake asset-1', 'finalize play-session-1 asset-1']);
  });

  it('skips finalization without a play session id', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: `${API_PATH}/entitlement/asset-1/play`, method: 'GET' })
      .reply(200, { playToken: 'test-play-token' });
    const { provider, calls } = analyticsSpy();

    await preparePlayback(clientFor(agent), 'asset-1', { analytics: provider });

    expect(calls).toEqual(['requested asset-1', 'handshake asset-1']);
  });

  it('does not let a failing analytics hook break playback', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: `${API_PATH}/entitlement/asset-1/play`, method: 'GET' })
      .reply(200, FAIRPLAY_ENTITLEMENT);
    const { provider } = analyticsSpy();
    provider.onEntitlementRequested = () => {
      throw new Error('analytics offline');
    };

    const { entitlement } = await preparePlayback(clientFor(agent), 'asset-1', { analytics: provider });

    expect(entitlement.playToken).toBe('test-play-token');
  });

  it('propagates entitlement failures', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: `${API_PATH}/entitlement/asset-1/play`, method: 'GET' })
      .reply(403, { httpCode: 403, message: 'NOT_ENTITLED' });
    const { provider, calls } = analyticsSpy();

    await expect(preparePlayback(clientFor(agent), 'asset-1', { analytics: provider })).rejects.toMatchObject({
      message: '403: NOT_ENTITLED',
    });
    expect(calls).toEqual(['requested asset-1']);
  });

  it('returns a requester that completes the Fairplay handshake', async () => {
    const exposure = agent.get(ORIGIN);
    exposure
      .intercept({ path: `${API_PATH}/entitlement/asset-1/play`, method: 'GET' })
      .reply(200, FAIRPLAY_ENTITLEMENT);
    const license = agent.get('https://license.example.com');
    license.intercept({ path: '/fairplay/certificate', method: 'GET' }).reply(200, '<fps><cert>QkFTRTY0</cert></fps>');
    license.intercept({ path: '/fairplay/license', method: 'POST' }).reply(200, '<fps><ckc>Y2tj</ckc></fps>');

    const { requester } = await preparePlayback(clientFor(agent), 'asset-1', {
      fairplay: { customScheme: 'skd' },
    });
    const key = keyRequest('skd://asset-1-key');

    expect(requester.canHandle(key.request)).toBe(true);
    await requester.drain();

    expect(key.errors).toEqual([]);
    expect(key.finished()).toBe(1);
    expect(key.responses.map((data) => new TextDecoder().decode(data))).toEqual(['ckc']);
  });
});
