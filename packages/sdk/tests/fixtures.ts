import { MockAgent, Headers } from 'undici';
import { createLogger } from '@exposure/kernel';
import { ExposureClient } from '../src/client.js';
import { Environment } from '../src/environment.js';
import { SessionToken } from '../src/session-token.js';

export const ORIGIN = 'https://exposure.example.com';
export const API_PATH = '/v1/customer/Customer/businessunit/BusinessUnit';

export const environment = new Environment(ORIGIN, 'Customer', 'BusinessUnit');
export const sessionToken = new SessionToken('crmToken|account-1|user-1|field|1000');
export const silentLogger = createLogger({ level: 'silent' });

export function mockAgent(): MockAgent {
  const agent = new MockAgent();
  agent.disableNetConnect();
  return agent;
}

export function clientFor(agent: MockAgent, token: SessionToken | undefined = sessionToken): ExposureClient {
  return new ExposureClient({
    environment,
    ...(token ? { sessionToken: token } : {}),
    dispatcher: agent,
    logger: silentLogger,
  });
}

export function headerOf(
  headers: Headers | Record<string, string> | undefined,
  name: string
): string | undefined {
  if (headers === undefined) {
    return undefined;
  }
  if (headers instanceof Headers) {
    return headers.get(name) ?? undefined;
  }
  const entry = Object.entries(headers).find(([key]) => key.toLowerCase() === name.toLowerCase());
  return entry?.[1];
}

export const FAIRPLAY_ENTITLEMENT = {
  playToken: 'test-play-token',
  mediaLocator: 'https://cdn.example.com/asset-1/master.m3u8',
  playSessionId: 'play-session-1',
  live: false,
  entitlementType: 'TVOD',
  fairplayConfig: {
    secondaryMediaLocator: 'https://cdn.example.com/asset-1/fairplay.m3u8',
    certificateUrl: 'https://license.example.com/fairplay/certificate',
    licenseAcquisitionUrl: 'https://license.example.com/fairplay/license',
  },
};
