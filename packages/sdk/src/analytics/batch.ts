/**
 * Analytics event batches for the Exposure event sink
 */

import { HEADERS, type JsonObject } from '@exposure/kernel';
import type { ExposureClient } from '../client.js';
import type { Environment } from '../environment.js';
import type { SessionToken } from '../session-token.js';

/**
 * A single analytics event.
 */
export interface AnalyticsPayload {
  /** Unix epoch milliseconds, used to order events inside a batch */
  readonly timestamp: number;
  readonly jsonPayload: JsonObject;
}

/**
 * Wrap an event already serialized to JSON, e.g. one restored from disk.
 * Events without a numeric `timestamp` sort first.
 */
export function persistedPayload(json: JsonObject): AnalyticsPayload {
  const timestamp = json['timestamp'];
  return {
    timestamp: typeof timestamp === 'number' ? timestamp : 0,
    jsonPayload: json,
  };
}

export interface AnalyticsBatchInit {
  sessionToken: SessionToken;
  environment: Environment;
  /** Device clock when the batch was sent, epoch milliseconds */
  dispatchTime: number;
  /** Device clock minus server clock, milliseconds */
  clockOffset?: number;
  /** Identifies the playback session, see `Entitlement.playSessionId` */
  playToken: string;
  payload: AnalyticsPayload[];
}

export class AnalyticsBatch {
  readonly sessionToken: SessionToken;
  readonly environment: Environment;
  readonly dispatchTime: number;
  readonly clockOffset: number | undefined;
  readonly playToken: string;
  readonly payload: readonly AnalyticsPayload[];

  constructor(init: AnalyticsBatchInit) {
    this.sessionToken = init.sessionToken;
    this.environment = init.environment;
    this.dispatchTime = init.dispatchTime;
    this.clockOffset = init.clockOffset;
    this.playToken = init.playToken;
    this.payload = [...init.payload].sort((a, b) => a.timestamp - b.timestamp);
  }

  get customer(): string {
    return this.environment.customer;
  }

  get businessUnit(): string {
    return this.environment.businessUnit;
  }

  toJSON(): JsonObject {
    const json: JsonObject = { dispatchTime: this.dispatchTime };
    if (this.clockOffset !== undefined) {
      json.clockOffset = this.clockOffset;
    }
    json.customer = this.customer;
    json.businessUnit = this.businessUnit;
    json.playToken = this.playToken;
    json.payload = this.payload.map((event) => event.jsonPayload);
    return json;
  }
}

/**
 * Deliver a batch to the event sink, authorized by the batch's own session.
 */
export async function sendAnalyticsBatch(client: ExposureClient, batch: AnalyticsBatch): Promise<void> {
  await client.requestEmpty({
    method: 'POST',
    url: `${batch.environment.apiUrl}/eventsink/send`,
    body: batch.toJSON(),
    headers: { [HEADERS.authorization]: batch.sessionToken.authorizationHeader },
  });
}
