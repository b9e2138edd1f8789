import type { Entitlement } from '@exposure/entitlement';

/**
 * Receives playback preparation milestones for analytics reporting.
 *
 * Hooks are notifications: a hook that throws is logged and does not fail the
 * playback.
 */
export interface ExposureAnalyticsProvider {
  onEntitlementRequested(assetId: string): void;
  onHandshakeStarted(assetId: string, entitlement: Entitlement): void;
  /**
   * Called once the entitlement carries a play session id. Events of this
   * playback should be dispatched against it from here on.
   */
  finalizePreparation(playSessionId: string, assetId: string, entitlement: Entitlement): void;
}
