/**
 * DRM sub-configurations carried by an entitlement
 *
 * Each sub-object is valid on its own terms: missing mandatory keys make the
 * sub-configuration absent, never the parent entitlement invalid.
 */

import { z } from 'zod';

/**
 * Fairplay configuration. All three URLs are mandatory.
 */
export const FairplayConfigurationSchema = z.object({
  /** Playable URL of the Fairplay-protected variant of the media */
  secondaryMediaLocator: z.string(),
  /** Where the application certificate is fetched from */
  certificateUrl: z.string(),
  /** Where the SPC is exchanged for a CKC */
  licenseAcquisitionUrl: z.string(),
});

export type FairplayConfiguration = z.infer<typeof FairplayConfigurationSchema>;

/**
 * EDRM configuration. Owner and user token are mandatory.
 */
export const EDRMConfigurationSchema = z.object({
  ownerId: z.string(),
  userToken: z.string(),
  requestUrl: z.string().optional().catch(undefined),
  adParameter: z.string().optional().catch(undefined),
});

export type EDRMConfiguration = z.infer<typeof EDRMConfigurationSchema>;

export function decodeFairplayConfiguration(value: unknown): FairplayConfiguration | undefined {
  const result = FairplayConfigurationSchema.safeParse(value);
  return result.success ? result.data : undefined;
}

export function decodeEDRMConfiguration(value: unknown): EDRMConfiguration | undefined {
  const result = EDRMConfigurationSchema.safeParse(value);
  return result.success ? result.data : undefined;
}
