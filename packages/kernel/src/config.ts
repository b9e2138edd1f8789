/**
 * Environment-driven SDK configuration
 */

import { z } from 'zod';
import { FAIRPLAY } from './constants.js';
import { ERROR_CODES, ExposureSdkError } from './errors.js';

function str(v: string | undefined, d?: string): string | undefined {
  const trimmed = v?.trim();
  return trimmed ? trimmed : d;
}

function num(v: string | undefined): number | undefined {
  const n = v ? Number(v) : NaN;
  return Number.isFinite(n) ? n : undefined;
}

const ConfigSchema = z.object({
  exposure: z.object({
    baseUrl: z.string().url().optional(),
    customer: z.string().min(1).optional(),
    businessUnit: z.string().min(1).optional(),
  }),
  fairplay: z.object({
    customScheme: z.string().regex(/^[a-z][a-z0-9+.-]*$/i),
    playTokenHeader: z.string().min(1),
  }),
  http: z.object({
    timeoutMs: z.number().int().positive().optional(),
  }),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
});

export type SdkConfig = Readonly<z.infer<typeof ConfigSchema>>;

/**
 * Read SDK configuration from environment variables.
 *
 * @throws ExposureSdkError (E_INVALID_CONFIG) when a variable is set to an unusable value
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): SdkConfig {
  const raw = {
    exposure: {
      baseUrl: str(env['EXPOSURE_BASE_URL']),
      customer: str(env['EXPOSURE_CUSTOMER']),
      businessUnit: str(env['EXPOSURE_BUSINESS_UNIT']),
    },
    fairplay: {
      customScheme: str(env['EXPOSURE_FAIRPLAY_SCHEME'], FAIRPLAY.customScheme),
      playTokenHeader: str(env['EXPOSURE_PLAY_TOKEN_HEADER'], FAIRPLAY.playTokenHeader),
    },
    http: {
      timeoutMs: num(env['EXPOSURE_HTTP_TIMEOUT_MS']),
    },
    logLevel: str(env['EXPOSURE_LOG_LEVEL'], 'info'),
  };

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ExposureSdkError(
      ERROR_CODES.E_INVALID_CONFIG,
      `Invalid configuration at ${issue.path.join('.')}: ${issue.message}`
    );
  }
  return Object.freeze(parsed.data);
}
