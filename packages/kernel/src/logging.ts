import { pino, type DestinationStream, type Logger } from 'pino';

export type { Logger } from 'pino';

/**
 * Credential-bearing fields that must never reach log output.
 */
export const REDACT_PATHS = [
  // Top-level keys we occasionally log
  'playToken',
  'sessionToken',
  'authorization',
  'userToken',

  // Request headers in common shapes
  'headers.authorization',
  'headers.AzukiApp',
  'req.headers.authorization',

  // Nested secrets anywhere one level down
  '*.playToken',
  '*.sessionToken',
  '*.userToken',
];

export interface LoggerOptions {
  name?: string;
  level?: string;
}

export function createLogger(options: LoggerOptions = {}, destination?: DestinationStream): Logger {
  const config = {
    name: options.name ?? 'exposure-sdk',
    level: options.level ?? 'info',
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };
  return destination ? pino(config, destination) : pino(config);
}

export const logger = createLogger({ level: process.env['EXPOSURE_LOG_LEVEL'] || 'info' });

/**
 * Child logger bound to a module name. Falls back to the SDK root logger when
 * the caller did not inject one.
 */
export function moduleLogger(module: string, parent?: Logger): Logger {
  return (parent ?? logger).child({ module });
}
