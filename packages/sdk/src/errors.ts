/**
 * Exposure REST errors
 */

import { z } from 'zod';
import { ExposureSdkError, type ErrorCode } from '@exposure/kernel';

/**
 * Error body returned by Exposure on non-2xx responses
 */
export const ExposureResponseMessageSchema = z.object({
  httpCode: z.number().int(),
  message: z.string(),
});

export type ExposureResponseMessage = z.infer<typeof ExposureResponseMessageSchema>;

export interface ExposureErrorDetails {
  /** HTTP status of the response, when one was received */
  status?: number;
  /** Structured error returned by Exposure */
  response?: ExposureResponseMessage;
  cause?: unknown;
}

export class ExposureError extends ExposureSdkError {
  readonly status: number | undefined;
  readonly response: ExposureResponseMessage | undefined;

  constructor(code: ErrorCode, message: string, details: ExposureErrorDetails = {}) {
    super(code, message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'ExposureError';
    this.status = details.status;
    this.response = details.response;
  }
}
