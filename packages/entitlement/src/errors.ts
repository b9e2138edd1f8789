import { ERROR_CODES, ExposureSdkError } from '@exposure/kernel';

/**
 * Raised only when the entitlement JSON is not an object at all. Missing or
 * mistyped fields never raise.
 */
export class EntitlementDecodeError extends ExposureSdkError {
  readonly receivedType: string;

  constructor(receivedType: string) {
    super(
      ERROR_CODES.E_ENTITLEMENT_NOT_OBJECT,
      `Entitlement must be a JSON object, received ${receivedType}`
    );
    this.name = 'EntitlementDecodeError';
    this.receivedType = receivedType;
  }
}
