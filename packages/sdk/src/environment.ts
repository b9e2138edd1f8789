import { ERROR_CODES, EXPOSURE, ExposureSdkError, type SdkConfig } from '@exposure/kernel';

/**
 * Exposure deployment a session talks to.
 */
export class Environment {
  readonly baseUrl: string;

  constructor(
    baseUrl: string,
    readonly customer: string,
    readonly businessUnit: string
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  /** Root of every customer/business unit scoped endpoint */
  get apiUrl(): string {
    return `${this.baseUrl}/${EXPOSURE.apiVersion}/customer/${this.customer}/businessunit/${this.businessUnit}`;
  }

  /**
   * @throws ExposureSdkError (E_INVALID_CONFIG) when base URL, customer or business unit is not configured
   */
  static fromConfig(config: SdkConfig): Environment {
    const { baseUrl, customer, businessUnit } = config.exposure;
    if (baseUrl === undefined || customer === undefined || businessUnit === undefined) {
      throw new ExposureSdkError(
        ERROR_CODES.E_INVALID_CONFIG,
        'EXPOSURE_BASE_URL, EXPOSURE_CUSTOMER and EXPOSURE_BUSINESS_UNIT are required'
      );
    }
    return new Environment(baseUrl, customer, businessUnit);
  }
}
