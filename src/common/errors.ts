// errors.ts - Error types raised by tenant clients

const MAX_ERROR_LENGTH = 200;

// Service error codes returned when the tenant lacks the licence a query needs
const LICENSE_ERROR_CODES = new Set([
  'AadPremiumLicenseRequired',
  'AadP2LicenseRequired',
  'LicenseRequired',
  'FeatureNotLicensed',
]);

export class ApiRequestError extends Error {
  readonly status: number | null;
  readonly code: string | null;
  readonly path: string;

  constructor(message: string, path: string, status: number | null, code: string | null) {
    super(message);
    this.name = 'ApiRequestError';
    this.path = path;
    this.status = status;
    this.code = code;
  }

  get isLicenseRequired(): boolean {
    if (this.status !== 403) return false;
    if (this.code && LICENSE_ERROR_CODES.has(this.code)) return true;
    return /\blicen[cs](e|ed)\b/i.test(this.message);
  }
}

/**
 * The tenant cannot answer a query because a licence or feature tier is missing.
 * Checks surface this as a Manual verdict.
 */
export class CapabilityUnavailableError extends Error {
  readonly capability: string;

  constructor(capability: string, message: string) {
    super(message);
    this.name = 'CapabilityUnavailableError';
    this.capability = capability;
  }
}

export function errorMessage(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  return message.substring(0, MAX_ERROR_LENGTH) || 'Unknown error';
}
