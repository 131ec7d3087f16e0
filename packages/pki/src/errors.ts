export class ConfigurationError extends Error {
  public readonly code = 'configuration_invalid';

  public constructor(message: string, options?: {cause?: unknown}) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export class CertificateNotCachedError extends Error {
  public readonly code = 'certificate_not_cached';
  public readonly certLabel: string;

  public constructor(certLabel: string) {
    super(`Certificate ${certLabel} is not cached`);
    this.name = 'CertificateNotCachedError';
    this.certLabel = certLabel;
  }
}

export const isConfigurationError = (error: unknown): error is ConfigurationError =>
  error instanceof ConfigurationError;

export const isCertificateNotCachedError = (error: unknown): error is CertificateNotCachedError =>
  error instanceof CertificateNotCachedError;
