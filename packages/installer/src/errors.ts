export const ERROR_CODES = {
  E_NOT_ROOT: { code: 'E_NOT_ROOT', message: 'Run the installer as root.' },
  E_CONFIG_INVALID: { code: 'E_CONFIG_INVALID', message: 'Invalid configuration.' },
  E_HOSTNAME_UNAVAILABLE: {
    code: 'E_HOSTNAME_UNAVAILABLE',
    message: 'Could not determine the hostname of this machine.',
  },
  E_CONF_NOT_FOUND: { code: 'E_CONF_NOT_FOUND', message: 'Configuration file not found.' },
  E_CONF_INVALID_ENTRY: { code: 'E_CONF_INVALID_ENTRY', message: 'Invalid key=value entry.' },
  E_COMMAND_FAILED: { code: 'E_COMMAND_FAILED', message: 'External command failed.' },
  E_DOWNLOAD_FAILED: { code: 'E_DOWNLOAD_FAILED', message: 'Download failed.' },
  E_SERVICE_FAILED: { code: 'E_SERVICE_FAILED', message: 'Service operation failed.' },
} as const;

export type ErrorCode = keyof typeof ERROR_CODES;

export class ProvisionError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? ERROR_CODES[code].message, options);
    this.name = 'ProvisionError';
    this.code = code;
  }
}

export function isProvisionError(err: unknown, code?: ErrorCode): err is ProvisionError {
  return err instanceof ProvisionError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
