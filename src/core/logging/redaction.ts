/**
 * Redaction configuration for pino.
 *
 * Recovery contexts and config objects are logged as-is, so secret-looking
 * keys are censored at any of these paths.
 */
export const REDACTION_CONFIG = {
  paths: [
    'token',
    'secret',
    'password',
    'apiKey',
    'authorization',

    '*.token',
    '*.secret',
    '*.password',
    '*.apiKey',

    'config.*.token',
    'context.*.token',

    'err.config.*.token',
  ],
  censor: '[REDACTED]',
};
