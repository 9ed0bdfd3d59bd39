/**
 * Redaction configuration for pino.
 *
 * Evaluation inputs can carry patient or applicant data, so their values are
 * censored; log the input names instead.
 */
export const REDACTION_CONFIG = {
  paths: [
    'inputs.*',
    '*.inputs.*',
    'rawInputs.*',

    'token',
    'secret',
    'password',
    'apiKey',
    'authorization',
    '*.token',
    '*.secret',
    '*.password',
    '*.apiKey',
  ],
  censor: '[REDACTED]',
};
