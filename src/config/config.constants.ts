export const BOOLEAN_TRUE_VALUES = ['true', '1', 'yes', 'on'];
export const BOOLEAN_FALSE_VALUES = ['false', '0', 'no', 'off'];

// Configuration defaults
export const DEFAULT_HTTP_PORT = 9091;
export const DEFAULT_SMTP_PORT = 465;
export const DEFAULT_IMAP_PORT = 993;
export const DEFAULT_CHECK_INTERVAL_SECONDS = 300; // 5 minutes
export const DEFAULT_TIMEOUT_SECONDS = 60;
export const DEFAULT_POLL_INTERVAL_SECONDS = 10;
export const DEFAULT_SPAM_SCORE_MIN_INTERVAL_SECONDS = 8 * 60 * 60; // 8 hours
export const DEFAULT_SPAM_SCORE_FETCH_TIMEOUT_SECONDS = 30;
export const DEFAULT_SECRETS_PATH = '/run/secrets';
export const DEFAULT_STATUS_HTML_FILE = 'status.html';
export const DEFAULT_LOG_LEVEL = 'info';
export const DEFAULT_ENVIRONMENT = 'production';

export const INTERNAL_PASSWORD_SECRET = 'internal_email_password';
export const EXTERNAL_PASSWORD_SECRET = 'external_email_password';

export const REQUIRED_ENV_VARS = [
  'INTERNAL_SMTP_SERVER',
  'INTERNAL_IMAP_SERVER',
  'INTERNAL_EMAIL_ADDRESS',
  'EXTERNAL_SMTP_SERVER',
  'EXTERNAL_IMAP_SERVER',
  'EXTERNAL_EMAIL_ADDRESS',
  'SPAM_SCORE_TEST_EMAIL_ADDRESS',
  'SPAM_SCORE_TEST_URL',
] as const;

export const ALLOWED_LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'verbose'] as const;
export type LogLevelName = (typeof ALLOWED_LOG_LEVELS)[number];
