import { registerAs } from '@nestjs/config';
import * as process from 'process';
import {
  ALLOWED_LOG_LEVELS,
  DEFAULT_CHECK_INTERVAL_SECONDS,
  DEFAULT_ENVIRONMENT,
  DEFAULT_HTTP_PORT,
  DEFAULT_IMAP_PORT,
  DEFAULT_LOG_LEVEL,
  DEFAULT_POLL_INTERVAL_SECONDS,
  DEFAULT_SECRETS_PATH,
  DEFAULT_SMTP_PORT,
  DEFAULT_SPAM_SCORE_FETCH_TIMEOUT_SECONDS,
  DEFAULT_SPAM_SCORE_MIN_INTERVAL_SECONDS,
  DEFAULT_STATUS_HTML_FILE,
  DEFAULT_TIMEOUT_SECONDS,
  EXTERNAL_PASSWORD_SECRET,
  INTERNAL_PASSWORD_SECRET,
  REQUIRED_ENV_VARS,
} from './config/config.constants';
import type { LogLevelName } from './config/config.constants';
import {
  parseNumberWithDefault,
  parseOptionalBoolean,
  parsePositiveNumberWithDefault,
  parseRequiredString,
  parseStringWithDefault,
  readSecret,
  readTextFile,
} from './config/config.parsers';
import { isHttpUrl, isValidEmailAddress, isValidPort } from './config/config.validators';
import type { ExporterConfiguration, MailAccountConfig } from './config/config.types';
import { ConfigurationError } from './shared/errors';
import { getErrorMessage } from './shared/error.utils';

export const CONFIG_NAMESPACE = 'exporter';

/**
 * Accumulates configuration problems so that startup reports all of them at once.
 */
class ProblemCollector {
  readonly problems: string[] = [];

  add(problem: string): void {
    this.problems.push(problem);
  }

  /**
   * Runs a parser; a thrown error is recorded against `name` and `fallback` is returned.
   */
  parse<T>(name: string, parser: () => T, fallback: T): T {
    try {
      return parser();
    } catch (error) {
      this.add(`${name}: ${getErrorMessage(error)}`);
      return fallback;
    }
  }

  port(name: string, defaultValue: number): number {
    const port = this.parse(name, () => parseNumberWithDefault(process.env[name], defaultValue), defaultValue);
    if (!isValidPort(port)) {
      this.add(`${name}: port must be between 1 and 65535 (got ${port})`);
    }
    return port;
  }

  positive(name: string, defaultValue: number): number {
    return this.parse(name, () => parsePositiveNumberWithDefault(process.env[name], defaultValue), defaultValue);
  }
}

/**
 * Builds one mail account from `<PREFIX>_SMTP_*`, `<PREFIX>_IMAP_*`, `<PREFIX>_EMAIL_ADDRESS`
 * and the password secret.
 */
function buildMailAccount(
  prefix: 'INTERNAL' | 'EXTERNAL',
  secretName: string,
  secretsPath: string,
  collector: ProblemCollector,
): MailAccountConfig {
  const address = parseRequiredString(process.env[`${prefix}_EMAIL_ADDRESS`]) ?? '';
  if (address && !isValidEmailAddress(address)) {
    collector.add(`${prefix}_EMAIL_ADDRESS: "${address}" is not a valid email address`);
  }

  const password = collector.parse(secretName, () => readSecret(secretName, secretsPath), undefined);
  if (!password) {
    collector.add(`Missing required secret: ${secretName}`);
  }

  return {
    address,
    password: password ?? '',
    smtp: {
      host: parseRequiredString(process.env[`${prefix}_SMTP_SERVER`]) ?? '',
      port: collector.port(`${prefix}_SMTP_PORT`, DEFAULT_SMTP_PORT),
      useTls: parseOptionalBoolean(process.env[`${prefix}_SMTP_USE_TLS`], true),
    },
    imap: {
      host: parseRequiredString(process.env[`${prefix}_IMAP_SERVER`]) ?? '',
      port: collector.port(`${prefix}_IMAP_PORT`, DEFAULT_IMAP_PORT),
      useSsl: parseOptionalBoolean(process.env[`${prefix}_IMAP_USE_SSL`], true),
    },
  };
}

function parseLogLevel(value: string | undefined, collector: ProblemCollector): LogLevelName {
  const normalized = parseStringWithDefault(value, DEFAULT_LOG_LEVEL).trim().toLowerCase();
  const level = normalized === 'warning' ? 'warn' : normalized;
  const match = ALLOWED_LOG_LEVELS.find((allowed) => allowed === level);
  if (!match) {
    collector.add(`LOG_LEVEL: "${value}" is not one of ${ALLOWED_LOG_LEVELS.join(', ')}`);
    return DEFAULT_LOG_LEVEL;
  }
  return match;
}

/**
 * Builds the exporter configuration from environment variables and secrets.
 *
 * Required environment variables:
 * - INTERNAL_SMTP_SERVER, INTERNAL_IMAP_SERVER, INTERNAL_EMAIL_ADDRESS
 * - EXTERNAL_SMTP_SERVER, EXTERNAL_IMAP_SERVER, EXTERNAL_EMAIL_ADDRESS
 * - SPAM_SCORE_TEST_EMAIL_ADDRESS, SPAM_SCORE_TEST_URL
 *
 * Required secrets (file under SECRETS_PATH, or the upper-cased environment variable):
 * - internal_email_password, external_email_password
 *
 * Optional environment variables:
 * - INTERNAL_/EXTERNAL_SMTP_PORT (465), _SMTP_USE_TLS (true), _IMAP_PORT (993), _IMAP_USE_SSL (true)
 * - CHECK_INTERVAL_SECONDS (300), TIMEOUT_SECONDS (60), POLL_INTERVAL_SECONDS (10)
 * - SPAM_SCORE_CHECK_INTERVAL_SECONDS (CHECK_INTERVAL_SECONDS), SPAM_SCORE_MIN_INTERVAL_SECONDS (28800)
 * - SPAM_SCORE_FETCH_TIMEOUT_SECONDS (30)
 * - HTTP_PORT (9091), STATUS_HTML_FILE (status.html), LOG_LEVEL (info), SECRETS_PATH (/run/secrets)
 *
 * @throws {ConfigurationError} Listing every missing or invalid setting
 */
export function buildConfiguration(): ExporterConfiguration {
  const collector = new ProblemCollector();

  const missing = REQUIRED_ENV_VARS.filter((name) => !parseRequiredString(process.env[name]));
  if (missing.length > 0) {
    collector.add(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const secretsPath = parseStringWithDefault(process.env.SECRETS_PATH, DEFAULT_SECRETS_PATH);
  const internal = buildMailAccount('INTERNAL', INTERNAL_PASSWORD_SECRET, secretsPath, collector);
  const external = buildMailAccount('EXTERNAL', EXTERNAL_PASSWORD_SECRET, secretsPath, collector);

  const checkIntervalSeconds = collector.positive('CHECK_INTERVAL_SECONDS', DEFAULT_CHECK_INTERVAL_SECONDS);
  const timeoutSeconds = collector.positive('TIMEOUT_SECONDS', DEFAULT_TIMEOUT_SECONDS);
  const pollIntervalSeconds = collector.positive('POLL_INTERVAL_SECONDS', DEFAULT_POLL_INTERVAL_SECONDS);

  const testAddress = parseRequiredString(process.env.SPAM_SCORE_TEST_EMAIL_ADDRESS) ?? '';
  if (testAddress && !isValidEmailAddress(testAddress)) {
    collector.add(`SPAM_SCORE_TEST_EMAIL_ADDRESS: "${testAddress}" is not a valid email address`);
  }
  const resultUrl = parseRequiredString(process.env.SPAM_SCORE_TEST_URL) ?? '';
  if (resultUrl && !isHttpUrl(resultUrl)) {
    collector.add(`SPAM_SCORE_TEST_URL: "${resultUrl}" is not an http(s) URL`);
  }

  const templatePath = parseStringWithDefault(process.env.STATUS_HTML_FILE, DEFAULT_STATUS_HTML_FILE);
  const template = collector.parse('STATUS_HTML_FILE', () => readTextFile(templatePath), '');

  const config: ExporterConfiguration = {
    environment: parseStringWithDefault(process.env.NODE_ENV, DEFAULT_ENVIRONMENT),
    logLevel: parseLogLevel(process.env.LOG_LEVEL, collector),
    http: {
      port: collector.port('HTTP_PORT', DEFAULT_HTTP_PORT),
    },
    accounts: { internal, external },
    roundTrip: {
      checkIntervalSeconds,
      timeoutSeconds,
      pollIntervalSeconds,
    },
    spamScore: {
      testAddress,
      resultUrl,
      checkIntervalSeconds: collector.positive('SPAM_SCORE_CHECK_INTERVAL_SECONDS', checkIntervalSeconds),
      minIntervalSeconds: collector.parse(
        'SPAM_SCORE_MIN_INTERVAL_SECONDS',
        () => parseNumberWithDefault(process.env.SPAM_SCORE_MIN_INTERVAL_SECONDS, DEFAULT_SPAM_SCORE_MIN_INTERVAL_SECONDS),
        DEFAULT_SPAM_SCORE_MIN_INTERVAL_SECONDS,
      ),
      fetchTimeoutSeconds: collector.positive(
        'SPAM_SCORE_FETCH_TIMEOUT_SECONDS',
        DEFAULT_SPAM_SCORE_FETCH_TIMEOUT_SECONDS,
      ),
    },
    status: {
      templatePath,
      template,
    },
  };

  if (collector.problems.length > 0) {
    throw new ConfigurationError(collector.problems);
  }

  return config;
}

export default registerAs(CONFIG_NAMESPACE, buildConfiguration);
