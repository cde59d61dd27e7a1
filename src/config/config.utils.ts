import { Logger } from '@nestjs/common';
import type { LogLevel } from '@nestjs/common';
import { ALLOWED_LOG_LEVELS } from './config.constants';
import type { LogLevelName } from './config.constants';
import type { ExporterConfiguration, MailAccountConfig } from './config.types';

const LOG_LEVEL_ORDER: Record<LogLevelName, LogLevel[]> = {
  error: ['fatal', 'error'],
  warn: ['fatal', 'error', 'warn'],
  info: ['fatal', 'error', 'warn', 'log'],
  debug: ['fatal', 'error', 'warn', 'log', 'debug'],
  verbose: ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'],
};

/**
 * Maps a `LOG_LEVEL` name to the set of Nest logger levels to enable.
 *
 * Unknown names fall back to `info`.
 */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const normalized = (level ?? 'info').trim().toLowerCase();
  const name = normalized === 'warning' ? 'warn' : normalized;
  const match = ALLOWED_LOG_LEVELS.find((allowed) => allowed === name);
  return LOG_LEVEL_ORDER[match ?? 'info'];
}

function describeAccount(account: MailAccountConfig): string {
  const smtpMode = account.smtp.useTls ? (account.smtp.port === 465 ? 'implicit TLS' : 'STARTTLS') : 'plain';
  const imapMode = account.imap.useSsl ? 'SSL' : 'plain';
  return (
    `${account.address} via SMTP ${account.smtp.host}:${account.smtp.port} (${smtpMode}), ` +
    `IMAP ${account.imap.host}:${account.imap.port} (${imapMode})`
  );
}

/* c8 ignore start */
/**
 * Log Configuration Summary
 *
 * Logs the loaded configuration at startup. Passwords are never included.
 *
 * @param config - The complete configuration object
 */
export function logConfigurationSummary(config: ExporterConfiguration): void {
  const summaryLogger = new Logger('Configuration');

  summaryLogger.log(`Environment: ${config.environment}`);
  summaryLogger.log(`HTTP Server: port ${config.http.port}`);
  summaryLogger.log(`Internal account: ${describeAccount(config.accounts.internal)}`);
  summaryLogger.log(`External account: ${describeAccount(config.accounts.external)}`);
  summaryLogger.log(
    `Round trip: every ${config.roundTrip.checkIntervalSeconds}s, ` +
      `timeout ${config.roundTrip.timeoutSeconds}s, poll every ${config.roundTrip.pollIntervalSeconds}s`,
  );
  summaryLogger.log(
    `Spam score: ${config.spamScore.testAddress} -> ${config.spamScore.resultUrl}, ` +
      `tick every ${config.spamScore.checkIntervalSeconds}s, at most every ${config.spamScore.minIntervalSeconds}s`,
  );
  summaryLogger.log(`Status template: ${config.status.templatePath}`);
}
/* c8 ignore stop */
