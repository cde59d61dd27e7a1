import type { LogLevelName } from './config.constants';

/**
 * Connection settings for one mail account (SMTP for sending, IMAP for reading).
 */
export interface MailAccountConfig {
  address: string;
  password: string;
  smtp: {
    host: string;
    port: number;
    useTls: boolean;
  };
  imap: {
    host: string;
    port: number;
    useSsl: boolean;
  };
}

/**
 * Configuration type definition for type-safe access
 */
export interface ExporterConfiguration {
  environment: string;
  logLevel: LogLevelName;
  http: {
    port: number;
  };
  accounts: {
    internal: MailAccountConfig;
    external: MailAccountConfig;
  };
  roundTrip: {
    checkIntervalSeconds: number;
    timeoutSeconds: number;
    pollIntervalSeconds: number;
  };
  spamScore: {
    testAddress: string;
    resultUrl: string;
    checkIntervalSeconds: number;
    minIntervalSeconds: number;
    fetchTimeoutSeconds: number;
  };
  status: {
    templatePath: string;
    template: string;
  };
}
