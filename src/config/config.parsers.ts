import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { BOOLEAN_FALSE_VALUES, BOOLEAN_TRUE_VALUES } from './config.constants';

export function parseOptionalBoolean(value: string | undefined, defaultValue = false): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (BOOLEAN_TRUE_VALUES.includes(normalized)) {
    return true;
  }

  if (BOOLEAN_FALSE_VALUES.includes(normalized)) {
    return false;
  }

  return defaultValue;
}

export function parseNumberWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric value: "${value}" (must be a non-negative finite number)`);
  }

  // Ports, intervals and timeouts are whole numbers
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric value: "${value}" (must be an integer)`);
  }

  return parsed;
}

/**
 * Same as {@link parseNumberWithDefault} but rejects zero, for intervals and timeouts
 * where zero would spin or never wait.
 */
export function parsePositiveNumberWithDefault(value: string | undefined, defaultValue: number): number {
  const parsed = parseNumberWithDefault(value, defaultValue);
  if (parsed === 0) {
    throw new Error(`Invalid numeric value: "${value}" (must be greater than zero)`);
  }
  return parsed;
}

/**
 * Parses a string environment variable with a default value.
 *
 * @param value - The string value to parse
 * @param defaultValue - The default value to return if not provided
 * @returns The value or default
 */
export function parseStringWithDefault(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value;
}

/**
 * Returns the trimmed value of a required environment variable, or undefined when unset or blank.
 */
export function parseRequiredString(value: string | undefined): string | undefined {
  if (value === undefined || !value.trim()) {
    return undefined;
  }
  return value.trim();
}

/**
 * Reads a secret from the secrets directory, falling back to the environment.
 *
 * The secret file `${secretsPath}/${name}` wins when it exists (container secrets);
 * otherwise the upper-cased variable of the same name is used (local development).
 *
 * @param name - Secret name, e.g. `internal_email_password`
 * @param secretsPath - Directory holding mounted secrets
 * @param env - Environment to fall back to
 * @returns The trimmed secret, or undefined if neither source provides one
 * @example
 * ```
 * // /run/secrets/internal_email_password missing, INTERNAL_EMAIL_PASSWORD=hunter2
 * readSecret('internal_email_password', '/run/secrets') // 'hunter2'
 * ```
 */
export function readSecret(name: string, secretsPath: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const secretFile = join(secretsPath, name);
  if (existsSync(secretFile)) {
    const content = readFileSync(secretFile, 'utf-8').trim();
    if (content) {
      return content;
    }
  }

  return parseRequiredString(env[name.toUpperCase()]);
}

/**
 * Reads a UTF-8 text file relative to the working directory.
 *
 * @throws {Error} If the file does not exist
 */
export function readTextFile(path: string): string {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    throw new Error(`File not found: ${fullPath}`);
  }
  return readFileSync(fullPath, 'utf-8');
}
