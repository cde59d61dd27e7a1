/**
 * Configuration validation helpers.
 */

const EMAIL_ADDRESS_REGEX = /^[^\s@<>()[\]",;:]+@[^\s@<>()[\]",;:]+\.[^\s@<>()[\]",;:]+$/;

/**
 * Checks a bare mailbox address (`local@domain.tld`), without display name.
 */
export function isValidEmailAddress(address: string): boolean {
  if (address.length > 254) {
    return false;
  }
  return EMAIL_ADDRESS_REGEX.test(address);
}

/**
 * Accepts absolute http and https URLs only.
 */
export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Valid TCP port number (1-65535).
 */
export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}
