import type { AccountCredentials } from '../azure/types.js';

const ACCOUNT_NAME = 'AccountName=';
const ACCOUNT_KEY = 'AccountKey=';

/**
 * Read the value following `field` up to the next ';' or the end of the string.
 * First occurrence wins.
 */
function readField(connectionString: string, field: string): string | undefined {
  const start = connectionString.indexOf(field);
  if (start === -1) {
    return undefined;
  }

  const valueStart = start + field.length;
  const end = connectionString.indexOf(';', valueStart);
  return end === -1
    ? connectionString.slice(valueStart)
    : connectionString.slice(valueStart, end);
}

/**
 * Extract the account name and key from a storage connection string.
 *
 * @param connectionString - Semicolon separated Key=Value pairs, e.g.
 *   "DefaultEndpointsProtocol=https;AccountName=acme;AccountKey=abc123;EndpointSuffix=core.windows.net"
 * @returns The credentials found. Empty when AccountName= is absent.
 *
 * Contract:
 *   - AccountKey= is only looked up once AccountName= was found; a key on its own yields {}
 *   - The last field may omit its trailing ';'
 *   - All other fields are ignored
 *   - Never throws
 */
export function parseConnectionString(connectionString: string): AccountCredentials {
  const accountName = readField(connectionString, ACCOUNT_NAME);
  if (!accountName) {
    return {};
  }

  const accountKey = readField(connectionString, ACCOUNT_KEY);
  return accountKey ? { accountName, accountKey } : { accountName };
}
