import { describe, it, expect } from 'vitest';
import { issueBlobToken, issueContainerToken } from '../src/azure/sas.js';
import { ConfigurationError, CredentialError } from '../src/errors/index.js';

const CREDENTIALS = { accountName: 'acme', accountKey: 'dGVzdC1zZWNyZXQ=' };
const NOW = new Date('2026-01-01T00:00:00.000Z');

function queryOf(token: string): URLSearchParams {
  return new URLSearchParams(token.slice(1));
}

describe('issueBlobToken', () => {
  it('returns a query string starting with ?', () => {
    const token = issueBlobToken(CREDENTIALS, 'logs', '2024/run.csv', 7, NOW);

    expect(token.startsWith('?')).toBe(true);
  });

  it('grants read-only access to a single blob', () => {
    const params = queryOf(issueBlobToken(CREDENTIALS, 'logs', '2024/run.csv', 7, NOW));

    expect(params.get('sp')).toBe('r');
    expect(params.get('sr')).toBe('b');
    expect(params.get('sig')).toBeTruthy();
  });

  it('is valid from issuance for seven days by default', () => {
    const params = queryOf(issueBlobToken(CREDENTIALS, 'logs', 'run.csv', undefined, NOW));

    expect(new Date(params.get('st') ?? '').toISOString()).toBe('2026-01-01T00:00:00.000Z');
    expect(new Date(params.get('se') ?? '').toISOString()).toBe('2026-01-08T00:00:00.000Z');
  });

  it('honours a caller-supplied validity period', () => {
    const params = queryOf(issueBlobToken(CREDENTIALS, 'logs', 'run.csv', 2, NOW));

    expect(new Date(params.get('se') ?? '').toISOString()).toBe('2026-01-03T00:00:00.000Z');
  });

  it('throws CredentialError when the account name is missing', () => {
    let caught: unknown;
    try {
      issueBlobToken({}, 'logs', 'run.csv', 7, NOW);
    } catch (error: unknown) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CredentialError);
    expect((caught as CredentialError).missing).toBe('accountName');
  });

  it('throws CredentialError when the account key is missing', () => {
    let caught: unknown;
    try {
      issueBlobToken({ accountName: 'acme' }, 'logs', 'run.csv', 7, NOW);
    } catch (error: unknown) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CredentialError);
    expect((caught as CredentialError).missing).toBe('accountKey');
  });

  it('throws ConfigurationError for a non-positive validity period', () => {
    expect(() => issueBlobToken(CREDENTIALS, 'logs', 'run.csv', 0, NOW)).toThrow(ConfigurationError);
    expect(() => issueBlobToken(CREDENTIALS, 'logs', 'run.csv', Number.NaN, NOW)).toThrow(
      ConfigurationError,
    );
  });
});

describe('issueContainerToken', () => {
  it('grants read, add, create, write and delete on the container', () => {
    const token = issueContainerToken(CREDENTIALS, 'logs', 7, NOW);
    const params = queryOf(token);

    expect(token.startsWith('?')).toBe(true);
    expect(params.get('sp')).toBe('racwd');
    expect(params.get('sr')).toBe('c');
    expect(new Date(params.get('se') ?? '').toISOString()).toBe('2026-01-08T00:00:00.000Z');
  });

  it('throws CredentialError without an account key', () => {
    expect(() => issueContainerToken({ accountName: 'acme' }, 'logs', 7, NOW)).toThrow(CredentialError);
  });
});
