import { describe, it, expect } from 'vitest';
import { parseConnectionString } from '../src/parse/connection-string.js';

describe('parseConnectionString', () => {
  it('extracts name and key from a full connection string', () => {
    const result = parseConnectionString(
      'DefaultEndpointsProtocol=https;AccountName=acme;AccountKey=abc123;EndpointSuffix=core.windows.net',
    );

    expect(result).toEqual({ accountName: 'acme', accountKey: 'abc123' });
  });

  it('reads a value that runs to the end of the string', () => {
    const result = parseConnectionString('AccountName=acme;AccountKey=abc123');

    expect(result).toEqual({ accountName: 'acme', accountKey: 'abc123' });
  });

  it('does not depend on field order', () => {
    const result = parseConnectionString('AccountKey=abc123;AccountName=acme;');

    expect(result).toEqual({ accountName: 'acme', accountKey: 'abc123' });
  });

  it('keeps base64 padding in the key', () => {
    const result = parseConnectionString('AccountName=acme;AccountKey=dGVzdC1zZWNyZXQ=;');

    expect(result.accountKey).toBe('dGVzdC1zZWNyZXQ=');
  });

  it('returns nothing when AccountName is absent, even if AccountKey is present', () => {
    const result = parseConnectionString('DefaultEndpointsProtocol=https;AccountKey=abc123;');

    expect(result).toEqual({});
  });

  it('returns only the name when AccountKey is absent', () => {
    const result = parseConnectionString('AccountName=acme;EndpointSuffix=core.windows.net');

    expect(result).toEqual({ accountName: 'acme' });
  });

  it('takes the first occurrence of a repeated field', () => {
    const result = parseConnectionString('AccountName=first;AccountName=second;AccountKey=k1;AccountKey=k2');

    expect(result).toEqual({ accountName: 'first', accountKey: 'k1' });
  });

  it('treats an empty AccountName as absent', () => {
    const result = parseConnectionString('AccountName=;AccountKey=abc123');

    expect(result).toEqual({});
  });

  it('returns nothing for an empty string', () => {
    expect(parseConnectionString('')).toEqual({});
  });
});
