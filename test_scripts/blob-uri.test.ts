import { describe, it, expect } from 'vitest';
import { parseBlobUri, parseFileName } from '../src/parse/blob-uri.js';

describe('parseBlobUri', () => {
  it('splits a tokenized blob URI into its parts', () => {
    const result = parseBlobUri('https://acme.blob.core.windows.net/logs/2024/run.csv?sv=2020-01-01');

    expect(result).toEqual({
      account: 'acme',
      container: 'logs',
      blobPath: '2024/run.csv',
      fileName: 'run.csv',
      fileExtension: 'csv',
      sasToken: '?sv=2020-01-01',
    });
  });

  it('leaves sasToken unset when there is no query string', () => {
    const result = parseBlobUri('https://acme.blob.core.windows.net/logs/run.csv');

    expect(result.sasToken).toBeUndefined();
    expect(result.blobPath).toBe('run.csv');
    expect(result.fileName).toBe('run.csv');
  });

  it('keeps everything from the first ? as the token', () => {
    const result = parseBlobUri('https://acme.blob.core.windows.net/logs/a.txt?sv=1&sig=x?y');

    expect(result.sasToken).toBe('?sv=1&sig=x?y');
    expect(result.blobPath).toBe('a.txt');
  });

  it('uses the last path segment as the file name', () => {
    const result = parseBlobUri('https://acme.blob.core.windows.net/exports/2024/01/05/daily.report.parquet');

    expect(result.blobPath).toBe('2024/01/05/daily.report.parquet');
    expect(result.fileName).toBe('daily.report.parquet');
    expect(result.fileExtension).toBe('parquet');
  });

  it('leaves fileExtension unset for a name without a dot', () => {
    const result = parseBlobUri('https://acme.blob.core.windows.net/logs/2024/README');

    expect(result.fileName).toBe('README');
    expect(result.fileExtension).toBeUndefined();
  });

  it('returns an empty result without a scheme separator', () => {
    expect(parseBlobUri('acme.blob.core.windows.net/logs/run.csv')).toEqual({});
  });

  it('returns an empty result when the path has no second slash', () => {
    expect(parseBlobUri('https://justahost/nopath')).toEqual({});
  });

  it('returns an empty result when the URI has no path at all', () => {
    expect(parseBlobUri('https://acme.blob.core.windows.net')).toEqual({});
  });

  it('returns an empty result when the authority has no dot', () => {
    expect(parseBlobUri('http://localhost/devstore/logs/run.csv')).toEqual({});
  });

  it('returns an empty result for a container without a blob path', () => {
    expect(parseBlobUri('https://acme.blob.core.windows.net/logs')).toEqual({});
  });

  it('returns an empty result for an empty string', () => {
    expect(parseBlobUri('')).toEqual({});
  });
});

describe('parseFileName', () => {
  it('splits directory, name and extension', () => {
    expect(parseFileName('logs/2024/run.csv')).toEqual({
      directory: 'logs/2024',
      fileName: 'run.csv',
      fileExtension: 'csv',
    });
  });

  it('handles a bare file name', () => {
    expect(parseFileName('notes')).toEqual({
      directory: '',
      fileName: 'notes',
      fileExtension: undefined,
    });
  });

  it('returns an empty result for a path ending in a slash', () => {
    expect(parseFileName('logs/2024/')).toEqual({});
  });
});
