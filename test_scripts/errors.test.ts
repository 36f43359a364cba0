import { describe, it, expect } from 'vitest';
import {
  BlobCourierError,
  ConfigurationError,
  CredentialError,
  TransientStorageError,
} from '../src/errors/index.js';

describe('BlobCourierError (base)', () => {
  it('is an instance of Error', () => {
    const err = new BlobCourierError('test message');
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(BlobCourierError);
  });

  it('has the correct default code', () => {
    const err = new BlobCourierError('test');
    expect(err.code).toBe('BLOB_COURIER_ERROR');
  });

  it('allows a custom code', () => {
    const err = new BlobCourierError('test', 'CUSTOM_CODE');
    expect(err.code).toBe('CUSTOM_CODE');
  });

  it('sets name and message', () => {
    const err = new BlobCourierError('something broke');
    expect(err.name).toBe('BlobCourierError');
    expect(err.message).toBe('something broke');
  });
});

describe('ConfigurationError', () => {
  it('extends BlobCourierError', () => {
    const err = new ConfigurationError('bad config', 'retryCount');
    expect(err).toBeInstanceOf(BlobCourierError);
    expect(err).toBeInstanceOf(ConfigurationError);
  });

  it('carries the parameter name and code', () => {
    const err = new ConfigurationError('bad config', 'BLOB_COURIER_SAS_DAYS');
    expect(err.parameter).toBe('BLOB_COURIER_SAS_DAYS');
    expect(err.code).toBe('CONFIGURATION_ERROR');
    expect(err.name).toBe('ConfigurationError');
  });
});

describe('CredentialError', () => {
  it('names the missing credential field', () => {
    const err = new CredentialError('no key', 'accountKey');
    expect(err).toBeInstanceOf(BlobCourierError);
    expect(err.missing).toBe('accountKey');
    expect(err.code).toBe('CREDENTIAL_ERROR');
    expect(err.name).toBe('CredentialError');
  });
});

describe('TransientStorageError', () => {
  it('carries the status code when given', () => {
    const err = new TransientStorageError('unavailable', 503);
    expect(err).toBeInstanceOf(BlobCourierError);
    expect(err.statusCode).toBe(503);
    expect(err.code).toBe('TRANSIENT_STORAGE_ERROR');
    expect(err.name).toBe('TransientStorageError');
  });

  it('leaves the status code undefined otherwise', () => {
    const err = new TransientStorageError('no body');
    expect(err.statusCode).toBeUndefined();
  });

  it('is not a ConfigurationError', () => {
    const err = new TransientStorageError('x');
    expect(err).not.toBeInstanceOf(ConfigurationError);
  });
});
