/**
 * Tests for credential providers.
 */

import {
  AuthenticationError,
  EnvironmentCredentialProvider,
  StaticCredentialProvider,
  resolveApiKey,
} from '../index.js';

describe('resolveApiKey', () => {
  it('should prefer api_key, then apiKey, then API_KEY', () => {
    expect(resolveApiKey({ api_key: 'a', apiKey: 'b', API_KEY: 'c' })).toBe('a');
    expect(resolveApiKey({ apiKey: 'b', API_KEY: 'c' })).toBe('b');
    expect(resolveApiKey({ API_KEY: 'c' })).toBe('c');
  });

  it('should skip blank values', () => {
    expect(resolveApiKey({ api_key: '  ', apiKey: 'test-secret' })).toBe('test-secret');
  });

  it('should throw AuthenticationError when no key is present', () => {
    expect(() => resolveApiKey({ token: 'test-secret' })).toThrow(AuthenticationError);
    expect(() => resolveApiKey({})).toThrow('expected one of: api_key, apiKey, API_KEY');
  });
});

describe('EnvironmentCredentialProvider', () => {
  it('should read AIRTABLE_API_KEY by default', async () => {
    const provider = new EnvironmentCredentialProvider(undefined, { AIRTABLE_API_KEY: 'test-secret' });
    await expect(provider.getCredentials()).resolves.toEqual({ api_key: 'test-secret' });
  });

  it('should read a custom variable', async () => {
    const provider = new EnvironmentCredentialProvider('MY_AIRTABLE_TOKEN', { MY_AIRTABLE_TOKEN: 'test-secret' });
    expect(resolveApiKey(await provider.getCredentials())).toBe('test-secret');
  });

  it('should report a missing variable as an absent key', async () => {
    const provider = new EnvironmentCredentialProvider(undefined, {});
    await expect(provider.getCredentials()).resolves.toEqual({ api_key: undefined });
  });
});

describe('StaticCredentialProvider', () => {
  it('should return a copy of its credentials', async () => {
    const provider = new StaticCredentialProvider({ apiKey: 'test-secret' });
    const first = await provider.getCredentials();
    first.apiKey = 'changed';

    await expect(provider.getCredentials()).resolves.toEqual({ apiKey: 'test-secret' });
  });
});
