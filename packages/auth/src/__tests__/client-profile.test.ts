import { describe, it, expect } from 'vitest';
import { ClientProfile } from '../implementations/client-profile.js';
import { ConfigurationError } from '../errors/index.js';
import { createProfile } from './test-utils.js';

describe('ClientProfile', () => {
  describe('defaults', () => {
    it('should fill in paths, grant type and token scheme', () => {
      const profile = createProfile();

      expect(profile.authorizePath).toBe('/oauth/authorize');
      expect(profile.accessTokenPath).toBe('/oauth/token');
      expect(profile.grantType).toBe('authorization_code');
      expect(profile.tokenScheme).toBe('auth-header:Bearer');
      expect(profile.autoSave).toBeUndefined();
    });

    it('should resolve endpoints against the site', () => {
      const profile = createProfile();

      expect(profile.authorizeEndpoint).toBe('https://auth.example.com/oauth/authorize');
      expect(profile.tokenEndpoint).toBe('https://auth.example.com/oauth/token');
    });
  });

  describe('endpoint resolution', () => {
    it('should keep the site path and use a single slash', () => {
      const profile = createProfile({ site: 'https://auth.example.com/tenant/' });

      expect(profile.tokenEndpoint).toBe('https://auth.example.com/tenant/oauth/token');
    });

    it('should use absolute URLs in paths as-is', () => {
      const profile = createProfile({ accessTokenPath: 'https://login.example.org/token' });

      expect(profile.tokenEndpoint).toBe('https://login.example.org/token');
      expect(profile.authorizeEndpoint).toBe('https://auth.example.com/oauth/authorize');
    });

    it('should keep query parameters on the authorize path', () => {
      const profile = createProfile({ authorizePath: '/authorize?prompt=consent' });

      expect(profile.authorizeEndpoint).toBe('https://auth.example.com/authorize?prompt=consent');
    });
  });

  describe('validation', () => {
    it('should reject an empty client id', () => {
      expect(() => createProfile({ clientId: '' })).toThrow(ConfigurationError);
      expect(() => createProfile({ clientId: '' })).toThrow(
        'Client profile: Missing required field: clientId',
      );
    });

    it('should reject a blank client secret', () => {
      expect(() => createProfile({ clientSecret: '   ' })).toThrow(
        'Client profile: Missing required field: clientSecret',
      );
    });

    it('should reject a malformed site', () => {
      expect(() => createProfile({ site: 'not a url' })).toThrow(
        'site: Invalid URL format: not a url',
      );
    });

    it('should reject a non-http site', () => {
      expect(() => createProfile({ site: 'ftp://auth.example.com' })).toThrow(
        'site: URL must use http or https: ftp://auth.example.com',
      );
    });

    it('should reject an unknown token location', () => {
      expect(() => createProfile({ tokenScheme: 'cookie:sid' })).toThrow(
        "Unknown token location in scheme 'cookie:sid'",
      );
    });

    it('should carry the configuration_error code', () => {
      try {
        createProfile({ clientId: '' });
        expect.unreachable('constructor should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error).toMatchObject({ code: 'configuration_error', name: 'ConfigurationError' });
      }
    });
  });

  it('should be frozen', () => {
    const profile = createProfile();

    expect(Object.isFrozen(profile)).toBe(true);
    expect(Reflect.set(profile, 'clientId', 'other-client')).toBe(false);
    expect(profile.clientId).toBe('test-client');
  });

  it('should keep the auto-save hook by reference', () => {
    const autoSave = async (): Promise<void> => undefined;
    const profile = new ClientProfile({
      clientId: 'test-client',
      clientSecret: 'test-secret',
      site: 'https://auth.example.com',
      autoSave,
    });

    expect(profile.autoSave).toBe(autoSave);
  });

  it('should describe itself without the secret', () => {
    const description = createProfile({ scope: 'read' }).describe();

    expect('clientSecret' in description).toBe(false);
    expect(description).toMatchObject({
      clientId: 'test-client',
      site: 'https://auth.example.com',
      scope: 'read',
    });
  });
});
