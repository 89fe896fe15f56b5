// Filename: test/api/auth.test.ts

import { describe, it, expect } from 'vitest';
import { authenticate, parseBasicAuth } from '../../api/auth.js';
import { basicAuth } from '../helpers/apiFixtures.js';

const USERS = [
  { username: 'tester', password: 'test-secret' },
  { username: 'reader', password: 'pass:with:colons' },
];

describe('auth', () => {
  describe('parseBasicAuth', () => {
    it('should decode the credentials', () => {
      expect(parseBasicAuth(basicAuth('tester', 'test-secret'))).toEqual({
        username: 'tester',
        password: 'test-secret',
      });
    });

    it('should split on the first colon only', () => {
      expect(parseBasicAuth(basicAuth('reader', 'pass:with:colons'))?.password).toBe('pass:with:colons');
    });

    it('should reject missing or foreign schemes', () => {
      expect(parseBasicAuth(undefined)).toBeNull();
      expect(parseBasicAuth('Bearer test-token')).toBeNull();
      expect(parseBasicAuth(`Basic ${Buffer.from('no-colon').toString('base64')}`)).toBeNull();
    });
  });

  describe('authenticate', () => {
    it('should return the matching username', () => {
      expect(authenticate(basicAuth('reader', 'pass:with:colons'), USERS)).toBe('reader');
    });

    it('should reject a wrong password or unknown user', () => {
      expect(authenticate(basicAuth('tester', 'test-secreT'), USERS)).toBeNull();
      expect(authenticate(basicAuth('nobody', 'test-secret'), USERS)).toBeNull();
    });

    it('should reject everyone when no users are configured', () => {
      expect(authenticate(basicAuth('tester', 'test-secret'), [])).toBeNull();
    });
  });
});
