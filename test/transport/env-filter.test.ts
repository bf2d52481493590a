import { describe, it, expect } from 'vitest';
import { filterSpawnEnv, isSensitiveName, redactEnv, summarizeEnv } from '../../src/transport/env-filter.js';

describe('transport/env-filter', () => {
  describe('filterSpawnEnv', () => {
    it('should drop credentials from the inherited environment', () => {
      const env = filterSpawnEnv({
        PATH: '/usr/bin',
        OPENAI_API_KEY: 'test-secret',
        GITHUB_TOKEN: 'test-secret',
        MY_SERVICE_PASSWORD: 'test-secret',
        HOME: '/home/test',
      });

      expect(env).toEqual({ PATH: '/usr/bin', HOME: '/home/test' });
    });

    it('should always pass explicit variables through', () => {
      const env = filterSpawnEnv({ PATH: '/usr/bin' }, { API_TOKEN: 'test-secret' });

      expect(env).toEqual({ PATH: '/usr/bin', API_TOKEN: 'test-secret' });
    });

    it('should skip undefined values', () => {
      expect(filterSpawnEnv({ EMPTY: undefined, PORT: '3000' })).toEqual({ PORT: '3000' });
    });
  });

  describe('isSensitiveName', () => {
    it('should match sensitive substrings case-insensitively', () => {
      expect(isSensitiveName('Stripe_Secret')).toBe(true);
      expect(isSensitiveName('DB_PASSWORD')).toBe(true);
      expect(isSensitiveName('DATABASE_URL')).toBe(true);
      expect(isSensitiveName('PORT')).toBe(false);
    });

    it('should use the given name list', () => {
      expect(isSensitiveName('PORT', ['port'])).toBe(true);
      expect(isSensitiveName('API_TOKEN', ['port'])).toBe(false);
    });
  });

  it('should redact sensitive values only', () => {
    expect(redactEnv({ API_TOKEN: 'test-secret', DEBUG: '1' })).toEqual({
      API_TOKEN: '[REDACTED]',
      DEBUG: '1',
    });
  });

  describe('summarizeEnv', () => {
    it('should list up to five safe names in full', () => {
      expect(summarizeEnv({ A: '1', B: '2', API_TOKEN: 'test-secret' })).toEqual({
        safe: ['A', 'B'],
        more: 0,
        sensitive: 1,
      });
    });

    it('should cut longer lists to three names', () => {
      const env = { A: '1', B: '2', C: '3', D: '4', E: '5', F: '6' };

      expect(summarizeEnv(env)).toEqual({ safe: ['A', 'B', 'C'], more: 3, sensitive: 0 });
    });
  });
});
