/**
 * Tests for Environment Variable Schema & Validation
 *
 * Covers:
 * - Schema completeness (known env vars are defined)
 * - Validation logic (invalid types, out-of-range, patterns)
 * - Sensitive value masking
 * - getEnvSummary() output format
 */

import {
  ENV_SCHEMA,
  validateEnv,
  getEnvSummary,
  maskValue,
  getEnvDef,
} from '../../src/config/env-schema';

describe('ENV_SCHEMA', () => {
  it('should define all well-known environment variables', () => {
    const names = ENV_SCHEMA.map(d => d.name);

    expect(names).toEqual([
      'CONTEXT_CACHE_ENABLED',
      'CONTEXT_CACHE_DEFAULT_TTL',
      'CONTEXT_CACHE_SAFETY_BUFFER_SECONDS',
      'CONTEXT_CACHE_DEDUPLICATE_CREATION',
      'CONTEXT_CACHE_CLEANUP_INTERVAL_MS',
      'CONTEXT_CACHE_REQUEST_TIMEOUT_MS',
      'CONTEXT_CACHE_API_BASE',
      'GEMINI_API_KEY',
      'CONTEXT_CACHE_LOG_LEVEL',
    ]);
  });

  it('should have no duplicate names', () => {
    const names = ENV_SCHEMA.map(d => d.name);
    expect(new Set(names).size).toBe(names.length);
  });

  it('should have a description and category for every entry', () => {
    for (const def of ENV_SCHEMA) {
      expect(def.description.length).toBeGreaterThan(0);
      expect(['cache', 'remote', 'debug']).toContain(def.category);
    }
  });

  it('should mark API keys as sensitive', () => {
    expect(getEnvDef('GEMINI_API_KEY')?.sensitive).toBe(true);
  });
});

describe('getEnvDef', () => {
  it('should return definition for known variable', () => {
    const def = getEnvDef('CONTEXT_CACHE_DEFAULT_TTL');
    expect(def?.default).toBe('3600s');
    expect(def?.type).toBe('string');
  });

  it('should return undefined for unknown variable', () => {
    expect(getEnvDef('TOTALLY_FAKE_VAR')).toBeUndefined();
  });
});

describe('validateEnv', () => {
  it('should pass an empty environment', () => {
    const result = validateEnv({});
    expect(result).toEqual({ valid: true, warnings: [], errors: [] });
  });

  it('should warn on invalid number type', () => {
    const result = validateEnv({ CONTEXT_CACHE_REQUEST_TIMEOUT_MS: 'soon' });
    expect(result.warnings).toEqual(['CONTEXT_CACHE_REQUEST_TIMEOUT_MS should be a number but got "soon"']);
  });

  it('should warn on number below minimum', () => {
    const result = validateEnv({ CONTEXT_CACHE_REQUEST_TIMEOUT_MS: '0' });
    expect(result.warnings).toEqual(['CONTEXT_CACHE_REQUEST_TIMEOUT_MS=0 is below minimum 1']);
  });

  it('should warn on number above maximum', () => {
    const result = validateEnv({ CONTEXT_CACHE_SAFETY_BUFFER_SECONDS: '7200' });
    expect(result.warnings).toEqual(['CONTEXT_CACHE_SAFETY_BUFFER_SECONDS=7200 is above maximum 3600']);
  });

  it('should warn on invalid boolean value', () => {
    const result = validateEnv({ CONTEXT_CACHE_ENABLED: 'yes-please' });
    expect(result.warnings).toEqual(['CONTEXT_CACHE_ENABLED should be a boolean (true/false) but got "yes-please"']);
  });

  it('should accept valid boolean values', () => {
    const result = validateEnv({ CONTEXT_CACHE_ENABLED: 'FALSE', CONTEXT_CACHE_DEDUPLICATE_CREATION: '1' });
    expect(result.warnings).toHaveLength(0);
  });

  it('should warn on a malformed TTL', () => {
    const result = validateEnv({ CONTEXT_CACHE_DEFAULT_TTL: '1h' });
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toContain('CONTEXT_CACHE_DEFAULT_TTL="1h" does not match expected pattern');
  });

  it('should pass valid pattern matches', () => {
    const result = validateEnv({
      CONTEXT_CACHE_DEFAULT_TTL: '600s',
      CONTEXT_CACHE_API_BASE: 'http://localhost:8080',
      CONTEXT_CACHE_LOG_LEVEL: 'debug',
    });
    expect(result.warnings).toHaveLength(0);
  });

  it('should treat empty strings as unset', () => {
    const result = validateEnv({ CONTEXT_CACHE_REQUEST_TIMEOUT_MS: '' });
    expect(result.warnings).toHaveLength(0);
  });
});

describe('maskValue', () => {
  it('should mask short values completely', () => {
    expect(maskValue('abc')).toBe('****');
    expect(maskValue('12345678')).toBe('****');
  });

  it('should show first and last 4 chars of longer values', () => {
    expect(maskValue('test-key-0000-1111')).toBe('test****1111');
  });

  it('should handle exactly 9-char values', () => {
    expect(maskValue('123456789')).toBe('1234****6789');
  });
});

describe('getEnvSummary', () => {
  it('should return a formatted string with header', () => {
    const summary = getEnvSummary({});
    const lines = summary.split('\n');

    expect(lines[0]).toBe('Context Cache Environment');
    expect(lines[1]).toBe('='.repeat(50));
  });

  it('should include category sections', () => {
    const summary = getEnvSummary({});
    expect(summary).toContain('[Local Cache]');
    expect(summary).toContain('[Remote Cache Service]');
    expect(summary).toContain('[Logging]');
  });

  it('should show defaults for unset variables', () => {
    const lines = getEnvSummary({}).split('\n');
    expect(lines).toContain('    CONTEXT_CACHE_DEFAULT_TTL=(default: 3600s)');
    expect(lines).toContain('    CONTEXT_CACHE_API_BASE=(not set)');
  });

  it('should mark set variables and mask secrets', () => {
    const lines = getEnvSummary({ GEMINI_API_KEY: 'test-key-0000-1111', CONTEXT_CACHE_ENABLED: 'false' }).split('\n');
    expect(lines).toContain('  * GEMINI_API_KEY=test****1111');
    expect(lines).toContain('  * CONTEXT_CACHE_ENABLED=false');
  });

  it('should list warnings and the set count', () => {
    const lines = getEnvSummary({ CONTEXT_CACHE_ENABLED: 'maybe' }).split('\n');
    expect(lines).toContain('Warnings:');
    expect(lines).toContain('  ? CONTEXT_CACHE_ENABLED should be a boolean (true/false) but got "maybe"');
    expect(lines[lines.length - 1]).toBe('1/9 variables set');
  });
});
