import { describe, it, expect } from 'vitest';
import { interpolateAll, interpolateVariables } from '../../src/parser/env.js';

describe('interpolateVariables', () => {
  const env = { DB_HOST: 'localhost', DB_PORT: '5432', EMPTY: '' };

  it('interpolates ${VAR} syntax', () => {
    expect(interpolateVariables('host=${DB_HOST}', env)).toBe('host=localhost');
  });

  it('interpolates $VAR syntax', () => {
    expect(interpolateVariables('host=$DB_HOST', env)).toBe('host=localhost');
  });

  it('uses the default of ${VAR:-default} for unset or empty values', () => {
    expect(interpolateVariables('${MISSING:-fallback}', env)).toBe('fallback');
    expect(interpolateVariables('${EMPTY:-fallback}', env)).toBe('fallback');
  });

  it('uses the default of ${VAR-default} only for unset values', () => {
    expect(interpolateVariables('${MISSING-fallback}', env)).toBe('fallback');
    expect(interpolateVariables('${EMPTY-fallback}', env)).toBe('');
  });

  it('treats $$ as a literal dollar', () => {
    expect(interpolateVariables('cost: $$5', env)).toBe('cost: $5');
  });

  it('replaces missing vars with an empty string and reports them', () => {
    const missing: string[] = [];
    expect(interpolateVariables('${MISSING}-$OTHER', env, (name) => missing.push(name))).toBe('-');
    expect(missing).toEqual(['MISSING', 'OTHER']);
  });

  it('handles multiple interpolations', () => {
    expect(interpolateVariables('${DB_HOST}:${DB_PORT}', env)).toBe('localhost:5432');
  });
});

describe('interpolateAll', () => {
  it('walks nested objects and arrays, leaving other values alone', () => {
    expect(
      interpolateAll({ image: 'app:${TAG}', ports: ['${PORT}', 80], privileged: true }, {
        TAG: '1.2',
        PORT: '8080',
      }),
    ).toEqual({ image: 'app:1.2', ports: ['8080', 80], privileged: true });
  });
});
