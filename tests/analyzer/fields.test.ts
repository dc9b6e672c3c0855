import { describe, it, expect } from 'vitest';
import {
  parseEnv,
  parseVolume,
  parseVolumes,
  parseContainerPort,
  parseServicePort,
} from '../../src/analyzer/fields.js';
import { ConversionError } from '../../src/utils/errors.js';

function sequence(...names: string[]): () => string {
  let i = 0;
  return () => names[i++];
}

describe('parseEnv', () => {
  it('splits on the first = and trims both sides', () => {
    expect(parseEnv('FOO = bar', 'web')).toEqual({ name: 'FOO', value: 'bar' });
  });

  it('keeps later = signs in the value', () => {
    expect(parseEnv('URL=postgres://db?ssl=true', 'web')).toEqual({
      name: 'URL',
      value: 'postgres://db?ssl=true',
    });
  });

  it('falls back to : and strips single quotes', () => {
    expect(parseEnv("FOO: 'bar'", 'web')).toEqual({ name: 'FOO', value: 'bar' });
  });

  it('prefers = over : when both are present', () => {
    expect(parseEnv('HOST=localhost:8080', 'web')).toEqual({
      name: 'HOST',
      value: 'localhost:8080',
    });
  });

  it('leaves unquoted colon values alone', () => {
    expect(parseEnv('MODE: prod', 'web')).toEqual({ name: 'MODE', value: 'prod' });
  });

  it('rejects entries without a separator', () => {
    expect(() => parseEnv('FOOBAR', 'web')).toThrow(ConversionError);
    expect(() => parseEnv('FOOBAR', 'web')).toThrow('Invalid container env FOOBAR for service web');
  });

  it('rejects entries with an empty name', () => {
    let caught: unknown;
    try {
      parseEnv('=bar', 'web');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConversionError);
    expect(caught).toMatchObject({ code: 'MalformedEnvEntry' });
  });
});

describe('parseVolume', () => {
  it('defaults to read-only without a mode', () => {
    expect(parseVolume('/host:/data', () => 'vol1')).toEqual({
      hostPath: '/host',
      containerPath: '/data',
      readOnly: true,
      generatedName: 'vol1',
    });
  });

  it('is writable only with rw', () => {
    expect(parseVolume('/host:/data:rw', () => 'vol1')?.readOnly).toBe(false);
    expect(parseVolume('/host:/data:ro', () => 'vol1')?.readOnly).toBe(true);
  });

  it('strips the mode from the container path', () => {
    expect(parseVolume('./src:/app/src:rw', () => 'vol1')?.containerPath).toBe('/app/src');
  });

  it('skips entries without a colon', () => {
    expect(parseVolume('/data', () => 'vol1')).toBeUndefined();
  });

  it('generates 20 character lowercase alphanumeric names by default', () => {
    const binding = parseVolume('/host:/data');
    expect(binding?.generatedName).toMatch(/^[a-z0-9]{20}$/);
  });
});

describe('parseVolumes', () => {
  it('drops entries without a colon and keeps names unique', () => {
    const bindings = parseVolumes(['/a:/a', '/anonymous', '/b:/b:rw'], sequence('x', 'x', 'y'));

    expect(bindings.map((b) => b.generatedName)).toEqual(['x', 'y']);
    expect(bindings.map((b) => b.containerPath)).toEqual(['/a', '/b']);
  });
});

describe('parseContainerPort', () => {
  it('keeps only the container side of host:container', () => {
    expect(parseContainerPort('8080:80', 'web')).toEqual({ containerPort: 80 });
  });

  it('uses a bare port as is', () => {
    expect(parseContainerPort('80', 'web')).toEqual({ containerPort: 80 });
  });

  it('rejects non-numeric ports', () => {
    expect(() => parseContainerPort('http', 'web')).toThrow(
      'Invalid container port http for service web',
    );
    expect(() => parseContainerPort('8080:abc', 'web')).toThrow(ConversionError);
  });
});

describe('parseServicePort', () => {
  it('maps host:container to port and targetPort', () => {
    expect(parseServicePort('8080:80', 'web')).toEqual({
      name: '8080',
      protocol: 'TCP',
      port: 8080,
      targetPort: 80,
    });
  });

  it('uses a bare port on both sides', () => {
    expect(parseServicePort('80', 'web')).toEqual({
      name: '80',
      protocol: 'TCP',
      port: 80,
      targetPort: 80,
    });
  });

  it('validates both sides independently', () => {
    expect(() => parseServicePort('abc:80', 'web')).toThrow(ConversionError);
    expect(() => parseServicePort('80:abc', 'web')).toThrow(ConversionError);
  });
});
