import { describe, it, expect } from 'vitest';
import { generateService } from '../../src/generator/service.js';
import { makeDescriptor } from '../helpers/descriptor.js';

describe('generateService', () => {
  it('exposes every port with its target', () => {
    const manifest = generateService(makeDescriptor({ ports: ['8080:80', '443'] }));

    expect(manifest).toEqual({
      apiVersion: 'v1',
      kind: 'Service',
      metadata: { name: 'web', labels: { service: 'web' } },
      spec: {
        selector: { service: 'web' },
        ports: [
          { name: '8080', protocol: 'TCP', port: 8080, targetPort: 80 },
          { name: '443', protocol: 'TCP', port: 443, targetPort: 443 },
        ],
      },
    });
  });

  it('omits ports for services without any', () => {
    expect(generateService(makeDescriptor()).spec).toEqual({ selector: { service: 'web' } });
  });

  it('merges compose labels over the service label', () => {
    const manifest = generateService(
      makeDescriptor({ labels: { tier: 'frontend', service: 'custom' } }),
    );

    expect(manifest.metadata.labels).toEqual({ service: 'custom', tier: 'frontend' });
    expect(manifest.spec.selector).toEqual({ service: 'web' });
  });
});
