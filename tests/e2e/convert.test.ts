import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Writable } from 'node:stream';
import { parseAllDocuments } from 'yaml';
import { runConvert } from '../../src/commands/convert.js';
import type { ConvertOptionsInput } from '../../src/config/schema.js';
import { volumeNames } from '../helpers/descriptor.js';
import { silentLogger } from '../helpers/logger.js';

const WEB_ONLY = `services:
  web:
    image: nginx
    ports:
      - "80"
`;

let dir: string;

async function convertIn(compose: string, options: ConvertOptionsInput = {}, stdout?: Writable) {
  await writeFile(join(dir, 'docker-compose.yml'), compose);
  const logger = silentLogger();
  const report = await runConvert(options, {
    cwd: dir,
    env: {},
    stdout,
    logger,
    build: { generateVolumeName: volumeNames() },
  });
  return { report, logger };
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'compose-kube-e2e-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('convert', () => {
  it('writes a service and a replication controller per compose service', async () => {
    const { report, logger } = await convertIn(WEB_ONLY);

    expect(report.writtenFiles).toEqual([join(dir, 'web-svc.json'), join(dir, 'web-rc.json')]);
    expect(logger.success).toHaveBeenCalledWith(`file "${join(dir, 'web-rc.json')}" created`);

    const service = JSON.parse(await readFile(join(dir, 'web-svc.json'), 'utf-8'));
    expect(service).toEqual({
      apiVersion: 'v1',
      kind: 'Service',
      metadata: { name: 'web', labels: { service: 'web' } },
      spec: {
        selector: { service: 'web' },
        ports: [{ name: '80', protocol: 'TCP', port: 80, targetPort: 80 }],
      },
    });

    const rc = JSON.parse(await readFile(join(dir, 'web-rc.json'), 'utf-8'));
    expect(rc.spec.replicas).toBe(1);
    expect(rc.spec.template.spec).toEqual({
      containers: [{ name: 'web', image: 'nginx', ports: [{ containerPort: 80 }] }],
      restartPolicy: 'Always',
    });
  });

  it('writes nothing for links to services outside the project', async () => {
    const { report } = await convertIn(`services:
  web:
    image: nginx
    links:
      - b
`);

    expect(report.output.placeholders).toEqual(['b']);
    expect((await readdir(dir)).sort()).toEqual([
      'docker-compose.yml',
      'web-rc.json',
      'web-svc.json',
    ]);
  });

  it('rejects conflicting options before writing anything', async () => {
    await expect(
      convertIn(WEB_ONLY, { out: 'all.json', deployment: true, daemonset: true }),
    ).rejects.toMatchObject({ code: 'ConfigurationConflict' });
    expect(await readdir(dir)).toEqual(['docker-compose.yml']);
  });

  it('leaves no files behind when a service fails to convert', async () => {
    await expect(
      convertIn(`services:
  web:
    image: nginx
  db:
    image: postgres
    restart: sometimes
`),
    ).rejects.toThrow('Unknown restart policy sometimes for service db');
    expect(await readdir(dir)).toEqual(['docker-compose.yml']);
  });

  it('writes one YAML file with every document separated', async () => {
    const { report, logger } = await convertIn(WEB_ONLY, { out: 'all.yaml', yaml: true });

    expect(report.writtenFiles).toEqual([join(dir, 'all.yaml')]);
    expect(logger.success).toHaveBeenCalledWith('file "all.yaml" created');
    const content = await readFile(join(dir, 'all.yaml'), 'utf-8');
    const kinds = parseAllDocuments(content)
      .map((doc) => doc.get('kind'))
      .filter((kind) => kind !== undefined);
    expect(kinds).toEqual(['Service', 'ReplicationController']);
    expect(content.startsWith('apiVersion: v1\nkind: Service\n')).toBe(true);
    expect(content.endsWith('---\n')).toBe(true);
  });

  it('streams to stdout and replaces controllers with the requested kind', async () => {
    const chunks: string[] = [];
    const stdout = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString());
        callback();
      },
    });

    const { report } = await convertIn(WEB_ONLY, { stdout: true, deployment: true }, stdout);

    expect(report.writtenFiles).toEqual([]);
    expect(report.output.manifests.map((m) => m.suffix)).toEqual(['svc', 'deployment']);
    expect(chunks.join('')).toBe(report.output.manifests.map((m) => `${m.content}\n`).join(''));
    expect(await readdir(dir)).toEqual(['docker-compose.yml']);
  });

  it('warns about unsupported keys and the chart flag', async () => {
    const { logger } = await convertIn(
      `services:
  web:
    image: nginx
    hostname: web-1
`,
      { chart: true },
    );

    expect(logger.warn).toHaveBeenCalledWith(
      'Chart generation is not supported - generating plain manifests only',
    );
    expect(logger.warn).toHaveBeenCalledWith('Unsupported key hostname in service "web" - ignoring');
  });
});
