import { parse } from 'yaml';
import {
  DEFAULT_CPUS,
  buildNodeConfig,
  buildProvisionDocuments,
  buildVmManifest,
  serializeNodeConfig,
  serializeVmManifest,
  withCopyFiles,
} from '../src/modules/provisioning/manifest-builder';
import { provisionRequest } from './test-helpers';

describe('manifest builder', () => {
  describe('buildVmManifest', () => {
    it.each([0, -1, -8])('defaults cpus to 2 when cpus is %d', (cpus) => {
      expect(buildVmManifest(provisionRequest({ cpus })).spec.cpus).toBe(DEFAULT_CPUS);
    });

    it('keeps a positive cpu count', () => {
      expect(buildVmManifest(provisionRequest({ cpus: 6 })).spec.cpus).toBe(6);
    });

    it('applies size and image defaults for empty strings', () => {
      const manifest = buildVmManifest(provisionRequest());
      expect(manifest.spec.diskSize).toBe('3GB');
      expect(manifest.spec.memory).toBe('1GB');
      expect(manifest.spec.image).toEqual({ oci: 'shajalahamedcse/only-k3-go:v1.0.10' });
    });

    it('uses the configured default image', () => {
      const manifest = buildVmManifest(provisionRequest(), 'registry.local/k3s:latest');
      expect(manifest.spec.image.oci).toBe('registry.local/k3s:latest');
    });

    it('prefers request values over defaults', () => {
      const manifest = buildVmManifest(
        provisionRequest({
          diskSize: '10GB',
          memory: '4GB',
          imageOci: 'registry.local/custom:1',
          enableSsh: true,
        }),
        'registry.local/k3s:latest',
      );
      expect(manifest.spec).toEqual({
        image: { oci: 'registry.local/custom:1' },
        cpus: 2,
        diskSize: '10GB',
        memory: '4GB',
        copyFiles: [],
        ssh: true,
      });
    });

    it('fills the fixed identity fields and metadata', () => {
      const manifest = buildVmManifest(provisionRequest({ nodeName: 'w7', nodeUid: 'uid-7' }));
      expect(manifest.apiVersion).toBe('ignite.weave.works/v1alpha4');
      expect(manifest.kind).toBe('VM');
      expect(manifest.metadata).toEqual({ name: 'w7', uid: 'uid-7' });
    });
  });

  it('builds the node config from the request verbatim', () => {
    const config = buildNodeConfig(
      provisionRequest({ nodeType: 'worker', token: 'test-token', masterIP: '10.0.0.5' }),
    );
    expect(config).toEqual({
      name: 'm1',
      uid: 'u1',
      nodeType: 'worker',
      token: 'test-token',
      masterIP: '10.0.0.5',
    });
  });

  it('buildProvisionDocuments returns both documents', () => {
    const docs = buildProvisionDocuments(provisionRequest());
    expect(docs.config.name).toBe('m1');
    expect(docs.manifest.spec.copyFiles).toEqual([]);
  });

  it('withCopyFiles returns a new manifest and leaves the original untouched', () => {
    const manifest = buildVmManifest(provisionRequest());
    const entry = { hostPath: '/tmp/config-1.json', vmPath: '/root/config.json' };
    const updated = withCopyFiles(manifest, [entry]);
    expect(updated.spec.copyFiles).toEqual([entry]);
    expect(manifest.spec.copyFiles).toEqual([]);
  });

  it('serializes the node config as indented JSON in field order', () => {
    const text = serializeNodeConfig(buildNodeConfig(provisionRequest()));
    expect(text).toBe(
      '{\n  "name": "m1",\n  "uid": "u1",\n  "nodeType": "",\n  "token": "",\n  "masterIP": ""\n}',
    );
  });

  it('serializes the manifest as YAML starting with apiVersion and kind', () => {
    const manifest = withCopyFiles(buildVmManifest(provisionRequest()), [
      { hostPath: '/tmp/config-1.json', vmPath: '/root/config.json' },
    ]);
    const text = serializeVmManifest(manifest);
    expect(text.startsWith('apiVersion: ignite.weave.works/v1alpha4\nkind: VM\n')).toBe(true);
    expect(parse(text)).toEqual(manifest);
  });
});
