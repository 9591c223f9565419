import { tmpdir } from 'os';
import { DEFAULT_IMAGE_OCI, EnvKeys, resolveProvisionConfig } from '../src/infra/config/env.config';

describe('resolveProvisionConfig', () => {
  const saved = { ...process.env };

  beforeEach(() => {
    for (const key of Object.values(EnvKeys)) delete process.env[key];
  });

  afterAll(() => {
    process.env = saved;
  });

  it('falls back to defaults when nothing is set', () => {
    expect(resolveProvisionConfig()).toEqual({
      port: 5090,
      ledgerPath: 'provisioned_vms.csv',
      stagingDir: tmpdir(),
      ignite: { binary: 'ignite', useSudo: true },
      defaultImageOci: DEFAULT_IMAGE_OCI,
    });
  });

  it('reads overrides from the environment', () => {
    process.env.PORT = '8081';
    process.env.LEDGER_PATH = '/var/lib/provision/ledger.csv';
    process.env.STAGING_DIR = '/var/tmp/staging';
    process.env.IGNITE_BIN = '/usr/local/bin/ignite';
    process.env.IGNITE_USE_SUDO = 'false';
    process.env.DEFAULT_IMAGE_OCI = 'example/k3s:latest';

    expect(resolveProvisionConfig()).toEqual({
      port: 8081,
      ledgerPath: '/var/lib/provision/ledger.csv',
      stagingDir: '/var/tmp/staging',
      ignite: { binary: '/usr/local/bin/ignite', useSudo: false },
      defaultImageOci: 'example/k3s:latest',
    });
  });

  it('ignores a port that is not a number', () => {
    process.env.PORT = 'http';
    expect(resolveProvisionConfig().port).toBe(5090);
  });

  it.each([
    ['TRUE', true],
    ['1', true],
    ['no', false],
  ])('treats IGNITE_USE_SUDO=%s as %p', (value, expected) => {
    process.env.IGNITE_USE_SUDO = value;
    expect(resolveProvisionConfig().ignite.useSudo).toBe(expected);
  });
});
