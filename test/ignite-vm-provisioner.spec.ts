import { IpNotFoundError, ProvisionerError } from '../src/infra/contracts/provision-errors';
import { IgniteVmProvisionerService } from '../src/modules/vm/ignite-vm-provisioner.service';
import {
  FakeCommandRunner,
  IGNITE_PS_HEADER,
  createTestLogger,
  ignitePsLine,
  testConfig,
} from './test-helpers';

describe('IgniteVmProvisionerService', () => {
  let runner: FakeCommandRunner;
  let logger: ReturnType<typeof createTestLogger>;
  let provisioner: IgniteVmProvisionerService;

  beforeEach(() => {
    runner = new FakeCommandRunner();
    logger = createTestLogger();
    provisioner = new IgniteVmProvisionerService(testConfig(), runner, logger);
  });

  describe('create', () => {
    it('runs ignite run --config through sudo', async () => {
      await provisioner.create('/tmp/ignite-config-1.yaml');
      expect(runner.calls).toEqual([
        { command: 'sudo', args: ['ignite', 'run', '--config', '/tmp/ignite-config-1.yaml'] },
      ]);
    });

    it('runs the configured binary directly when sudo is disabled', async () => {
      provisioner = new IgniteVmProvisionerService(
        testConfig({ ignite: { binary: '/usr/local/bin/ignite', useSudo: false } }),
        runner,
        logger,
      );
      await provisioner.create('/tmp/m.yaml');
      expect(runner.calls).toEqual([
        { command: '/usr/local/bin/ignite', args: ['run', '--config', '/tmp/m.yaml'] },
      ]);
    });

    it('surfaces stdout and stderr on a non-zero exit', async () => {
      runner.handler = () => ({ exitCode: 1, stdout: 'pulling image', stderr: 'boom' });
      const attempt = provisioner.create('/tmp/m.yaml');
      await expect(attempt).rejects.toThrow(
        'Error running ignite: exit status 1\nStdout: pulling image\nStderr: boom',
      );
      await expect(attempt).rejects.toMatchObject({
        action: 'run',
        stdout: 'pulling image',
        stderr: 'boom',
        exitCode: 1,
      });
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it('describes a process killed by a signal', async () => {
      runner.handler = () => ({ exitCode: null, signal: 'SIGKILL' });
      await expect(provisioner.create('/tmp/m.yaml')).rejects.toThrow(
        'Error running ignite: signal: SIGKILL\nStdout: \nStderr: ',
      );
    });

    it('wraps a launch failure in ProvisionerError', async () => {
      const launchError = new Error('spawn sudo ENOENT');
      runner.handler = () => Promise.reject(launchError);
      const attempt = provisioner.create('/tmp/m.yaml');
      await expect(attempt).rejects.toBeInstanceOf(ProvisionerError);
      await expect(attempt).rejects.toThrow('failed to start sudo: spawn sudo ENOENT');
      await expect(attempt).rejects.toMatchObject({ action: 'run', cause: launchError });
    });
  });

  describe('listRunning', () => {
    it('returns ignite ps stdout', async () => {
      const listing = `${IGNITE_PS_HEADER}\n${ignitePsLine('m1', '10.0.0.5')}\n`;
      runner.handler = () => ({ stdout: listing });
      await expect(provisioner.listRunning()).resolves.toBe(listing);
      expect(runner.calls).toEqual([{ command: 'sudo', args: ['ignite', 'ps'] }]);
    });

    it('fails with the exit status and stderr', async () => {
      runner.handler = () => ({ exitCode: 2, stderr: 'permission denied' });
      await expect(provisioner.listRunning()).rejects.toThrow(
        'error running ignite ps: exit status 2\nStderr: permission denied',
      );
    });
  });

  describe('findNodeIp', () => {
    it('returns the IP column of the node line', () => {
      const listing = `${IGNITE_PS_HEADER}\n${ignitePsLine('m1', '10.0.0.5')}`;
      expect(provisioner.findNodeIp('m1', listing)).toBe('10.0.0.5');
    });

    it('throws IpNotFoundError when the node is missing', () => {
      expect(() => provisioner.findNodeIp('m9', IGNITE_PS_HEADER)).toThrow(
        new IpNotFoundError('m9'),
      );
      expect(() => provisioner.findNodeIp('m9', IGNITE_PS_HEADER)).toThrow(
        "IP address for node 'm9' not found",
      );
    });
  });

  describe('stop and remove', () => {
    it('runs ignite vm stop and ignite vm rm', async () => {
      await provisioner.stop('m1');
      await provisioner.remove('m1');
      expect(runner.calls).toEqual([
        { command: 'sudo', args: ['ignite', 'vm', 'stop', 'm1'] },
        { command: 'sudo', args: ['ignite', 'vm', 'rm', 'm1'] },
      ]);
    });

    it('includes trimmed stderr in the failure', async () => {
      runner.handler = () => ({ exitCode: 1, stderr: 'VM not found\n' });
      const attempt = provisioner.stop('missing-vm');
      await expect(attempt).rejects.toThrow('exit status 1: VM not found');
      await expect(attempt).rejects.toMatchObject({ action: 'stop' });
    });

    it('reports the exit status alone when stderr is empty', async () => {
      runner.handler = () => ({ exitCode: 1 });
      const attempt = provisioner.remove('m1');
      await expect(attempt).rejects.toThrow('exit status 1');
      await expect(attempt).rejects.toMatchObject({ action: 'rm', exitCode: 1 });
    });
  });
});
