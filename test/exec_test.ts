// Unit tests for running of the external commands

import { expect } from 'chai';
import { Config, config } from '../src/config';
import { CommandFailed, TimeoutExpiredError } from '../src/exceptions';
import { execCmd, runCmd } from '../src/exec';
import { failure, FakeOc } from './fake_oc';

module.exports = function () {
  let fake: FakeOc;

  beforeEach(() => {
    fake = new FakeOc().install();
  });

  afterEach(() => {
    fake.uninstall();
    config.reset();
  });

  it('should split the command and return the output', async () => {
    fake.on('get pods', { stdout: 'pod-1\n' });
    const res = await execCmd("oc get pods -l 'app=noobaa'");
    expect(res.args).to.deep.equal(['oc', 'get', 'pods', '-l', 'app=noobaa']);
    expect(res.stdout).to.equal('pod-1\n');
    expect(res.returncode).to.equal(0);
  });

  it('should throw CommandFailed with masked secrets', async () => {
    fake.on('aws', failure('bad key test-secret'));
    try {
      await execCmd('aws s3 ls --key test-secret', { secrets: ['test-secret'] });
    } catch (err) {
      expect(err).to.be.instanceOf(CommandFailed);
      expect(err).to.have.property(
        'message',
        'Error during execution of command: aws s3 ls --key *****.\nError is bad key *****'
      );
      return;
    }
    throw new Error('Expected an exception');
  });

  it('should not throw with ignoreError', async () => {
    fake.on('false', failure('nope'));
    const res = await execCmd('false', { ignoreError: true });
    expect(res.returncode).to.equal(1);
    expect(res.stderr).to.equal('nope');
  });

  it('should not throw when grep found nothing', async () => {
    fake.on('grep', failure('command terminated with exit code 1'));
    const res = await execCmd('oc rsh pod-1 grep missing /etc/hosts');
    expect(res.returncode).to.equal(1);
  });

  it('should turn runner timeout to CommandFailed', async () => {
    fake.on('sleep', () => {
      throw new TimeoutExpiredError(5);
    });
    try {
      await execCmd('sleep 100', { timeout: 5 });
    } catch (err) {
      expect(err).to.be.instanceOf(CommandFailed);
      expect(err).to.have.property('message', 'Command sleep 100 timed out after 5s');
      return;
    }
    throw new Error('Expected an exception');
  });

  it('should run the command by shell', async () => {
    fake.on('echo', { stdout: 'a\nb\n' });
    const res = await execCmd('echo a && echo b', { shell: true });
    expect(res.args).to.deep.equal(['sh', '-c', 'echo a && echo b']);
  });

  it('should replace kubeconfig by the custom location', async () => {
    fake.on('get pods', {});
    config.update({ RUN: { custom_kubeconfig_location: '/tmp/custom-kc' } });
    const res = await execCmd('oc --kubeconfig /tmp/old-kc get pods');
    expect(res.args).to.deep.equal(['oc', '--kubeconfig', '/tmp/custom-kc', 'get', 'pods']);
  });

  it('should add kubeconfig of the cluster config', async () => {
    fake.on('get pods', {});
    const clusterConfig = new Config();
    clusterConfig.update({ RUN: { kubeconfig: '/clusters/c2/kubeconfig' } });
    const res = await execCmd('oc get pods', { clusterConfig });
    expect(res.args).to.deep.equal(['oc', '--kubeconfig', '/clusters/c2/kubeconfig', 'get', 'pods']);
    const other = await execCmd('ls', { clusterConfig, ignoreError: true });
    expect(other.args).to.deep.equal(['ls']);
  });

  it('should return masked stdout from runCmd', async () => {
    fake.on('cat', { stdout: 'password: test-secret' });
    expect(await runCmd('cat creds', { secrets: ['test-secret'] })).to.equal('password: *****');
  });
};
