// Unit tests for the Ceph health checks

import { expect } from 'chai';
import {
  cephHealthCheck,
  cephHealthCheckBase,
  getCephHealthDetail,
  healthStatus,
  runCephHealthCmd
} from '../src/ceph_health';
import { CephHealthException, CommandFailed, NoRunningCephToolBoxException } from '../src/exceptions';
import { failure, FakeOc, toolsPods } from './fake_oc';

module.exports = function () {
  let fake: FakeOc;

  beforeEach(() => {
    fake = new FakeOc().install();
  });

  afterEach(() => {
    fake.uninstall();
  });

  it('should get the status from the health output', () => {
    expect(healthStatus('HEALTH_WARN 1 osds down; Degraded data redundancy\n')).to.equal('HEALTH_WARN');
    expect(healthStatus('HEALTH_OK\n')).to.equal('HEALTH_OK');
    expect(healthStatus('')).to.equal('');
  });

  it('should run ceph health on the running tools pod', async () => {
    fake
      .on('--selector=app=rook-ceph-tools', { stdout: toolsPods(['Terminating', 'Running']) })
      .on('ceph health', { stdout: 'HEALTH_OK\n' });
    expect(await runCephHealthCmd('openshift-storage')).to.equal('HEALTH_OK\n');
    expect(fake.callsWith('ceph health')).to.deep.equal([
      'oc -n openshift-storage rsh rook-ceph-tools-1 ceph health'
    ]);
  });

  it('should run ceph health detail', async () => {
    fake
      .on('--selector=app=rook-ceph-tools', { stdout: toolsPods(['Running']) })
      .on('ceph health detail', { stdout: 'HEALTH_WARN 1 pool(s) full\n[WRN] POOL_FULL: 1 pool(s) full\n' });
    expect(await getCephHealthDetail('openshift-storage')).to.equal(
      'HEALTH_WARN 1 pool(s) full\n[WRN] POOL_FULL: 1 pool(s) full\n'
    );
  });

  it('should turn missing tools pod to command failure', async () => {
    fake.on('--selector=app=rook-ceph-tools', { stdout: 'items: []\n' });
    try {
      await runCephHealthCmd('openshift-storage');
    } catch (err) {
      expect(err).to.be.instanceOf(CommandFailed);
      expect(fake.callsWith('ceph health')).to.have.lengthOf(0);
      return;
    }
    throw new Error('Expected an exception');
  });

  it('should fail if no tools pod is running', async () => {
    fake.on('--selector=app=rook-ceph-tools', { stdout: toolsPods(['Pending']) });
    try {
      await runCephHealthCmd('openshift-storage');
    } catch (err) {
      expect(err).to.be.instanceOf(NoRunningCephToolBoxException);
      return;
    }
    throw new Error('Expected an exception');
  });

  it('should pass the base check if the health is OK', async () => {
    fake
      .on('--selector=app=rook-ceph-tools', { stdout: toolsPods(['Running']) })
      .on('ceph health', { stdout: 'HEALTH_OK\n' });
    expect(await cephHealthCheckBase('openshift-storage')).to.be.true;
  });

  it('should fail the base check if the health is not OK', async () => {
    fake
      .on('--selector=app=rook-ceph-tools', { stdout: toolsPods(['Running']) })
      .on('ceph health', { stdout: 'HEALTH_ERR 1 full osd(s)\n' });
    try {
      await cephHealthCheckBase('openshift-storage');
    } catch (err) {
      expect(err).to.be.instanceOf(CephHealthException);
      expect(err).to.have.property('message', 'Ceph cluster health is not OK. Health: HEALTH_ERR 1 full osd(s)\n');
      return;
    }
    throw new Error('Expected an exception');
  });

  it('should retry the check until the cluster recovers', async () => {
    fake
      .on('--selector=app=rook-ceph-tools', { stdout: toolsPods(['Running']) })
      .once('ceph health', { stdout: 'HEALTH_WARN 1 osds down\n' })
      .once('ceph health', failure('error: unable to upgrade connection: container not found'))
      .on('ceph health', { stdout: 'HEALTH_OK\n' });
    expect(await cephHealthCheck('openshift-storage', 4, 0.01)).to.be.true;
    expect(fake.callsWith('ceph health')).to.have.lengthOf(3);
  });

  it('should give up after the tries', async () => {
    fake
      .on('--selector=app=rook-ceph-tools', { stdout: toolsPods(['Running']) })
      .on('ceph health', { stdout: 'HEALTH_WARN 1 osds down\n' });
    try {
      await cephHealthCheck('openshift-storage', 2, 0.01);
    } catch (err) {
      expect(err).to.be.instanceOf(CephHealthException);
      expect(fake.callsWith('ceph health')).to.have.lengthOf(2);
      return;
    }
    throw new Error('Expected an exception');
  });
};
