// Unit tests for installing operators through OLM

import { expect } from 'chai';
import * as yaml from 'js-yaml';
import * as sinon from 'ts-sinon';
import { allCsvsSucceeded, CSV } from '../src/csv';
import { ChannelNotFound } from '../src/exceptions';
import { waitForInstallPlanAndApprove } from '../src/install_plan';
import { subscribeOperator } from '../src/olm';
import { PackageManifest } from '../src/package_manifest';
import { getSubscriptions, Subscription } from '../src/subscription';
import { FakeOc, readFileArg } from './fake_oc';

const MANIFEST = {
  kind: 'PackageManifest',
  metadata: { name: 'odf-operator', namespace: 'openshift-marketplace' },
  status: {
    defaultChannel: 'stable-4.16',
    channels: [
      { name: 'stable-4.15', currentCSV: 'odf-operator.v4.15.3' },
      { name: 'stable-4.16', currentCSV: 'odf-operator.v4.16.0' }
    ]
  }
};

function installPlan (name: string, created: string, approved: boolean, csvNames: string[]) {
  return {
    metadata: { name, creationTimestamp: created },
    spec: { approved, clusterServiceVersionNames: csvNames }
  };
}

module.exports = function () {
  let fake: FakeOc;

  beforeEach(() => {
    fake = new FakeOc().install();
  });

  afterEach(() => {
    fake.uninstall();
  });

  describe('package manifest', () => {
    it('should pick the named item from the list', async () => {
      const other = { ...MANIFEST, metadata: { name: 'mcg-operator' } };
      fake.on('get packagemanifest odf-operator', {
        stdout: yaml.dump({ kind: 'List', items: [other, MANIFEST] })
      });
      const pm = new PackageManifest('odf-operator', { selector: 'ocs-operator-internal=true' });
      const data = await pm.get();
      expect(data).to.have.nested.property('metadata.name', 'odf-operator');
      expect(fake.calls).to.deep.equal([
        'oc -n openshift-marketplace get packagemanifest odf-operator -n openshift-marketplace ' +
        '--selector=ocs-operator-internal=true -o yaml'
      ]);
    });

    it('should get the CSV of the default channel', async () => {
      fake.on('get packagemanifest odf-operator', { stdout: yaml.dump(MANIFEST) });
      const pm = new PackageManifest('odf-operator');
      expect(await pm.getDefaultChannel()).to.equal('stable-4.16');
      expect(await pm.getCurrentCsv()).to.equal('odf-operator.v4.16.0');
      expect(await pm.getCurrentCsv('stable-4.15')).to.equal('odf-operator.v4.15.3');
      // the manifest is read once and cached
      expect(fake.calls).to.have.lengthOf(1);
    });

    it('should fail for unknown channel', async () => {
      fake.on('get packagemanifest odf-operator', { stdout: yaml.dump(MANIFEST) });
      const pm = new PackageManifest('odf-operator');
      try {
        await pm.getCurrentCsv('stable-5.0');
      } catch (err) {
        expect(err).to.be.instanceOf(ChannelNotFound);
        expect(err).to.have.property(
          'message',
          "Channel: stable-5.0 not found in available channels: ['stable-4.15', 'stable-4.16']"
        );
        return;
      }
      throw new Error('Expected an exception');
    });

    it('should take the CSV from the latest approved install plan', async () => {
      fake.on('get InstallPlan', {
        stdout: yaml.dump({
          items: [
            installPlan('install-1', '2024-01-01T00:00:00Z', true, ['odf-operator.v4.15.0', 'mcg-operator.v4.15.0']),
            installPlan('install-2', '2024-02-01T00:00:00Z', true, ['mcg-operator.v4.16.0', 'odf-operator.v4.16.0']),
            installPlan('install-3', '2024-03-01T00:00:00Z', false, ['odf-operator.v4.16.1'])
          ]
        })
      });
      const pm = new PackageManifest('odf-operator', { installPlanNamespace: 'openshift-storage' });
      expect(await pm.getInstalledCsvFromInstallPlans('odf-operator')).to.equal('odf-operator.v4.16.0');
    });
  });

  it('should approve the pending install plan', async () => {
    fake
      .on('get InstallPlan', {
        stdout: yaml.dump({
          items: [
            installPlan('install-1', '2024-01-01T00:00:00Z', true, []),
            installPlan('install-2', '2024-02-01T00:00:00Z', false, [])
          ]
        })
      })
      .on(' patch ', { stdout: 'installplan.operators.coreos.com/install-2 patched' });
    expect(await waitForInstallPlanAndApprove('openshift-storage', 30, 1)).to.deep.equal(['install-2']);
    expect(fake.callsWith(' patch ')).to.deep.equal([
      'oc -n openshift-storage patch InstallPlan install-2 -n openshift-storage ' +
      '-p {"spec": {"approved": true}} --type merge'
    ]);
  });

  it('should tell if all CSVs succeeded', async () => {
    fake.once('get csv', {
      stdout: yaml.dump({
        items: [
          { metadata: { name: 'odf-operator.v4.16.0' }, status: { phase: 'Succeeded' } },
          { metadata: { name: 'mcg-operator.v4.16.0' }, status: { phase: 'Installing' } }
        ]
      })
    }).on('get csv', {
      stdout: yaml.dump({
        items: [{ metadata: { name: 'odf-operator.v4.16.0' }, status: { phase: 'Succeeded' } }]
      })
    });
    expect(await allCsvsSucceeded('openshift-storage')).to.be.false;
    expect(await allCsvsSucceeded('openshift-storage')).to.be.true;
  });

  it('should wait for the installed CSV of the subscription', async () => {
    fake
      .once('get Subscription odf-operator', { stdout: yaml.dump({ spec: { channel: 'stable-4.16' }, status: {} }) })
      .on('get Subscription odf-operator', {
        stdout: yaml.dump({ spec: { channel: 'stable-4.16' }, status: { installedCSV: 'odf-operator.v4.16.0' } })
      });
    const sub = new Subscription({ resourceName: 'odf-operator', namespace: 'openshift-storage' });
    expect(await sub.waitForInstalledCsv(5, 0.01)).to.equal('odf-operator.v4.16.0');
    expect(await sub.getChannel()).to.equal('stable-4.16');
    expect(fake.callsWith('get Subscription')).to.have.lengthOf(3);
  });

  it('should list the subscriptions', async () => {
    fake.on('get Subscription', {
      stdout: yaml.dump({ items: [{ metadata: { name: 'odf-operator' } }, { metadata: { name: 'mcg-operator' } }] })
    });
    const subs = await getSubscriptions('openshift-storage');
    expect(subs.map((s) => s.metadata)).to.deep.equal([{ name: 'odf-operator' }, { name: 'mcg-operator' }]);
  });

  it('should subscribe to the operator and wait for its CSV', async () => {
    let subscription: unknown;
    fake
      .on('get packagemanifest odf-operator', { stdout: yaml.dump(MANIFEST) })
      .on('apply -f', (args) => {
        subscription = readFileArg(args);
        return { stdout: 'subscription.operators.coreos.com/odf-operator created' };
      })
      .on('get csv odf-operator.v4.16.0', { stdout: yaml.dump({ status: { phase: 'Succeeded' } }) });
    const waitForPhase = sinon.default.spy(CSV.prototype, 'waitForPhase');
    try {
      const csv = await subscribeOperator({ packageName: 'odf-operator', namespace: 'openshift-storage' });
      expect(csv).to.equal('odf-operator.v4.16.0');
    } finally {
      waitForPhase.restore();
    }
    expect(subscription).to.deep.equal({
      apiVersion: 'operators.coreos.com/v1alpha1',
      kind: 'Subscription',
      metadata: { name: 'odf-operator', namespace: 'openshift-storage' },
      spec: {
        channel: 'stable-4.16',
        installPlanApproval: 'Automatic',
        name: 'odf-operator',
        source: 'redhat-operators',
        sourceNamespace: 'openshift-marketplace'
      }
    });
    expect(waitForPhase.calledOnce).to.be.true;
    expect(waitForPhase.firstCall.args).to.deep.equal(['Succeeded', 720]);
    expect(fake.callsWith('apply -f')[0]).to.match(/^oc -n openshift-storage apply -f /);
  });
};
