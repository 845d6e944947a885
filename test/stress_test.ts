// Unit tests for the stress of MCG buckets

import { expect } from 'chai';
import { StressOperationFailed } from '../src/exceptions';
import {
  awscliOperations,
  fanOut,
  iterationPrefix,
  runBackgroundCephHealthCheck,
  runStressLoop,
  StressBucket,
  StressOperations,
  StressStage,
  uploadObjsToBuckets
} from '../src/stress';
import { StopEvent, WorkerPool } from '../src/worker_pool';
import { failure, FakeOc, testMcg, testPod, toolsPods } from './fake_oc';

// Operations recording "stage:bucket:iteration:multiplier" of each call.
// The failing ones throw for the given stage and bucket.
function recordingOps (calls: string[], failing: Partial<Record<StressStage, string>> = {}): StressOperations {
  const op = (stage: StressStage) => async (bucket: StressBucket, iteration: number, multiplier: number) => {
    calls.push(`${stage}:${bucket.name}:${iteration}:${multiplier}`);
    if (failing[stage] === bucket.name) {
      throw new Error(`${stage} failed`);
    }
  };
  return {
    upload: op('upload'),
    list: op('list'),
    download: op('download'),
    delete: op('delete')
  };
}

const BUCKETS: StressBucket[] = [
  { kind: 'oc', name: 'bucket-1' },
  { kind: 'oc', name: 'bucket-2' }
];

module.exports = function () {
  it('should name the prefix by the iteration', () => {
    expect(iterationPrefix(3)).to.equal('objects-3');
  });

  it('should run all stages on all buckets in each iteration', async () => {
    const calls: string[] = [];
    const result = await runStressLoop({
      buckets: BUCKETS,
      iterations: 2,
      pool: new WorkerPool(2),
      stopEvent: new StopEvent(),
      operations: recordingOps(calls)
    });
    expect(result).to.deep.equal({ iterationsCompleted: 2, failures: [] });
    expect(calls).to.have.lengthOf(16);
    expect(calls.filter((c) => c.startsWith('upload:')).sort()).to.deep.equal([
      'upload:bucket-1:1:1',
      'upload:bucket-1:2:2',
      'upload:bucket-2:1:1',
      'upload:bucket-2:2:2'
    ]);
    // stages of an iteration don't overlap
    expect(calls.slice(0, 2).every((c) => c.startsWith('upload:'))).to.be.true;
    expect(calls.slice(6, 8).every((c) => c.startsWith('delete:'))).to.be.true;
  });

  it('should collect the failures and go on', async () => {
    const calls: string[] = [];
    const result = await runStressLoop({
      buckets: BUCKETS,
      iterations: 2,
      pool: new WorkerPool(2),
      stopEvent: new StopEvent(),
      operations: recordingOps(calls, { list: 'bucket-2' })
    });
    expect(result.iterationsCompleted).to.equal(2);
    expect(result.failures).to.deep.equal([
      { iteration: 1, stage: 'list', bucket: 'bucket-2', error: 'list failed' },
      { iteration: 2, stage: 'list', bucket: 'bucket-2', error: 'list failed' }
    ]);
    expect(calls).to.have.lengthOf(16);
  });

  it('should stop on the first failure with fail fast', async () => {
    const calls: string[] = [];
    const stopEvent = new StopEvent();
    const result = await runStressLoop({
      buckets: BUCKETS,
      iterations: 3,
      pool: new WorkerPool(1),
      stopEvent,
      operations: recordingOps(calls, { upload: 'bucket-1' }),
      failFast: true
    });
    expect(stopEvent.isSet()).to.be.true;
    expect(result.iterationsCompleted).to.equal(0);
    expect(result.failures).to.have.lengthOf(1);
    expect(calls).to.deep.equal(['upload:bucket-1:1:1']);
  });

  it('should not start when stopped', async () => {
    const calls: string[] = [];
    const stopEvent = new StopEvent();
    stopEvent.set();
    const result = await runStressLoop({
      buckets: BUCKETS,
      iterations: 3,
      pool: new WorkerPool(2),
      stopEvent,
      operations: recordingOps(calls)
    });
    expect(result).to.deep.equal({ iterationsCompleted: 0, failures: [] });
    expect(calls).to.have.lengthOf(0);
  });

  it('should pass the multiplier to the operation', async () => {
    const calls: string[] = [];
    const failures = await fanOut(recordingOps(calls).upload, 'upload', BUCKETS.slice(0, 1), 4, {
      pool: new WorkerPool(1),
      multiplier: 3
    });
    expect(failures).to.deep.equal([]);
    expect(calls).to.deep.equal(['upload:bucket-1:4:3']);
  });

  describe('aws CLI operations', () => {
    let fake: FakeOc;
    const bucket: StressBucket = { kind: 'oc', name: 'bucket-1', mcg: testMcg() };
    const awsPrefix =
      'oc -n openshift-storage rsh awscli-relay-pod sh -c ' +
      'AWS_CA_BUNDLE=/cert/service-ca.crt AWS_ACCESS_KEY_ID=test-access-key ' +
      'AWS_SECRET_ACCESS_KEY=test-secret AWS_DEFAULT_REGION=us-east-2 ' +
      'aws s3 --endpoint=https://s3.openshift-storage.svc:443';

    beforeEach(() => {
      fake = new FakeOc().install();
      fake.on('', {});
    });

    afterEach(() => {
      fake.uninstall();
    });

    it('should upload the objects multiplier times', async () => {
      await awscliOperations(testPod()).upload(bucket, 2, 2);
      expect(fake.calls).to.deep.equal([
        `${awsPrefix} sync /test_objects/ s3://bucket-1/objects-2/0/`,
        `${awsPrefix} sync /test_objects/ s3://bucket-1/objects-2/1/`
      ]);
    });

    it('should download the objects and remove them', async () => {
      await awscliOperations(testPod(), '/test_objects/', '/tmp/results').download(bucket, 1, 1);
      expect(fake.calls).to.deep.equal([
        `${awsPrefix} sync s3://bucket-1/objects-1 /tmp/results/bucket-1`,
        'oc -n openshift-storage exec awscli-relay-pod -- sh -c rm -rf /tmp/results/bucket-1'
      ]);
    });

    it('should raise the failure of the upload to the buckets', async () => {
      // the failure must precede the rule matching any command
      fake.uninstall();
      fake = new FakeOc().install()
        .on('s3://bucket-2/', failure('upload failed: access denied'))
        .on('', {});
      const buckets: StressBucket[] = [bucket, { kind: 'oc', name: 'bucket-2', mcg: testMcg() }];
      try {
        await uploadObjsToBuckets(testPod(), buckets, 1, { pool: new WorkerPool(2) });
      } catch (err) {
        expect(err).to.be.instanceOf(StressOperationFailed);
        expect(err).to.have.property('message').that.match(/^upload of bucket-2 failed: /);
        expect(err).to.have.property('failures').that.has.lengthOf(1);
        return;
      }
      throw new Error('Expected an exception');
    });

    it('should delete the objects of the iteration', async () => {
      await awscliOperations(testPod()).delete(bucket, 1, 1);
      expect(fake.calls).to.deep.equal([`${awsPrefix} rm s3://bucket-1/objects-1 --recursive`]);
    });
  });

  describe('background health check', () => {
    let fake: FakeOc;

    beforeEach(() => {
      fake = new FakeOc().install();
    });

    afterEach(() => {
      fake.uninstall();
    });

    it('should collect the failed checks until stopped', async () => {
      const stopEvent = new StopEvent();
      let checks = 0;
      fake
        .on('--selector=app=rook-ceph-tools', { stdout: toolsPods(['Running']) })
        .on('ceph health', () => {
          checks++;
          if (checks === 3) {
            stopEvent.set();
          }
          return { stdout: checks === 2 ? 'HEALTH_WARN 1 osds down\n' : 'HEALTH_OK\n' };
        });
      const failures = await runBackgroundCephHealthCheck(stopEvent, 0.01, 'openshift-storage');
      expect(checks).to.equal(3);
      expect(failures).to.have.lengthOf(1);
      expect(failures[0]).to.match(/ Ceph cluster health is not OK\. Health: HEALTH_WARN 1 osds down\n$/);
    });
  });
};
