// Unit tests for the bucket notifications manager

import { expect } from 'chai';
import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { BucketNotificationsManager, parseKafkaEvents } from '../src/bucket_notifications_manager';
import { CommandFailed } from '../src/exceptions';
import { failure, FakeOc, testMcg, testPod } from './fake_oc';

const CORE_POD_RUNNING = yaml.dump({
  items: [{ metadata: { name: 'noobaa-core-0' }, status: { phase: 'Running' } }]
});

module.exports = function () {
  let fake: FakeOc;

  beforeEach(() => {
    fake = new FakeOc().install();
  });

  afterEach(() => {
    fake.uninstall();
  });

  it('should parse the events printed by the kafka consumer', () => {
    const raw = [
      JSON.stringify({ Records: [{ eventName: 'ObjectCreated:Put', s3: { object: { key: 'obj-1' } } }] }),
      'Processed a total of 2 messages',
      '',
      JSON.stringify({ Records: [] }),
      JSON.stringify({ Records: [{ eventName: 'ObjectRemoved:Delete' }] })
    ].join('\n');
    expect(parseKafkaEvents(raw)).to.deep.equal([
      { eventName: 'ObjectCreated:Put', s3: { object: { key: 'obj-1' } } },
      { eventName: 'ObjectRemoved:Delete' }
    ]);
  });

  it('should replace the config in CR if it already exists', async () => {
    fake
      .once('"op":"add"', failure('The request is invalid: the path "/spec/bucketNotifications" already exists'))
      .on('"op":"replace"', { stdout: 'noobaa.noobaa.io/noobaa patched' })
      .on('get PersistentVolumeClaim', { stdout: 'spec:\n  volumeName: pv-notifs\n' })
      .on(' label ', { stdout: 'labeled' })
      .on('get Pod', { stdout: CORE_POD_RUNNING });
    const manager = new BucketNotificationsManager(testMcg(), 'openshift-storage');
    await manager.enableOnNoobaaCr('notifs-pvc');

    const patches = fake.callsWith(' patch ');
    expect(patches).to.have.lengthOf(2);
    expect(patches[1]).to.equal(
      'oc -n openshift-storage patch noobaa noobaa -n openshift-storage -p ' +
      '[{"op":"replace","path":"/spec/bucketNotifications","value":{"connections":[],"enabled":true,"pvc":"notifs-pvc"}}] ' +
      '--type json'
    );
    expect(fake.callsWith(' label ')).to.deep.equal([
      'oc -n openshift-storage label PersistentVolumeClaim notifs-pvc custom=mcg-label',
      'oc label PersistentVolume pv-notifs custom=mcg-label'
    ]);
  });

  it('should fail enabling if the patch fails for other reason', async () => {
    fake.on(' patch ', failure('Error from server (Forbidden): noobaas.noobaa.io "noobaa" is forbidden'));
    const manager = new BucketNotificationsManager(testMcg(), 'openshift-storage');
    try {
      await manager.enableOnNoobaaCr();
    } catch (err) {
      expect(err).to.be.instanceOf(CommandFailed);
      expect(fake.callsWith(' patch ')).to.have.lengthOf(1);
      return;
    }
    throw new Error('Expected an exception');
  });

  it('should tolerate missing config when disabling', async () => {
    fake
      .on(' patch ', failure('The request is invalid: the server could not find the requested resource: not found'))
      .on('get Pod', { stdout: CORE_POD_RUNNING });
    const manager = new BucketNotificationsManager(testMcg(), 'openshift-storage');
    await manager.disableOnNoobaaCr();
    expect(fake.callsWith(' patch ')[0]).to.include('"value":null');
  });

  it('should create the connection secret', async () => {
    let connConfig: unknown;
    let connFile = '';
    fake.on('create secret generic', (args) => {
      const fileArg = args.find((arg) => arg.startsWith('--from-file='));
      if (fileArg) {
        connFile = fileArg.slice('--from-file='.length);
        connConfig = JSON.parse(fs.readFileSync(connFile, 'utf8'));
      }
      return { stdout: 'secret/created' };
    });
    const manager = new BucketNotificationsManager(testMcg(), 'openshift-storage');
    manager.kafkaEndpoint = 'kafka.example.com:9092';
    const conn = await manager.createKafkaConnSecret('topic-1', 'client-1');

    expect(conn.secretName).to.equal(`${conn.connName}-secret`);
    expect(conn.connName).to.match(/^kafka-conn-nb-notif-/);
    expect(conn.connFileName).to.match(/^kafka_conn-[a-z0-9]+\.json$/);
    expect(connConfig).to.deep.equal({
      'metadata.broker.list': 'kafka.example.com:9092',
      notification_protocol: 'kafka',
      topic: 'topic-1',
      name: conn.connName,
      kafka_client_id: 'client-1'
    });
    expect(manager.connSecrets).to.deep.equal([conn.secretName]);
    expect(connFile).to.not.equal('');
    expect(fs.existsSync(connFile)).to.be.false;
  });

  it('should remove the connection file if the secret cannot be created', async () => {
    let connFile = '';
    fake.on('create secret generic', (args) => {
      const fileArg = args.find((arg) => arg.startsWith('--from-file='));
      connFile = fileArg ? fileArg.slice('--from-file='.length) : '';
      return failure('error: failed to create secret: secrets "kafka-conn" already exists');
    });
    const manager = new BucketNotificationsManager(testMcg(), 'openshift-storage');
    try {
      await manager.createKafkaConnSecret('topic-1');
    } catch (err) {
      expect(err).to.be.instanceOf(CommandFailed);
      expect(connFile).to.not.equal('');
      expect(fs.existsSync(connFile)).to.be.false;
      expect(manager.connSecrets).to.deep.equal([]);
      return;
    }
    throw new Error('Expected an exception');
  });

  it('should put the notification config on the bucket', async () => {
    let script = '';
    fake.on('put-bucket-notification', (args) => {
      script = args[args.length - 1];
      return {};
    });
    const manager = new BucketNotificationsManager(testMcg(), 'openshift-storage');
    manager.propagationWait = 0;
    await manager.putBucketNotification(testPod(), 'bucket-1', ['s3:ObjectCreated:*'], 'kafka_conn-1.json');

    expect(script).to.include('aws s3api --endpoint=https://s3.openshift-storage.svc:443 put-bucket-notification --bucket bucket-1');
    const match = /'(\{.*\})'/.exec(script);
    expect(match).to.not.be.null;
    const notifConfig: unknown = JSON.parse(match ? match[1] : '{}');
    expect(notifConfig).to.have.nested.property('TopicConfiguration.Topic', 'kafka_conn-1.json');
    expect(notifConfig).to.have.nested.deep.property('TopicConfiguration.Events', ['s3:ObjectCreated:*']);
  });

  it('should get the notification config of the bucket', async () => {
    const notifConfig = { TopicConfigurations: [{ Id: 'id-1', TopicArn: 'kafka_conn-1.json' }] };
    fake.on('get-bucket-notification --bucket bucket-1', { stdout: JSON.stringify(notifConfig) });
    const manager = new BucketNotificationsManager(testMcg(), 'openshift-storage');
    expect(await manager.getBucketNotification(testPod(), 'bucket-1')).to.deep.equal(notifConfig);
  });

  it('should fail if the notification config is not JSON', async () => {
    fake.on('get-bucket-notification --bucket bucket-1', {
      stdout: 'An error occurred (NoSuchBucket) when calling the GetBucketNotificationConfiguration operation'
    });
    const manager = new BucketNotificationsManager(testMcg(), 'openshift-storage');
    try {
      await manager.getBucketNotification(testPod(), 'bucket-1');
    } catch (err) {
      expect(err).to.be.instanceOf(CommandFailed);
      expect(err).to.have.property('message').that.match(/^Unexpected output of s3api /);
      return;
    }
    throw new Error('Expected an exception');
  });

  it('should require MCG for the S3 calls', async () => {
    const manager = new BucketNotificationsManager(undefined, 'openshift-storage');
    try {
      await manager.getBucketNotification(testPod(), 'bucket-1');
    } catch (err) {
      expect(err).to.be.instanceOf(CommandFailed);
      expect(fake.calls).to.have.lengthOf(0);
      return;
    }
    throw new Error('Expected an exception');
  });

  it('should read the events from the kafka pod', async () => {
    const event = JSON.stringify({ Records: [{ eventName: 'ObjectCreated:Put' }] });
    fake
      .on('get Pod -n myproject --selector=strimzi.io/name=my-cluster-kafka', {
        stdout: yaml.dump({ items: [{ metadata: { name: 'kafka-0', namespace: 'myproject' } }] })
      })
      .on('rsh kafka-0', { stdout: event + '\n' });
    const manager = new BucketNotificationsManager(testMcg(), 'openshift-storage');
    manager.kafkaEndpoint = 'kafka.example.com:9092';
    expect(await manager.getEvents('topic-1', 1000)).to.deep.equal([{ eventName: 'ObjectCreated:Put' }]);
    expect(fake.callsWith('rsh kafka-0')).to.deep.equal([
      'oc -n myproject rsh kafka-0 /opt/kafka/bin/kafka-console-consumer.sh ' +
      '--bootstrap-server kafka.example.com:9092 --topic topic-1 --from-beginning --timeout-ms 1000'
    ]);
  });
};
