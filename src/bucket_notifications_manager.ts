// Bucket notifications of MCG: NooBaa sends the S3 events of the buckets
// to a Kafka topic through the connections listed in its CR.

import * as fs from 'fs';
import * as path from 'path';
import { craftS3Command, parseS3ApiOutput } from './bucket_utils';
import { clusterNamespace, config } from './config';
import {
  AMQ_NAMESPACE,
  CUSTOM_MCG_LABEL,
  DEFAULT_MCG_BUCKET_NOTIFS_PVC,
  KAFKA_CONSUMER_BIN,
  KAFKA_ENDPOINT,
  KAFKA_PODS_LABEL,
  NOOBAA_CORE_POD,
  NOOBAA_RESOURCE_KIND,
  NOOBAA_RESOURCE_NAME,
  PV,
  PVC,
  SECRET
} from './constants';
import { CommandFailed } from './exceptions';
import { Logger } from './logger';
import type { MCG } from './mcg';
import { OCP } from './ocp';
import { getNoobaaPods, getPods, Pod, waitForPodsToBeRunning } from './pod';
import { dumpDataToTempJson } from './templating';
import { createUniqueResourceName, errorMessage, getStr, isRecord, sleep } from './utils';

const log = Logger('bucket-notifs');

export const NOTIFS_YAML_PATH_NB_CR = '/spec/bucketNotifications';

export type KafkaConnection = {
  // name of the connection, used as the topic of the notification config
  connName: string;
  secretName: string;
  // name of the file in the secret
  connFileName: string;
}

export type BucketEvent = Record<string, unknown>;

// Parse the output of the kafka console consumer. Every line holds one
// notification with the event as the single item of Records.
export function parseKafkaEvents (raw: string): BucketEvent[] {
  const events: BucketEvent[] = [];
  for (const line of raw.split('\n')) {
    if (!line.trim()) {
      continue;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err) {
      log.warn(`Failed to parse event line: ${line}, error: ${errorMessage(err)}`);
      continue;
    }
    const records = isRecord(parsed) ? parsed.Records : undefined;
    const event = Array.isArray(records) ? records[0] : undefined;
    if (isRecord(event)) {
      events.push(event);
    } else {
      log.warn(`No event record in line: ${line}`);
    }
  }
  return events;
}

export class BucketNotificationsManager {
  mcg?: MCG;
  namespace: string;
  kafkaNamespace: string;
  kafkaEndpoint: string;
  connSecrets: string[];
  // seconds to wait after put-bucket-notification
  propagationWait: number;

  constructor (mcg?: MCG, namespace?: string) {
    this.mcg = mcg;
    this.namespace = namespace || clusterNamespace();
    this.kafkaNamespace = config.getString('ENV_DATA', 'amq_namespace', AMQ_NAMESPACE) || AMQ_NAMESPACE;
    this.kafkaEndpoint = config.getString('ENV_DATA', 'kafka_endpoint', KAFKA_ENDPOINT) || KAFKA_ENDPOINT;
    this.connSecrets = [];
    this.propagationWait = 60;
  }

  get nbConfigResource (): OCP {
    return new OCP({ kind: NOOBAA_RESOURCE_KIND, namespace: this.namespace, resourceName: NOOBAA_RESOURCE_NAME });
  }

  private async waitForCorePod () {
    await waitForPodsToBeRunning(this.namespace, [NOOBAA_CORE_POD], 60, 10);
  }

  // Enable the feature on the NooBaa CR.
  //
  // @param pvcName  PVC for the pending notifications, NooBaa creates its
  //                 own if not given.
  async enableOnNoobaaCr (pvcName?: string) {
    log.info('Enabling bucket notifications on the NooBaa CR');
    const value: Record<string, unknown> = { connections: [], enabled: true };
    if (pvcName) {
      value.pvc = pvcName;
    }
    const patch = (op: string) => this.nbConfigResource.patch({
      params: JSON.stringify([{ op, path: NOTIFS_YAML_PATH_NB_CR, value }]),
      formatType: 'json'
    });
    try {
      await patch('add');
    } catch (err) {
      if (err instanceof CommandFailed && err.message.toLowerCase().includes('already exists')) {
        await patch('replace');
      } else {
        log.error(`Failed to enable bucket notifications: ${errorMessage(err)}`);
        throw err;
      }
    }
    // the PVC and its PV may stay after the tests
    const pvc = pvcName || DEFAULT_MCG_BUCKET_NOTIFS_PVC;
    const pvcOcp = new OCP({ kind: PVC, namespace: this.namespace });
    const pvName = getStr(await pvcOcp.get({ resourceName: pvc }), 'spec.volumeName');
    await pvcOcp.addLabel(pvc, CUSTOM_MCG_LABEL);
    if (pvName) {
      await new OCP({ kind: PV }).addLabel(pvName, CUSTOM_MCG_LABEL);
    }
    await this.waitForCorePod();
    log.info('Bucket notifications have been enabled');
  }

  async disableOnNoobaaCr () {
    log.info('Disabling bucket notifications on the NooBaa CR');
    try {
      await this.nbConfigResource.patch({
        params: JSON.stringify([{ op: 'replace', path: NOTIFS_YAML_PATH_NB_CR, value: null }]),
        formatType: 'json'
      });
    } catch (err) {
      if (err instanceof CommandFailed && err.message.toLowerCase().includes('not found')) {
        log.info('The bucketNotifications field was not found');
      } else {
        log.error(`Failed to disable bucket notifications: ${errorMessage(err)}`);
        throw err;
      }
    }
    await this.waitForCorePod();
    log.info('Bucket notifications have been disabled');
  }

  // Create the secret with the JSON file which defines the Kafka
  // connection for NooBaa.
  async createKafkaConnSecret (topic: string, kafkaClientId?: string): Promise<KafkaConnection> {
    const connName = createUniqueResourceName('nb-notif', 'kafka-conn');
    const secretName = `${connName}-secret`;
    const connConfig: Record<string, string> = {
      'metadata.broker.list': this.kafkaEndpoint,
      notification_protocol: 'kafka',
      topic,
      name: connName
    };
    if (kafkaClientId) {
      connConfig.kafka_client_id = kafkaClientId;
    }
    const connFile = dumpDataToTempJson(connConfig, 'kafka_conn');
    try {
      await new OCP().execOcCmd(
        `create secret generic ${secretName} --from-file=${connFile} -n ${this.namespace}`,
        { outYamlFormat: false }
      );
    } finally {
      fs.rmSync(connFile, { force: true });
    }
    this.connSecrets.push(secretName);
    return { connName, secretName, connFileName: path.basename(connFile) };
  }

  // Append the connection secret to the connections in the NooBaa CR.
  async addNotificationConnection (secretName: string) {
    const value = { name: secretName, namespace: this.namespace };
    await this.nbConfigResource.patch({
      params: JSON.stringify([{ op: 'add', path: `${NOTIFS_YAML_PATH_NB_CR}/connections/-`, value }]),
      formatType: 'json'
    });
    const names = (await getNoobaaPods(this.namespace)).map((pod) => pod.name);
    await waitForPodsToBeRunning(this.namespace, names, 60, 10);
  }

  // Enable the feature and create a connection to the topic.
  async setup (topic: string, pvcName?: string): Promise<KafkaConnection> {
    await this.enableOnNoobaaCr(pvcName);
    const conn = await this.createKafkaConnSecret(topic);
    await this.addNotificationConnection(conn.secretName);
    return conn;
  }

  private requireMcg (): MCG {
    if (!this.mcg) {
      throw new CommandFailed('MCG object is needed for the S3 calls');
    }
    return this.mcg;
  }

  // Configure notifications of the bucket.
  //
  // @param events    S3 events, i.e. ['s3:ObjectCreated:*'].
  // @param connFile  The file name of the connection in its secret.
  async putBucketNotification (awscliPod: Pod, bucket: string, events: string[], connFile: string) {
    const notifConfig = {
      TopicConfiguration: {
        Id: createUniqueResourceName('notif', 'id'),
        Events: events,
        Topic: connFile
      }
    };
    const notifJson = JSON.stringify(notifConfig).replace(/"/g, '\\"');
    const mcg = this.requireMcg();
    await awscliPod.execCmdOnPod(
      craftS3Command(`put-bucket-notification --bucket ${bucket} --notification-configuration '${notifJson}'`, mcg, true),
      { outYamlFormat: false, secrets: [mcg.accessKeyId, mcg.accessKey, mcg.s3InternalEndpoint] }
    );
    log.info('Waiting for put-bucket-notification to propagate');
    await sleep(this.propagationWait);
  }

  async getBucketNotification (awscliPod: Pod, bucket: string): Promise<Record<string, unknown>> {
    const mcg = this.requireMcg();
    const out = await awscliPod.execCmdOnPod(
      craftS3Command(`get-bucket-notification --bucket ${bucket}`, mcg, true),
      { outYamlFormat: false, secrets: [mcg.accessKeyId, mcg.accessKey, mcg.s3InternalEndpoint] }
    );
    return parseS3ApiOutput(out);
  }

  // Events received by the topic from its beginning.
  //
  // @param timeoutMs  How long the consumer waits for new events.
  async getEvents (topic: string, timeoutMs = 5000): Promise<BucketEvent[]> {
    const label = config.getString('ENV_DATA', 'kafka_pods_label', KAFKA_PODS_LABEL) || KAFKA_PODS_LABEL;
    const pods = await getPods({ namespace: this.kafkaNamespace, selector: label });
    if (pods.length === 0) {
      throw new CommandFailed(`No kafka pod with label ${label} in ${this.kafkaNamespace}`);
    }
    const cmd =
      `${KAFKA_CONSUMER_BIN} --bootstrap-server ${this.kafkaEndpoint} ` +
      `--topic ${topic} --from-beginning --timeout-ms ${timeoutMs}`;
    const raw = await pods[0].execCmdOnPod(cmd, { outYamlFormat: false });
    return parseKafkaEvents(raw);
  }

  // Disable the feature and delete the connection secrets.
  async cleanup () {
    await this.disableOnNoobaaCr();
    const secrets = new OCP({ kind: SECRET, namespace: this.namespace });
    for (const secretName of this.connSecrets) {
      await secrets.delete({ resourceName: secretName });
    }
    this.connSecrets = [];
  }
}
