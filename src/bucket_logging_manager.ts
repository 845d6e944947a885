// Guaranteed bucket logging of MCG. The operations on a source bucket are
// written as JSON lines to the logging PVC mounted on the noobaa pods, and
// later moved to the logs bucket.

import { craftS3Command, listObjects, parseS3ApiOutput } from './bucket_utils';
import { clusterNamespace } from './config';
import {
  BUCKET_LOGS_MOUNT_PATH,
  BUCKET_LOGS_VOLUME_NAME,
  DEFAULT_MCG_BUCKET_LOGS_PVC,
  NOOBAA_CORE_POD_LABEL,
  NOOBAA_ENDPOINT_POD_LABEL,
  NOOBAA_RESOURCE_KIND,
  NOOBAA_RESOURCE_NAME,
  POD
} from './constants';
import { CommandFailed, InvalidBucketLoggingConfig, TimeoutExpiredError } from './exceptions';
import { Logger } from './logger';
import type { MCG } from './mcg';
import { OCP } from './ocp';
import { getNoobaaCorePod, Pod } from './pod';
import { TimeoutSampler } from './timeout_sampler';
import { errorMessage, getList, getRecord, getStr, isRecord, sleep } from './utils';

const log = Logger('bucket-logging');

export const LOG_CONFIG_YAML_PATH = '/spec/bucketLogging';

export type BucketLog = Record<string, unknown>;

// [operation, object key], i.e. ['PUT', 'obj1']
export type ExpectedOp = [string, string];

// Parse JSON lines of a log file. Lines which are not JSON are skipped.
export function parseLogFileStr (logFileStr: string): BucketLog[] {
  const logs: BucketLog[] = [];
  for (const line of logFileStr.split('\n')) {
    if (!line.trim()) {
      continue;
    }
    try {
      const parsed: unknown = JSON.parse(line);
      if (isRecord(parsed)) {
        logs.push(parsed);
      }
    } catch (err) {
      log.warn(`Failed to parse log line: ${line}, error: ${errorMessage(err)}`);
    }
  }
  return logs;
}

function opKey (op: string, key: string, httpStatus: string): string {
  return `${op}-${key}-${httpStatus}`;
}

// Expected operations missing in the logs. Each operation is expected to
// be done once; successful DELETE is logged with 204, the rest with 200.
// Intent logs have the http status 102.
export function missingOps (logs: BucketLog[], expectedOps: ExpectedOp[], checkIntent = false): string[] {
  const expected: string[] = [];
  for (const [op, key] of expectedOps) {
    expected.push(opKey(op, key, op === 'DELETE' ? '204' : '200'));
  }
  if (checkIntent) {
    for (const [op, key] of expectedOps) {
      expected.push(opKey(op, key, '102'));
    }
  }
  const logged = new Set(logs.map((entry) => opKey(
    String(entry.op),
    String(entry.object_key),
    String(entry.http_status)
  )));
  return expected.filter((item) => !logged.has(item));
}

// Whether all the expected operations are in the logs. Extra logs are fine.
export function verifyLogsIntegrity (logs: BucketLog[], expectedOps: ExpectedOp[], checkIntent = false): boolean {
  const missing = missingOps(logs, expectedOps, checkIntent);
  if (missing.length > 0) {
    log.warn(`Operations missing in the bucket logs: ${missing.join(', ')}`);
  }
  return missing.length === 0;
}

export class BucketLoggingManager {
  mcg: MCG;
  awscliPod?: Pod;
  namespace: string;
  curLogsPvc: string;
  // seconds to wait after the logging config is confirmed
  propagationWait: number;

  constructor (mcg: MCG, awscliPod?: Pod, namespace?: string) {
    this.mcg = mcg;
    this.awscliPod = awscliPod;
    this.namespace = namespace || clusterNamespace();
    this.curLogsPvc = DEFAULT_MCG_BUCKET_LOGS_PVC;
    this.propagationWait = 60;
  }

  get nbConfigResource (): OCP {
    return new OCP({ kind: NOOBAA_RESOURCE_KIND, namespace: this.namespace, resourceName: NOOBAA_RESOURCE_NAME });
  }

  private requirePod (): Pod {
    if (!this.awscliPod) {
      throw new CommandFailed('awscli pod is needed for the S3 calls');
    }
    return this.awscliPod;
  }

  private async s3api (cmd: string): Promise<string> {
    return this.requirePod().execCmdOnPod(craftS3Command(cmd, this.mcg, true), {
      outYamlFormat: false,
      secrets: [this.mcg.accessKeyId, this.mcg.accessKey, this.mcg.s3InternalEndpoint]
    });
  }

  // Enable guaranteed bucket logs.
  //
  // @param logsPvc  PVC for the intermediate logs, MCG creates its own if
  //                 not given.
  async enableOnNoobaaCr (logsPvc?: string) {
    log.info('Enabling guaranteed bucket logs');
    const value: Record<string, string> = { loggingType: 'guaranteed' };
    if (logsPvc) {
      value.bucketLoggingPVC = logsPvc;
    }
    const patch = (op: string) => this.nbConfigResource.patch({
      params: JSON.stringify([{ op, path: LOG_CONFIG_YAML_PATH, value }]),
      formatType: 'json'
    });
    try {
      await patch('add');
    } catch (err) {
      if (err instanceof CommandFailed && err.message.toLowerCase().includes('already exists')) {
        await patch('replace');
      } else {
        log.error(`Failed to enable guaranteed bucket logs: ${errorMessage(err)}`);
        throw err;
      }
    }
    this.curLogsPvc = logsPvc || DEFAULT_MCG_BUCKET_LOGS_PVC;
    log.info('Guaranteed bucket logs have been enabled');
  }

  async getLoggingConfigFromCr (): Promise<Record<string, unknown>> {
    return getRecord(await this.nbConfigResource.get(), 'spec.bucketLogging');
  }

  async disableOnNoobaaCr () {
    log.info('Disabling guaranteed bucket logs');
    try {
      await this.nbConfigResource.patch({
        params: JSON.stringify([{ op: 'replace', path: LOG_CONFIG_YAML_PATH, value: null }]),
        formatType: 'json'
      });
    } catch (err) {
      if (err instanceof CommandFailed && err.message.includes('not found')) {
        log.info('The bucketLogging field was not found');
      } else {
        log.error(`Failed to disable guaranteed bucket logs: ${errorMessage(err)}`);
        throw err;
      }
    }
    log.info('Guaranteed bucket logs have been disabled');
  }

  // Set the logs bucket on the source bucket.
  //
  // @param verify  Wait until get-bucket-logging shows the logs bucket.
  async putBucketLogging (bucketName: string, logsBucketName: string, prefix = '', verify = true) {
    log.info(`Setting the logs bucket ${logsBucketName} on the source bucket ${bucketName}`);
    const loggingStatus = {
      LoggingEnabled: { TargetBucket: logsBucketName, TargetPrefix: prefix }
    };
    const cmd =
      `put-bucket-logging --bucket ${bucketName} ` +
      `--bucket-logging-status '${JSON.stringify(loggingStatus)}'`;
    await this.s3api(cmd.replace(/"/g, '\\"'));

    if (verify) {
      const targetBucket = async () => getStr(await this.getBucketLogging(bucketName), 'LoggingEnabled.TargetBucket');
      try {
        await new TimeoutSampler(60, 10, targetBucket).waitForFuncValue(logsBucketName);
      } catch (err) {
        if (err instanceof TimeoutExpiredError) {
          throw new InvalidBucketLoggingConfig(`Failed to set guaranteed bucket logging on ${bucketName}`);
        }
        throw err;
      }
      log.info(`Confirmed logging config on ${bucketName} via get-bucket-logging`);
      await sleep(this.propagationWait);
    }
    log.info(`The logs bucket ${logsBucketName} has been set on the source bucket ${bucketName}`);
  }

  async getBucketLogging (bucketName: string): Promise<Record<string, unknown>> {
    return parseS3ApiOutput(await this.s3api(`get-bucket-logging --bucket ${bucketName}`));
  }

  async removeBucketLogging (bucketName: string) {
    log.info(`Removing the logging configuration from the bucket ${bucketName}`);
    await this.s3api(`put-bucket-logging --bucket ${bucketName} --bucket-logging-status '{}'`);
  }

  // Whether each noobaa core and endpoint pod mounts the logs PVC at the
  // expected path.
  //
  // @returns Pod name to the answer.
  async getLogsPvcMountStatus (): Promise<Record<string, boolean>> {
    const pods: unknown[] = [];
    for (const selector of [NOOBAA_CORE_POD_LABEL, NOOBAA_ENDPOINT_POD_LABEL]) {
      const data = await new OCP({ kind: POD, namespace: this.namespace, selector }).get();
      pods.push(...getList(data, 'items'));
    }
    const status: Record<string, boolean> = {};
    for (const pod of pods) {
      const name = getStr(pod, 'metadata.name');
      if (!name) {
        continue;
      }
      const volume = getList(pod, 'spec.volumes').find((v) => getStr(v, 'name') === BUCKET_LOGS_VOLUME_NAME);
      const pvcOk = volume !== undefined && getStr(volume, 'persistentVolumeClaim.claimName') === this.curLogsPvc;
      const mount = getList(pod, ['spec', 'containers', 0, 'volumeMounts'])
        .find((vm) => getStr(vm, 'name') === BUCKET_LOGS_VOLUME_NAME);
      const mountOk = mount !== undefined && getStr(mount, 'mountPath') === BUCKET_LOGS_MOUNT_PATH;
      status[name] = pvcOk && mountOk;
    }
    return status;
  }

  // Wait for the noobaa pods to mount (or unmount) the logs PVC.
  //
  // @returns False if some pod did not get there in time.
  async waitForLogsPvcMountStatus (mountStatusExpected = true, timeout = 300, sleepSec = 15): Promise<boolean> {
    log.info('Waiting for the noobaa pods to mount/unmount the logs PVC');
    let lastStatus: Record<string, boolean> = {};
    try {
      for await (const status of new TimeoutSampler(timeout, sleepSec, () => this.getLogsPvcMountStatus())) {
        const answers = Object.values(status);
        if (mountStatusExpected ? answers.every((a) => a) : !answers.some((a) => a)) {
          log.info(mountStatusExpected
            ? 'All noobaa pods have mounted the logs PVC'
            : 'All noobaa pods have unmounted the logs PVC');
          return true;
        }
        lastStatus = status;
        log.warn(`Waiting for the logs PVC mount status of the pods: ${JSON.stringify(status)}`);
      }
    } catch (err) {
      if (!(err instanceof TimeoutExpiredError)) {
        throw err;
      }
    }
    log.warn(`The noobaa pods did not reach the logs PVC mount status in time: ${JSON.stringify(lastStatus)}`);
    return false;
  }

  // Intermediate logs on the logging PVC, read via the noobaa core pod.
  async getIntermLogs (filter: { sourceBucket?: string, logsBucket?: string } = {}): Promise<BucketLog[]> {
    const corePod = await getNoobaaCorePod(this.namespace);
    const files = await corePod.execCmdOnPod(`ls ${BUCKET_LOGS_MOUNT_PATH}`, { outYamlFormat: false });
    let logs: BucketLog[] = [];
    for (const file of files.trim().split('\n')) {
      if (!file.trim()) {
        continue;
      }
      const content = await corePod.execCmdOnPod(`cat ${BUCKET_LOGS_MOUNT_PATH}/${file.trim()}`, { outYamlFormat: false });
      logs.push(...parseLogFileStr(content));
    }
    if (filter.sourceBucket) {
      logs = logs.filter((entry) => entry.source_bucket === filter.sourceBucket);
    }
    if (filter.logsBucket) {
      logs = logs.filter((entry) => entry.log_bucket === filter.logsBucket);
    }
    return logs;
  }

  // Wait until the intermediate logs show up and then are moved to the
  // logs bucket.
  async awaitIntermLogsTransfer (logsBucket: string, timeout = 600, sleepSec = 10) {
    log.info('Waiting for the intermediate logs to move to the logs bucket');
    let found = false;
    try {
      for await (const logs of new TimeoutSampler(timeout, sleepSec, () => this.getIntermLogs({ logsBucket }))) {
        if (logs.length > 0) {
          log.info(found
            ? 'Still waiting for the intermediate logs to be moved to the logs bucket'
            : 'Some intermediate logs were found, waiting for them to be moved');
          found = true;
        } else if (found) {
          log.info('Intermediate logs have been moved to the logs bucket');
          return;
        } else {
          log.info('No intermediate logs were found yet');
        }
      }
    } catch (err) {
      if (err instanceof TimeoutExpiredError) {
        log.error(found
          ? `The intermediate logs were not transferred to the logs bucket ${logsBucket} in time`
          : 'Intermediate logs were not found in the logging PVC');
      }
      throw err;
    }
  }

  // Logs stored in the logs bucket.
  async getBucketLogs (logsBucket: string, sourceBucket?: string): Promise<BucketLog[]> {
    const pod = this.requirePod();
    const secrets = [this.mcg.accessKeyId, this.mcg.accessKey, this.mcg.s3InternalEndpoint];
    let logs: BucketLog[] = [];
    for (const obj of await listObjects(pod, `s3://${logsBucket}`, { mcg: this.mcg, recursive: true })) {
      const content = await pod.execCmdOnPod(craftS3Command(`cp s3://${logsBucket}/${obj} -`, this.mcg), {
        outYamlFormat: false,
        secrets
      });
      logs.push(...parseLogFileStr(content));
    }
    if (sourceBucket) {
      logs = logs.filter((entry) => entry.source_bucket === sourceBucket);
    }
    return logs;
  }
}
