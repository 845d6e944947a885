// Object buckets created in different ways: by the noobaa CLI, by the S3
// API of MCG, or from an OBC by oc. They share the logic of deletion and
// health verification, only the internal operations differ.

import * as _ from 'lodash';
import { runS3Cmd } from './bucket_utils';
import { clusterNamespace, config } from './config';
import {
  EXTERNAL_MODE_RGW_STORAGECLASS,
  HEALTHY_OB_CLI_MODE,
  HEALTHY_OBC_CLI_PHASE,
  MCG_OBC_YAML,
  OBJECTBUCKETCLAIM_SHORT,
  OPTIMAL_MODE,
  RGW_STORAGECLASS,
  STATUS_BOUND
} from './constants';
import { CommandFailed, TimeoutExpiredError, UnhealthyBucket, ValueError } from './exceptions';
import { Logger } from './logger';
import type { MCG } from './mcg';
import { OCP } from './ocp';
import { createResource } from './ocs';
import { getAwscliPod, Pod } from './pod';
import type { RGW } from './rgw';
import { dumpDataToTempJson, loadYaml } from './templating';
import { TimeoutSampler } from './timeout_sampler';
import { createUniqueResourceName, getList, getStr, isRecord } from './utils';

const log = Logger('objectbucket');

// [ruleId, destinationBucket, prefix]
export type ReplicationPolicySpec = [string, string, string | undefined];

export type ReplicationPolicy = {
  rules: Array<{
    rule_id: string;
    destination_bucket: string;
    filter: { prefix: string };
  }>;
}

export function buildReplicationPolicy (spec?: ReplicationPolicySpec): ReplicationPolicy | undefined {
  if (!spec) {
    return undefined;
  }
  const [ruleId, destinationBucket, prefix] = spec;
  return {
    rules: [{
      rule_id: ruleId,
      destination_bucket: destinationBucket,
      filter: { prefix: prefix === undefined ? '' : prefix }
    }]
  };
}

export type BucketOptions = {
  mcg?: MCG;
  rgw?: RGW;
  bucketclass?: { name: string };
  replicationPolicy?: ReplicationPolicySpec;
  // additionalConfig of the OBC, i.e. { maxObjects: '1' }
  quota?: Record<string, string>;
  // pod with the aws CLI (the default one of the config if not given)
  awscliPod?: Pod;
  // namespace buckets
  readNsResources?: string[];
  writeNsResource?: string;
}

export abstract class ObjectBucket {
  name: string;
  mcg?: MCG;
  rgw?: RGW;
  bucketclass?: { name: string };
  replicationPolicy?: ReplicationPolicy;
  quota?: Record<string, string>;
  namespace: string;
  protected awscliPod?: Pod;

  constructor (name: string, opts: BucketOptions = {}) {
    this.name = name;
    this.mcg = opts.mcg;
    this.rgw = opts.rgw;
    this.bucketclass = opts.bucketclass;
    this.replicationPolicy = buildReplicationPolicy(opts.replicationPolicy);
    this.quota = opts.quota;
    this.awscliPod = opts.awscliPod;
    this.namespace = clusterNamespace();
  }

  // Create the bucket in the cluster.
  abstract create (): Promise<void>;
  protected abstract internalDelete (): Promise<void>;
  protected abstract internalStatus (): Promise<string>;
  protected abstract internalVerifyHealth (): Promise<boolean>;
  protected abstract internalVerifyDeletion (): Promise<boolean>;

  equals (other: ObjectBucket | string): boolean {
    return typeof other === 'string' ? this.name === other : this.name === other.name;
  }

  toString (): string {
    return this.name;
  }

  protected requireMcg (): MCG {
    if (!this.mcg) {
      throw new ValueError(`Bucket ${this.name} needs the MCG object`);
    }
    return this.mcg;
  }

  protected async getAwscliPod (): Promise<Pod> {
    if (!this.awscliPod) {
      this.awscliPod = await getAwscliPod();
    }
    return this.awscliPod;
  }

  async status (): Promise<string> {
    const status = await this.internalStatus();
    log.info(`${this.name} status is ${status}`);
    return status;
  }

  async statusBound (): Promise<boolean> {
    return (await this.status()) === STATUS_BOUND;
  }

  // Delete the bucket. A bucket which is already gone is not an error.
  //
  // @param verify  Wait until the bucket disappears.
  async delete (verify = true) {
    log.info(`Deleting bucket: ${this.name}`);
    try {
      await this.internalDelete();
    } catch (err) {
      if (err instanceof CommandFailed && err.message.includes('not found')) {
        log.warn(`${this.name} was not found, or already deleted.`);
        return;
      }
      throw err;
    }
    if (verify) {
      await this.verifyDeletion();
    }
  }

  async verifyDeletion (timeout = 60, interval = 5) {
    log.info(`Verifying deletion of ${this.name}`);
    try {
      for await (const deleted of new TimeoutSampler(timeout, interval, () => this.internalVerifyDeletion())) {
        if (deleted) {
          log.info(`${this.name} was deleted successfully`);
          return;
        }
        log.info(`${this.name} still exists. Retrying...`);
      }
    } catch (err) {
      if (err instanceof TimeoutExpiredError) {
        log.error(`${this.name} was not deleted within ${timeout} seconds.`);
        throw new TimeoutExpiredError(timeout, `${this.name} was not deleted within ${timeout} seconds.`);
      }
      throw err;
    }
  }

  private async healthy (): Promise<boolean> {
    if (!(await this.internalVerifyHealth())) {
      return false;
    }
    return this.mcg ? this.mcg.s3VerifyBucketExists(this.name, await this.getAwscliPod()) : true;
  }

  // Wait for the bucket to become healthy.
  //
  // @throws UnhealthyBucket with the OBC yaml and description on timeout.
  async verifyHealth (timeout = 180, interval = 5) {
    log.info(`Waiting for ${this.name} to be healthy`);
    try {
      for await (const healthy of new TimeoutSampler(timeout, interval, () => this.healthy())) {
        if (healthy) {
          log.info(`${this.name} is healthy`);
          return;
        }
        log.info(`${this.name} is unhealthy. Rechecking.`);
      }
    } catch (err) {
      if (!(err instanceof TimeoutExpiredError)) {
        throw err;
      }
    }
    log.error(`${this.name} did not reach a healthy state within ${timeout} seconds.`);
    const obc = new OCP({ kind: OBJECTBUCKETCLAIM_SHORT, namespace: this.namespace, resourceName: this.name });
    const obcYaml = await obc.get();
    const obcDescription = await obc.describe({ resourceName: this.name });
    throw new UnhealthyBucket(
      `${this.name} did not reach a healthy state within ${timeout} seconds.\n` +
      `OBC YAML:\n${JSON.stringify(obcYaml, null, 2)}\n\n` +
      `OBC description:\n${obcDescription}`
    );
  }
}

// Bucket claimed by `noobaa obc create`.
export class MCGCLIBucket extends ObjectBucket {
  async create () {
    let cmd = `obc create --exact ${this.name}`;
    if (this.bucketclass) {
      cmd += ` --bucketclass ${this.bucketclass.name}`;
    }
    if (this.replicationPolicy) {
      cmd += ` --replication-policy ${dumpDataToTempJson(this.replicationPolicy, 'replication-policy')}`;
    }
    await this.requireMcg().execMcgCmd(cmd);
  }

  protected async internalDelete () {
    await this.requireMcg().execMcgCmd(`obc delete ${this.name}`);
  }

  protected async internalStatus (): Promise<string> {
    return (await this.requireMcg().execMcgCmd(`obc status ${this.name}`)).stdout;
  }

  protected async internalVerifyHealth (): Promise<boolean> {
    const status = (await this.status()).replace(/ /g, '');
    return status.includes(HEALTHY_OB_CLI_MODE) && status.includes(HEALTHY_OBC_CLI_PHASE);
  }

  protected async internalVerifyDeletion (): Promise<boolean> {
    return !(await this.requireMcg().cliListAllBucketsNames()).includes(this.name);
  }
}

// Bucket created by the S3 API of MCG, without a claim.
export class MCGS3Bucket extends ObjectBucket {
  async create () {
    const pod = await this.getAwscliPod();
    await runS3Cmd(pod, `create-bucket --bucket ${this.name}`, { mcg: this.requireMcg(), api: true });
  }

  protected async internalDelete () {
    const pod = await this.getAwscliPod();
    await runS3Cmd(pod, `rb s3://${this.name} --force`, { mcg: this.requireMcg() });
  }

  // Mode of the bucket as read by RPC.
  protected async internalStatus (): Promise<string> {
    return getStr(await this.requireMcg().getBucketInfo(this.name), 'mode') || '';
  }

  protected async internalVerifyHealth (): Promise<boolean> {
    return (await this.status()) === OPTIMAL_MODE;
  }

  protected async internalVerifyDeletion (): Promise<boolean> {
    const names = await this.requireMcg().s3ListAllBucketsNames(await this.getAwscliPod());
    return !names.includes(this.name);
  }
}

async function ocGetAllObcNames (namespace: string): Promise<string[]> {
  const data = await new OCP({ kind: OBJECTBUCKETCLAIM_SHORT, namespace }).get();
  return getList(data, 'items')
    .map((obc) => getStr(obc, 'metadata.name'))
    .filter((name): name is string => name !== undefined);
}

// Bucket claimed by an OBC created by oc.
export abstract class OCBucket extends ObjectBucket {
  protected abstract obcData (): Record<string, unknown>;

  async create () {
    await createResource(this.obcData());
  }

  protected baseObcData (): Record<string, unknown> {
    const data = loadYaml(MCG_OBC_YAML);
    _.set(data, 'metadata.name', this.name);
    _.set(data, 'metadata.namespace', this.namespace);
    _.unset(data, 'spec.generateBucketName');
    _.set(data, 'spec.bucketName', this.name);
    return data;
  }

  protected async internalDelete () {
    await new OCP({ kind: OBJECTBUCKETCLAIM_SHORT, namespace: this.namespace }).delete({ resourceName: this.name });
  }

  // Phase of the OBC.
  protected async internalStatus (): Promise<string> {
    const obc = await new OCP({ kind: OBJECTBUCKETCLAIM_SHORT, namespace: this.namespace }).get({
      resourceName: this.name
    });
    return getStr(obc, 'status.phase') || '';
  }

  protected async internalVerifyHealth (): Promise<boolean> {
    return (await this.status()) === STATUS_BOUND;
  }

  protected async internalVerifyDeletion (): Promise<boolean> {
    return !(await ocGetAllObcNames(this.namespace)).includes(this.name);
  }
}

export class MCGOCBucket extends OCBucket {
  protected obcData (): Record<string, unknown> {
    const data = this.baseObcData();
    _.set(data, 'spec.storageClassName', `${this.namespace}.noobaa.io`);
    if (this.bucketclass) {
      _.set(data, 'spec.additionalConfig.bucketclass', this.bucketclass.name);
    }
    if (this.replicationPolicy) {
      _.set(data, 'spec.additionalConfig.replicationPolicy', JSON.stringify(this.replicationPolicy));
    }
    return data;
  }
}

export class RGWOCBucket extends OCBucket {
  protected obcData (): Record<string, unknown> {
    const data = this.baseObcData();
    const external = config.getBool('DEPLOYMENT', 'external_mode');
    _.set(data, 'spec.storageClassName', external ? EXTERNAL_MODE_RGW_STORAGECLASS : RGW_STORAGECLASS);
    if (this.quota) {
      _.set(data, 'spec.additionalConfig', this.quota);
    }
    return data;
  }
}

// Namespace bucket created by RPC on top of namespace resources.
export class MCGNamespaceBucket extends ObjectBucket {
  readNsResources: string[];
  writeNsResource?: string;

  constructor (name: string, opts: BucketOptions = {}) {
    super(name, opts);
    this.readNsResources = opts.readNsResources || [];
    this.writeNsResource = opts.writeNsResource;
  }

  async create () {
    await this.requireMcg().sendRpcQuery('bucket_api', 'create_bucket', {
      name: this.name,
      namespace: {
        write_resource: this.writeNsResource,
        read_resources: this.readNsResources
      }
    });
  }

  protected async internalDelete () {
    await this.requireMcg().sendRpcQuery('bucket_api', 'delete_bucket', { name: this.name });
  }

  protected async internalStatus (): Promise<string> {
    return getStr(await this.requireMcg().getBucketInfo(this.name), 'mode') || '';
  }

  private async systemBucket (): Promise<Record<string, unknown> | undefined> {
    const system = await this.requireMcg().readSystem();
    return getList(system, 'buckets')
      .filter(isRecord)
      .find((bucket) => getStr(bucket, 'name') === this.name);
  }

  protected async internalVerifyHealth (): Promise<boolean> {
    const bucket = await this.systemBucket();
    if (!bucket) {
      return false;
    }
    const readResources = getList(bucket, 'namespace.read_resources').filter((r): r is string => typeof r === 'string');
    const writeResource = getStr(bucket, 'namespace.write_resource');
    return _.isEqual(new Set(readResources), new Set(this.readNsResources)) &&
      writeResource === this.writeNsResource;
  }

  protected async internalVerifyDeletion (): Promise<boolean> {
    return (await this.systemBucket()) === undefined;
  }
}

type BucketClass = new (name: string, opts?: BucketOptions) => ObjectBucket;

export const BUCKET_MAP = new Map<string, BucketClass>([
  ['cli', MCGCLIBucket],
  ['s3', MCGS3Bucket],
  ['oc', MCGOCBucket],
  ['mcg-oc', MCGOCBucket],
  ['rgw-oc', RGWOCBucket],
  ['mcg-namespace', MCGNamespaceBucket]
]);

// Create a bucket of the kind (a key of BUCKET_MAP) and wait for it to be
// healthy.
//
// @param name    Generated if not given.
// @param verify  Wait for the bucket to become healthy.
export async function createBucket (
  kind: string,
  name?: string,
  opts: BucketOptions = {},
  verify = true
): Promise<ObjectBucket> {
  const cls = BUCKET_MAP.get(kind.toLowerCase());
  if (!cls) {
    throw new ValueError(`Unknown bucket kind ${kind}, expected one of: ${[...BUCKET_MAP.keys()].join(', ')}`);
  }
  const bucket = new cls(name || createUniqueResourceName(kind, 'obc'), opts);
  log.info(`Creating bucket: ${bucket.name}`);
  await bucket.create();
  if (verify) {
    await bucket.verifyHealth();
  }
  return bucket;
}
