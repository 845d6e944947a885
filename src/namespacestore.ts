// NamespaceStore of MCG: a bucket (or a filesystem PVC) of an external
// provider which namespace buckets read from and write to.

import * as _ from 'lodash';
import { clusterNamespace } from './config';
import {
  AWS_PLATFORM,
  AZURE_PLATFORM,
  IBMCOS_PLATFORM,
  MCG_NAMESPACESTORE_YAML,
  NAMESPACESTORE,
  NSFS_PLATFORM,
  RGW_PLATFORM,
  STATUS_READY
} from './constants';
import { CommandFailed, ResourceInUnexpectedState, TimeoutExpiredError, ValueError } from './exceptions';
import { Logger } from './logger';
import type { CloudClient, CloudManager, MCG } from './mcg';
import { OCP } from './ocp';
import { createResource } from './ocs';
import { TimeoutSampler } from './timeout_sampler';
import { getStr } from './utils';
import { loadYaml } from './templating';

const log = Logger('namespacestore');

export type NamespaceStoreMethod = 'oc' | 'cli';

export type NamespaceStoreOptions = {
  name: string;
  method: NamespaceStoreMethod;
  mcg: MCG;
  // underlying storage: bucket of the provider or the PVC of nsfs
  uls?: string;
  secretName?: string;
  namespace?: string;
}

export class NamespaceStore {
  name: string;
  method: NamespaceStoreMethod;
  mcg: MCG;
  uls?: string;
  secretName?: string;
  namespace: string;

  constructor (opts: NamespaceStoreOptions) {
    this.name = opts.name;
    this.method = opts.method;
    this.mcg = opts.mcg;
    this.uls = opts.uls;
    this.secretName = opts.secretName;
    this.namespace = opts.namespace || clusterNamespace();
  }

  private ocp (): OCP {
    return new OCP({ kind: NAMESPACESTORE, namespace: this.namespace, resourceName: this.name });
  }

  // @returns True when the store is gone, false when it should be retried.
  private async ocDelete (retry: boolean): Promise<boolean> {
    try {
      await this.ocp().delete({ resourceName: this.name });
      return true;
    } catch (err) {
      if (!(err instanceof CommandFailed)) {
        throw err;
      }
      const msg = err.message;
      if (msg.toLowerCase().includes('not found')) {
        log.warn(`Namespacestore ${this.name} was already deleted.`);
        return true;
      }
      if (retry && ['cannot complete because pool', 'in', 'state'].every((s) => msg.includes(s))) {
        log.warn(`Deletion of ${this.name} failed due to its state; Retrying`);
        return false;
      }
      throw err;
    }
  }

  private async cliDelete (): Promise<boolean> {
    try {
      await this.mcg.execMcgCmd(`namespacestore delete ${this.name}`);
      return true;
    } catch (err) {
      if (!(err instanceof CommandFailed)) {
        throw err;
      }
      if (err.message.toLowerCase().includes('being used by one or more buckets')) {
        log.warn(`Deletion of ${this.name} failed because it's being used by a bucket. Retrying...`);
      } else {
        log.warn(`Deletion of ${this.name} failed. Error:\n${err.message}`);
      }
      return false;
    }
  }

  private async isDeleted (): Promise<boolean> {
    if (this.method === 'cli') {
      const res = await this.mcg.execMcgCmd('namespacestore list');
      return !res.stdout.includes(this.name);
    }
    try {
      await this.ocp().get();
    } catch (err) {
      if (err instanceof CommandFailed && err.message.toLowerCase().includes('not found')) {
        log.info(`Namespacestore ${this.name} was deleted.`);
        return true;
      }
      throw err;
    }
    return false;
  }

  // Delete the namespacestore by oc or by the noobaa CLI.
  //
  // @param retry  Retry while the store is in use.
  async delete (retry = true, timeout = 120, sleep = 20) {
    log.info(`Cleaning up namespacestore ${this.name}`);
    const deleteOnce = () => this.method === 'oc' ? this.ocDelete(retry) : this.cliDelete();
    if (retry) {
      const sampler = new TimeoutSampler(timeout, sleep, deleteOnce);
      if (!(await sampler.waitForFuncStatus(true))) {
        log.error(`Failed to delete ${this.name}`);
        throw new TimeoutExpiredError(timeout, `Failed to delete ${this.name}`);
      }
    } else {
      await deleteOnce();
    }
    log.info(`Verifying whether namespacestore ${this.name} exists after deletion`);
    if (!(await this.isDeleted())) {
      throw new ResourceInUnexpectedState(`Namespacestore ${this.name} was not deleted successfully`);
    }
  }

  async cliVerifyHealth (): Promise<boolean> {
    let out: string;
    try {
      out = (await this.mcg.execMcgCmd(`namespacestore status ${this.name}`)).stdout;
    } catch (err) {
      if (err instanceof CommandFailed && /Not ?Found/.test(err.message)) {
        return false;
      }
      throw err;
    }
    const compact = out.replace(/\s/g, '');
    return compact.includes('Phase:Ready') && compact.includes('Mode:OPTIMAL');
  }

  async ocVerifyHealth (): Promise<boolean> {
    const data = await this.ocp().get();
    return getStr(data, 'status.phase') === STATUS_READY;
  }

  // Wait until the namespacestore is healthy.
  async verifyHealth (timeout = 180, interval = 5) {
    log.info(`Waiting for ${this.name} to be healthy`);
    const check = () => this.method === 'oc' ? this.ocVerifyHealth() : this.cliVerifyHealth();
    try {
      for await (const healthy of new TimeoutSampler(timeout, interval, check)) {
        if (healthy) {
          log.info(`${this.name} is healthy`);
          return;
        }
        log.info(`${this.name} is unhealthy. Rechecking.`);
      }
    } catch (err) {
      if (err instanceof TimeoutExpiredError) {
        log.error(`${this.name} did not reach a healthy state within ${timeout} seconds.`);
        throw new TimeoutExpiredError(timeout, `${this.name} did not reach a healthy state within ${timeout} seconds.`);
      }
      throw err;
    }
  }
}

export type NamespaceStoreSpec = {
  name: string;
  platform: string;
  mcg: MCG;
  // target bucket, blob container or PVC (nsfs)
  uls: string;
  cldMgr?: CloudManager;
  // nsfs only
  subPath?: string;
  fsBackend?: string;
}

function cloudClient (cldMgr: CloudManager | undefined, platform: string): CloudClient {
  const client = cldMgr && cldMgr[platform];
  if (!client) {
    throw new ValueError(`No credentials of ${platform} in the cloud manager`);
  }
  return client;
}

// Arguments of `noobaa namespacestore create` for the platform.
export function cliCreateArgs (spec: NamespaceStoreSpec): string {
  const platform = spec.platform.toLowerCase();
  if (platform === NSFS_PLATFORM) {
    let args = `nsfs ${spec.name} --pvc-name ${spec.uls}`;
    if (spec.subPath) {
      args += ` --sub-path ${spec.subPath}`;
    }
    if (spec.fsBackend) {
      args += ` --fs-backend ${spec.fsBackend}`;
    }
    return args;
  }
  const client = cloudClient(spec.cldMgr, platform);
  switch (platform) {
    case AWS_PLATFORM:
      return `aws-s3 ${spec.name} --access-key ${client.accessKey} --secret-key ${client.secretKey} --target-bucket ${spec.uls}`;
    case AZURE_PLATFORM:
      return `azure-blob ${spec.name} --account-key ${client.secretKey} --account-name ${client.accessKey} --target-blob-container ${spec.uls}`;
    case RGW_PLATFORM:
    case IBMCOS_PLATFORM:
      return (
        `s3-compatible ${spec.name} --endpoint ${client.endpoint} --access-key ${client.accessKey} ` +
        `--secret-key ${client.secretKey} --target-bucket ${spec.uls}`
      );
    default:
      throw new ValueError(`Unsupported platform: ${spec.platform}`);
  }
}

// Spec of the NamespaceStore CR for the platform.
export function ocNamespacestoreSpec (spec: NamespaceStoreSpec, namespace: string): Record<string, unknown> {
  const platform = spec.platform.toLowerCase();
  if (platform === NSFS_PLATFORM) {
    const nsfs: Record<string, string> = { pvcName: spec.uls, subPath: spec.subPath || '' };
    if (spec.fsBackend) {
      nsfs.fsBackend = spec.fsBackend;
    }
    return { type: 'nsfs', nsfs };
  }
  const client = cloudClient(spec.cldMgr, platform);
  const secret = { name: client.secretName, namespace };
  switch (platform) {
    case AWS_PLATFORM:
      return { type: 'aws-s3', awsS3: { targetBucket: spec.uls, secret } };
    case AZURE_PLATFORM:
      return { type: 'azure-blob', azureBlob: { targetBlobContainer: spec.uls, secret } };
    case RGW_PLATFORM:
    case IBMCOS_PLATFORM:
      return {
        type: 's3-compatible',
        s3Compatible: { targetBucket: spec.uls, endpoint: client.endpoint, signatureVersion: 'v2', secret }
      };
    default:
      throw new ValueError(`Unsupported platform: ${spec.platform}`);
  }
}

export async function createNamespacestoreCli (spec: NamespaceStoreSpec): Promise<NamespaceStore> {
  await spec.mcg.execMcgCmd(`namespacestore create ${cliCreateArgs(spec)}`);
  return new NamespaceStore({ name: spec.name, method: 'cli', mcg: spec.mcg, uls: spec.uls });
}

export async function createNamespacestoreOc (spec: NamespaceStoreSpec): Promise<NamespaceStore> {
  const namespace = clusterNamespace();
  const data = loadYaml(MCG_NAMESPACESTORE_YAML);
  _.set(data, 'metadata.name', spec.name);
  _.set(data, 'metadata.namespace', namespace);
  data.spec = ocNamespacestoreSpec(spec, namespace);
  await createResource(data);
  return new NamespaceStore({ name: spec.name, method: 'oc', mcg: spec.mcg, uls: spec.uls, namespace });
}

// Create the namespacestore by the method and wait until it is healthy.
export async function createNamespacestore (method: NamespaceStoreMethod, spec: NamespaceStoreSpec): Promise<NamespaceStore> {
  const nss = method === 'oc' ? await createNamespacestoreOc(spec) : await createNamespacestoreCli(spec);
  await nss.verifyHealth();
  return nss;
}
