// Stress of NooBaa by bulk S3 operations on many buckets at once. Each
// iteration uploads a new generation of objects to every bucket, lists,
// downloads and deletes them. The work on the buckets runs concurrently
// in a worker pool and winds down when the stop event is set.

import * as path from 'path';
import { listObjects, runS3Cmd, S3Credentials, SignedRequestCreds } from './bucket_utils';
import { cephHealthCheckBase } from './ceph_health';
import { AWSCLI_TEST_OBJ_DIR } from './constants';
import { StressOperationFailed } from './exceptions';
import { Logger } from './logger';
import type { Pod } from './pod';
import { errorMessage } from './utils';
import { StopEvent, WorkerPool } from './worker_pool';

const log = Logger('stress');

export type StressBucket = {
  // kind of the bucket, i.e. "oc" or "rgw-oc"
  kind: string;
  name: string;
  mcg?: S3Credentials;
  signedRequestCreds?: SignedRequestCreds;
}

export type StressStage = 'upload' | 'list' | 'download' | 'delete';

export const STRESS_STAGES: StressStage[] = ['upload', 'list', 'download', 'delete'];

// Operation of a stage on one bucket.
export type StressOp = (bucket: StressBucket, iteration: number, multiplier: number) => Promise<void>;

export type StressOperations = Record<StressStage, StressOp>;

export type StressFailure = {
  iteration: number;
  stage: StressStage;
  bucket: string;
  error: string;
}

export type StressResult = {
  iterationsCompleted: number;
  failures: StressFailure[];
}

export type FanOutOptions = {
  pool: WorkerPool;
  stopEvent?: StopEvent;
  multiplier?: number;
}

// Prefix of the objects of the iteration.
export function iterationPrefix (iteration: number): string {
  return `objects-${iteration}`;
}

function bucketPath (bucket: StressBucket, iteration: number): string {
  return `s3://${bucket.name}/${iterationPrefix(iteration)}`;
}

// The S3 operations run by the aws CLI on the pod.
//
// @param srcDir     Directory in the pod with the objects to upload.
// @param resultDir  Directory in the pod to download the objects to.
export function awscliOperations (pod: Pod, srcDir = AWSCLI_TEST_OBJ_DIR, resultDir = '/tmp/stress-results'): StressOperations {
  return {
    // the objects are uploaded multiplier times under different prefixes
    upload: async (bucket, iteration, multiplier) => {
      for (let i = 0; i < multiplier; i++) {
        await runS3Cmd(pod, `sync ${srcDir} ${bucketPath(bucket, iteration)}/${i}/`, {
          mcg: bucket.mcg,
          signedRequestCreds: bucket.signedRequestCreds
        });
      }
    },
    list: async (bucket, iteration) => {
      const objs = await listObjects(pod, bucketPath(bucket, iteration), {
        recursive: true,
        mcg: bucket.mcg,
        signedRequestCreds: bucket.signedRequestCreds
      });
      log.info(`Listed ${objs.length} objects of ${bucketPath(bucket, iteration)}`);
    },
    download: async (bucket, iteration) => {
      const target = path.posix.join(resultDir, bucket.name);
      await runS3Cmd(pod, `sync ${bucketPath(bucket, iteration)} ${target}`, {
        mcg: bucket.mcg,
        signedRequestCreds: bucket.signedRequestCreds
      });
      await pod.execShCmdOnPod(`rm -rf ${target}`, 'sh');
    },
    delete: async (bucket, iteration) => {
      await runS3Cmd(pod, `rm ${bucketPath(bucket, iteration)} --recursive`, {
        mcg: bucket.mcg,
        signedRequestCreds: bucket.signedRequestCreds
      });
    }
  };
}

// Run the operation on all the buckets concurrently. Buckets whose turn
// comes after the stop event has been set are skipped.
//
// @returns Failures of the operation, one per failed bucket.
export async function fanOut (
  op: StressOp,
  stage: StressStage,
  buckets: StressBucket[],
  iteration: number,
  opts: FanOutOptions & { failFast?: boolean }
): Promise<StressFailure[]> {
  const failures: StressFailure[] = [];
  const multiplier = opts.multiplier || 1;
  await opts.pool.map(buckets, async (bucket) => {
    if (opts.stopEvent && opts.stopEvent.isSet()) {
      log.debug(`Skipping ${stage} of ${bucket.name}, stop was requested`);
      return;
    }
    try {
      await op(bucket, iteration, multiplier);
    } catch (err) {
      const failure = { iteration, stage, bucket: bucket.name, error: errorMessage(err) };
      log.error(`${stage} of ${bucket.name} in iteration ${iteration} failed: ${failure.error}`);
      failures.push(failure);
      if (opts.failFast && opts.stopEvent) {
        opts.stopEvent.set();
      }
    }
  });
  return failures;
}

function throwIfFailed (failures: StressFailure[]) {
  if (failures.length > 0) {
    const first = failures[0];
    throw new StressOperationFailed(`${first.stage} of ${first.bucket} failed: ${first.error}`, failures);
  }
}

// Upload objects to the buckets under the prefix of the iteration.
export async function uploadObjsToBuckets (pod: Pod, buckets: StressBucket[], iteration: number, opts: FanOutOptions) {
  log.info(`Uploading objects of iteration ${iteration} to ${buckets.length} buckets`);
  throwIfFailed(await fanOut(awscliOperations(pod).upload, 'upload', buckets, iteration, opts));
}

export async function listObjsFromBuckets (pod: Pod, buckets: StressBucket[], iteration: number, opts: FanOutOptions) {
  throwIfFailed(await fanOut(awscliOperations(pod).list, 'list', buckets, iteration, opts));
}

export async function downloadObjsFromBuckets (
  pod: Pod,
  buckets: StressBucket[],
  iteration: number,
  resultDir: string,
  opts: FanOutOptions
) {
  const ops = awscliOperations(pod, AWSCLI_TEST_OBJ_DIR, resultDir);
  throwIfFailed(await fanOut(ops.download, 'download', buckets, iteration, opts));
}

export async function deleteObjsFromBuckets (pod: Pod, buckets: StressBucket[], iteration: number, opts: FanOutOptions) {
  throwIfFailed(await fanOut(awscliOperations(pod).delete, 'delete', buckets, iteration, opts));
}

// Check the Ceph health every interval seconds until the stop event is set.
//
// @returns Descriptions of the failed checks.
export async function runBackgroundCephHealthCheck (stopEvent: StopEvent, interval = 60, namespace?: string): Promise<string[]> {
  const failures: string[] = [];
  while (!stopEvent.isSet()) {
    try {
      await cephHealthCheckBase(namespace);
    } catch (err) {
      const msg = errorMessage(err);
      log.warn(`Background health check failed: ${msg}`);
      failures.push(`${new Date().toISOString()} ${msg}`);
    }
    if (await stopEvent.wait(interval)) {
      break;
    }
  }
  log.info(`Background health check stopped with ${failures.length} failures`);
  return failures;
}

export type StressLoopOptions = {
  buckets: StressBucket[];
  iterations: number;
  pool: WorkerPool;
  stopEvent: StopEvent;
  operations: StressOperations;
  // stop the loop on the first failure
  failFast?: boolean;
}

// Run the stages upload, list, download and delete in each iteration. The
// number of uploaded copies grows with the iteration.
export async function runStressLoop (opts: StressLoopOptions): Promise<StressResult> {
  const failures: StressFailure[] = [];
  let iterationsCompleted = 0;
  for (let iteration = 1; iteration <= opts.iterations; iteration++) {
    log.info(`Performing iteration ${iteration} of stressing the cluster`);
    for (const stage of STRESS_STAGES) {
      if (opts.stopEvent.isSet()) {
        break;
      }
      failures.push(...await fanOut(opts.operations[stage], stage, opts.buckets, iteration, {
        pool: opts.pool,
        stopEvent: opts.stopEvent,
        multiplier: iteration,
        failFast: opts.failFast
      }));
    }
    if (opts.stopEvent.isSet()) {
      log.info(`Stop requested during iteration ${iteration}`);
      break;
    }
    iterationsCompleted++;
  }
  return { iterationsCompleted, failures };
}
