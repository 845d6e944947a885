// S3 operations on the buckets. All of them run the aws CLI in a pod
// inside the cluster, so the endpoints need not be exposed.

import { AWSCLI_TEST_OBJ_DIR, OPTIMAL_MODE, SERVICE_CA_CRT_AWSCLI_PATH } from './constants';
import { CommandFailed, TimeoutExpiredError } from './exceptions';
import { Logger } from './logger';
import type { MCG } from './mcg';
import type { Pod } from './pod';
import { TimeoutSampler } from './timeout_sampler';
import { errorMessage, getNum, getStr, isRecord, shlexSplit } from './utils';

const log = Logger('bucket-utils');

// What is needed from MCG to sign the requests.
export type S3Credentials = Pick<MCG, 'accessKeyId' | 'accessKey' | 's3InternalEndpoint' | 'region'>;

// Credentials of any S3 endpoint (RGW, AWS, ...).
export type SignedRequestCreds = {
  accessKeyId: string;
  accessKey: string;
  endpoint: string;
  region?: string;
  // false to skip the certificate verification
  ssl?: boolean;
}

// Craft the aws CLI command with the credentials.
//
// @param cmd  The command without "aws s3", i.e. "ls s3://bucket".
// @param api  True for s3api, false for s3.
export function craftS3Command (
  cmd: string,
  mcg?: S3Credentials,
  api = false,
  signedRequestCreds?: SignedRequestCreds
): string {
  const s3 = api ? 's3api' : 's3';
  if (mcg) {
    const region = mcg.region ? `AWS_DEFAULT_REGION=${mcg.region} ` : '';
    return (
      `sh -c "AWS_CA_BUNDLE=${SERVICE_CA_CRT_AWSCLI_PATH} ` +
      `AWS_ACCESS_KEY_ID=${mcg.accessKeyId} ` +
      `AWS_SECRET_ACCESS_KEY=${mcg.accessKey} ` +
      `${region}aws ${s3} --endpoint=${mcg.s3InternalEndpoint} ${cmd}"`
    );
  }
  if (signedRequestCreds) {
    const region = signedRequestCreds.region ? `AWS_DEFAULT_REGION=${signedRequestCreds.region} ` : '';
    const noSsl = signedRequestCreds.ssl === false ? '--no-verify-ssl ' : '';
    return (
      `sh -c "AWS_ACCESS_KEY_ID=${signedRequestCreds.accessKeyId} ` +
      `AWS_SECRET_ACCESS_KEY=${signedRequestCreds.accessKey} ` +
      `${region}aws ${s3} --endpoint=${signedRequestCreds.endpoint} ${noSsl}${cmd}"`
    );
  }
  return `aws ${s3} --no-sign-request ${cmd}`;
}

function credsSecrets (mcg?: S3Credentials, signedRequestCreds?: SignedRequestCreds): string[] | undefined {
  if (mcg) {
    return [mcg.accessKeyId, mcg.accessKey, mcg.s3InternalEndpoint];
  }
  if (signedRequestCreds) {
    return [signedRequestCreds.accessKeyId, signedRequestCreds.accessKey, signedRequestCreds.endpoint];
  }
  return undefined;
}

export type S3CmdOptions = {
  mcg?: S3Credentials;
  signedRequestCreds?: SignedRequestCreds;
  api?: boolean;
  timeout?: number;
}

// Run the aws CLI command on the pod.
//
// @returns Raw output of the command.
export async function runS3Cmd (pod: Pod, cmd: string, opts: S3CmdOptions = {}): Promise<string> {
  return pod.execCmdOnPod(craftS3Command(cmd, opts.mcg, opts.api, opts.signedRequestCreds), {
    outYamlFormat: false,
    secrets: credsSecrets(opts.mcg, opts.signedRequestCreds),
    timeout: opts.timeout
  });
}

// JSON printed by s3api, {} if the command printed nothing.
export function parseS3ApiOutput (out: string): Record<string, unknown> {
  if (!out.trim()) {
    return {};
  }
  let data: unknown;
  try {
    data = JSON.parse(out);
  } catch (err) {
    throw new CommandFailed(`Unexpected output of s3api (${errorMessage(err)}): ${out}`);
  }
  return isRecord(data) ? data : {};
}

// Sync objects between the source and target (local dir or s3:// path).
export async function syncObjectDirectory (
  pod: Pod,
  src: string,
  target: string,
  mcg?: S3Credentials,
  signedRequestCreds?: SignedRequestCreds
) {
  log.info(`Syncing all objects and directories from ${src} to ${target}`);
  await runS3Cmd(pod, `sync ${src} ${target}`, { mcg, signedRequestCreds });
}

// Remove the objects under the target path (bucket or bucket/prefix).
export async function rmObjectRecursive (pod: Pod, target: string, mcg: S3Credentials, option = '') {
  await runS3Cmd(pod, `rm s3://${target} --recursive ${option}`.trimEnd(), { mcg });
}

// Keys of the objects in the target listed by `aws s3 ls`.
//
// @param target  s3:// path of the bucket.
export async function listObjects (
  pod: Pod,
  target: string,
  opts: { prefix?: string, recursive?: boolean, timeout?: number } & S3CmdOptions = {}
): Promise<string[]> {
  let cmd = opts.prefix ? `ls ${target}/${opts.prefix}` : `ls ${target}`;
  if (opts.recursive) {
    cmd += ' --recursive';
  }
  const out = await runS3Cmd(pod, cmd, {
    mcg: opts.mcg,
    signedRequestCreds: opts.signedRequestCreds,
    timeout: opts.timeout === undefined ? 600 : opts.timeout
  });
  // date, time, size and key; "PRE" rows of prefixes have only two fields
  return out.split('\n')
    .map((row) => row.trim().split(/\s+/))
    .filter((fields) => fields.length >= 4)
    .map((fields) => fields.slice(3).join(' '));
}

// Wait until all the objects are listed in the bucket.
export async function checkObjectsInBucket (
  bucketName: string,
  objects: string[],
  mcg: S3Credentials,
  pod: Pod,
  timeout = 60,
  sleep = 10
): Promise<boolean> {
  const check = async () => {
    const listed = await listObjects(pod, `s3://${bucketName}`, { mcg });
    return objects.every((obj) => listed.includes(obj));
  };
  const found = await new TimeoutSampler(timeout, sleep, check).waitForFuncStatus(true);
  if (!found) {
    log.error('Objects are not synced within the time limit.');
  }
  return found;
}

// Write random files by dd in the directory of the pod.
//
// @returns Names of the written files.
export async function writeRandomObjectsInPod (
  pod: Pod,
  fileDir: string,
  amount: number,
  pattern = 'ObjKey-',
  bs = '1M'
): Promise<string[]> {
  const objs: string[] = [];
  for (let i = 0; i < amount; i++) {
    objs.push(`${pattern}${i}`);
  }
  const command =
    `for i in $(seq 0 ${amount - 1}); ` +
    `do dd if=/dev/urandom of=${fileDir}/${pattern}$i bs=${bs} count=1 status=none; done`;
  await pod.execShCmdOnPod(command, 'sh');
  return objs;
}

// Copy the files one by one from the directory of the pod to the bucket.
export async function writeIndividualS3Objects (
  mcg: S3Credentials,
  pod: Pod,
  bucketName: string,
  files: string[],
  targetDir = AWSCLI_TEST_OBJ_DIR
) {
  log.info(`Writing objects to bucket ${bucketName}`);
  for (const name of files) {
    const out = await runS3Cmd(pod, `cp ${targetDir}${name} s3://${bucketName}/${name}`, { mcg });
    if (!out.includes('Completed')) {
      throw new CommandFailed(`Upload of ${name} to ${bucketName} did not complete: ${out}`);
    }
  }
}

// Compare md5 sums of the original and the downloaded object.
//
// @param resultPod  Pod holding the result object, if it is not the awscli pod.
export async function verifyS3ObjectIntegrity (
  originalPath: string,
  resultPath: string,
  awscliPod: Pod,
  resultPod?: Pod
): Promise<boolean> {
  let md5sum: string[];
  if (resultPod) {
    md5sum = [
      ...shlexSplit(await awscliPod.execCmdOnPod(`md5sum ${originalPath}`, { outYamlFormat: false })),
      ...shlexSplit(await resultPod.execCmdOnPod(`md5sum ${resultPath}`, { outYamlFormat: false }))
    ];
  } else {
    md5sum = shlexSplit(await awscliPod.execCmdOnPod(`md5sum ${originalPath} ${resultPath}`, { outYamlFormat: false }));
  }
  if (md5sum.length < 4) {
    throw new CommandFailed(`Failed to parse md5sum output: ${md5sum.join(' ')}`);
  }
  log.info(`MD5 of ${md5sum[1]}: ${md5sum[0]}, MD5 of ${md5sum[3]}: ${md5sum[2]}`);
  if (md5sum[0] === md5sum[2]) {
    log.info(`Passed: MD5 comparison for ${originalPath} and ${resultPath}`);
    return true;
  }
  log.error(`Failed: MD5 comparison of ${originalPath} and ${resultPath} - ${md5sum[0]} != ${md5sum[2]}`);
  return false;
}

// Upload the file from the pod as the object.
//
// @param body  Path of the file in the pod.
export async function s3PutObject (
  mcg: S3Credentials,
  pod: Pod,
  bucketName: string,
  key: string,
  body: string,
  contentType?: string
): Promise<Record<string, unknown>> {
  let cmd = `put-object --bucket ${bucketName} --key ${key} --body ${body}`;
  if (contentType) {
    cmd += ` --content-type ${contentType}`;
  }
  return parseS3ApiOutput(await runS3Cmd(pod, cmd, { mcg, api: true }));
}

// Download the object to the target path in the pod.
//
// @returns Metadata of the object.
export async function s3GetObject (
  mcg: S3Credentials,
  pod: Pod,
  bucketName: string,
  key: string,
  target = '/dev/null',
  versionId?: string
): Promise<Record<string, unknown>> {
  let cmd = `get-object --bucket ${bucketName} --key ${key}`;
  if (versionId) {
    cmd += ` --version-id ${versionId}`;
  }
  cmd += ` ${target}`;
  return parseS3ApiOutput(await runS3Cmd(pod, cmd, { mcg, api: true }));
}

export async function s3DeleteObject (
  mcg: S3Credentials,
  pod: Pod,
  bucketName: string,
  key: string,
  versionId?: string
): Promise<Record<string, unknown>> {
  let cmd = `delete-object --bucket ${bucketName} --key ${key}`;
  if (versionId) {
    cmd += ` --version-id ${versionId}`;
  }
  return parseS3ApiOutput(await runS3Cmd(pod, cmd, { mcg, api: true }));
}

export type ListObjectsV2Options = {
  prefix?: string;
  delimiter?: string;
  maxKeys?: number;
  startAfter?: string;
  fetchOwner?: boolean;
}

export async function s3ListObjectsV2 (
  mcg: S3Credentials,
  pod: Pod,
  bucketName: string,
  opts: ListObjectsV2Options = {}
): Promise<Record<string, unknown>> {
  let cmd = `list-objects-v2 --bucket ${bucketName}`;
  if (opts.prefix) {
    cmd += ` --prefix ${opts.prefix}`;
  }
  if (opts.delimiter) {
    cmd += ` --delimiter ${opts.delimiter}`;
  }
  if (opts.maxKeys !== undefined) {
    cmd += ` --max-keys ${opts.maxKeys}`;
  }
  if (opts.startAfter) {
    cmd += ` --start-after ${opts.startAfter}`;
  }
  if (opts.fetchOwner) {
    cmd += ' --fetch-owner';
  }
  return parseS3ApiOutput(await runS3Cmd(pod, cmd, { mcg, api: true }));
}

// Bucket metadata (size, tiers, mode, ...) read by the RPC API.
export async function bucketReadApi (mcg: MCG, bucketName: string): Promise<Record<string, unknown>> {
  return mcg.getBucketInfo(bucketName);
}

export async function getBucketAvailableSize (mcg: MCG, bucketName: string): Promise<number | undefined> {
  return getNum(await bucketReadApi(mcg, bucketName), 'storage.values.free');
}

// True if the bucket is in OPTIMAL mode.
export async function bucketHealth (mcg: MCG, bucketName: string): Promise<boolean> {
  const mode = getStr(await bucketReadApi(mcg, bucketName), 'mode');
  log.info(`Bucket ${bucketName} is in ${mode} mode`);
  return mode === OPTIMAL_MODE;
}

// Change the read and write resources of a namespace bucket.
export async function namespaceBucketUpdate (
  mcg: MCG,
  bucketName: string,
  readResources: string[],
  writeResource: string
) {
  await mcg.sendRpcQuery('bucket_api', 'update_bucket', {
    name: bucketName,
    namespace: {
      read_resources: readResources.map((resource) => ({ resource })),
      write_resource: { resource: writeResource }
    }
  });
}

// Wait for the object count of the bucket (prefix) to reach the expected one.
export async function waitForObjectCountInBucket (
  mcg: S3Credentials,
  pod: Pod,
  bucketName: string,
  expected: number,
  opts: { prefix?: string, timeout?: number, sleep?: number } = {}
): Promise<boolean> {
  const count = async () => {
    const keys = await listObjects(pod, `s3://${bucketName}`, { mcg, prefix: opts.prefix, recursive: true });
    return keys.length;
  };
  try {
    await new TimeoutSampler(opts.timeout || 60, opts.sleep || 5, count).waitForFuncValue(expected);
  } catch (err) {
    if (!(err instanceof TimeoutExpiredError)) {
      throw err;
    }
    log.error(`Bucket ${bucketName} does not contain ${expected} objects`);
    return false;
  }
  return true;
}
