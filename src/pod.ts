// Pod resource and helpers for finding the pods of ODF components.

import { craftS3Command } from './bucket_utils';
import { clusterNamespace, config } from './config';
import {
  NOOBAA_APP_LABEL,
  NOOBAA_CORE_POD_LABEL,
  NOOBAA_ENDPOINT_POD_LABEL,
  NOOBAA_OPERATOR_POD_LABEL,
  POD,
  RGW_APP_LABEL,
  STATUS_RUNNING,
  STATUS_SUCCEEDED,
  TOOL_APP_LABEL
} from './constants';
import {
  CephToolBoxNotFoundException,
  CommandFailed,
  NoRunningCephToolBoxException,
  ResourceNotFoundError,
  TimeoutExpiredError
} from './exceptions';
import { Logger } from './logger';
import type { MCG } from './mcg';
import { OCP, OcCmdOptions, ResourceData } from './ocp';
import { OCS } from './ocs';
import { withRetry } from './retry';
import { TimeoutSampler } from './timeout_sampler';
import { getList, getNum, getRecord, getStr, isRecord } from './utils';

const log = Logger('pod');

export type PodExecOptions = OcCmdOptions & {
  container?: string;
}

export class Pod extends OCS {
  constructor (data: ResourceData) {
    super({ apiVersion: 'v1', kind: POD, ...data });
    this.ocp = new OCP({ kind: POD, namespace: this.namespace });
  }

  getLabels (): Record<string, string> {
    const labels: Record<string, string> = {};
    for (const [k, v] of Object.entries(getRecord(this.data, 'metadata.labels'))) {
      if (typeof v === 'string') {
        labels[k] = v;
      }
    }
    return labels;
  }

  // Name of the node the pod has been scheduled to.
  getNode (): string | undefined {
    return getStr(this.data, 'spec.nodeName');
  }

  async getRestartCount (): Promise<number> {
    return getNum(await this.get(), ['status', 'containerStatuses', 0, 'restartCount']) || 0;
  }

  // Execute a command on the pod (oc rsh or oc exec to the container).
  //
  // @returns Parsed yaml output or raw output if outYamlFormat is false.
  execCmdOnPod (command: string, opts?: PodExecOptions & { outYamlFormat?: true }): Promise<unknown>;
  execCmdOnPod (command: string, opts: PodExecOptions & { outYamlFormat: false }): Promise<string>;
  async execCmdOnPod (command: string, opts: PodExecOptions & { outYamlFormat?: boolean } = {}): Promise<unknown> {
    const cmd = opts.container
      ? `exec ${this.name} -c ${opts.container} -- ${command}`
      : `rsh ${this.name} ${command}`;
    const ocOpts: OcCmdOptions = {
      secrets: opts.secrets,
      timeout: opts.timeout === undefined ? 600 : opts.timeout,
      silent: opts.silent,
      ignoreError: opts.ignoreError
    };
    if (opts.outYamlFormat === false) {
      return this.ocp.execOcCmd(cmd, { ...ocOpts, outYamlFormat: false });
    }
    return this.ocp.execOcCmd(cmd, ocOpts);
  }

  // Execute an aws CLI command on the pod, with MCG credentials if given.
  //
  // @param api  Use the s3api command instead of s3.
  async execS3CmdOnPod (command: string, mcg?: MCG, api = false): Promise<string> {
    return this.execCmdOnPod(craftS3Command(command, mcg, api), {
      outYamlFormat: false,
      secrets: mcg ? [mcg.accessKeyId, mcg.accessKey, mcg.s3InternalEndpoint] : undefined
    });
  }

  // Execute a shell command on the pod, so that &&, || or loops can be used.
  async execShCmdOnPod (command: string, sh = 'bash', timeout = 600): Promise<string> {
    return this.ocp.execOcCmd(`exec ${this.name} -- ${sh} -c "${command}"`, {
      outYamlFormat: false,
      timeout
    });
  }

  // Execute a Ceph command on the Ceph tools pod.
  //
  // @param format  Output format appended as --format (json-pretty by default).
  async execCephCmd (cephCmd: string, format: string | null = 'json-pretty', timeout = 600): Promise<unknown> {
    if (!Object.values(this.getLabels()).includes('rook-ceph-tools')) {
      throw new CommandFailed('Ceph commands can be executed only on toolbox pod');
    }
    const cmd = format ? `${cephCmd} --format ${format}` : cephCmd;
    const out = await this.execCmdOnPod(cmd, { timeout });
    // i.e. "ceph fs ls" returns a list
    if (Array.isArray(out)) {
      return out.filter((item) => item);
    }
    return out;
  }

  async waitForPodDelete (timeout = 60): Promise<boolean> {
    return this.ocp.waitForDelete({ resourceName: this.name, timeout });
  }
}

function podsFromList (data: ResourceData): Pod[] {
  return getList(data, 'items').filter(isRecord).map((item) => new Pod(item));
}

// Pods having the label.
//
// @param selector  Label selector, i.e. app=noobaa.
export async function getPods (opts: { namespace?: string, selector?: string } = {}): Promise<Pod[]> {
  const namespace = opts.namespace || clusterNamespace();
  const data = await new OCP({ kind: POD, namespace, selector: opts.selector }).get();
  return podsFromList(data);
}

// All pods in the namespace, optionally filtered by the values of a label.
//
// @param selector         Values of the label to look for, i.e. ['noobaa'].
// @param selectorLabel    Name of the label (app by default).
// @param excludeSelector  Return the pods not matching the selector instead.
export async function getAllPods (opts: {
  namespace?: string,
  selector?: string[],
  selectorLabel?: string,
  excludeSelector?: boolean
} = {}): Promise<Pod[]> {
  const data = await new OCP({ kind: POD, namespace: opts.namespace }).get({ allNamespaces: !opts.namespace });
  let pods = podsFromList(data);
  const selector = opts.selector;
  if (selector && selector.length > 0) {
    const label = opts.selectorLabel || 'app';
    pods = pods.filter((pod) => {
      const matches = selector.includes(pod.getLabels()[label]);
      return opts.excludeSelector ? !matches : matches;
    });
  }
  return pods;
}

export async function getPodObj (name: string, namespace?: string): Promise<Pod> {
  const ocp = new OCP({ kind: POD, namespace: namespace || clusterNamespace() });
  return new Pod(await ocp.get({ resourceName: name }));
}

// Pod objects of the pod names.
//
// @param raiseNotFound  Fail if some of the pods does not exist.
export async function getPodObjs (names: string[], namespace?: string, raiseNotFound = false): Promise<Pod[]> {
  const wanted = new Set(names);
  const pods = (await getAllPods({ namespace: namespace || clusterNamespace() }))
    .filter((pod) => wanted.has(pod.name));
  if (pods.length < wanted.size) {
    const found = new Set(pods.map((pod) => pod.name));
    const missing = [...wanted].filter((name) => !found.has(name));
    const msg = `Did not find the following pod names: ${missing.join(', ')}`;
    if (raiseNotFound) {
      throw new ResourceNotFoundError(msg);
    }
    log.info(msg);
  }
  return pods;
}

async function getRunningToolsPods (namespace: string): Promise<ResourceData[]> {
  const data = await new OCP({ kind: POD, namespace, selector: TOOL_APP_LABEL }).get();
  const items = getList(data, 'items').filter(isRecord);
  log.info(`These are the ceph tool box pods: ${items.map((p) => getStr(p, 'metadata.name')).join(', ')}`);
  if (items.length === 0) {
    throw new CephToolBoxNotFoundException('Ceph tool box pod not found');
  }
  // after a node failure the old tools pod stays in Terminating state
  const running = items.filter((pod) => getStr(pod, 'status.phase') === STATUS_RUNNING);
  if (running.length === 0) {
    throw new NoRunningCephToolBoxException('No running Ceph tool box pod');
  }
  return running;
}

// The running Ceph tools pod.
//
// @param wait  Retry while there is no running tools pod.
export async function getCephToolsPod (namespace?: string, wait = false): Promise<Pod> {
  const ns = namespace || clusterNamespace();
  const running = wait
    ? await withRetry(NoRunningCephToolBoxException, { tries: 10, delay: 5 }, () => getRunningToolsPods(ns))
    : await getRunningToolsPods(ns);
  return new Pod(running[0]);
}

export async function getNoobaaPods (namespace?: string): Promise<Pod[]> {
  return getPods({ namespace, selector: NOOBAA_APP_LABEL });
}

export async function getNoobaaCorePod (namespace?: string): Promise<Pod> {
  const pods = await getPods({ namespace, selector: NOOBAA_CORE_POD_LABEL });
  if (pods.length === 0) {
    throw new ResourceNotFoundError('Noobaa core pod not found');
  }
  return pods[0];
}

export async function getNoobaaEndpointPods (namespace?: string): Promise<Pod[]> {
  return getPods({ namespace, selector: NOOBAA_ENDPOINT_POD_LABEL });
}

export async function getNoobaaOperatorPod (namespace?: string): Promise<Pod> {
  const pods = await getPods({ namespace, selector: NOOBAA_OPERATOR_POD_LABEL });
  if (pods.length === 0) {
    throw new ResourceNotFoundError('Noobaa operator pod not found');
  }
  return pods[0];
}

export async function getRgwPods (namespace?: string): Promise<Pod[]> {
  return getPods({ namespace, selector: RGW_APP_LABEL });
}

// The pod with the aws CLI used to access the S3 endpoints.
export async function getAwscliPod (): Promise<Pod> {
  const name = config.getString('RUN', 'awscli_pod_name', 'awscli-relay-pod') || 'awscli-relay-pod';
  const namespace = config.getString('RUN', 'awscli_pod_namespace') || clusterNamespace();
  return getPodObj(name, namespace);
}

// Check once that all the pods (or the listed ones) are running. Pods of
// finished jobs are skipped.
export async function checkPodsInRunningState (namespace?: string, podNames?: string[]): Promise<boolean> {
  const pods = podNames
    ? await getPodObjs(podNames, namespace)
    : await getAllPods({ namespace: namespace || clusterNamespace() });
  let allRunning = true;
  for (const pod of pods) {
    const phase = getStr(pod.data, 'status.phase');
    if (phase === STATUS_SUCCEEDED) {
      continue;
    }
    if (phase !== STATUS_RUNNING) {
      log.warn(`The pod ${pod.name} is in ${phase} state`);
      allRunning = false;
    }
  }
  return allRunning;
}

// Wait for all the pods in the namespace to be running.
//
// @returns True if they are running, false if the timeout expired.
export async function waitForPodsToBeRunning (
  namespace?: string,
  podNames?: string[],
  timeout = 200,
  sleep = 10
): Promise<boolean> {
  try {
    const sampler = new TimeoutSampler(timeout, sleep, checkPodsInRunningState, namespace, podNames);
    for await (const running of sampler) {
      if (running) {
        log.info('All the pods reached status running!');
        return true;
      }
    }
  } catch (err) {
    if (!(err instanceof TimeoutExpiredError)) {
      throw err;
    }
    log.warn(`Not all the pods reached status running after ${timeout} seconds`);
  }
  return false;
}

export type PodLogsOptions = {
  container?: string;
  previous?: boolean;
  allContainers?: boolean;
  // relative duration, i.e. 5s or 2m
  since?: string;
}

// Output of `oc logs` of the pod.
export async function getPodLogs (podName: string, namespace?: string, opts: PodLogsOptions = {}): Promise<string> {
  const pod = new OCP({ kind: POD, namespace: namespace || clusterNamespace() });
  let cmd = `logs ${podName}`;
  if (opts.container) {
    cmd += ` -c ${opts.container}`;
  }
  if (opts.previous) {
    cmd += ' --previous';
  }
  if (opts.allContainers) {
    cmd += ' --all-containers=true';
  }
  if (opts.since) {
    cmd += ` --since=${opts.since}`;
  }
  return pod.execOcCmd(cmd, { outYamlFormat: false });
}
