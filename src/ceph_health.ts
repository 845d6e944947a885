// Health of the Ceph cluster as reported by `ceph health` on the tools pod.

import { clusterNamespace, config } from './config';
import { IBM_POWER_PLATFORM } from './constants';
import {
  CephHealthException,
  CephToolBoxNotFoundException,
  CommandFailed,
  NoRunningCephToolBoxException
} from './exceptions';
import { Logger } from './logger';
import { getCephToolsPod } from './pod';
import { withRetry } from './retry';
import { TimeoutSampler } from './timeout_sampler';
import { errorMessage } from './utils';

const log = Logger('ceph-health');

export const HEALTH_OK = 'HEALTH_OK';
export const HEALTH_WARN = 'HEALTH_WARN';
export const HEALTH_ERR = 'HEALTH_ERR';

// Output of the ceph health command.
//
// @param detail  Run `ceph health detail` instead.
export async function runCephHealthCmd (namespace?: string, detail = false): Promise<string> {
  let toolsPod;
  try {
    toolsPod = await getCephToolsPod(namespace || clusterNamespace());
  } catch (err) {
    if (err instanceof CephToolBoxNotFoundException) {
      throw new CommandFailed(errorMessage(err));
    }
    throw err;
  }
  const cmd = detail ? 'ceph health detail' : 'ceph health';
  return toolsPod.execCmdOnPod(cmd, { outYamlFormat: false, timeout: 120 });
}

// First word of the health output, i.e. HEALTH_WARN.
export function healthStatus (health: string): string {
  return health.trim().split(/\s+/)[0] || '';
}

// @returns True if the health is HEALTH_OK.
// @throws CephHealthException otherwise.
export async function cephHealthCheckBase (namespace?: string): Promise<boolean> {
  const health = await runCephHealthCmd(namespace);
  if (health.trim() === HEALTH_OK) {
    log.info('Ceph cluster health is HEALTH_OK.');
    return true;
  }
  throw new CephHealthException(`Ceph cluster health is not OK. Health: ${health}`);
}

// Check the health with retries, for the cluster to recover.
//
// @param tries  Number of attempts.
// @param delay  Seconds between the attempts (60 on IBM Power).
export async function cephHealthCheck (namespace?: string, tries = 20, delay = 30): Promise<boolean> {
  const platform = (config.getString('ENV_DATA', 'platform') || '').toLowerCase();
  if (platform === IBM_POWER_PLATFORM) {
    delay = 60;
  }
  return withRetry(
    [CephHealthException, CommandFailed, NoRunningCephToolBoxException],
    { tries, delay, backoff: 1 },
    () => cephHealthCheckBase(namespace)
  );
}

// Wait until the health is not HEALTH_OK, i.e. after a disruption.
//
// @returns False if the health stayed OK.
export async function waitForCephHealthNotOk (timeout = 300, sleep = 10, namespace?: string): Promise<boolean> {
  const notOk = async () => (await runCephHealthCmd(namespace)).trim() !== HEALTH_OK;
  return new TimeoutSampler(timeout, sleep, notOk).waitForFuncStatus(true);
}

export async function getCephHealthDetail (namespace?: string): Promise<string> {
  return runCephHealthCmd(namespace, true);
}
