// Validation of the cluster health while disruptive workloads run in the
// background. The validator takes a baseline before the workload, checks
// the cluster periodically during it and compares the final state with the
// baseline afterwards.
//
// Events emitted by the validator:
//
//   "failure"  - a check failed (argument is the ValidationFailure)
//   "critical" - maxConsecutiveFailures rounds in a row had a failure
//                (argument is the number of the failed rounds)
//   "round"    - a validation round has finished (argument is its number)

import { EventEmitter } from 'events';
import { cephHealthCheck, HEALTH_OK, HEALTH_WARN, healthStatus, runCephHealthCmd } from './ceph_health';
import { clusterNamespace, config } from './config';
import { DEFAULT_CEPHBLOCKPOOL, EVENT, PV, STATUS_FAILED, STATUS_RELEASED } from './constants';
import { Logger } from './logger';
import { OCP, ResourceData } from './ocp';
import { getCephToolsPod } from './pod';
import { errorMessage, getList, getStr, isRecord } from './utils';
import { StopEvent } from './worker_pool';

const log = Logger('cluster-validator');

export const RBD_DRIVER = 'rbd.csi.ceph.com';
export const CEPHFS_DRIVER = 'cephfs.csi.ceph.com';
export const CSI_VOL_PREFIX = 'csi-vol-';
export const PVC_FAILURE_REASONS = ['ProvisioningFailed', 'FailedMount', 'FailedAttachVolume'];

export type CheckName = 'cephHealth' | 'orphanPvs' | 'orphanRbdImages' | 'orphanCephfsSubvolumes' | 'pvcEvents';

export const ALL_CHECKS: CheckName[] = ['cephHealth', 'orphanPvs', 'orphanRbdImages', 'orphanCephfsSubvolumes', 'pvcEvents'];

export type ValidationFailure = {
  check: CheckName;
  message: string;
  details?: string[];
  timestamp: string;
}

export type ValidationReport = {
  totalChecks: number;
  failedChecks: number;
  failures: ValidationFailure[];
  startTime: string;
  endTime: string;
  durationSec: number;
  passed: boolean;
}

export type ValidatorOptions = {
  // namespace of the PVC events
  namespace?: string;
  // seconds between the validation rounds
  interval?: number;
  allowHealthWarn?: boolean;
  maxConsecutiveFailures?: number;
  // checks run in each round (all by default)
  checks?: CheckName[];
  rbdPool?: string;
  stopEvent?: StopEvent;
}

// The uuid part of csi-vol-<uuid>, undefined for other names.
export function csiVolumeUuid (name: string): string | undefined {
  return name.startsWith(CSI_VOL_PREFIX) ? name.slice(CSI_VOL_PREFIX.length) : undefined;
}

// CSI volumes with no PV whose volume handle ends with their uuid.
//
// @param names    Names of the images or subvolumes.
// @param handles  Volume handles of the PVs of the driver.
export function findOrphanVolumes (names: string[], handles: string[]): string[] {
  return names.filter((name) => {
    const uuid = csiVolumeUuid(name);
    return uuid !== undefined && !handles.some((handle) => handle.endsWith(uuid));
  });
}

function pvHandles (pvs: ResourceData[], driver: string): string[] {
  return pvs
    .filter((pv) => getStr(pv, 'spec.csi.driver') === driver)
    .map((pv) => getStr(pv, 'spec.csi.volumeHandle'))
    .filter((handle): handle is string => handle !== undefined);
}

function eventTime (event: unknown): number {
  const ts = getStr(event, 'lastTimestamp') || getStr(event, 'eventTime') || getStr(event, 'metadata.creationTimestamp');
  return ts ? Date.parse(ts) : NaN;
}

// Warning events of failed provisioning or attaching of volumes, newer
// than the time.
export function pvcFailureEvents (events: unknown[], since: Date): string[] {
  return events
    .filter((ev) => getStr(ev, 'type') === 'Warning')
    .filter((ev) => PVC_FAILURE_REASONS.includes(getStr(ev, 'reason') || ''))
    .filter((ev) => eventTime(ev) >= since.getTime())
    .map((ev) =>
      `${getStr(ev, 'involvedObject.kind')}/${getStr(ev, 'involvedObject.name')}: ` +
      `${getStr(ev, 'reason')}: ${getStr(ev, 'message')}`
    );
}

export class BackgroundClusterValidator extends EventEmitter {
  namespace: string;
  interval: number;
  allowHealthWarn: boolean;
  maxConsecutiveFailures: number;
  checks: CheckName[];
  rbdPool: string;
  stopEvent: StopEvent;
  baselinePvs: Set<string>;
  baselineRbdImages: Set<string>;
  baselineSubvolumes: Set<string>;
  failures: ValidationFailure[];
  totalChecks: number;
  failedChecks: number;
  rounds: number;
  consecutiveFailures: number;
  startTime?: Date;
  endTime?: Date;
  private loop?: Promise<void>;

  constructor (opts: ValidatorOptions = {}) {
    super();
    this.namespace = opts.namespace || clusterNamespace();
    this.interval = opts.interval === undefined ? 60 : opts.interval;
    this.allowHealthWarn = opts.allowHealthWarn !== false;
    this.maxConsecutiveFailures = opts.maxConsecutiveFailures || 3;
    this.checks = opts.checks || ALL_CHECKS;
    this.rbdPool = opts.rbdPool || config.getString('ENV_DATA', 'rbd_pool') || DEFAULT_CEPHBLOCKPOOL;
    this.stopEvent = opts.stopEvent || new StopEvent();
    this.baselinePvs = new Set();
    this.baselineRbdImages = new Set();
    this.baselineSubvolumes = new Set();
    this.failures = [];
    this.totalChecks = 0;
    this.failedChecks = 0;
    this.rounds = 0;
    this.consecutiveFailures = 0;
  }

  private async getPvs (): Promise<ResourceData[]> {
    return getList(await new OCP({ kind: PV }).get(), 'items').filter(isRecord);
  }

  private async getRbdImages (): Promise<string[]> {
    const toolsPod = await getCephToolsPod(this.namespace);
    const out = await toolsPod.execCmdOnPod(`rbd ls -p ${this.rbdPool}`, { outYamlFormat: false });
    return out.split('\n').map((line) => line.trim()).filter((line) => line.length > 0);
  }

  private async getCephfsSubvolumes (): Promise<string[]> {
    const toolsPod = await getCephToolsPod(this.namespace);
    const filesystems = await toolsPod.execCephCmd('ceph fs ls', 'json');
    const subvolumes: string[] = [];
    for (const fs of Array.isArray(filesystems) ? filesystems : []) {
      const fsName = getStr(fs, 'name');
      if (!fsName) {
        continue;
      }
      const list = await toolsPod.execCephCmd(`ceph fs subvolume ls ${fsName} csi`, 'json');
      for (const subvol of Array.isArray(list) ? list : []) {
        const name = getStr(subvol, 'name');
        if (name) {
          subvolumes.push(name);
        }
      }
    }
    return subvolumes;
  }

  private async getEvents (): Promise<unknown[]> {
    return getList(await new OCP({ kind: EVENT, namespace: this.namespace }).get(), 'items');
  }

  // Take the baseline and check that Ceph is healthy before the workload.
  async runPreValidation () {
    log.info('Performing pre-operation validation');
    this.startTime = new Date();
    this.baselinePvs = new Set((await this.getPvs()).map((pv) => getStr(pv, 'metadata.name') || ''));
    this.baselineRbdImages = new Set(await this.getRbdImages());
    this.baselineSubvolumes = new Set(await this.getCephfsSubvolumes());
    log.info(
      `Baseline: ${this.baselinePvs.size} PVs, ${this.baselineRbdImages.size} RBD images, ` +
      `${this.baselineSubvolumes.size} CephFS subvolumes`
    );
    await this.runCheck('cephHealth');
    log.info('Pre-operation validation completed');
  }

  // @returns Details of the problems found by the check (empty if it passed).
  private async check (name: CheckName): Promise<string[]> {
    switch (name) {
      case 'cephHealth': {
        const status = healthStatus(await runCephHealthCmd(this.namespace));
        if (status === HEALTH_OK || (status === HEALTH_WARN && this.allowHealthWarn)) {
          return [];
        }
        return [`Ceph health is ${status}`];
      }
      case 'orphanPvs':
        return (await this.getPvs())
          .filter((pv) => [STATUS_RELEASED, STATUS_FAILED].includes(getStr(pv, 'status.phase') || ''))
          .map((pv) => getStr(pv, 'metadata.name') || '')
          .filter((name) => !this.baselinePvs.has(name));
      case 'orphanRbdImages': {
        const images = (await this.getRbdImages()).filter((img) => !this.baselineRbdImages.has(img));
        return findOrphanVolumes(images, pvHandles(await this.getPvs(), RBD_DRIVER));
      }
      case 'orphanCephfsSubvolumes': {
        const subvols = (await this.getCephfsSubvolumes()).filter((sv) => !this.baselineSubvolumes.has(sv));
        return findOrphanVolumes(subvols, pvHandles(await this.getPvs(), CEPHFS_DRIVER));
      }
      case 'pvcEvents':
        return pvcFailureEvents(await this.getEvents(), this.startTime || new Date(0));
    }
  }

  private recordFailure (check: CheckName, message: string, details?: string[]) {
    const failure: ValidationFailure = { check, message, details, timestamp: new Date().toISOString() };
    this.failures.push(failure);
    this.failedChecks++;
    log.warn(`Validation check ${check} failed: ${message}`);
    this.emit('failure', failure);
  }

  // Run the check and record its result.
  //
  // @returns True if the check passed.
  async runCheck (name: CheckName): Promise<boolean> {
    this.totalChecks++;
    let details: string[];
    try {
      details = await this.check(name);
    } catch (err) {
      this.recordFailure(name, `Check raised an error: ${errorMessage(err)}`);
      return false;
    }
    if (details.length > 0) {
      this.recordFailure(name, `Found ${details.length} problem(s)`, details);
      return false;
    }
    return true;
  }

  // One round of the enabled checks.
  //
  // @returns True if all of them passed.
  async runRound (): Promise<boolean> {
    let passed = true;
    for (const name of this.checks) {
      if (!(await this.runCheck(name))) {
        passed = false;
      }
    }
    this.rounds++;
    if (passed) {
      this.consecutiveFailures = 0;
    } else {
      this.consecutiveFailures++;
      if (this.consecutiveFailures === this.maxConsecutiveFailures) {
        log.error(`Validation failed in ${this.consecutiveFailures} consecutive rounds`);
        this.emit('critical', this.consecutiveFailures);
      }
    }
    this.emit('round', this.rounds);
    return passed;
  }

  private async runLoop () {
    while (!this.stopEvent.isSet()) {
      await this.runRound();
      if (await this.stopEvent.wait(this.interval)) {
        break;
      }
    }
    log.info(`Continuous validation stopped after ${this.rounds} rounds`);
  }

  // Start the continuous validation in the background. The returned
  // promise resolves when the validation is stopped.
  start (): Promise<void> {
    if (!this.loop) {
      if (!this.startTime) {
        this.startTime = new Date();
      }
      log.info(`Starting continuous validation every ${this.interval} seconds`);
      this.loop = this.runLoop();
    }
    return this.loop;
  }

  async stop () {
    this.stopEvent.set();
    if (this.loop) {
      await this.loop;
      this.loop = undefined;
    }
  }

  // Final checks after the workload: Ceph health with retries (the cluster
  // may still be recovering) and the orphans compared to the baseline.
  async runPostValidation (healthTries = 20, healthDelay = 30): Promise<ValidationReport> {
    log.info('Performing post-operation validation');
    this.totalChecks++;
    try {
      await cephHealthCheck(this.namespace, healthTries, healthDelay);
    } catch (err) {
      this.recordFailure('cephHealth', `Ceph did not become healthy: ${errorMessage(err)}`);
    }
    for (const name of ['orphanPvs', 'orphanRbdImages', 'orphanCephfsSubvolumes'] as const) {
      await this.runCheck(name);
    }
    this.endTime = new Date();
    const report = this.getReport();
    log.info(`Post-operation validation completed: ${report.passed ? 'PASSED' : 'FAILED'}`);
    return report;
  }

  getReport (): ValidationReport {
    const start = this.startTime || new Date();
    const end = this.endTime || new Date();
    return {
      totalChecks: this.totalChecks,
      failedChecks: this.failedChecks,
      failures: this.failures.slice(),
      startTime: start.toISOString(),
      endTime: end.toISOString(),
      durationSec: (end.getTime() - start.getTime()) / 1000,
      passed: this.failedChecks === 0
    };
  }
}
