// ClusterServiceVersion (CSV) of an operator installed by OLM.

import { CLUSTER_SERVICE_VERSION, OCS_CSV_PREFIX, ODF_OPERATOR_NAME, STATUS_SUCCEEDED } from './constants';
import { Logger } from './logger';
import { OCP, OcpOptions, ResourceData } from './ocp';
import { TimeoutSampler } from './timeout_sampler';
import { getList, getStr, isRecord } from './utils';

const log = Logger('csv');

export class CSV extends OCP {
  constructor (opts: Omit<OcpOptions, 'kind'> = {}) {
    super({ ...opts, kind: CLUSTER_SERVICE_VERSION });
    this.hasPhase = true;
  }
}

async function listCsvs (namespace: string): Promise<ResourceData[]> {
  const data = await new CSV({ namespace }).get();
  return getList(data, 'items').filter(isRecord);
}

export async function getCsvsStartWithPrefix (csvPrefix: string, namespace: string): Promise<ResourceData[]> {
  const csvs = await listCsvs(namespace);
  return csvs.filter((csv) => (getStr(csv, 'metadata.name') || '').startsWith(csvPrefix));
}

export async function getCsvNameStartWithPrefix (csvPrefix: string, namespace: string): Promise<string | undefined> {
  const csvs = await listCsvs(namespace);
  return csvs
    .map((csv) => getStr(csv, 'metadata.name') || '')
    .find((name) => name.includes(csvPrefix));
}

// Check once if all CSVs in the namespace are in Succeeded phase.
export async function allCsvsSucceeded (namespace: string): Promise<boolean> {
  for (const csv of await listCsvs(namespace)) {
    const name = getStr(csv, 'metadata.name');
    const phase = getStr(csv, 'status.phase');
    log.info(`CSV: ${name} is in phase: ${phase}`);
    if (phase !== STATUS_SUCCEEDED) {
      log.warn(`CSV: ${name} is not in Succeeded phase! Current phase: ${phase}`);
      return false;
    }
  }
  return true;
}

// Wait for all CSVs in the namespace to be in Succeeded phase.
//
// @returns True if they succeeded within the timeout.
export async function checkAllCsvsAreSucceeded (namespace: string, timeout = 600, sleep = 10): Promise<boolean> {
  const sampler = new TimeoutSampler(timeout, sleep, allCsvsSucceeded, namespace);
  return sampler.waitForFuncStatus(true);
}

// Names of the OCS and ODF operator CSVs.
export async function getOperatorCsvNames (namespace: string): Promise<{ ocs?: string, odf?: string }> {
  const ocs = await getCsvNameStartWithPrefix(OCS_CSV_PREFIX, namespace);
  const odf = await getCsvNameStartWithPrefix(ODF_OPERATOR_NAME, namespace);
  if (!ocs) {
    log.warn(`Could not find CSV for ${OCS_CSV_PREFIX} in namespace ${namespace}`);
  }
  if (!odf) {
    log.warn(`Could not find CSV for ${ODF_OPERATOR_NAME} in namespace ${namespace}`);
  }
  return { ocs, odf };
}
