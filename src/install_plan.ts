// InstallPlan created by OLM for subscriptions with Manual approval.

import { INSTALL_PLAN } from './constants';
import { Logger } from './logger';
import { OCP, ResourceData } from './ocp';
import { TimeoutSampler } from './timeout_sampler';
import { getIn, getList, getStr, isRecord } from './utils';

const log = Logger('install-plan');

export class InstallPlan extends OCP {
  constructor (opts: { resourceName?: string, namespace?: string } = {}) {
    super({ ...opts, kind: INSTALL_PLAN });
  }

  async approve (resourceName?: string): Promise<boolean> {
    const name = resourceName || this.resourceName;
    log.info(`Approving install plan ${name}`);
    return this.patch({
      resourceName: name,
      params: '{"spec": {"approved": true}}',
      formatType: 'merge'
    });
  }

  async list (): Promise<ResourceData[]> {
    const data = await this.get();
    return getList(data, 'items').filter(isRecord);
  }
}

export function isApproved (plan: ResourceData): boolean {
  return getIn(plan, 'spec.approved') === true;
}

// Install plans waiting for approval, [] when there is none.
export async function getInstallPlansForApproval (namespace: string): Promise<ResourceData[]> {
  const plans = await new InstallPlan({ namespace }).list();
  return plans.filter((ip) => !isApproved(ip));
}

// Wait for an install plan waiting for approval and approve it.
//
// @returns Names of the approved install plans.
export async function waitForInstallPlanAndApprove (namespace: string, timeout = 300, sleep = 10): Promise<string[]> {
  const installPlan = new InstallPlan({ namespace });
  for await (const plans of new TimeoutSampler(timeout, sleep, getInstallPlansForApproval, namespace)) {
    if (plans.length === 0) {
      log.info(`No install plan for approval found in ${namespace} yet`);
      continue;
    }
    const approved: string[] = [];
    for (const plan of plans) {
      const name = getStr(plan, 'metadata.name') || '';
      await installPlan.approve(name);
      approved.push(name);
    }
    return approved;
  }
  return [];
}
