// OLM Subscription of an operator.

import { SUBSCRIPTION } from './constants';
import { TimeoutExpiredError } from './exceptions';
import { Logger } from './logger';
import { OCP, ResourceData } from './ocp';
import { TimeoutSampler } from './timeout_sampler';
import { getList, getStr, isRecord } from './utils';

const log = Logger('subscription');

export class Subscription extends OCP {
  constructor (opts: { resourceName?: string, namespace?: string, selector?: string } = {}) {
    super({ ...opts, kind: SUBSCRIPTION });
  }

  async getChannel (): Promise<string | undefined> {
    this.checkNameIsSpecified();
    return getStr(await this.get(), 'spec.channel');
  }

  async getCurrentCsv (): Promise<string | undefined> {
    this.checkNameIsSpecified();
    return getStr(await this.get(), 'status.currentCSV');
  }

  async getInstalledCsv (): Promise<string | undefined> {
    this.checkNameIsSpecified();
    return getStr(await this.get(), 'status.installedCSV');
  }

  // Wait until the subscription reports the installed CSV.
  //
  // @returns Name of the installed CSV.
  async waitForInstalledCsv (timeout = 300, sleep = 10): Promise<string> {
    const sampler = new TimeoutSampler(timeout, sleep, () => this.getInstalledCsv());
    for await (const csv of sampler) {
      if (csv) {
        log.info(`Subscription ${this.resourceName} installed CSV ${csv}`);
        return csv;
      }
    }
    throw new TimeoutExpiredError(timeout, `No CSV installed for subscription ${this.resourceName}`);
  }
}

export async function getSubscriptions (namespace: string, selector?: string): Promise<ResourceData[]> {
  const data = await new Subscription({ namespace, selector }).get();
  return getList(data, 'items').filter(isRecord);
}
