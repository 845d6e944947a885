// PackageManifest of an operator offered by a catalog source.

import { clusterNamespace } from './config';
import {
  CATALOG_SOURCE,
  MARKETPLACE_NAMESPACE,
  OCS_CSV_PREFIX,
  OPERATOR_CATALOG_SOURCE_NAME,
  OPERATOR_INTERNAL_SELECTOR,
  PACKAGE_MANIFEST
} from './constants';
import {
  ChannelNotFound,
  CommandFailed,
  CSVNotFound,
  NoInstallPlanForApproveFoundException,
  ResourceNotFoundError
} from './exceptions';
import { InstallPlan, isApproved } from './install_plan';
import { Logger } from './logger';
import { GetOptions, OCP, ResourceData } from './ocp';
import { withRetry } from './retry';
import { TimeoutSampler } from './timeout_sampler';
import { getList, getRecord, getStr, isRecord } from './utils';

const log = Logger('package-manifest');

export type Channel = {
  name: string;
  currentCSV: string;
}

export type PackageManifestOptions = {
  namespace?: string;
  installPlanNamespace?: string;
  // Automatic or Manual
  subscriptionPlanApproval?: string;
  selector?: string;
}

export class PackageManifest extends OCP {
  installPlanNamespace: string;
  subscriptionPlanApproval: string;

  constructor (resourceName = '', opts: PackageManifestOptions = {}) {
    super({
      resourceName,
      namespace: opts.namespace || MARKETPLACE_NAMESPACE,
      selector: opts.selector,
      kind: PACKAGE_MANIFEST
    });
    this.installPlanNamespace = opts.installPlanNamespace || clusterNamespace();
    this.subscriptionPlanApproval = opts.subscriptionPlanApproval || 'Automatic';
  }

  // Get the package manifest. If the oc returns a list (selector has
  // been used), the item matching the name is picked from it.
  async get (opts: GetOptions = {}): Promise<ResourceData> {
    return withRetry(ResourceNotFoundError, { tries: 10, delay: 10, backoff: 1 }, () => this.getOnce(opts));
  }

  private async getOnce (opts: GetOptions): Promise<ResourceData> {
    const resourceName = opts.resourceName || this.resourceName;
    const selector = opts.selector || this.selector;
    const data = await super.get(opts);
    if (data.kind !== 'List') {
      return data;
    }
    const items = getList(data, 'items').filter(isRecord);
    const notFound = () => new ResourceNotFoundError(
      `Requested packageManifest: ${resourceName} with selector: ${selector} not found!`
    );
    if (items.length === 0 && selector && resourceName) {
      throw notFound();
    }
    if (items.length === 1) {
      return items[0];
    }
    if (items.length > 1 && resourceName) {
      const matching = items.filter((i) => getStr(i, 'metadata.name') === resourceName);
      if (matching.length === 1) {
        return matching[0];
      }
      if (matching.length === 0) {
        throw notFound();
      }
      return { ...data, items: matching };
    }
    return data;
  }

  async getDefaultChannel (): Promise<string> {
    this.checkNameIsSpecified();
    return withRetry(CommandFailed, { tries: 100, delay: 5, backoff: 1 }, async () => {
      const data = await this.data();
      const channel = getStr(data, 'status.defaultChannel');
      if (channel === undefined) {
        log.error(`Can't get default channel for package manifest. Value of data: ${JSON.stringify(data)}`);
        throw new CommandFailed(`No default channel in package manifest ${this.resourceName}`);
      }
      return channel;
    });
  }

  async getChannels (): Promise<Channel[]> {
    this.checkNameIsSpecified();
    const data = await this.data();
    const status = getRecord(data, 'status');
    if (!Array.isArray(status.channels)) {
      log.error(`Can't get channels for package manifest. Value of data: ${JSON.stringify(data)}`);
      throw new ResourceNotFoundError(`No channels in package manifest ${this.resourceName}`);
    }
    return status.channels.filter(isRecord).map((ch) => ({
      name: getStr(ch, 'name') || '',
      currentCSV: getStr(ch, 'currentCSV') || ''
    }));
  }

  // Current CSV for the default or the given channel.
  //
  // @param channel     Channel of the CSV.
  // @param csvPattern  CSV name pattern used with Manual approval.
  async getCurrentCsv (channel?: string, csvPattern = OCS_CSV_PREFIX): Promise<string> {
    this.checkNameIsSpecified();
    const wanted = channel || await this.getDefaultChannel();
    const channels = await this.getChannels();
    if (this.subscriptionPlanApproval === 'Manual') {
      try {
        return await this.getInstalledCsvFromInstallPlans(csvPattern);
      } catch (err) {
        if (err instanceof NoInstallPlanForApproveFoundException) {
          log.debug('All install plans approved, continue to get the CSV name from the packageManifest');
        } else if (err instanceof CSVNotFound) {
          log.warn('No CSV found from any installPlan, continue to get the CSV name from the packageManifest');
        } else {
          throw err;
        }
      }
    }
    const found = channels.find((ch) => ch.name === wanted);
    if (found) {
      return found.currentCSV;
    }
    const names = channels.map((ch) => `'${ch.name}'`).join(', ');
    throw new ChannelNotFound(`Channel: ${wanted} not found in available channels: [${names}]`);
  }

  // Currently installed CSV taken from the latest approved install plan.
  async getInstalledCsvFromInstallPlans (pattern: string): Promise<string> {
    const installPlans = await new InstallPlan({ namespace: this.installPlanNamespace }).list();
    if (!installPlans.some((ip) => !isApproved(ip))) {
      throw new NoInstallPlanForApproveFoundException('No install plan for approve found!');
    }
    const created = (ip: ResourceData) => getStr(ip, 'metadata.creationTimestamp') || '';
    const sorted = [...installPlans].sort((a, b) => created(b).localeCompare(created(a)));
    for (const ip of sorted) {
      if (!isApproved(ip)) {
        continue;
      }
      const csvName = getList(ip, 'spec.clusterServiceVersionNames')
        .filter((n): n is string => typeof n === 'string')
        .find((n) => n.includes(pattern));
      if (csvName) {
        return csvName;
      }
    }
    throw new CSVNotFound('No CSV found from approved install plans');
  }

  // Wait until the package manifest exists.
  async waitForPackageManifest (resourceName?: string, timeout = 60, sleep = 3) {
    const name = resourceName || this.resourceName;
    log.info(`Waiting for a resource(s) of kind ${this.kind} identified by name '${name}'`);
    this.checkNameIsSpecified(name);
    const sampler = new TimeoutSampler(timeout, sleep, () => this.get({ resourceName: name }));
    for await (const sample of sampler) {
      if (getStr(sample, 'metadata.name') === name) {
        log.info(`package manifest ${name} found!`);
        return;
      }
      log.info(`package manifest ${name} not found!`);
    }
  }
}

// Selector for the package manifest when the operator comes from the
// internal catalog source, undefined otherwise.
export async function getSelectorForOcsOperator (): Promise<string | undefined> {
  const catalogSource = new OCP({
    kind: CATALOG_SOURCE,
    namespace: MARKETPLACE_NAMESPACE,
    selector: OPERATOR_INTERNAL_SELECTOR
  });
  try {
    const data = await catalogSource.get();
    const items = getList(data, 'items').filter(isRecord);
    if (items.some((cs) => getStr(cs, 'metadata.name') === OPERATOR_CATALOG_SOURCE_NAME)) {
      return OPERATOR_INTERNAL_SELECTOR;
    }
  } catch (err) {
    if (!(err instanceof CommandFailed)) {
      throw err;
    }
  }
  log.info('Internal catalog source not found!');
  return undefined;
}
