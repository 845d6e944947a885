// Installation of operators through OLM: the catalog source offering the
// operator, the subscription and the approval of its install plan.

import * as _ from 'lodash';
import { CatalogSource } from './catalog_source';
import { clusterNamespace, config } from './config';
import {
  CATALOG_SOURCE_YAML,
  MARKETPLACE_NAMESPACE,
  STATUS_SUCCEEDED,
  SUBSCRIPTION,
  SUBSCRIPTION_YAML
} from './constants';
import { CSV } from './csv';
import { waitForInstallPlanAndApprove } from './install_plan';
import { Logger } from './logger';
import { OCP } from './ocp';
import { PackageManifest } from './package_manifest';
import { dumpDataToTempYaml, loadYaml } from './templating';
import { getStr } from './utils';

const log = Logger('olm');

export type SubscribeOptions = {
  // name of the package (and of the subscription)
  packageName: string;
  namespace?: string;
  channel?: string;
  // catalog source providing the package
  source?: string;
  sourceNamespace?: string;
  // Automatic or Manual
  approval?: string;
  // package manifest selector (internal catalog source)
  selector?: string;
  // pattern of the CSV name, defaults to the package name
  csvPattern?: string;
  // seconds to wait for the CSV to succeed
  timeout?: number;
}

// Subscribe to the operator and wait for its CSV to succeed.
//
// @returns Name of the installed CSV.
export async function subscribeOperator (opts: SubscribeOptions): Promise<string> {
  const namespace = opts.namespace || clusterNamespace();
  const approval = opts.approval ||
    config.getString('DEPLOYMENT', 'subscription_plan_approval', 'Automatic') || 'Automatic';
  const source = opts.source ||
    config.getString('DEPLOYMENT', 'default_operator_source', 'redhat-operators') || 'redhat-operators';
  const timeout = opts.timeout === undefined ? 720 : opts.timeout;

  const packageManifest = new PackageManifest(opts.packageName, {
    selector: opts.selector,
    subscriptionPlanApproval: approval,
    installPlanNamespace: namespace
  });
  await packageManifest.waitForPackageManifest(undefined, 300, 10);
  const channel = opts.channel ||
    config.getString('DEPLOYMENT', 'ocs_csv_channel') ||
    await packageManifest.getDefaultChannel();
  log.info(`Subscribing to ${opts.packageName} from ${source} in channel ${channel}, approval ${approval}`);

  const subscription = loadYaml(SUBSCRIPTION_YAML);
  _.set(subscription, 'metadata.name', opts.packageName);
  _.set(subscription, 'metadata.namespace', namespace);
  _.set(subscription, 'spec.name', opts.packageName);
  _.set(subscription, 'spec.channel', channel);
  _.set(subscription, 'spec.source', source);
  _.set(subscription, 'spec.sourceNamespace', opts.sourceNamespace || MARKETPLACE_NAMESPACE);
  _.set(subscription, 'spec.installPlanApproval', approval);
  const subscriptionFile = dumpDataToTempYaml(subscription, 'subscription');
  await new OCP({ kind: SUBSCRIPTION, namespace }).apply(subscriptionFile);

  if (approval === 'Manual') {
    await waitForInstallPlanAndApprove(namespace);
  }

  const csvName = await packageManifest.getCurrentCsv(channel, opts.csvPattern || opts.packageName);
  const csv = new CSV({ resourceName: csvName, namespace });
  await csv.waitForPhase(STATUS_SUCCEEDED, timeout);
  log.info(`Operator ${opts.packageName} installed, CSV ${csvName} succeeded`);
  return csvName;
}

// Create the catalog source of the index image and wait until it is READY.
export async function createCatalogSource (image: string, timeout = 480): Promise<CatalogSource> {
  const data = loadYaml(CATALOG_SOURCE_YAML);
  _.set(data, 'spec.image', image);
  const name = getStr(data, 'metadata.name') || '';
  const namespace = getStr(data, 'metadata.namespace') || MARKETPLACE_NAMESPACE;
  log.info(`Creating catalog source ${name} with image ${image}`);
  const catalogSourceFile = dumpDataToTempYaml(data, 'catalog_source');
  const catalogSource = new CatalogSource({ resourceName: name, namespace });
  await catalogSource.apply(catalogSourceFile);
  await catalogSource.waitForState('READY', timeout);
  return catalogSource;
}
