// Run configuration. Defaults come from conf/default_config.yaml and any
// number of user files can be merged on top of them. Several clusters can be
// configured at once, each one with its own Config object, and the module
// wide `config` always points to the one in the current context.

import { KubeConfig } from '@kubernetes/client-node';
import * as fs from 'fs';
import * as _ from 'lodash';
import * as yaml from 'js-yaml';
import { DEFAULT_CONFIG_PATH } from './constants';
import { ConfigurationError, UnknownConfigSection } from './exceptions';
import { Logger } from './logger';
import { errorMessage, isRecord, Path } from './utils';

const log = Logger('config');

export const SECTIONS = [
  'AUTH',
  'DEPLOYMENT',
  'ENV_DATA',
  'EXTERNAL_MODE',
  'REPORTING',
  'RUN',
  'UPGRADE',
  'PERF',
  'COMPONENTS',
  'MULTICLUSTER'
] as const;

export type SectionName = typeof SECTIONS[number];
export type Section = Record<string, unknown>;

function isSectionName (name: string): name is SectionName {
  return SECTIONS.some((s) => s === name);
}

// Update a dict recursively, with values from `update` merged into `orig`.
// Nested objects are merged, anything else (lists included) is replaced.
export function mergeDict (orig: Section, update: Section): Section {
  for (const [k, v] of Object.entries(update)) {
    const cur = orig[k];
    if (isRecord(v)) {
      orig[k] = mergeDict(isRecord(cur) ? cur : {}, v);
    } else {
      orig[k] = v;
    }
  }
  return orig;
}

export function readYamlFile (file: string): Section {
  let data: unknown;
  try {
    data = yaml.load(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot load config file ${file}: ${err}`);
  }
  if (data === undefined || data === null) {
    return {};
  }
  if (!isRecord(data)) {
    throw new ConfigurationError(`Config file ${file} does not contain a mapping`);
  }
  return data;
}

export class Config {
  private sections: Record<SectionName, Section>;

  constructor () {
    this.sections = Config.emptySections();
    this.reset();
  }

  private static emptySections (): Record<SectionName, Section> {
    return {
      AUTH: {},
      DEPLOYMENT: {},
      ENV_DATA: {},
      EXTERNAL_MODE: {},
      REPORTING: {},
      RUN: {},
      UPGRADE: {},
      PERF: {},
      COMPONENTS: {},
      MULTICLUSTER: {}
    };
  }

  // Clear all configuration data and load defaults.
  reset () {
    this.sections = Config.emptySections();
    this.update(readYamlFile(DEFAULT_CONFIG_PATH));
  }

  // Override configuration items with the items in userDict, without
  // wiping out items which are not overridden.
  update (userDict?: Section | null) {
    if (!userDict) {
      return;
    }
    for (const [k, v] of Object.entries(userDict)) {
      if (!isSectionName(k)) {
        throw new UnknownConfigSection(
          `${k} is not a valid config section. Valid sections: ${SECTIONS.join(', ')}`
        );
      }
      if (v === null || v === undefined) {
        continue;
      }
      if (!isRecord(v)) {
        throw new ConfigurationError(`Config section ${k} must be a mapping`);
      }
      mergeDict(this.sections[k], v);
    }
  }

  loadFile (file: string) {
    log.info(`Loading config file ${file}`);
    this.update(readYamlFile(file));
  }

  section (name: SectionName): Section {
    return this.sections[name];
  }

  get AUTH () { return this.sections.AUTH; }
  get DEPLOYMENT () { return this.sections.DEPLOYMENT; }
  get ENV_DATA () { return this.sections.ENV_DATA; }
  get EXTERNAL_MODE () { return this.sections.EXTERNAL_MODE; }
  get REPORTING () { return this.sections.REPORTING; }
  get RUN () { return this.sections.RUN; }
  get UPGRADE () { return this.sections.UPGRADE; }
  get PERF () { return this.sections.PERF; }
  get COMPONENTS () { return this.sections.COMPONENTS; }
  get MULTICLUSTER () { return this.sections.MULTICLUSTER; }

  // Typed accessors. The fallback is returned when the value is missing or
  // has a different type.
  getString (name: SectionName, path: Path, fallback?: string): string | undefined {
    const val = _.get(this.sections[name], path);
    return typeof val === 'string' ? val : fallback;
  }

  getNumber (name: SectionName, path: Path, fallback?: number): number | undefined {
    const val = _.get(this.sections[name], path);
    return typeof val === 'number' ? val : fallback;
  }

  getBool (name: SectionName, path: Path, fallback = false): boolean {
    const val = _.get(this.sections[name], path);
    return typeof val === 'boolean' ? val : fallback;
  }

  getDict (): Record<SectionName, Section> {
    return _.cloneDeep(this.sections);
  }
}

// Wraps Config objects so that we can handle multiple cluster contexts.
export class MultiClusterConfig {
  clusters: Config[];
  curIndex: number;

  constructor () {
    this.clusters = [new Config()];
    this.curIndex = 0;
  }

  get nclusters (): number {
    return this.clusters.length;
  }

  get multicluster (): boolean {
    return this.clusters.length > 1;
  }

  get clusterCtx (): Config {
    return this.clusters[this.curIndex];
  }

  // Reset to `count` fresh cluster configs, each one knowing its index.
  initClusterConfigs (count: number) {
    if (count < 1) {
      throw new ConfigurationError('At least one cluster has to be configured');
    }
    this.clusters = [];
    for (let i = 0; i < count; i++) {
      const conf = new Config();
      conf.MULTICLUSTER.multicluster_index = i;
      this.clusters.push(conf);
    }
    this.curIndex = 0;
  }

  insertClusterConfig (index: number, conf: Config) {
    this.clusters.splice(index, 0, conf);
  }

  switchCtx (index = 0) {
    if (index < 0 || index >= this.clusters.length) {
      throw new ConfigurationError(`No cluster config at index ${index}`);
    }
    this.curIndex = index;
    log.info(`Switched to cluster: ${this.currentClusterName()}`);
  }

  resetCtx () {
    this.curIndex = 0;
  }

  // Run the function with the given cluster context and restore the
  // original context once it is done.
  async runWithCtx<R> (index: number, fn: () => Promise<R>): Promise<R> {
    const orig = this.curIndex;
    this.switchCtx(index);
    try {
      return await fn();
    } finally {
      this.switchCtx(orig);
    }
  }

  currentClusterName (): string {
    return this.clusterCtx.getString('ENV_DATA', 'cluster_name', `cluster-${this.curIndex}`) || '';
  }

  getProviderIndex (): number {
    const idx = this.clusters.findIndex(
      (c) => c.getString('ENV_DATA', 'cluster_type') === 'provider'
    );
    if (idx < 0) {
      throw new ConfigurationError("Didn't find the provider cluster");
    }
    return idx;
  }

  getConsumerIndexes (): number[] {
    const indexes: number[] = [];
    this.clusters.forEach((c, i) => {
      if (c.getString('ENV_DATA', 'cluster_type') === 'consumer') {
        indexes.push(i);
      }
    });
    return indexes;
  }

  update (userDict?: Section | null) {
    this.clusterCtx.update(userDict);
  }

  reset () {
    this.clusterCtx.reset();
  }

  loadFile (file: string) {
    this.clusterCtx.loadFile(file);
  }

  getString (name: SectionName, path: Path, fallback?: string): string | undefined {
    return this.clusterCtx.getString(name, path, fallback);
  }

  getNumber (name: SectionName, path: Path, fallback?: number): number | undefined {
    return this.clusterCtx.getNumber(name, path, fallback);
  }

  getBool (name: SectionName, path: Path, fallback = false): boolean {
    return this.clusterCtx.getBool(name, path, fallback);
  }

  get AUTH () { return this.clusterCtx.AUTH; }
  get DEPLOYMENT () { return this.clusterCtx.DEPLOYMENT; }
  get ENV_DATA () { return this.clusterCtx.ENV_DATA; }
  get EXTERNAL_MODE () { return this.clusterCtx.EXTERNAL_MODE; }
  get REPORTING () { return this.clusterCtx.REPORTING; }
  get RUN () { return this.clusterCtx.RUN; }
  get UPGRADE () { return this.clusterCtx.UPGRADE; }
  get PERF () { return this.clusterCtx.PERF; }
  get COMPONENTS () { return this.clusterCtx.COMPONENTS; }
  get MULTICLUSTER () { return this.clusterCtx.MULTICLUSTER; }
}

export const config = new MultiClusterConfig();

// Namespace where ODF is installed in the current cluster context.
export function clusterNamespace (): string {
  return config.getString('ENV_DATA', 'cluster_namespace', 'openshift-storage') || 'openshift-storage';
}

// Load k8s config file and check that its current context points to
// a cluster. oc reads the same file, so a broken one fails here early.
//
// @param kubefile  Kube config file, the default locations if not given.
export function loadKubeConfig (kubefile?: string): KubeConfig {
  const kubeConfig = new KubeConfig();
  try {
    if (kubefile) {
      log.info('Reading k8s configuration from file ' + kubefile);
      kubeConfig.loadFromFile(kubefile);
    } else {
      kubeConfig.loadFromDefault();
    }
  } catch (err) {
    throw new ConfigurationError(`Cannot load kubeconfig ${kubefile || ''}: ${errorMessage(err)}`);
  }
  const context = kubeConfig.getCurrentContext();
  if (!context || !kubeConfig.getContextObject(context)) {
    throw new ConfigurationError(`Current context "${context || ''}" not found in the kubeconfig`);
  }
  const cluster = kubeConfig.getCurrentCluster();
  if (!cluster || !cluster.server) {
    throw new ConfigurationError(`No cluster server for the context "${context}" in the kubeconfig`);
  }
  return kubeConfig;
}
