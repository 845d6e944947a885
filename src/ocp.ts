// A basic OCP object running `oc` commands against a kind of resources,
// optionally bound to a namespace and a resource name. Resource specific
// wrappers (CSV, PackageManifest, ...) are built on top of it.

import * as yaml from 'js-yaml';
import {
  CommandFailed,
  NotSupportedFunctionError,
  ResourceInUnexpectedState,
  ResourceNameNotSpecifiedException,
  TimeoutExpiredError,
  ValueError
} from './exceptions';
import { ExecOptions, runCmd } from './exec';
import { Logger } from './logger';
import { withRetry } from './retry';
import { TimeoutSampler } from './timeout_sampler';
import { errorMessage, getList, getStr, isRecord, shlexSplit, sleep } from './utils';

const log = Logger('ocp');

export type ResourceData = Record<string, unknown>;

export type OcpOptions = {
  apiVersion?: string;
  kind?: string;
  namespace?: string;
  resourceName?: string;
  selector?: string;
}

export type OcCmdOptions = {
  secrets?: string[];
  // seconds
  timeout?: number;
  silent?: boolean;
  ignoreError?: boolean;
}

export type GetOptions = {
  resourceName?: string;
  selector?: string;
  allNamespaces?: boolean;
}

export type WaitForResourceOptions = {
  condition: string;
  resourceName?: string;
  column?: string;
  selector?: string;
  // how many resources in the condition are enough (0 means all)
  resourceCount?: number;
  timeout?: number;
  sleep?: number;
}

// Retry settings of waitForPhase() on ResourceInUnexpectedState.
export const PHASE_RETRY = { tries: 4, delay: 5, backoff: 1 };

export function toResourceData (out: unknown, what: string): ResourceData {
  if (!isRecord(out)) {
    throw new CommandFailed(`Unexpected output of ${what}: ${String(out)}`);
  }
  return out;
}

const ACCESS_MODES = ['RWO', 'RWX', 'ROX'];

function isUpper (word: string): boolean {
  return word !== word.toLowerCase() && word === word.toUpperCase();
}

// Get a value from the table printed by `oc get` (without -o yaml).
// Titles in the header are separated by two or more spaces. The values of
// the row are split as shell words and the uppercase ones are dropped,
// except the access modes.
//
// @param output  Output of oc get for a single resource.
// @param column  Title of the column.
// @param row     Index of the value row (0 is the first line after header).
export function parseTableColumn (output: string, column: string, row = 0): string {
  const lines = output.split('\n').filter((l) => l.trim().length > 0);
  if (lines.length < 2 + row) {
    throw new ValueError(`No row ${row} in the output: ${output}`);
  }
  const titles = lines[0].trim().split(/\s{2,}/);
  const idx = titles.indexOf(column);
  if (idx < 0) {
    throw new ValueError(`Column ${column} not found in: ${lines[0]}`);
  }
  const values = shlexSplit(lines[1 + row]).filter((w) => !isUpper(w) || ACCESS_MODES.includes(w));
  if (idx >= values.length) {
    throw new ValueError(`No value of ${column} in: ${lines[1 + row]}`);
  }
  return values[idx];
}

export class OCP {
  // Set to true in the child class if the resource has a phase in status.
  hasPhase: boolean;
  apiVersion: string;
  kind: string;
  namespace?: string;
  resourceName: string;
  selector?: string;
  private cachedData?: ResourceData;

  constructor (opts: OcpOptions = {}) {
    this.hasPhase = false;
    this.apiVersion = opts.apiVersion || 'v1';
    this.kind = opts.kind || 'Service';
    this.namespace = opts.namespace;
    this.resourceName = opts.resourceName || '';
    this.selector = opts.selector;
  }

  // Cached result of get().
  async data (): Promise<ResourceData> {
    if (!this.cachedData) {
      this.cachedData = await this.get();
    }
    return this.cachedData;
  }

  async reloadData () {
    this.cachedData = await this.get();
  }

  // Execute `oc` command.
  //
  // @param command  The command without the initial 'oc' (i.e. create -f file.yaml).
  // @returns Parsed yaml output or raw output if outYamlFormat is false.
  execOcCmd (command: string, opts?: OcCmdOptions & { outYamlFormat?: true }): Promise<unknown>;
  execOcCmd (command: string, opts: OcCmdOptions & { outYamlFormat: false }): Promise<string>;
  async execOcCmd (command: string, opts: OcCmdOptions & { outYamlFormat?: boolean } = {}): Promise<unknown> {
    let ocCmd = 'oc ';
    const kubeconfig = process.env.KUBECONFIG;
    if (this.namespace) {
      ocCmd += `-n ${this.namespace} `;
    }
    if (kubeconfig) {
      ocCmd += `--kubeconfig ${kubeconfig} `;
    }
    ocCmd += command;
    const execOpts: ExecOptions = {
      secrets: opts.secrets,
      timeout: opts.timeout,
      silent: opts.silent,
      ignoreError: opts.ignoreError
    };
    let out = await runCmd(ocCmd, execOpts);
    if (out.startsWith('hints = ')) {
      const brace = out.indexOf('{');
      if (brace >= 0) {
        out = out.slice(brace);
      }
    }
    if (opts.outYamlFormat === false) {
      return out;
    }
    return yaml.load(out);
  }

  // Run the commands on the node by `oc debug` and fail if any of them fails.
  async execOcDebugCmd (node: string, cmdList: string[]): Promise<string> {
    const errMsg = 'CMD FAILED';
    const cmd = [...cmdList, ' '].join(` || echo '${errMsg}';`);
    const debugCmd = `debug nodes/${node} -- chroot /host /bin/bash -c "${cmd}"`;
    const out = await this.execOcCmd(debugCmd, { outYamlFormat: false });
    if (out.includes(errMsg)) {
      throw new CommandFailed(`Command failed on node ${node}: ${out}`);
    }
    return out;
  }

  private getCommand (opts: GetOptions, outYamlFormat: boolean): string {
    const resourceName = opts.resourceName || this.resourceName;
    const selector = opts.selector === undefined ? this.selector : opts.selector;
    let command = `get ${this.kind} ${resourceName}`.trimEnd();
    if (opts.allNamespaces && !this.namespace) {
      command += ' -A';
    } else if (this.namespace) {
      command += ` -n ${this.namespace}`;
    }
    if (selector) {
      command += ` --selector=${selector}`;
    }
    if (outYamlFormat) {
      command += ' -o yaml';
    }
    return command;
  }

  // Get command - 'oc get <kind> <resource>'.
  async get (opts: GetOptions = {}): Promise<ResourceData> {
    const out = await this.execOcCmd(this.getCommand(opts, true));
    return toResourceData(out, `oc get ${this.kind}`);
  }

  // Same as get() but returns the table printed by oc.
  async getTable (opts: GetOptions = {}): Promise<string> {
    return this.execOcCmd(this.getCommand(opts, false), { outYamlFormat: false });
  }

  async describe (opts: GetOptions = {}): Promise<string> {
    const resourceName = opts.resourceName || this.resourceName;
    let command = `describe ${this.kind} ${resourceName}`.trimEnd();
    if (opts.allNamespaces && !this.namespace) {
      command += ' -A';
    }
    if (opts.selector) {
      command += ` --selector=${opts.selector}`;
    }
    return this.execOcCmd(command, { outYamlFormat: false });
  }

  async create (opts: { yamlFile?: string, resourceName?: string, outYamlFormat?: boolean }): Promise<unknown> {
    if (!(opts.yamlFile || opts.resourceName)) {
      throw new CommandFailed('At least one of resourceName or yamlFile have to be provided');
    }
    let command = 'create ';
    if (opts.yamlFile) {
      command += `-f ${opts.yamlFile}`;
    } else {
      command += `${this.kind} ${opts.resourceName}`;
    }
    if (opts.outYamlFormat !== false) {
      command += ' -o yaml';
      return this.execOcCmd(command);
    }
    return this.execOcCmd(command, { outYamlFormat: false });
  }

  async delete (opts: { yamlFile?: string, resourceName?: string, wait?: boolean, force?: boolean }): Promise<string> {
    if (!(opts.yamlFile || opts.resourceName)) {
      throw new CommandFailed('At least one of resourceName or yamlFile have to be provided');
    }
    let command = 'delete ';
    if (opts.resourceName) {
      command += `${this.kind} ${opts.resourceName}`;
    } else {
      command += `-f ${opts.yamlFile}`;
    }
    if (opts.force) {
      command += ' --grace-period=0 --force';
    }
    // oc waits by default
    if (opts.wait === false) {
      command += ' --wait=false';
    }
    return this.execOcCmd(command, { outYamlFormat: false });
  }

  async apply (yamlFile: string): Promise<string> {
    return this.execOcCmd(`apply -f ${yamlFile}`, { outYamlFormat: false });
  }

  // Apply changes to the resource.
  //
  // @param params      The patch (json or merge patch document).
  // @param formatType  Type of the patch (json, merge, strategic).
  // @returns True if the resource has been patched.
  async patch (opts: { resourceName?: string, params: string, formatType?: string }): Promise<boolean> {
    const resourceName = opts.resourceName || this.resourceName;
    const formatType = opts.formatType || 'json';
    const command =
      `patch ${this.kind} ${resourceName} -n ${this.namespace} ` +
      `-p '${opts.params}' --type ${formatType}`;
    log.info(`Command: ${command}`);
    const result = await this.execOcCmd(command, { outYamlFormat: false });
    return result.includes('patched');
  }

  async annotate (annotation: string, resourceName?: string, overwrite = true): Promise<string> {
    let command = `annotate ${this.kind} ${resourceName || this.resourceName} ${annotation}`;
    if (overwrite) {
      command += ' --overwrite';
    }
    return this.execOcCmd(command, { outYamlFormat: false });
  }

  // @param label  New label, i.e. "app=rook-ceph-mds".
  async addLabel (resourceName: string, label: string): Promise<string> {
    return this.execOcCmd(`label ${this.kind} ${resourceName} ${label}`, { outYamlFormat: false });
  }

  async newProject (projectName: string): Promise<boolean> {
    const out = await this.execOcCmd(`new-project ${projectName}`, { outYamlFormat: false });
    return out.includes(`Now using project "${projectName}"`);
  }

  async getUserToken (): Promise<string> {
    const token = await this.execOcCmd('whoami --show-token', { outYamlFormat: false });
    return token.trimEnd();
  }

  // Value of the column in the `oc get` table of the resource.
  async getResource (resourceName: string, column: string): Promise<string> {
    const table = await this.getTable({ resourceName });
    return parseTableColumn(table, column);
  }

  async getResourceStatus (resourceName: string, column = 'STATUS'): Promise<string> {
    return this.getResource(resourceName, column);
  }

  // Wait for a resource (or all resources matching the selector) to reach
  // the desired condition in the given column of `oc get` output.
  //
  // @returns True when the condition is reached.
  async waitForResource (opts: WaitForResourceOptions): Promise<boolean> {
    const resourceName = opts.resourceName || this.resourceName;
    const column = opts.column || 'STATUS';
    const resourceCount = opts.resourceCount || 0;
    const timeout = opts.timeout === undefined ? 60 : opts.timeout;
    const sleepSec = opts.sleep === undefined ? 3 : opts.sleep;
    log.info(
      `Waiting for a resource(s) of kind ${this.kind} identified by name ` +
      `'${resourceName}' and selector ${opts.selector} to reach desired ` +
      `condition ${opts.condition}`
    );
    // actual status of the resource(s), reported when the waiting times out
    let actualStatus: string | string[] | undefined;
    const sampler = new TimeoutSampler(
      timeout,
      sleepSec,
      (name: string, selector?: string) => this.get({ resourceName: name, selector }),
      resourceName,
      opts.selector
    );
    try {
      for await (const sample of sampler) {
        if (resourceName) {
          const status = await this.getResourceStatus(resourceName, column);
          if (status === opts.condition) {
            return true;
          }
          log.info(`status of ${resourceName} was ${status}, but we were waiting for ${opts.condition}`);
          actualStatus = status;
        } else if (sample.kind === 'List') {
          const items = getList(sample, 'items');
          const inCondition: unknown[] = [];
          const statuses: string[] = [];
          for (const item of items) {
            const itemName = getStr(item, 'metadata.name') || '';
            try {
              const status = await this.getResourceStatus(itemName, column);
              statuses.push(status);
              if (status === opts.condition) {
                inCondition.push(item);
              }
            } catch (err) {
              if (!(err instanceof CommandFailed)) {
                throw err;
              }
              log.info(`Failed to get status of resource: ${itemName}, Error: ${err.message}`);
            }
            if (resourceCount) {
              if (inCondition.length === resourceCount) {
                return true;
              }
            } else if (items.length === inCondition.length) {
              return true;
            }
          }
          actualStatus = statuses;
          const expNumStr = resourceCount > 0 ? `all ${resourceCount}` : 'all';
          log.info(
            `status of ${resourceName} item(s) were ${statuses}, but we were ` +
            `waiting for ${expNumStr} of them to be ${opts.condition}`
          );
        }
      }
    } catch (err) {
      if (err instanceof TimeoutExpiredError) {
        log.error(`timeout expired: ${err.message}`);
        log.error(
          `Wait for ${this.kind} resource ${resourceName} to reach desired ` +
          `condition ${opts.condition} failed, last actual status was ${actualStatus}`
        );
      }
      throw err;
    }
    return false;
  }

  // Wait for the resource to be deleted.
  //
  // @returns True once the resource is gone.
  async waitForDelete (opts: { resourceName?: string, timeout?: number, sleep?: number } = {}): Promise<boolean> {
    const resourceName = opts.resourceName || this.resourceName;
    const timeout = opts.timeout === undefined ? 60 : opts.timeout;
    const sleepSec = opts.sleep === undefined ? 3 : opts.sleep;
    const start = Date.now();
    while (true) {
      try {
        await this.get({ resourceName });
      } catch (err) {
        if (err instanceof CommandFailed && err.message.includes('NotFound')) {
          log.info(`${this.kind} ${resourceName} got deleted successfully`);
          return true;
        }
        throw err;
      }
      if (timeout < (Date.now() - start) / 1000) {
        const describeOut = await this.describe({ resourceName });
        throw new TimeoutExpiredError(
          timeout,
          `Timeout when waiting for ${resourceName} to delete. Describe output: ${describeOut}`
        );
      }
      await sleep(sleepSec);
    }
  }

  checkNameIsSpecified (resourceName?: string) {
    if (!(resourceName || this.resourceName)) {
      throw new ResourceNameNotSpecifiedException('Resource name has to be specified in class!');
    }
  }

  checkFunctionSupported (supportVar: boolean) {
    if (!supportVar) {
      throw new NotSupportedFunctionError("Resource name doesn't support this functionality!");
    }
  }

  // @returns True if the resource is in the phase.
  async checkPhase (phase: string): Promise<boolean> {
    this.checkFunctionSupported(this.hasPhase);
    this.checkNameIsSpecified();
    let data: ResourceData;
    try {
      data = await this.get();
    } catch (err) {
      if (!(err instanceof CommandFailed)) {
        throw err;
      }
      log.info(`Cannot find resource object ${this.resourceName}`);
      return false;
    }
    const currentPhase = getStr(data, 'status.phase');
    if (currentPhase === undefined) {
      log.info(
        `Problem while reading phase status of resource ${this.resourceName}, ` +
        `data: ${JSON.stringify(data)}`
      );
      return false;
    }
    log.info(`Resource ${this.resourceName} is in phase: ${currentPhase}!`);
    return currentPhase === phase;
  }

  // Wait till phase of resource is the same as the required one.
  async waitForPhase (phase: string, timeout = 300, sleepSec = 5) {
    this.checkFunctionSupported(this.hasPhase);
    this.checkNameIsSpecified();
    await withRetry(ResourceInUnexpectedState, PHASE_RETRY, async () => {
      const sampler = new TimeoutSampler(timeout, sleepSec, (p: string) => this.checkPhase(p), phase);
      if (!(await sampler.waitForFuncStatus(true))) {
        throw new ResourceInUnexpectedState(
          `Resource: ${this.resourceName} is not in expected phase: ${phase}`
        );
      }
    });
  }
}

// Switch to another project.
export async function switchToProject (projectName: string): Promise<boolean> {
  const ocp = new OCP();
  try {
    const out = await ocp.execOcCmd(`project ${projectName}`, { outYamlFormat: false });
    return out.includes(projectName);
  } catch (err) {
    log.error(`Cannot switch to project ${projectName}: ${errorMessage(err)}`);
    return false;
  }
}

// Names of resources of the kind which contain the text.
export async function getAllResourceOfKindContaining (
  kind: string,
  text: string,
  namespace?: string
): Promise<string[]> {
  const data = await new OCP({ kind, namespace }).get();
  return getList(data, 'items')
    .map((item) => getStr(item, 'metadata.name') || '')
    .filter((name) => name.includes(text));
}
