// General resource object. It is created from the resource dictionary,
// either loaded from a template (new resource) or from `oc get` (existing
// resource), and keeps an OCP object bound to its kind and namespace.

import * as fs from 'fs';
import { OCP, ResourceData } from './ocp';
import { Logger } from './logger';
import { dumpDataToTempYaml } from './templating';
import { errorMessage, getStr } from './utils';
import { ValueError } from './exceptions';

const log = Logger('ocs');

// Resources which are never deleted by the tests.
const PROTECTED_NAMES = ['ocs-storagecluster-cephfs', 'ocs-storagecluster-ceph-rbd'];

export class OCS {
  data: ResourceData;
  ocp: OCP;
  tempYaml?: string;
  protected deleted: boolean;

  constructor (data: ResourceData) {
    this.data = data;
    this.ocp = this.makeOcp();
    this.deleted = false;
  }

  private makeOcp (): OCP {
    return new OCP({
      apiVersion: this.apiVersion,
      kind: this.kind,
      namespace: this.namespace,
      resourceName: this.name
    });
  }

  get apiVersion (): string | undefined {
    return getStr(this.data, 'apiVersion');
  }

  get kind (): string {
    const kind = getStr(this.data, 'kind');
    if (!kind) {
      throw new ValueError('Resource data without kind');
    }
    return kind;
  }

  get namespace (): string | undefined {
    return getStr(this.data, 'metadata.namespace');
  }

  get name (): string {
    return getStr(this.data, 'metadata.name') || '';
  }

  get isDeleted (): boolean {
    return this.deleted;
  }

  setDeleted () {
    this.deleted = true;
  }

  // Reload the object with the information from the cluster. After
  // creating a resource the cluster adds status and other fields to it.
  async reload () {
    this.data = await this.get();
    this.ocp = this.makeOcp();
  }

  async get (): Promise<ResourceData> {
    return this.ocp.get({ resourceName: this.name });
  }

  async status (): Promise<string> {
    return this.ocp.getResource(this.name, 'STATUS');
  }

  async describe (): Promise<string> {
    return this.ocp.describe({ resourceName: this.name });
  }

  async create (doReload = true): Promise<unknown> {
    log.info(`Adding ${this.kind} with name ${this.name}`);
    this.tempYaml = dumpDataToTempYaml(this.data, this.kind.toLowerCase());
    const status = await this.ocp.create({ yamlFile: this.tempYaml });
    if (doReload) {
      await this.reload();
    }
    return status;
  }

  // Delete the object unless it has been deleted already.
  //
  // @returns True if deleted.
  async delete (opts: { wait?: boolean, force?: boolean } = {}): Promise<boolean> {
    if (PROTECTED_NAMES.includes(this.name)) {
      log.info(`Attempt to delete default resource ${this.name}, skipping`);
      return false;
    }
    if (this.deleted) {
      log.info(
        `Attempt to remove resource: ${this.name} which is already deleted! ` +
        'Skipping delete of this resource!'
      );
      return true;
    }
    await this.ocp.delete({ resourceName: this.name, wait: opts.wait, force: opts.force });
    this.deleted = true;
    return true;
  }

  async apply (data: ResourceData) {
    this.tempYaml = dumpDataToTempYaml(data, this.kind.toLowerCase());
    await this.ocp.apply(this.tempYaml);
    await this.reload();
  }

  async addLabel (label: string): Promise<string> {
    const status = await this.ocp.addLabel(this.name, label);
    await this.reload();
    return status;
  }

  deleteTempYaml () {
    if (!this.tempYaml) {
      return;
    }
    try {
      fs.unlinkSync(this.tempYaml);
    } catch (err) {
      log.warn(`Failed to remove ${this.tempYaml}: ${errorMessage(err)}`);
    }
    this.tempYaml = undefined;
  }
}

// Create the resource in the cluster from its dictionary.
export async function createResource (data: ResourceData, doReload = true): Promise<OCS> {
  const obj = new OCS(data);
  await obj.create(doReload);
  return obj;
}
