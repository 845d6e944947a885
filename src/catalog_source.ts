// CatalogSource of OLM providing operator bundles from an index image.

import { CATALOG_SOURCE, MARKETPLACE_NAMESPACE } from './constants';
import { ResourceWrongStatusException } from './exceptions';
import { Logger } from './logger';
import { OCP } from './ocp';
import { TimeoutSampler } from './timeout_sampler';
import { getStr } from './utils';

const log = Logger('catalog-source');

export class CatalogSource extends OCP {
  constructor (opts: { resourceName?: string, namespace?: string, selector?: string } = {}) {
    super({
      resourceName: opts.resourceName,
      namespace: opts.namespace || MARKETPLACE_NAMESPACE,
      selector: opts.selector,
      kind: CATALOG_SOURCE
    });
  }

  // Full image url of the index image, i.e. quay.io/org/ocs-registry:4.15.0-100
  async getImageUrl (): Promise<string> {
    this.checkNameIsSpecified();
    const data = await this.get();
    return getStr(data, 'spec.image') || '';
  }

  // Image name without the tag.
  async getImageName (): Promise<string> {
    const url = await this.getImageUrl();
    const colon = url.lastIndexOf(':');
    return colon > url.lastIndexOf('/') ? url.slice(0, colon) : url;
  }

  // Image tag, '' when the image has none.
  async getImageTag (): Promise<string> {
    const url = await this.getImageUrl();
    const colon = url.lastIndexOf(':');
    return colon > url.lastIndexOf('/') ? url.slice(colon + 1) : '';
  }

  async getState (): Promise<string | undefined> {
    this.checkNameIsSpecified();
    const data = await this.get();
    return getStr(data, 'status.connectionState.lastObservedState');
  }

  async checkState (state: string): Promise<boolean> {
    const current = await this.getState();
    log.info(`Catalog source ${this.resourceName} is in state ${current}`);
    return current === state;
  }

  async waitForState (state = 'READY', timeout = 480, sleep = 5) {
    const sampler = new TimeoutSampler(timeout, sleep, (s: string) => this.checkState(s), state);
    if (!(await sampler.waitForFuncStatus(true))) {
      throw new ResourceWrongStatusException(this.resourceName, {
        kind: CATALOG_SOURCE,
        expected: state,
        got: await this.getState()
      });
    }
  }
}
