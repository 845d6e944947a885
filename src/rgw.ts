// Ceph object gateway (RGW) of the internal object store.

import { clusterNamespace } from './config';
import { ROUTE, RGW_ADMIN_SECRET, RGW_ROUTE_NAME, RGW_SERVICE_NAME, SECRET, SERVICE } from './constants';
import { CommandFailed } from './exceptions';
import { Logger } from './logger';
import { OCP } from './ocp';
import { decode, getList, getNum, getStr } from './utils';

const log = Logger('rgw');

export class RGW {
  namespace: string;

  constructor (namespace?: string) {
    this.namespace = namespace || clusterNamespace();
  }

  // Endpoint of the service reachable from the pods of the cluster.
  async getInternalEndpoint (): Promise<string> {
    const svc = await new OCP({ kind: SERVICE, namespace: this.namespace }).get({ resourceName: RGW_SERVICE_NAME });
    const port = getNum(getList(svc, 'spec.ports')[0], 'port') || 80;
    return `http://${RGW_SERVICE_NAME}.${this.namespace}.svc:${port}`;
  }

  // Endpoint exposed by the route of the object store.
  async getExternalEndpoint (): Promise<string> {
    const route = await new OCP({ kind: ROUTE, namespace: this.namespace }).get({ resourceName: RGW_ROUTE_NAME });
    const host = getStr(route, 'spec.host');
    if (!host) {
      throw new CommandFailed(`Route ${RGW_ROUTE_NAME} has no host`);
    }
    return `http://${host}`;
  }

  // Endpoint and S3 keys of the object store user.
  //
  // @param secretName  Secret of the user created by rook.
  // @param external    Use the route instead of the service.
  // @returns [endpoint, accessKey, secretKey]
  async getCredentials (secretName = RGW_ADMIN_SECRET, external = false): Promise<[string, string, string]> {
    const endpoint = external ? await this.getExternalEndpoint() : await this.getInternalEndpoint();
    const secret = await new OCP({ kind: SECRET, namespace: this.namespace }).get({ resourceName: secretName });
    const accessKey = decode(getStr(secret, 'data.AccessKey') || '');
    const secretKey = decode(getStr(secret, 'data.SecretKey') || '');
    log.debug(`Credentials of ${secretName} read, endpoint ${endpoint}`);
    return [endpoint, accessKey, secretKey];
  }
}
