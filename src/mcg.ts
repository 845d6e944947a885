// Multi Cloud Gateway (NooBaa). The S3 endpoints and admin credentials
// are read from the noobaa CR and its admin secret. The management API
// is a JSON RPC endpoint protected by a token of the admin account.

import { Agent, fetch } from 'undici';
import parse from 'url-parse';
import { parseS3ApiOutput } from './bucket_utils';
import { clusterNamespace, config } from './config';
import {
  AWS_PLATFORM,
  AZURE_PLATFORM,
  IBMCOS_PLATFORM,
  MCG_NS_AWS_ENDPOINT,
  MCG_NS_AZURE_ENDPOINT,
  MCG_NS_IBMCOS_ENDPOINT,
  NOOBAA_ADMIN_SECRET,
  NOOBAA_RESOURCE_KIND,
  NOOBAA_RESOURCE_NAME,
  OBJECTBUCKETCLAIM_SHORT,
  OPTIMAL_MODE,
  RGW_PLATFORM,
  SECRET
} from './constants';
import { CommandFailed, TimeoutExpiredError, ValueError } from './exceptions';
import { CompletedProcess, execCmd } from './exec';
import { Logger } from './logger';
import { OCP, ResourceData } from './ocp';
import { getAwscliPod, Pod } from './pod';
import { TimeoutSampler } from './timeout_sampler';
import { createUniqueResourceName, decode, errorMessage, getList, getRecord, getStr, isRecord } from './utils';

const log = Logger('mcg');

export type RpcResponse = {
  status: number;
  body: string;
}

// Sends the JSON body of an RPC request to the url.
export type RpcTransport = (url: string, body: string) => Promise<RpcResponse>;

// The management endpoint uses a self-signed certificate.
const insecureAgent = new Agent({ connect: { rejectUnauthorized: false } });

export const fetchTransport: RpcTransport = async (url, body) => {
  const res = await fetch(url, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body,
    dispatcher: insecureAgent
  });
  return { status: res.status, body: await res.text() };
};

let transport: RpcTransport = fetchTransport;

export function setRpcTransport (newTransport: RpcTransport) {
  transport = newTransport;
}

export function resetRpcTransport () {
  transport = fetchTransport;
}

// Credentials of a cloud provider account (or of the RGW user). For
// Azure the access key is the account name and the secret key is the
// account key.
export type CloudClient = {
  endpoint?: string;
  accessKey: string;
  secretKey: string;
  // secret holding the credentials in the cluster
  secretName?: string;
}

export type CloudManager = Partial<Record<string, CloudClient>>;

// Parameters of account_api.add_external_connection for the platform.
export function externalConnectionParams (cldMgr: CloudManager, platform: string, connName: string): Record<string, string> {
  const client = cldMgr[platform];
  if (!client) {
    throw new ValueError(`No credentials of ${platform} in the cloud manager`);
  }
  const common = { identity: client.accessKey, name: connName, secret: client.secretKey };
  switch (platform) {
    case AWS_PLATFORM:
      return { auth_method: 'AWS_V4', endpoint: client.endpoint || MCG_NS_AWS_ENDPOINT, endpoint_type: 'AWS', ...common };
    case AZURE_PLATFORM:
      return { endpoint: client.endpoint || MCG_NS_AZURE_ENDPOINT, endpoint_type: 'AZURE', ...common };
    case RGW_PLATFORM:
      return { auth_method: 'AWS_V4', endpoint: client.endpoint || '', endpoint_type: 'S3_COMPATIBLE', ...common };
    case IBMCOS_PLATFORM:
      return { auth_method: 'AWS_V2', endpoint: client.endpoint || MCG_NS_IBMCOS_ENDPOINT, endpoint_type: 'IBM_COS', ...common };
    default:
      throw new ValueError(`Unsupported platform: ${platform}`);
  }
}

export type MCGFields = {
  namespace: string;
  s3Endpoint: string;
  s3InternalEndpoint: string;
  mgmtEndpoint: string;
  region: string;
  accessKeyId: string;
  accessKey: string;
  noobaaUser: string;
  noobaaPassword: string;
}

export class MCG {
  namespace: string;
  s3Endpoint: string;
  s3InternalEndpoint: string;
  mgmtEndpoint: string;
  region: string;
  accessKeyId: string;
  accessKey: string;
  noobaaUser: string;
  noobaaPassword: string;
  noobaaToken?: string;

  constructor (fields: MCGFields) {
    this.namespace = fields.namespace;
    this.s3Endpoint = fields.s3Endpoint;
    this.s3InternalEndpoint = fields.s3InternalEndpoint;
    this.mgmtEndpoint = fields.mgmtEndpoint;
    this.region = fields.region;
    this.accessKeyId = fields.accessKeyId;
    this.accessKey = fields.accessKey;
    this.noobaaUser = fields.noobaaUser;
    this.noobaaPassword = fields.noobaaPassword;
  }

  // Read the endpoints and credentials from the cluster and log in to
  // the management API.
  //
  // @param retrieveToken  Get the RPC token of the admin account.
  static async create (namespace?: string, retrieveToken = true): Promise<MCG> {
    const ns = namespace || clusterNamespace();
    const noobaa = await new OCP({ kind: NOOBAA_RESOURCE_KIND, namespace: ns }).get({
      resourceName: NOOBAA_RESOURCE_NAME
    });
    const services = getRecord(noobaa, 'status.services');
    const first = (path: string) => {
      const val = getList(services, path)[0];
      if (typeof val !== 'string') {
        throw new CommandFailed(`No ${path} in the status of the noobaa CR`);
      }
      return val;
    };
    const secret = await new OCP({ kind: SECRET, namespace: ns }).get({ resourceName: NOOBAA_ADMIN_SECRET });
    const secretValue = (key: string) => decode(getStr(secret, ['data', key]) || '');
    const mcg = new MCG({
      namespace: ns,
      s3Endpoint: first('serviceS3.externalDNS'),
      s3InternalEndpoint: first('serviceS3.internalDNS'),
      mgmtEndpoint: first('serviceMgmt.externalDNS'),
      region: config.getString('ENV_DATA', 'region', '') || '',
      accessKeyId: secretValue('AWS_ACCESS_KEY_ID'),
      accessKey: secretValue('AWS_SECRET_ACCESS_KEY'),
      noobaaUser: secretValue('email'),
      noobaaPassword: secretValue('password')
    });
    if (retrieveToken) {
      await mcg.retrieveNbToken();
    }
    return mcg;
  }

  get rpcUrl (): string {
    const url = parse(this.mgmtEndpoint);
    url.set('pathname', '/rpc');
    return url.toString();
  }

  // Send an RPC query to the management endpoint.
  //
  // @param api     Name of the API, i.e. bucket_api.
  // @param method  Method in the API, i.e. read_bucket.
  // @returns The parsed response.
  async sendRpcQuery (api: string, method: string, params: Record<string, unknown> = {}): Promise<ResourceData> {
    const payload = JSON.stringify({ api, method, params, auth_token: this.noobaaToken });
    const res = await transport(this.rpcUrl, payload);
    if (res.status < 200 || res.status >= 300) {
      throw new CommandFailed(`RPC ${api}.${method} failed with HTTP ${res.status}: ${res.body}`);
    }
    let reply: unknown;
    try {
      reply = JSON.parse(res.body);
    } catch (err) {
      throw new CommandFailed(`Invalid reply of RPC ${api}.${method}: ${errorMessage(err)}`);
    }
    if (!isRecord(reply)) {
      throw new CommandFailed(`Invalid reply of RPC ${api}.${method}: ${res.body}`);
    }
    return reply;
  }

  // Create the auth token of the admin account for RPC calls.
  async retrieveNbToken (timeout = 300, sleep = 30): Promise<string> {
    const createAuth = async () => {
      const resp = await this.sendRpcQuery('auth_api', 'create_auth', {
        role: 'admin',
        system: 'noobaa',
        email: this.noobaaUser,
        password: this.noobaaPassword
      });
      return getStr(resp, 'reply.token');
    };
    for await (const token of new TimeoutSampler(timeout, sleep, createAuth)) {
      if (token) {
        this.noobaaToken = token;
        return token;
      }
      log.info('Token of the noobaa admin is not available yet');
    }
    throw new TimeoutExpiredError(timeout, 'Failed to retrieve the noobaa token');
  }

  // Run the noobaa CLI.
  //
  // @param cmd  The command without the CLI name, i.e. "bucket list".
  async execMcgCmd (cmd: string, opts: { namespace?: string, useYamlOutput?: boolean, ignoreError?: boolean } = {}): Promise<CompletedProcess> {
    const cli = config.getString('RUN', 'mcg_cli', 'noobaa') || 'noobaa';
    let fullCmd = `${cli} ${cmd} -n ${opts.namespace || this.namespace}`;
    if (opts.useYamlOutput) {
      fullCmd += ' -o yaml';
    }
    return execCmd(fullCmd, {
      ignoreError: opts.ignoreError,
      secrets: [this.accessKeyId, this.accessKey, this.s3Endpoint]
    });
  }

  async readSystem (): Promise<ResourceData> {
    return getRecord(await this.sendRpcQuery('system_api', 'read_system'), 'reply');
  }

  async getBucketInfo (bucketName: string): Promise<ResourceData> {
    return getRecord(await this.sendRpcQuery('bucket_api', 'read_bucket', { name: bucketName }), 'reply');
  }

  async s3ListAllBucketsNames (pod?: Pod): Promise<string[]> {
    const awscli = pod || await getAwscliPod();
    const out = await awscli.execS3CmdOnPod('list-buckets', this, true);
    return getList(parseS3ApiOutput(out), 'Buckets')
      .map((b) => getStr(b, 'Name'))
      .filter((name): name is string => name !== undefined);
  }

  async ocListAllBucketsNames (): Promise<string[]> {
    const data = await new OCP({ kind: OBJECTBUCKETCLAIM_SHORT, namespace: this.namespace }).get();
    return getList(data, 'items')
      .map((obc) => getStr(obc, 'spec.bucketName'))
      .filter((name): name is string => name !== undefined);
  }

  async cliListAllBucketsNames (): Promise<string[]> {
    const res = await this.execMcgCmd('bucket list');
    // first line is the header
    return res.stdout.split('\n').slice(1).map((l) => l.trim()).filter((l) => l.length > 0);
  }

  async s3VerifyBucketExists (bucketName: string, pod?: Pod): Promise<boolean> {
    const awscli = pod || await getAwscliPod();
    try {
      await awscli.execS3CmdOnPod(`head-bucket --bucket ${bucketName}`, this, true);
    } catch (err) {
      if (!(err instanceof CommandFailed)) {
        throw err;
      }
      log.info(`${bucketName} does not exist`);
      return false;
    }
    log.info(`${bucketName} exists`);
    return true;
  }

  async ocVerifyBucketExists (bucketName: string): Promise<boolean> {
    try {
      await new OCP({ kind: OBJECTBUCKETCLAIM_SHORT, namespace: this.namespace }).get({ resourceName: bucketName });
    } catch (err) {
      if (err instanceof CommandFailed && err.message.includes('NotFound')) {
        log.info(`${bucketName} does not exist`);
        return false;
      }
      throw err;
    }
    log.info(`${bucketName} exists`);
    return true;
  }

  async cliVerifyBucketExists (bucketName: string): Promise<boolean> {
    return (await this.cliListAllBucketsNames()).includes(bucketName);
  }

  // Create an external connection to the cloud provider.
  //
  // @returns Name of the connection.
  async createConnection (cldMgr: CloudManager, platform: string, connName?: string): Promise<string> {
    const name = connName || createUniqueResourceName(`${platform}-connection`, 'mcgconn');
    const params = externalConnectionParams(cldMgr, platform, name);
    const addConnection = async () => {
      const resp = await this.sendRpcQuery('account_api', 'add_external_connection', params);
      return resp.error === undefined;
    };
    const sampler = new TimeoutSampler(30, 3, addConnection);
    for await (const created of sampler) {
      if (created) {
        log.info(`Connection ${name} created successfully`);
        return name;
      }
      log.info(`${platform} IAM ${name} did not yet propagate`);
    }
    throw new TimeoutExpiredError(30, `Could not create connection ${name}`);
  }

  // Wait for the backingstore (pool) to reach the mode.
  async checkBackingstoreState (name: string, desiredState: string, timeout = 600, sleep = 10): Promise<boolean> {
    const readMode = async () => {
      const resp = await this.sendRpcQuery('pool_api', 'read_pool', { name });
      const mode = getStr(resp, 'reply.mode');
      log.info(`Backingstore ${name} is in ${mode} mode`);
      return mode;
    };
    try {
      await new TimeoutSampler(timeout, sleep, readMode).waitForFuncValue(desiredState);
    } catch (err) {
      if (!(err instanceof TimeoutExpiredError)) {
        throw err;
      }
      log.error(`Backingstore ${name} did not reach ${desiredState} in ${timeout} seconds`);
      return false;
    }
    return true;
  }

  // Check once that the namespace resource is in OPTIMAL mode.
  async checkNsResourceState (name: string): Promise<boolean> {
    const system = await this.readSystem();
    const resource = getList(system, 'namespace_resources')
      .filter(isRecord)
      .find((nsr) => getStr(nsr, 'name') === name);
    if (!resource) {
      log.warn(`Namespace resource ${name} not found`);
      return false;
    }
    const mode = getStr(resource, 'mode');
    log.info(`Namespace resource ${name} is in ${mode} mode`);
    return mode === OPTIMAL_MODE;
  }
}
