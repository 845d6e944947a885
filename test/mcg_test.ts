// Unit tests for the MCG object: RPC calls and the noobaa CLI

import { expect } from 'chai';
import { CommandFailed } from '../src/exceptions';
import { resetRpcTransport, RpcResponse, setRpcTransport } from '../src/mcg';
import { FakeOc, testMcg, testPod } from './fake_oc';

type RpcCall = {
  url: string;
  body: unknown;
}

// Install RPC transport answering by the handler and recording the calls.
function fakeRpc (handler: (method: string, params: unknown) => RpcResponse): RpcCall[] {
  const calls: RpcCall[] = [];
  setRpcTransport(async (url, body) => {
    const parsed: unknown = JSON.parse(body);
    calls.push({ url, body: parsed });
    const method = typeof parsed === 'object' && parsed !== null && 'method' in parsed ? String(parsed.method) : '';
    const params = typeof parsed === 'object' && parsed !== null && 'params' in parsed ? parsed.params : undefined;
    return handler(method, params);
  });
  return calls;
}

function reply (data: unknown): RpcResponse {
  return { status: 200, body: JSON.stringify({ reply: data }) };
}

module.exports = function () {
  let fake: FakeOc;

  beforeEach(() => {
    fake = new FakeOc().install();
  });

  afterEach(() => {
    fake.uninstall();
    resetRpcTransport();
  });

  it('should post RPC to the management endpoint', async () => {
    const calls = fakeRpc(() => reply({ name: 'b1', mode: 'OPTIMAL' }));
    const mcg = testMcg();
    mcg.noobaaToken = 'test-token';
    const info = await mcg.getBucketInfo('b1');
    expect(info).to.deep.equal({ name: 'b1', mode: 'OPTIMAL' });
    expect(calls).to.deep.equal([{
      url: 'https://noobaa-mgmt.apps.example.com:8443/rpc',
      body: { api: 'bucket_api', method: 'read_bucket', params: { name: 'b1' }, auth_token: 'test-token' }
    }]);
  });

  it('should fail on HTTP error of RPC', async () => {
    fakeRpc(() => ({ status: 500, body: 'internal error' }));
    try {
      await testMcg().readSystem();
    } catch (err) {
      expect(err).to.be.instanceOf(CommandFailed);
      expect(err).to.have.property('message', 'RPC system_api.read_system failed with HTTP 500: internal error');
      return;
    }
    throw new Error('Expected an exception');
  });

  it('should retrieve the token of the admin', async () => {
    let attempts = 0;
    const calls = fakeRpc(() => {
      attempts++;
      return attempts === 1 ? reply({}) : reply({ token: 'test-token' });
    });
    const mcg = testMcg();
    expect(await mcg.retrieveNbToken(5, 0.01)).to.equal('test-token');
    expect(mcg.noobaaToken).to.equal('test-token');
    expect(calls[1].body).to.deep.equal({
      api: 'auth_api',
      method: 'create_auth',
      params: { role: 'admin', system: 'noobaa', email: 'admin@example.com', password: 'test-password' }
    });
  });

  it('should run the noobaa CLI in the namespace', async () => {
    fake.on('bucket list', { stdout: 'BUCKET-NAME\nfirst.bucket\nb1\n' });
    const mcg = testMcg();
    expect(await mcg.cliListAllBucketsNames()).to.deep.equal(['first.bucket', 'b1']);
    expect(await mcg.cliVerifyBucketExists('b2')).to.be.false;
    expect(fake.calls[0]).to.equal('noobaa bucket list -n openshift-storage');
  });

  it('should list buckets by s3api', async () => {
    fake.on('list-buckets', { stdout: '{"Buckets": [{"Name": "b1"}, {"Name": "b2"}]}' });
    expect(await testMcg().s3ListAllBucketsNames(testPod())).to.deep.equal(['b1', 'b2']);
  });

  it('should fail listing buckets if s3api does not print JSON', async () => {
    fake.on('list-buckets', { stdout: 'An error occurred (AccessDenied) when calling the ListBuckets operation' });
    try {
      await testMcg().s3ListAllBucketsNames(testPod());
    } catch (err) {
      expect(err).to.be.instanceOf(CommandFailed);
      return;
    }
    throw new Error('Expected an exception');
  });

  it('should tell whether the bucket exists', async () => {
    fake
      .on('head-bucket --bucket b1', {})
      .on('head-bucket --bucket b2', { stderr: 'An error occurred (404)', returncode: 254 });
    const mcg = testMcg();
    expect(await mcg.s3VerifyBucketExists('b1', testPod())).to.be.true;
    expect(await mcg.s3VerifyBucketExists('b2', testPod())).to.be.false;
  });

  it('should check the mode of the namespace resource', async () => {
    fakeRpc(() => reply({
      namespace_resources: [
        { name: 'nss-1', mode: 'OPTIMAL' },
        { name: 'nss-2', mode: 'IO_ERRORS' }
      ]
    }));
    const mcg = testMcg();
    expect(await mcg.checkNsResourceState('nss-1')).to.be.true;
    expect(await mcg.checkNsResourceState('nss-2')).to.be.false;
    expect(await mcg.checkNsResourceState('nss-3')).to.be.false;
  });
};
