// Unit tests for the S3 operations run by the aws CLI

import { expect } from 'chai';
import {
  craftS3Command,
  listObjects,
  parseS3ApiOutput,
  s3PutObject,
  verifyS3ObjectIntegrity
} from '../src/bucket_utils';
import { CommandFailed } from '../src/exceptions';
import { FakeOc, testMcg, testPod } from './fake_oc';

const LISTING = [
  '2024-01-01 10:00:00       1024 objects-1/0/a.txt',
  '                           PRE dir/',
  '2024-01-01 10:00:01       2048 objects-1/0/my file.txt',
  ''
].join('\n');

module.exports = function () {
  let fake: FakeOc;

  beforeEach(() => {
    fake = new FakeOc().install();
  });

  afterEach(() => {
    fake.uninstall();
  });

  describe('craftS3Command', () => {
    it('should pass MCG credentials in the environment', () => {
      expect(craftS3Command('ls s3://b1', testMcg())).to.equal(
        'sh -c "AWS_CA_BUNDLE=/cert/service-ca.crt AWS_ACCESS_KEY_ID=test-access-key ' +
        'AWS_SECRET_ACCESS_KEY=test-secret AWS_DEFAULT_REGION=us-east-2 ' +
        'aws s3 --endpoint=https://s3.openshift-storage.svc:443 ls s3://b1"'
      );
    });

    it('should use signed request credentials', () => {
      const creds = { accessKeyId: 'rgw-key', accessKey: 'test-secret', endpoint: 'http://rgw:80', ssl: false };
      expect(craftS3Command('head-bucket --bucket b1', undefined, true, creds)).to.equal(
        'sh -c "AWS_ACCESS_KEY_ID=rgw-key AWS_SECRET_ACCESS_KEY=test-secret ' +
        'aws s3api --endpoint=http://rgw:80 --no-verify-ssl head-bucket --bucket b1"'
      );
    });

    it('should send unsigned request without credentials', () => {
      expect(craftS3Command('ls s3://public')).to.equal('aws s3 --no-sign-request ls s3://public');
    });
  });

  it('should parse s3api output', () => {
    expect(parseS3ApiOutput('')).to.deep.equal({});
    expect(parseS3ApiOutput('{"ETag": "\\"abc\\""}')).to.deep.equal({ ETag: '"abc"' });
    expect(() => parseS3ApiOutput('Completed')).to.throw(CommandFailed);
  });

  it('should list the object keys', async () => {
    fake.on('ls s3://b1', { stdout: LISTING });
    const keys = await listObjects(testPod(), 's3://b1', { mcg: testMcg(), prefix: 'objects-1', recursive: true });
    expect(keys).to.deep.equal(['objects-1/0/a.txt', 'objects-1/0/my file.txt']);
    expect(fake.calls).to.have.lengthOf(1);
    expect(fake.calls[0]).to.match(/^oc -n openshift-storage rsh awscli-relay-pod sh -c /);
    expect(fake.calls[0]).to.match(/ ls s3:\/\/b1\/objects-1 --recursive$/);
  });

  it('should put the object by s3api', async () => {
    fake.on('put-object', { stdout: '{"ETag": "\\"d41d8\\""}' });
    const res = await s3PutObject(testMcg(), testPod(), 'b1', 'key-1', '/tmp/file', 'text/plain');
    expect(res).to.deep.equal({ ETag: '"d41d8"' });
    expect(fake.calls[0]).to.include(
      'aws s3api --endpoint=https://s3.openshift-storage.svc:443 ' +
      'put-object --bucket b1 --key key-1 --body /tmp/file --content-type text/plain'
    );
  });

  it('should compare md5 sums of the objects', async () => {
    fake.on('md5sum', { stdout: 'abc /orig/a\nabc /result/a\n' });
    expect(await verifyS3ObjectIntegrity('/orig/a', '/result/a', testPod())).to.be.true;
    fake = new FakeOc().install();
    fake.on('md5sum', { stdout: 'abc /orig/a\ndef /result/a\n' });
    expect(await verifyS3ObjectIntegrity('/orig/a', '/result/a', testPod())).to.be.false;
  });
};
