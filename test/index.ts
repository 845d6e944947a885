// Unit tests for the QA toolkit

import * as logger from '../src/logger';

const utilsTest = require('./utils_test');
const workqTest = require('./workq_test');
const workerPoolTest = require('./worker_pool_test');
const retryTest = require('./retry_test');
const timeoutSamplerTest = require('./timeout_sampler_test');
const loggerTest = require('./logger_test');
const configTest = require('./config_test');
const execTest = require('./exec_test');
const ocpTest = require('./ocp_test');
const olmTest = require('./olm_test');
const cephHealthTest = require('./ceph_health_test');
const bucketUtilsTest = require('./bucket_utils_test');
const mcgTest = require('./mcg_test');
const objectBucketTest = require('./objectbucket_test');
const namespaceStoreTest = require('./namespacestore_test');
const bucketNotificationsTest = require('./bucket_notifications_test');
const bucketLoggingTest = require('./bucket_logging_test');
const clusterValidatorTest = require('./cluster_validator_test');
const stressTest = require('./stress_test');

// the exact oc command lines are asserted
delete process.env.KUBECONFIG;
logger.setLevel('silly');

describe('odf-qa', function () {
  describe('utils', utilsTest);
  describe('workq', workqTest);
  describe('worker pool', workerPoolTest);
  describe('retry', retryTest);
  describe('timeout sampler', timeoutSamplerTest);
  describe('logger', loggerTest);
  describe('config', configTest);
  describe('exec', execTest);
  describe('ocp', ocpTest);
  describe('olm', olmTest);
  describe('ceph health', cephHealthTest);
  describe('bucket utils', bucketUtilsTest);
  describe('mcg', mcgTest);
  describe('object bucket', objectBucketTest);
  describe('namespace store', namespaceStoreTest);
  describe('bucket notifications', bucketNotificationsTest);
  describe('bucket logging', bucketLoggingTest);
  describe('cluster validator', clusterValidatorTest);
  describe('stress', stressTest);
});
