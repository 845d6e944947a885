// Names, labels and paths shared by the resource wrappers.

import * as fs from 'fs';
import * as path from 'path';

// Directory holding package.json, found by walking up from this file so
// that it resolves the same from sources and from the build output.
function packageRoot (start: string): string {
  let cur = start;
  while (!fs.existsSync(path.join(cur, 'package.json'))) {
    const parent = path.dirname(cur);
    if (parent === cur) {
      return path.join(start, '..');
    }
    cur = parent;
  }
  return cur;
}

export const ROOT_DIR = packageRoot(__dirname);
export const CONF_DIR = path.join(ROOT_DIR, 'conf');
export const TEMPLATE_DIR = path.join(ROOT_DIR, 'templates');
export const DEFAULT_CONFIG_PATH = path.join(CONF_DIR, 'default_config.yaml');

export const MCG_OBC_YAML = path.join(TEMPLATE_DIR, 'mcg', 'obc.yaml');
export const MCG_NAMESPACESTORE_YAML = path.join(TEMPLATE_DIR, 'mcg', 'namespacestore.yaml');
export const SUBSCRIPTION_YAML = path.join(TEMPLATE_DIR, 'olm', 'subscription.yaml');
export const CATALOG_SOURCE_YAML = path.join(TEMPLATE_DIR, 'olm', 'catalog_source.yaml');

// statuses
export const STATUS_PENDING = 'Pending';
export const STATUS_RUNNING = 'Running';
export const STATUS_BOUND = 'Bound';
export const STATUS_RELEASED = 'Released';
export const STATUS_FAILED = 'Failed';
export const STATUS_COMPLETED = 'Completed';
export const STATUS_READY = 'Ready';
export const STATUS_SUCCEEDED = 'Succeeded';

// kinds
export const POD = 'Pod';
export const PV = 'PersistentVolume';
export const PVC = 'PersistentVolumeClaim';
export const SECRET = 'Secret';
export const ROUTE = 'Route';
export const SERVICE = 'Service';
export const EVENT = 'Event';
export const CLUSTER_SERVICE_VERSION = 'csv';
export const PACKAGE_MANIFEST = 'packagemanifest';
export const INSTALL_PLAN = 'InstallPlan';
export const CATALOG_SOURCE = 'CatalogSource';
export const SUBSCRIPTION = 'Subscription';
export const NOOBAA_RESOURCE_KIND = 'noobaa';
export const NAMESPACESTORE = 'namespacestore';
export const BACKINGSTORE = 'backingstore';
export const OBJECTBUCKETCLAIM = 'ObjectBucketClaim';
export const OBJECTBUCKET = 'ObjectBucket';

// namespaces and names
export const OPENSHIFT_STORAGE_NAMESPACE = 'openshift-storage';
export const MARKETPLACE_NAMESPACE = 'openshift-marketplace';
export const NOOBAA_RESOURCE_NAME = 'noobaa';
export const NOOBAA_ADMIN_SECRET = 'noobaa-admin';
export const OPERATOR_CATALOG_SOURCE_NAME = 'ocs-catalogsource';
export const OPERATOR_INTERNAL_SELECTOR = 'ocs-operator-internal=true';
export const OCS_CSV_PREFIX = 'ocs-operator';
export const ODF_OPERATOR_NAME = 'odf-operator';
export const RGW_STORAGECLASS = 'ocs-storagecluster-ceph-rgw';
export const RGW_SERVICE_NAME = 'rook-ceph-rgw-ocs-storagecluster-cephobjectstore';
export const RGW_ROUTE_NAME = 'ocs-storagecluster-cephobjectstore';
export const RGW_ADMIN_SECRET = 'rook-ceph-object-user-ocs-storagecluster-cephobjectstore-noobaa-ceph-objectstore-user';
export const CEPHFILESYSTEM_NAME = 'ocs-storagecluster-cephfilesystem';
export const DEFAULT_CEPHBLOCKPOOL = 'ocs-storagecluster-cephblockpool';

// labels
export const TOOL_APP_LABEL = 'app=rook-ceph-tools';
export const RGW_APP_LABEL = 'app=rook-ceph-rgw';
export const NOOBAA_APP_LABEL = 'app=noobaa';
export const NOOBAA_CORE_POD_LABEL = 'noobaa-core=noobaa';
export const NOOBAA_ENDPOINT_POD_LABEL = 'noobaa-s3=noobaa';
export const NOOBAA_OPERATOR_POD_LABEL = 'noobaa-operator=deployment';

// awscli pod
export const SERVICE_CA_CRT_AWSCLI_PATH = '/cert/service-ca.crt';
export const AWSCLI_TEST_OBJ_DIR = '/test_objects/';

// bucket logging
export const BUCKET_LOGS_VOLUME_NAME = 'noobaa-bucket-logging-volume';
export const BUCKET_LOGS_MOUNT_PATH = '/var/logs/bucket-logs';
export const DEFAULT_MCG_BUCKET_LOGS_PVC = 'noobaa-bucket-logging-pvc';

// bucket notifications
export const KAFKA_CONSUMER_BIN = '/opt/kafka/bin/kafka-console-consumer.sh';
export const BUCKET_NOTIFS_MOUNT_PATH = '/var/logs/notifications';
export const DEFAULT_MCG_BUCKET_NOTIFS_PVC = 'noobaa-bucket-notifications-pvc';
export const AMQ_NAMESPACE = 'myproject';
export const KAFKA_ENDPOINT = `my-cluster-kafka-bootstrap.${AMQ_NAMESPACE}.svc.cluster.local:9092`;
export const KAFKA_PODS_LABEL = 'strimzi.io/name=my-cluster-kafka';
export const NOOBAA_CORE_POD = 'noobaa-core-0';
// PVCs and PVs with the label may be left behind by the tests
export const CUSTOM_MCG_LABEL = 'custom=mcg-label';

// platforms
export const AWS_PLATFORM = 'aws';
export const AZURE_PLATFORM = 'azure';
export const RGW_PLATFORM = 'rgw';
export const IBMCOS_PLATFORM = 'ibmcos';
export const NSFS_PLATFORM = 'nsfs';
export const IBM_POWER_PLATFORM = 'ibm_power';

// endpoints of the cloud providers used by namespace resources
export const MCG_NS_AWS_ENDPOINT = 'https://s3.amazonaws.com';
export const MCG_NS_AZURE_ENDPOINT = 'https://blob.core.windows.net';
export const MCG_NS_IBMCOS_ENDPOINT = 'https://s3.us-east.cloud-object-storage.appdomain.cloud';

export const OBJECTBUCKETCLAIM_SHORT = 'obc';
export const NOOBAA_OBJECTBUCKET_STATUS_BOUND = 'Bound';
export const OPTIMAL_MODE = 'OPTIMAL';
export const HEALTHY_OBC_CLI_PHASE = 'Phase:Bound';
export const HEALTHY_OB_CLI_MODE = 'Mode:OPTIMAL';
export const EXTERNAL_MODE_RGW_STORAGECLASS = 'ocs-external-storagecluster-ceph-rgw';
