#!/usr/bin/env node
// Command line entry of the QA toolkit. It loads the configuration, binds
// the helpers together and runs one workload against the cluster.

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { BackgroundClusterValidator } from './cluster_validator';
import { cephHealthCheck } from './ceph_health';
import { config, loadKubeConfig } from './config';
import { ClusterValidationError, StressOperationFailed } from './exceptions';
import * as logger from './logger';
import { MCG } from './mcg';
import { createBucket, ObjectBucket } from './objectbucket';
import { subscribeOperator } from './olm';
import { getAwscliPod } from './pod';
import { awscliOperations, runBackgroundCephHealthCheck, runStressLoop, StressBucket } from './stress';
import { errorMessage } from './utils';
import { StopEvent, WorkerPool } from './worker_pool';

const log = logger.Logger();

function setVerbosity (count: number) {
  switch (count) {
    case 0:
      logger.setLevel('info');
      break;
    case 1:
      logger.setLevel('debug');
      break;
    default:
      logger.setLevel('silly');
      break;
  }
}

// Shared by the workloads, set on SIGINT and SIGTERM.
const stopEvent = new StopEvent();

async function runValidate (duration: number, interval: number) {
  const validator = new BackgroundClusterValidator({ interval, stopEvent });
  validator.on('critical', (count: number) => log.error(`Validation failed in ${count} consecutive rounds`));
  await validator.runPreValidation();
  const loop = validator.start();
  await stopEvent.wait(duration);
  await validator.stop();
  await loop;
  const report = await validator.runPostValidation();
  console.log(JSON.stringify(report, null, 2));
  if (!report.passed) {
    throw new ClusterValidationError(`Validation failed with ${report.failedChecks} failed checks`);
  }
}

async function runStress (bucketCount: number, iterations: number, kind: string, workers: number, failFast: boolean) {
  const mcg = await MCG.create();
  const pod = await getAwscliPod();
  const created: ObjectBucket[] = [];
  const pool = new WorkerPool(workers);
  const healthStop = new StopEvent();
  const health = runBackgroundCephHealthCheck(healthStop);
  const propagateStop = () => healthStop.set();
  stopEvent.once('stop', propagateStop);
  try {
    for (let i = 0; i < bucketCount; i++) {
      created.push(await createBucket(kind, undefined, { mcg }));
    }
    const buckets: StressBucket[] = created.map((b) => ({ kind, name: b.name, mcg }));
    const result = await runStressLoop({
      buckets,
      iterations,
      pool,
      stopEvent,
      operations: awscliOperations(pod),
      failFast
    });
    log.info(`Completed ${result.iterationsCompleted} of ${iterations} iterations`);
    console.log(JSON.stringify(result, null, 2));
    if (result.failures.length > 0) {
      throw new StressOperationFailed(`Stress finished with ${result.failures.length} failures`, result.failures);
    }
  } finally {
    stopEvent.removeListener('stop', propagateStop);
    healthStop.set();
    const healthFailures = await health;
    if (healthFailures.length > 0) {
      log.warn(`Ceph health was not OK ${healthFailures.length} times during the stress`);
    }
    await pool.shutdown();
    for (const bucket of created) {
      await bucket.delete();
    }
  }
}

export async function main (argv: string[] = hideBin(process.argv)) {
  process.on('SIGTERM', () => {
    log.info('SIGTERM signal received.');
    stopEvent.set();
  });
  process.on('SIGINT', () => {
    log.info('SIGINT signal received.');
    stopEvent.set();
  });

  await yargs(argv)
    .options({
      k: {
        alias: 'kubeconfig',
        describe: 'Path to kubeconfig file',
        string: true
      },
      n: {
        alias: 'cluster-namespace',
        describe: 'Namespace where ODF is installed',
        string: true
      },
      c: {
        alias: 'conf',
        describe: 'Extra YAML config file, can be repeated',
        array: true,
        string: true
      },
      v: {
        alias: 'verbose',
        describe: 'Print debug log messages',
        count: true
      }
    })
    .middleware((opts) => {
      setVerbosity(opts.v);
      for (const file of opts.conf || []) {
        config.loadFile(file);
      }
      if (opts.kubeconfig) {
        config.update({ RUN: { kubeconfig: opts.kubeconfig } });
      }
      if (opts.clusterNamespace) {
        config.update({ ENV_DATA: { cluster_namespace: opts.clusterNamespace } });
      }
      const kubeConfig = loadKubeConfig(opts.kubeconfig);
      log.info(`Using k8s context "${kubeConfig.getCurrentContext()}"`);
    })
    .command(
      'ceph-health',
      'Check the health of the Ceph cluster',
      (y) => y.options({
        tries: { describe: 'Number of attempts', default: 20, number: true },
        delay: { describe: 'Seconds between the attempts', default: 30, number: true }
      }),
      async (opts) => {
        await cephHealthCheck(undefined, opts.tries, opts.delay);
      }
    )
    .command(
      'validate',
      'Validate the cluster in the background for a period of time',
      (y) => y.options({
        duration: { describe: 'Seconds of the continuous validation', default: 600, number: true },
        interval: { describe: 'Seconds between the validation rounds', default: 60, number: true }
      }),
      async (opts) => {
        await runValidate(opts.duration, opts.interval);
      }
    )
    .command(
      'stress',
      'Stress the MCG by S3 operations on many buckets',
      (y) => y.options({
        buckets: { describe: 'Number of buckets', default: 5, number: true },
        iterations: { describe: 'Number of iterations', default: 3, number: true },
        'bucket-kind': { describe: 'Kind of the created buckets', default: 'oc', string: true },
        workers: { describe: 'Max concurrent bucket operations', default: 5, number: true },
        'fail-fast': { describe: 'Stop on the first failure', default: false, boolean: true }
      }),
      async (opts) => {
        await runStress(opts.buckets, opts.iterations, opts.bucketKind, opts.workers, opts.failFast);
      }
    )
    .command(
      'install-operator <package>',
      'Subscribe to the operator and wait for its CSV to succeed',
      (y) => y
        .positional('package', { describe: 'Name of the package', type: 'string', demandOption: true })
        .options({
          channel: { describe: 'Subscription channel', string: true },
          source: { describe: 'Catalog source', string: true },
          namespace: { describe: 'Namespace of the operator', string: true }
        }),
      async (opts) => {
        const csv = await subscribeOperator({
          packageName: opts.package,
          channel: opts.channel,
          source: opts.source,
          namespace: opts.namespace
        });
        console.log(csv);
      }
    )
    .demandCommand(1)
    .help('help')
    .strict()
    .parseAsync();
}

if (require.main === module) {
  main().then(
    () => process.exit(0),
    (err: unknown) => {
      log.error(errorMessage(err));
      process.exit(1);
    }
  );
}
