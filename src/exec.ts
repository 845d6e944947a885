// Running of external commands (oc, noobaa CLI, aws CLI wrapped in oc exec).
// All commands go through a single runner function which can be replaced,
// so that the wrappers can be tested without a cluster.

import { spawn } from 'child_process';
import { Config, config } from './config';
import { CommandFailed, TimeoutExpiredError } from './exceptions';
import { Logger } from './logger';
import { listInsertAtPosition, maskSecrets, shlexSplit } from './utils';
import { Workq } from './workq';

const log = Logger('exec');

export const DEFAULT_CMD_TIMEOUT = 600;

export type RunnerResult = {
  stdout: string;
  stderr: string;
  returncode: number;
}

export type RunnerOptions = {
  // seconds
  timeout: number;
  input?: string;
}

export type Runner = (args: string[], opts: RunnerOptions) => Promise<RunnerResult>;

export type CompletedProcess = RunnerResult & {
  args: string[];
}

export type ExecOptions = {
  // secrets to be masked with asterisks in the log and in errors
  secrets?: string[];
  // seconds
  timeout?: number;
  // don't throw for non-zero return code
  ignoreError?: boolean;
  // serializes oc commands of concurrent workers
  lock?: Workq;
  // don't log stderr of the command
  silent?: boolean;
  // run the command string by sh -c instead of splitting it
  shell?: boolean;
  // config of the cluster the oc command should talk to
  clusterConfig?: Config;
  input?: string;
}

// Spawn the process and collect its output.
export const spawnRunner: Runner = (args, opts) => {
  return new Promise((resolve, reject) => {
    const child = spawn(args[0], args.slice(1), { stdio: 'pipe' });
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, opts.timeout * 1000);

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });
    child.on('error', (err) => {
      clearTimeout(timer);
      reject(new CommandFailed(`Failed to start ${args[0]}: ${err.message}`));
    });
    child.on('close', (code, signal) => {
      clearTimeout(timer);
      if (timedOut) {
        reject(new TimeoutExpiredError(opts.timeout));
        return;
      }
      resolve({
        stdout,
        stderr,
        returncode: code === null ? (signal ? 128 : 1) : code
      });
    });
    if (opts.input !== undefined) {
      child.stdin.write(opts.input);
    }
    child.stdin.end();
  });
};

let runner: Runner = spawnRunner;

export function setRunner (newRunner: Runner) {
  runner = newRunner;
}

export function resetRunner () {
  runner = spawnRunner;
}

// Put the kubeconfig options to the oc command if there are any configured.
function addKubeconfig (args: string[], clusterConfig?: Config): string[] {
  if (args[0] !== 'oc') {
    return args;
  }
  const custom = config.getString('RUN', 'custom_kubeconfig_location');
  if (custom) {
    const idx = args.indexOf('--kubeconfig');
    if (idx > 0) {
      args = [...args.slice(0, idx), ...args.slice(idx + 2)];
    }
    return listInsertAtPosition(args, 1, ['--kubeconfig', custom]);
  }
  if (clusterConfig && !args.includes('--kubeconfig')) {
    const kubepath = clusterConfig.getString('RUN', 'kubeconfig');
    if (kubepath) {
      return listInsertAtPosition(args, 1, ['--kubeconfig', kubepath]);
    }
  }
  return args;
}

// Run an arbitrary command locally.
//
// If the command is grep and the matching pattern is not found, then the
// command returns "command terminated with exit code 1" in stderr and that
// is not treated as an error.
//
// @param cmd   Command to run, either a string or already split words.
// @returns The completed process with raw output.
export async function execCmd (cmd: string | string[], opts: ExecOptions = {}): Promise<CompletedProcess> {
  const cmdStr = Array.isArray(cmd) ? cmd.join(' ') : cmd;
  const maskedCmd = maskSecrets(cmdStr, opts.secrets);
  const timeout = opts.timeout === undefined ? DEFAULT_CMD_TIMEOUT : opts.timeout;
  log.info(`Executing command: ${maskedCmd}`);

  let args: string[];
  if (Array.isArray(cmd)) {
    args = cmd.slice();
  } else if (opts.shell) {
    args = ['sh', '-c', cmd];
  } else {
    args = shlexSplit(cmd);
  }
  args = addKubeconfig(args, opts.clusterConfig);

  const run = () => runner(args, { timeout, input: opts.input });
  let res: RunnerResult;
  try {
    if (opts.lock && args[0] === 'oc') {
      res = await opts.lock.push(null, run);
    } else {
      res = await run();
    }
  } catch (err) {
    if (err instanceof TimeoutExpiredError) {
      throw new CommandFailed(`Command ${maskedCmd} timed out after ${timeout}s`);
    }
    throw err;
  }

  const maskedStdout = maskSecrets(res.stdout, opts.secrets);
  if (res.stdout.length > 0) {
    log.debug(`Command stdout: ${maskedStdout}`);
  } else {
    log.debug('Command stdout is empty');
  }
  const maskedStderr = maskSecrets(res.stderr, opts.secrets);
  if (res.stderr.length > 0) {
    if (!opts.silent) {
      log.warn(`Command stderr: ${maskedStderr}`);
    }
  } else {
    log.debug('Command stderr is empty');
  }
  log.debug(`Command return code: ${res.returncode}`);

  if (res.returncode && !opts.ignoreError) {
    if (maskedCmd.includes('grep') && res.stderr.includes('command terminated with exit code 1')) {
      log.info(`No results found for grep command: ${maskedCmd}`);
    } else {
      throw new CommandFailed(
        `Error during execution of command: ${maskedCmd}.\nError is ${maskedStderr}`
      );
    }
  }
  return { args, ...res };
}

// Same as execCmd() but returns just the masked stdout of the command.
export async function runCmd (cmd: string | string[], opts: ExecOptions = {}): Promise<string> {
  const res = await execCmd(cmd, opts);
  return maskSecrets(res.stdout, opts.secrets);
}
