// Errors raised by the wrappers. Callers match them with instanceof and
// optionally on the text of the message (see retry()).

export class QaError extends Error {
  constructor (msg?: string) {
    super(msg);
    this.name = new.target.name;
  }
}

export class CommandFailed extends QaError {}

export class ValueError extends QaError {}

export class TimeoutExpiredError extends QaError {
  timeout: number;

  constructor (timeout: number, customMessage?: string) {
    super(customMessage === undefined ? `Timed Out: ${timeout}` : customMessage);
    this.timeout = timeout;
  }
}

export class ResourceNameNotSpecifiedException extends QaError {}

export class NotSupportedFunctionError extends QaError {}

export class ResourceInUnexpectedState extends QaError {}

export class ResourceNotFoundError extends QaError {}

// Resource reached a state other than the one we waited for.
export class ResourceWrongStatusException extends QaError {
  resourceName: string;
  describeOut?: string;
  column?: string;
  expected?: string;
  got?: string;

  constructor (
    resourceName: string,
    opts: { describeOut?: string, column?: string, expected?: string, got?: string, kind?: string } = {}
  ) {
    let msg = opts.kind ? `${opts.kind} resource ${resourceName}` : `Resource ${resourceName}`;
    if (opts.column) {
      msg += ` in column ${opts.column}`;
    }
    if (opts.got) {
      msg += ` was in state ${opts.got}`;
    }
    if (opts.expected) {
      msg += ` while expected ${opts.expected}`;
    }
    if (opts.describeOut) {
      msg += `\nDescribe output: ${opts.describeOut}`;
    }
    super(msg);
    this.resourceName = resourceName;
    this.describeOut = opts.describeOut;
    this.column = opts.column;
    this.expected = opts.expected;
    this.got = opts.got;
  }
}

export class ChannelNotFound extends QaError {}

export class CSVNotFound extends QaError {}

export class NoInstallPlanForApproveFoundException extends QaError {}

export class UnhealthyBucket extends QaError {}

export class UnavailableResourceException extends QaError {}

export class InvalidBucketLoggingConfig extends QaError {}

export class CephHealthException extends QaError {}

export class NoRunningCephToolBoxException extends QaError {}

export class CephToolBoxNotFoundException extends QaError {}

export class NotAllNodesCreated extends QaError {}

export class ClusterValidationError extends QaError {}

// Operation of the stress failed on some of the buckets.
export class StressOperationFailed extends QaError {
  failures: { stage: string, bucket: string, error: string }[];

  constructor (msg: string, failures: { stage: string, bucket: string, error: string }[]) {
    super(msg);
    this.failures = failures;
  }
}

export class ConfigurationError extends QaError {}

export class UnknownConfigSection extends QaError {}

export type ErrorClass = new (...args: never[]) => Error;
