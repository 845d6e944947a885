// Common logger instance which is configured once and can be included in
// all files where logging is needed.

import * as winston from 'winston';

const monthShortNames = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec'
];

// This will convert ISO timestamp string to following format:
// Oct 10 19:49:29.027
export function toLocalTime (isoTs: string): string {
  const dt = new Date(Date.parse(isoTs));
  const pad = function (num: number) {
    return (num < 10 ? '0' : '') + num;
  };
  const pad3 = function (num: number) {
    if (num < 10) {
      return '00' + num;
    } else if (num < 100) {
      return '0' + num;
    } else {
      return '' + num;
    }
  };
  return (
    monthShortNames[dt.getMonth()] +
    ' ' +
    pad(dt.getDate()) +
    ' ' +
    pad(dt.getHours()) +
    ':' +
    pad(dt.getMinutes()) +
    ':' +
    pad(dt.getSeconds()) +
    '.' +
    pad3(dt.getMilliseconds())
  );
}

export function formatLine (info: winston.Logform.TransformableInfo): string {
  const ts = typeof info.timestamp === 'string' ? info.timestamp : new Date().toISOString();
  const result = [toLocalTime(ts)];

  // silly -> trace
  result.push(info.level.replace(/silly/, 'trace'));

  if (typeof info.label === 'string' && info.label) {
    result.push('[' + info.label + ']:');
  } else {
    result[result.length - 1] += ':';
  }
  result.push(String(info.message));
  return result.join(' ');
}

const formats = [winston.format.timestamp(), winston.format.printf(formatLine)];
if (process.stdout.isTTY) {
  formats.unshift(winston.format.colorize());
}
const logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(...formats),
  transports: [new winston.transports.Console()]
});

export function setLevel (level: string) {
  logger.level = level;
}

export function getLevel (): string {
  return logger.level;
}

// Purpose of the wrapper is to add component prefix to each log message
export class ComponentLogger {
  readonly component?: string;

  constructor (component?: string) {
    this.component = component;
  }

  private write (level: string, msg: string) {
    logger.log({ level, label: this.component, message: msg });
  }

  // rename trace to silly
  trace (msg: string) {
    this.write('silly', msg);
  }

  debug (msg: string) {
    this.write('debug', msg);
  }

  info (msg: string) {
    this.write('info', msg);
  }

  warn (msg: string) {
    this.write('warn', msg);
  }

  error (msg: string) {
    this.write('error', msg);
  }
}

export function Logger (component?: string): ComponentLogger {
  return new ComponentLogger(component);
}
