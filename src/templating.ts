// Loading of the resource templates and dumping of rendered resources to
// temporary files which are then passed to `oc create -f`.

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ValueError } from './exceptions';
import { getRandomStr, isRecord } from './utils';

export type ResourceDict = Record<string, unknown>;

// Load the single yaml document from the file.
export function loadYaml (file: string): ResourceDict {
  const data = yaml.load(fs.readFileSync(file, 'utf8'));
  if (!isRecord(data)) {
    throw new ValueError(`File ${file} does not hold a yaml mapping`);
  }
  return data;
}

// Load all yaml documents from the file.
export function loadYamlAll (file: string): ResourceDict[] {
  const docs: ResourceDict[] = [];
  for (const doc of yaml.loadAll(fs.readFileSync(file, 'utf8'))) {
    if (isRecord(doc)) {
      docs.push(doc);
    }
  }
  return docs;
}

export function dumpYaml (data: unknown): string {
  return yaml.dump(data, { noRefs: true, lineWidth: -1 });
}

// Write the data to a new temporary yaml file.
//
// @returns Path of the file.
export function dumpDataToTempYaml (data: ResourceDict | ResourceDict[], prefix = 'resource'): string {
  const file = path.join(os.tmpdir(), `${prefix}-${getRandomStr(8)}.yaml`);
  const content = Array.isArray(data)
    ? data.map((doc) => dumpYaml(doc)).join('---\n')
    : dumpYaml(data);
  fs.writeFileSync(file, content);
  return file;
}

// Write a JSON document to a new temporary file.
export function dumpDataToTempJson (data: unknown, prefix = 'data'): string {
  const file = path.join(os.tmpdir(), `${prefix}-${getRandomStr(8)}.json`);
  fs.writeFileSync(file, JSON.stringify(data));
  return file;
}
