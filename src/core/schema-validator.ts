import { readFileSync } from 'node:fs';
import { Ajv2020 } from 'ajv/dist/2020.js';
import type { ErrorObject, ValidateFunction } from 'ajv';
import { getSchemaPath } from '../utils/paths.js';
import type { PipListEntry, PipReport } from '../types/pip.js';

const ajv = new Ajv2020({ allErrors: true, strict: false });

let reportValidator: ValidateFunction<PipReport> | null = null;
let listValidator: ValidateFunction<PipListEntry[]> | null = null;

function compileSchema<T>(fileName: string): ValidateFunction<T> {
  const schema = JSON.parse(readFileSync(getSchemaPath(fileName), 'utf-8'));
  return ajv.compile<T>(schema);
}

export function getReportValidator(): ValidateFunction<PipReport> {
  reportValidator ??= compileSchema<PipReport>('pip-report.schema.json');
  return reportValidator;
}

export function getListValidator(): ValidateFunction<PipListEntry[]> {
  listValidator ??= compileSchema<PipListEntry[]>('pip-list.schema.json');
  return listValidator;
}

export function formatSchemaError(err: ErrorObject): string {
  return `${err.instancePath || '/'} ${err.message ?? 'unknown error'}`;
}
