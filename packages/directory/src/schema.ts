import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import type { ValidationIssue } from '@flowrelay/core';

/** Process instance as the remote engine sends it. */
export interface WireProcess {
  id: string;
  action: string;
  name?: string;
  status?: string;
  metadata?: Record<string, unknown>;
}

export interface WireContextProcesses {
  context?: string;
  processes: WireProcess[];
}

export interface DirectoryEnv {
  FLOWRELAY_BASE_URL: string;
  FLOWRELAY_TIMEOUT_MS?: string;
}

const ajv = new Ajv({ allErrors: true });
addFormats(ajv);

const processSchema = {
  $id: 'process',
  type: 'object',
  required: ['id', 'action'],
  properties: {
    id: { type: 'string', minLength: 1 },
    action: { type: 'string', minLength: 1 },
    name: { type: 'string' },
    status: { type: 'string' },
    metadata: { type: 'object' },
  },
};

ajv.addSchema(processSchema);

export const validateProcess: ValidateFunction<WireProcess> = ajv.compile<WireProcess>({ $ref: 'process' });

export const validateContextProcesses: ValidateFunction<WireContextProcesses> = ajv.compile<WireContextProcesses>({
  type: 'object',
  required: ['processes'],
  properties: {
    context: { type: 'string' },
    processes: { type: 'array', items: { $ref: 'process' } },
  },
});

export const validateDirectoryEnv: ValidateFunction<DirectoryEnv> = ajv.compile<DirectoryEnv>({
  type: 'object',
  required: ['FLOWRELAY_BASE_URL'],
  properties: {
    FLOWRELAY_BASE_URL: { type: 'string', format: 'uri', pattern: '^https?://' },
    FLOWRELAY_TIMEOUT_MS: { type: 'string', pattern: '^[1-9][0-9]*$' },
  },
});

/**
 * Flatten Ajv errors into issues.
 */
export function toIssues(errors: ErrorObject[] | null | undefined): ValidationIssue[] {
  return (errors ?? []).map(error => ({
    path: error.instancePath || '/',
    message: error.message ?? 'is invalid',
  }));
}
