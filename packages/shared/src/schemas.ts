/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for extraction output, run summaries and API requests.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { AnySchemaObject, ValidateFunction } from 'ajv';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

const SCHEMA_FILES = {
  contractFields: 'contract_fields.schema.json',
  runSummary: 'run_summary.schema.json',
  extractRequest: 'extract_request.schema.json',
  submitContractRequest: 'submit_contract_request.schema.json',
} as const;

type SchemaName = keyof typeof SCHEMA_FILES;

const loadedSchemas = new Map<SchemaName, AnySchemaObject>();
const validators = new Map<SchemaName, ValidateFunction>();

function loadSchema(schemaFile: string): AnySchemaObject {
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaFile),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaFile),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaFile),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const schema: AnySchemaObject = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
      return schema;
    }
  }

  logger.warn(`Schema file not found: ${schemaFile}, using permissive validation`);
  return { type: 'object' };
}

function getSchema(name: SchemaName): AnySchemaObject {
  let schema = loadedSchemas.get(name);
  if (!schema) {
    schema = loadSchema(SCHEMA_FILES[name]);
    loadedSchemas.set(name, schema);
  }
  return schema;
}

function getValidator(name: SchemaName): ValidateFunction {
  let validate = validators.get(name);
  if (!validate) {
    // run_summary references contract_fields by $id
    if (name === 'runSummary') {
      getValidator('contractFields');
    }
    validate = ajv.compile(getSchema(name));
    validators.set(name, validate);
  }
  return validate;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function validateWith(name: SchemaName, label: string, data: unknown): ValidationResult {
  const validate = getValidator(name);

  if (!validate(data)) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn(`${label} validation failed`, { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/**
 * Validate the flat field mapping (six keys, non-empty trimmed string or null)
 */
export function validateContractFields(data: unknown): ValidationResult {
  return validateWith('contractFields', 'ContractFields', data);
}

/**
 * Validate a summary.json payload
 */
export function validateRunSummary(data: unknown): ValidationResult {
  return validateWith('runSummary', 'RunSummary', data);
}

export function validateExtractRequest(data: unknown): ValidationResult {
  return validateWith('extractRequest', 'ExtractRequest', data);
}

export function validateSubmitContractRequest(data: unknown): ValidationResult {
  return validateWith('submitContractRequest', 'SubmitContractRequest', data);
}

export const schemas = {
  get contractFields() {
    return getSchema('contractFields');
  },
  get runSummary() {
    return getSchema('runSummary');
  },
};
