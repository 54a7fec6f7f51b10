/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for category configuration files and
 * classification reports.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { ConfigurationError } from './errors';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

export const SCHEMA_FILES = {
  categoryConfig: 'category_config.schema.json',
  classificationReport: 'classification_report.schema.json',
} as const;

type SchemaName = keyof typeof SCHEMA_FILES;

// Compiled validators - lazy loaded on first use
const validators = new Map<SchemaName, ValidateFunction>();

function loadSchema(schemaFile: string): object {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaFile),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaFile),
    // Relative to the working directory
    path.join(process.cwd(), 'docs/contracts', schemaFile),
  ];

  for (const schemaPath of possiblePaths) {
    if (!fs.existsSync(schemaPath)) continue;
    const content = fs.readFileSync(schemaPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== 'object' || parsed === null) {
      throw new ConfigurationError(`Schema file is not a JSON object: ${schemaPath}`);
    }
    logger.debug('Loaded JSON schema', { schema: schemaFile, path: schemaPath });
    return parsed;
  }

  throw new ConfigurationError(`Schema file not found: ${schemaFile}`, possiblePaths);
}

function getValidator(name: SchemaName): ValidateFunction {
  let validate = validators.get(name);
  if (!validate) {
    validate = ajv.compile(loadSchema(SCHEMA_FILES[name]));
    validators.set(name, validate);
  }
  return validate;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function runValidation(name: SchemaName, data: unknown, label: string): ValidationResult {
  const validate = getValidator(name);
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`) ?? [];
    logger.warn(`${label} validation failed`, { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/**
 * Validate a raw category configuration against category_config.schema.json
 */
export function validateCategoryConfig(data: unknown): ValidationResult {
  return runValidation('categoryConfig', data, 'Category configuration');
}

/**
 * Validate a ClassificationReport against classification_report.schema.json
 */
export function validateReport(data: unknown): ValidationResult {
  return runValidation('classificationReport', data, 'ClassificationReport');
}
