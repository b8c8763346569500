/**
 * JSON Schema Validation
 *
 * Ajv validation for extraction service responses and for the data files
 * (classifier vocabulary, expected fields) the engine loads at startup.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject, ValidateFunction } from 'ajv';
import { ConfigurationError } from './errors';
import { logger } from './logger';
import type { DocumentCategory, TopicClassification } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
});

// ============================================================================
// File Loading
// ============================================================================

function readJson(candidates: string[], fileName: string): unknown {
  for (const filePath of candidates) {
    if (fs.existsSync(filePath)) {
      const content = fs.readFileSync(filePath, 'utf-8');
      try {
        const parsed: unknown = JSON.parse(content);
        return parsed;
      } catch (err) {
        throw new ConfigurationError(
          `Invalid JSON in ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
          fileName
        );
      }
    }
  }
  throw new ConfigurationError(`File not found: ${fileName} (looked in ${candidates.join(', ')})`, fileName);
}

function loadSchema(schemaName: string): unknown {
  return readJson(
    [
      // Relative to shared package in development
      path.join(__dirname, '../../../docs/contracts', schemaName),
      // Relative to shared package dist
      path.join(__dirname, '../../../../docs/contracts', schemaName),
      // Relative to project root (for containers)
      path.join(process.cwd(), 'docs/contracts', schemaName),
    ],
    schemaName
  );
}

/**
 * Load a data file shipped with the shared package (packages/shared/data).
 */
export function loadDataFile(fileName: string): unknown {
  return readJson(
    [
      path.join(__dirname, '../data', fileName),
      path.join(__dirname, '../../../../packages/shared/data', fileName),
      path.join(process.cwd(), 'packages/shared/data', fileName),
    ],
    fileName
  );
}

export interface ValidationResult<T> {
  valid: boolean;
  value?: T;
  errors?: string[];
}

function formatErrors<T>(validate: ValidateFunction<T>): string[] {
  return (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`);
}

function lazyValidator<T>(schemaName: string): () => ValidateFunction<T> {
  let compiled: ValidateFunction<T> | null = null;
  return () => {
    if (!compiled) {
      compiled = ajv.compile<T>(loadSchemaObject(schemaName));
    }
    return compiled;
  };
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadSchemaObject(schemaName: string): SchemaObject {
  const schema = loadSchema(schemaName);
  if (!isSchemaObject(schema)) {
    throw new ConfigurationError(`Schema ${schemaName} is not a JSON object`, schemaName);
  }
  return schema;
}

// ============================================================================
// Pass Responses
// ============================================================================

export interface PassResponseField {
  name: string;
  value: string | number | boolean;
  excerpt: string;
  confidence: number;
  category: string;
}

export interface PassResponse {
  fields: PassResponseField[];
  warnings?: string[];
}

const passResponseValidator = lazyValidator<PassResponse>('pass_response.schema.json');

/**
 * Validate an extraction service payload against pass_response.schema.json
 */
export function validatePassResponse(data: unknown): ValidationResult<PassResponse> {
  const validate = passResponseValidator();
  if (validate(data)) {
    return { valid: true, value: data };
  }
  const errors = formatErrors(validate);
  logger.debug('Pass response validation failed', { errors });
  return { valid: false, errors };
}

// ============================================================================
// Data Files
// ============================================================================

export interface ClassifierVocabulary {
  topics: Record<TopicClassification, string[]>;
  attestation: string[];
  partyIntroduction: string[];
}

export type ExpectedFieldSets = Record<DocumentCategory, string[]>;

const vocabularyValidator = lazyValidator<ClassifierVocabulary>('classifier_vocabulary.schema.json');
const expectedFieldsValidator = lazyValidator<ExpectedFieldSets>('expected_fields.schema.json');

export function validateClassifierVocabulary(data: unknown): ValidationResult<ClassifierVocabulary> {
  const validate = vocabularyValidator();
  return validate(data) ? { valid: true, value: data } : { valid: false, errors: formatErrors(validate) };
}

export function validateExpectedFieldSets(data: unknown): ValidationResult<ExpectedFieldSets> {
  const validate = expectedFieldsValidator();
  return validate(data) ? { valid: true, value: data } : { valid: false, errors: formatErrors(validate) };
}
