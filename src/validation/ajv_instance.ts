/**
 * Ajv validation instance with schema validators
 * Config files, recorded tick batches and emitted scan results are all checked
 * against the JSON schemas under schemas/
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { RawScannerConfig } from '@/core/config';
import type { RawTickBatch } from '@/providers/replay_provider';
import type { ScanResult } from '@/scanner/types';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (date-time, etc.)
addFormats(ajv);

// Lazy-loaded validators
let scannerConfigValidator: ValidateFunction<RawScannerConfig> | null = null;
let tickBatchValidator: ValidateFunction<RawTickBatch> | null = null;
let scanResultValidator: ValidateFunction<ScanResult> | null = null;

export function getScannerConfigValidator(): ValidateFunction<RawScannerConfig> {
  if (!scannerConfigValidator) {
    scannerConfigValidator = ajv.compile<RawScannerConfig>(loadSchema('scanner_config.v1'));
  }
  return scannerConfigValidator;
}

export function getTickBatchValidator(): ValidateFunction<RawTickBatch> {
  if (!tickBatchValidator) {
    tickBatchValidator = ajv.compile<RawTickBatch>(loadSchema('tick_batch.v1'));
  }
  return tickBatchValidator;
}

export function getScanResultValidator(): ValidateFunction<ScanResult> {
  if (!scanResultValidator) {
    scanResultValidator = ajv.compile<ScanResult>(loadSchema('scan_result.v1'));
  }
  return scanResultValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateScannerConfig(data: unknown): ValidationResult<RawScannerConfig> {
  return runValidator(getScannerConfigValidator(), data);
}

export function validateTickBatch(data: unknown): ValidationResult<RawTickBatch> {
  return runValidator(getTickBatchValidator(), data);
}

export function validateScanResult(data: unknown): ValidationResult<ScanResult> {
  return runValidator(getScanResultValidator(), data);
}
