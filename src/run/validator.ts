/**
 * Scan Result Validator
 * Validates scan results against the schema and checks ranking consistency
 */

import { validateScanResult, type ValidationResult } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';
import { compareComposites } from '@/scoring/aggregator';
import { PILLAR_IDS, type ScanResult } from '@/scanner/types';

const logger = createChildLogger('result_validator');

export function validateScanResultRecord(data: unknown): ValidationResult<ScanResult> {
  const result = validateScanResult(data);

  if (!result.valid) {
    logger.error({ errors: result.errors }, 'Scan result validation failed');
  } else {
    logger.debug('Scan result validation passed');
  }

  return result;
}

export function isValidScanResult(data: unknown): data is ScanResult {
  return validateScanResult(data).valid;
}

export interface ConsistencyCheck {
  passed: boolean;
  issues: string[];
}

export function checkScanResultConsistency(result: ScanResult): ConsistencyCheck {
  const issues: string[] = [];
  const seen = new Set<string>();

  result.entries.forEach((entry, index) => {
    if (entry.rank !== index + 1) {
      issues.push(`${entry.symbol} has rank ${entry.rank} at position ${index + 1}`);
    }
    if (seen.has(entry.symbol)) {
      issues.push(`${entry.symbol} appears more than once`);
    }
    seen.add(entry.symbol);

    const previous = index > 0 ? result.entries[index - 1] : undefined;
    if (previous && compareComposites(previous, entry) >= 0) {
      issues.push(`${previous.symbol} and ${entry.symbol} are out of order`);
    }

    for (const pillar of PILLAR_IDS) {
      const score = entry.pillars[pillar];
      if (score.symbol !== entry.symbol || score.version !== entry.version) {
        issues.push(`${entry.symbol} ${pillar} score does not match version ${entry.version}`);
      }
      const listed = Number(entry.passedPillars.includes(pillar)) + Number(entry.failedPillars.includes(pillar));
      if (listed !== 1) {
        issues.push(`${entry.symbol} ${pillar} must be listed as exactly one of passed or failed`);
      }
    }
    if (entry.passedAll !== (entry.failedPillars.length === 0)) {
      issues.push(`${entry.symbol} passedAll disagrees with ${entry.failedPillars.length} failed pillars`);
    }
  });

  for (const symbol of result.skippedSymbols) {
    if (seen.has(symbol)) {
      issues.push(`Skipped symbol ${symbol} is also ranked`);
    }
  }

  const degraded = result.degradedReasons.length > 0;
  if (degraded !== (result.status === 'degraded')) {
    issues.push(`Status ${result.status} disagrees with ${result.degradedReasons.length} degraded reasons`);
  }
  if (result.skippedSymbols.length > 0 && result.status !== 'degraded') {
    issues.push('Skipped symbols present but cycle is not degraded');
  }

  return {
    passed: issues.length === 0,
    issues,
  };
}
