/**
 * Error taxonomy for the scan engine.
 *
 * Per-symbol errors (invalid ticks, incomplete score sets) are caught by the
 * scheduler and recorded against the symbol. Cycle-level errors (provider
 * outage, deadline overrun) become degraded reasons on the ScanResult.
 * Insufficient data is never an error: pillars return a fallback score.
 */

export type ScannerErrorCode =
  | 'invalid_tick'
  | 'incomplete_score_set'
  | 'provider_unavailable'
  | 'deadline_exceeded'
  | 'configuration'
  | 'provider';

export class ScannerError extends Error {
  constructor(
    message: string,
    public readonly code: ScannerErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ScannerError';
  }
}

export type InvalidTickReason =
  | 'empty_symbol'
  | 'bad_timestamp'
  | 'non_positive_price'
  | 'negative_volume'
  | 'non_positive_float'
  | 'out_of_order';

export class InvalidTickError extends ScannerError {
  constructor(
    public readonly symbol: string,
    public readonly reason: InvalidTickReason,
    detail: string
  ) {
    super(`Invalid tick for ${symbol || '<empty>'}: ${detail}`, 'invalid_tick');
    this.name = 'InvalidTickError';
  }
}

export class IncompleteScoreSetError extends ScannerError {
  constructor(
    public readonly symbol: string,
    detail: string
  ) {
    super(`Incomplete score set for ${symbol}: ${detail}`, 'incomplete_score_set');
    this.name = 'IncompleteScoreSetError';
  }
}

export class ProviderUnavailableError extends ScannerError {
  constructor(
    public readonly provider: string,
    detail: string,
    cause?: unknown
  ) {
    super(`Provider ${provider} unavailable: ${detail}`, 'provider_unavailable', { cause });
    this.name = 'ProviderUnavailableError';
  }
}

export class DeadlineExceededError extends ScannerError {
  constructor(
    public readonly deadlineMs: number,
    public readonly phase: string
  ) {
    super(`Cycle deadline of ${deadlineMs}ms exceeded during ${phase}`, 'deadline_exceeded');
    this.name = 'DeadlineExceededError';
  }
}

export class ConfigurationError extends ScannerError {
  constructor(message: string, public readonly errors: string[] = []) {
    super(message, 'configuration');
    this.name = 'ConfigurationError';
  }
}

export class ProviderError extends ScannerError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly method: string,
    cause?: unknown
  ) {
    super(message, 'provider', { cause });
    this.name = 'ProviderError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
