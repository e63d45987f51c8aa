/**
 * Scan Result Writer
 * Appends each emitted ScanResult as one JSON line under data/scans/<date>.jsonl
 */

import { appendFile, mkdir } from 'fs/promises';
import { isAbsolute, join } from 'path';
import { createChildLogger } from '@/utils/logger';
import { contentHash } from '@/utils/hash';
import { formatDate } from '@/core/time';
import type { ScanResult } from '@/scanner/types';
import { validateScanResultRecord } from './validator';

const logger = createChildLogger('result_writer');

export interface WriteResult {
  cycleId: string;
  filePath: string;
  contentHash: string;
}

export interface ScanResultSink {
  write(result: ScanResult): Promise<WriteResult>;
}

export interface JsonlResultWriterOptions {
  /** Relative paths resolve against cwd. */
  dir: string;
  /** Reject results that fail schema validation. Default true. */
  validate?: boolean;
}

export class JsonlResultWriter implements ScanResultSink {
  private readonly dir: string;
  private readonly validate: boolean;
  private dirReady = false;
  private written = 0;

  constructor(options: JsonlResultWriterOptions) {
    this.dir = isAbsolute(options.dir) ? options.dir : join(process.cwd(), options.dir);
    this.validate = options.validate ?? true;
  }

  get count(): number {
    return this.written;
  }

  fileFor(result: ScanResult): string {
    return join(this.dir, `${formatDate(new Date(result.startedAt))}.jsonl`);
  }

  async write(result: ScanResult): Promise<WriteResult> {
    if (this.validate) {
      const validation = validateScanResultRecord(result);
      if (!validation.valid) {
        throw new Error(
          `Scan result ${result.cycleId} failed validation: ${validation.errors?.join('; ') ?? 'Unknown error'}`
        );
      }
    }

    if (!this.dirReady) {
      await mkdir(this.dir, { recursive: true });
      this.dirReady = true;
    }

    const filePath = this.fileFor(result);
    await appendFile(filePath, JSON.stringify(result) + '\n', 'utf-8');
    this.written += 1;

    logger.debug({ cycleId: result.cycleId, filePath }, 'Scan result written');

    return {
      cycleId: result.cycleId,
      filePath,
      contentHash: contentHash(result),
    };
  }
}
