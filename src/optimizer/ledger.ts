import type { Batch } from '../types.js';
import {
  DEFAULT_ARTIFACT_FOLDER_PATTERN,
  DEFAULT_OUTPUT_FOLDER_PATTERN,
} from '../constants.js';
import { LedgerError } from '../errors.js';

export interface LedgerFolders {
  artifactFolderPattern?: string;
  outputFolderPattern?: string;
}

/**
 * Dense, append-only record of batch number → generated artifact.
 *
 * Batch numbers start at 1 and have no gaps: batch N+1 can only be added once
 * batch N exists.
 */
export class Ledger {
  private readonly batches: Batch[] = [];
  private readonly artifactFolderPattern: string;
  private readonly outputFolderPattern: string;

  constructor(firstBatch: Omit<Batch, 'batchNo'>, folders: LedgerFolders = {}) {
    this.artifactFolderPattern =
      folders.artifactFolderPattern ?? DEFAULT_ARTIFACT_FOLDER_PATTERN;
    this.outputFolderPattern =
      folders.outputFolderPattern ?? DEFAULT_OUTPUT_FOLDER_PATTERN;
    this.add({ batchNo: 1, ...firstBatch });
  }

  /**
   * Rebuild a ledger from stored batches, checking density on the way.
   */
  static fromBatches(batches: readonly Batch[], folders: LedgerFolders = {}): Ledger {
    const [first, ...rest] = [...batches].sort((a, b) => a.batchNo - b.batchNo);
    if (!first || first.batchNo !== 1) {
      throw new LedgerError('A ledger must start with batch 1');
    }
    const ledger = new Ledger(first, folders);
    for (const batch of rest) {
      ledger.add(batch);
    }
    return ledger;
  }

  get size(): number {
    return this.batches.length;
  }

  add(batch: Batch): Batch {
    const expected = this.batches.length + 1;
    if (batch.batchNo !== expected) {
      throw new LedgerError(
        `Cannot add batch ${batch.batchNo}: the next batch must be ${expected}`
      );
    }
    const frozen = Object.freeze({ ...batch });
    this.batches.push(frozen);
    return frozen;
  }

  has(batchNo: number): boolean {
    return Number.isInteger(batchNo) && batchNo >= 1 && batchNo <= this.batches.length;
  }

  /**
   * @throws LedgerError when the batch was never generated
   */
  get(batchNo: number): Batch {
    if (!this.has(batchNo)) {
      throw new LedgerError(`Batch ${batchNo} does not exist`);
    }
    return this.batches[batchNo - 1];
  }

  /** Folder a batch's artifact lives in, or would be generated to. */
  artifactFolder(batchNo: number): string {
    return this.has(batchNo)
      ? this.get(batchNo).artifactPath
      : this.artifactFolderPattern.replaceAll('{batch}', String(batchNo));
  }

  /** Folder a batch's solver output lives in, or is expected in. */
  outputFolder(batchNo: number): string {
    return this.has(batchNo)
      ? this.get(batchNo).outputPath
      : this.outputFolderPattern.replaceAll('{batch}', String(batchNo));
  }

  toArray(): Batch[] {
    return [...this.batches];
  }
}

/**
 * Name of the artifact generated for a batch, e.g. `batch_3__res_a_length_412`.
 */
export function batchArtifactName(
  batchNo: number,
  optimizerName: string,
  variableName: string,
  value: number
): string {
  return `batch_${batchNo}__${optimizerName}_${variableName}_${value}`;
}
