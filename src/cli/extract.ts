import { FidelityExtractor } from '@tradeledger/fidelity-parser';
import {
  pathLike,
  renderImportId,
  toTransactionJson,
  type Fingerprint,
  type TransactionJson,
} from '@tradeledger/types';

export interface ExtractOptions {
  verbose: boolean;
  /** Overrides the extractor's default import ID template. */
  importIdTemplate?: string;
}

export interface ExtractedFile {
  file: string;
  fingerprint: Fingerprint | null;
  transactions: Array<TransactionJson & { importId: string }>;
}

export interface ExtractOutput {
  files: ExtractedFile[];
  skipped: Array<{ file: string; reason: string }>;
}

/**
 * Run the Fidelity extractor over each path. Files whose header does not
 * match the export layout are reported as skipped, not failed.
 */
export function extractFiles(paths: readonly string[], options: ExtractOptions): ExtractOutput {
  const output: ExtractOutput = { files: [], skipped: [] };

  for (const path of paths) {
    const extractor = new FidelityExtractor(pathLike(path));
    try {
      if (!extractor.detect()) {
        console.error(`[WARN] Not a Fidelity export, skipping: ${path}`);
        output.skipped.push({ file: path, reason: 'header does not match Fidelity export layout' });
        continue;
      }

      if (options.verbose) {
        console.error(`[INFO] ${extractor.filename}: ${extractor.rowCount} transaction row(s)`);
      }

      const fingerprint = extractor.fingerprint();
      const template = options.importIdTemplate ?? extractor.defaultImportId;
      const transactions: ExtractedFile['transactions'] = [];
      for (const txn of extractor.extract()) {
        transactions.push({ importId: renderImportId(template, txn), ...toTransactionJson(txn) });
      }

      output.files.push({
        file: extractor.filename,
        fingerprint: fingerprint.found ? fingerprint.fingerprint : null,
        transactions,
      });
    } finally {
      extractor.close();
    }
  }

  return output;
}
