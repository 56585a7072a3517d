#!/usr/bin/env node

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { writeFile } from 'fs/promises';
import { resolve } from 'path';
import { PARSER_VERSION } from '@tradeledger/types';
import { envBool } from './env.js';
import { extractFiles } from './extract.js';

interface CliOptions {
  out?: string;
  verbose: boolean;
  pretty: boolean;
  importId?: string;
}

const program = new Command();

program
  .name('fidelity-extract')
  .description('Extract transactions and a fingerprint from Fidelity account-activity CSV exports')
  .version(PARSER_VERSION)
  .argument('<csv-files...>', 'Fidelity CSV export(s)')
  .option('-o, --out <file>', 'Output file path (default: stdout)', process.env['FIDELITY_OUTPUT_FILE'])
  .option('-v, --verbose', 'Enable verbose output', envBool('FIDELITY_VERBOSE', false))
  .option('--pretty', 'Pretty-print JSON output', envBool('FIDELITY_PRETTY', true))
  .option('--no-pretty', 'Disable pretty-printing')
  .option(
    '--import-id <template>',
    'Import ID template, e.g. "{{ file | as_posix_path }}:{{ reversed_lineno }}"',
    process.env['FIDELITY_IMPORT_ID_TEMPLATE']
  )
  .action(async (csvFiles: string[], options: CliOptions) => {
    try {
      await run(csvFiles, options);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ERROR] ${message}`);
      if (options.verbose && error instanceof Error && error.stack !== undefined) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

async function run(csvFiles: string[], options: CliOptions): Promise<void> {
  if (options.verbose) {
    console.error(`[INFO] Parser version: ${PARSER_VERSION}`);
    console.error(`[INFO] Processing ${csvFiles.length} file(s)`);
  }

  const output = extractFiles(csvFiles, {
    verbose: options.verbose,
    ...(options.importId !== undefined ? { importIdTemplate: options.importId } : {}),
  });

  const json = JSON.stringify(output, null, options.pretty ? 2 : undefined);

  if (options.out !== undefined) {
    const outPath = resolve(options.out);
    await writeFile(outPath, json, 'utf-8');
    console.error(`[INFO] Output written to: ${outPath}`);
  } else {
    // eslint-disable-next-line no-console
    console.log(json);
  }
}

await program.parseAsync();
