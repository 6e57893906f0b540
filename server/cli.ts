#!/usr/bin/env node
/**
 * Pairing parser CLI
 *
 * Usage:
 *   pairing-parser <pairing_file.txt> [--reference-date yyyy-MM-dd]
 *
 * Prints the extracted pairings as an indented JSON array.
 */

import 'dotenv/config';
import fs from 'fs';
import { isValid, parseISO } from 'date-fns';
import { loadServerConfig } from './config';
import { readDocumentFile } from './documentText';
import { PairingParser } from './pairingParser';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultIO: CliIO = {
  stdout: text => process.stdout.write(text + '\n'),
  stderr: text => process.stderr.write(text + '\n'),
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const args = [...argv];
  let referenceDate: Date | undefined;

  const flagIndex = args.indexOf('--reference-date');
  if (flagIndex !== -1) {
    const value = args[flagIndex + 1];
    const parsed = value ? parseISO(value) : undefined;
    if (!parsed || !isValid(parsed)) {
      io.stderr(`Error: Invalid --reference-date "${value ?? ''}" (expected yyyy-MM-dd)`);
      return 1;
    }
    referenceDate = parsed;
    args.splice(flagIndex, 2);
  }

  const filePath = args[0];
  if (!filePath) {
    io.stderr('Usage: pairing-parser <pairing_file.txt> [--reference-date yyyy-MM-dd]');
    return 1;
  }

  if (!fs.existsSync(filePath)) {
    io.stderr(`Error: File not found at ${filePath}`);
    return 1;
  }

  let content: string;
  try {
    content = await readDocumentFile(filePath);
  } catch (error) {
    io.stderr(`Error reading file: ${errorMessage(error)}`);
    return 1;
  }

  try {
    const { PRELIM_ID_STRATEGY } = loadServerConfig();
    const parser = new PairingParser({ prelimIdStrategy: PRELIM_ID_STRATEGY });
    const trips = parser.parse(content, referenceDate);
    io.stdout(JSON.stringify(trips, null, 2));
    return 0;
  } catch (error) {
    io.stderr(`Error during parsing: ${errorMessage(error)}`);
    return 1;
  }
}

if (require.main === module) {
  // Keep stdout for the JSON payload
  if (!process.env.LOG_LEVEL) process.env.LOG_LEVEL = 'warn';

  runCli(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    error => {
      console.error('Unexpected error:', error);
      process.exitCode = 1;
    }
  );
}
