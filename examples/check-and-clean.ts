/**
 * Check a PDF for JavaScript and write a cleaned copy if any is found.
 *
 * Usage:
 *   npx tsx examples/check-and-clean.ts path/to/document.pdf [path/to/output.pdf]
 */

import { checkFile, createLogger, sanitizeFile } from '../src/index.js';

const input = process.argv[2];

if (!input) {
  console.error('Usage: npx tsx examples/check-and-clean.ts <path-to-pdf> [output]');
  process.exit(1);
}

const output = process.argv[3] ?? `${input.replace(/\.pdf$/i, '')}.clean.pdf`;

const logger = createLogger({ level: 'info', write: line => console.error(line) });

const check = await checkFile(input, { logger });
switch (check.status) {
  case 'clean':
    console.log('Nothing to do.');
    break;
  case 'unverified':
    console.log(`Could not read ${input} (${check.error.code})`);
    process.exitCode = 2;
    break;
  case 'detected': {
    console.log(`JavaScript at ${check.finding.location}`);
    const result = await sanitizeFile(input, output, { logger });
    if (result.ok) {
      console.log(`Wrote ${output} after ${result.report.passes} pass(es)`);
    } else {
      console.log(`Failed: ${result.error.message}`);
      process.exitCode = 1;
    }
    break;
  }
}
