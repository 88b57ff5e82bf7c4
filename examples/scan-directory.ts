/**
 * Report which PDFs in a directory carry JavaScript.
 *
 * Usage:
 *   npx tsx examples/scan-directory.ts path/to/folder
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { checkFile } from '../src/index.js';

const dir = process.argv[2];

if (!dir) {
  console.error('Usage: npx tsx examples/scan-directory.ts <folder>');
  process.exit(1);
}

const files = (await readdir(dir)).filter(name => name.toLowerCase().endsWith('.pdf'));
const counts = { detected: 0, clean: 0, unverified: 0 };

for (const name of files) {
  const result = await checkFile(join(dir, name));
  counts[result.status]++;
  if (result.status === 'detected') console.log(`${name}: ${result.finding.location}`);
  if (result.status === 'unverified') console.log(`${name}: unreadable (${result.error.message})`);
}

console.log('---');
console.log(`${files.length} file(s): ${counts.detected} with JavaScript, ${counts.clean} clean, ${counts.unverified} unreadable`);
