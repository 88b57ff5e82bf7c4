/**
 * Lower-level use: open a document, list every script location the
 * detector finds as actions are removed one pass at a time.
 *
 * Usage:
 *   npx tsx examples/inspect-graph.ts path/to/document.pdf
 */

import {
  PdfDocument,
  createLogger,
  createPassContext,
  findJavaScript,
  sanitizePass,
} from '../src/index.js';

const filePath = process.argv[2];

if (!filePath) {
  console.error('Usage: npx tsx examples/inspect-graph.ts <path-to-pdf>');
  process.exit(1);
}

const doc = await PdfDocument.load(filePath);
const logger = createLogger({ level: 'debug', write: line => console.error(line) });

console.log(`PDF ${doc.version}, ${doc.pageCount} page(s)${doc.isEncrypted ? ', encrypted' : ''}`);
if (doc.wasRecovered) console.log('Cross-reference data was rebuilt by scanning the file');

for (let pass = 1; pass <= 10; pass++) {
  const finding = findJavaScript(doc);
  if (!finding) {
    console.log(pass === 1 ? 'No JavaScript found' : `Clean after ${pass - 1} pass(es)`);
    break;
  }
  console.log(`Pass ${pass}: ${finding.location}${finding.page ? ` (page ${finding.page})` : ''}`);
  if (!sanitizePass(doc.root, createPassContext(doc, logger))) break;
}

doc.dispose();
