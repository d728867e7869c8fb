/**
 * Text excerpts for the sensitivity classifier. PDF and Word documents are
 * parsed to plain text; anything else is read as UTF-8 from the start of
 * the file. Digests are always taken over the raw bytes, never over this.
 */
import fs from 'node:fs';
import path from 'node:path';

import mammoth from 'mammoth';
import { extractText } from 'unpdf';

// Word 97-2003 keeps body text as runs of printable characters, either
// single-byte or UTF-16LE depending on the document.
const PRINTABLE_RUN = /[\x20-\x7e\t\r\n]{4,}/g;

export async function readExcerpt(
  filePath: string,
  maxChars: number,
): Promise<string> {
  switch (path.extname(filePath).toLowerCase()) {
    case '.pdf':
      return (await pdfText(filePath)).slice(0, maxChars);
    case '.docx':
      return (await docxText(filePath)).slice(0, maxChars);
    case '.doc':
      return (await legacyDocText(filePath)).slice(0, maxChars);
    default:
      return readTextPrefix(filePath, maxChars);
  }
}

async function pdfText(filePath: string): Promise<string> {
  const data = new Uint8Array(await fs.promises.readFile(filePath));
  const { text } = await extractText(data, { mergePages: true });
  return Array.isArray(text) ? text.join('\n') : text;
}

async function docxText(filePath: string): Promise<string> {
  const { value } = await mammoth.extractRawText({ path: filePath });
  return value;
}

async function legacyDocText(filePath: string): Promise<string> {
  const buf = await fs.promises.readFile(filePath);
  const runs = [
    ...(buf.toString('latin1').match(PRINTABLE_RUN) ?? []),
    ...(buf.toString('utf16le').match(PRINTABLE_RUN) ?? []),
  ];
  return runs.map((r) => r.trim()).filter(Boolean).join('\n');
}

/** At most `maxChars` characters from the start of a text file. */
async function readTextPrefix(filePath: string, maxChars: number): Promise<string> {
  const handle = await fs.promises.open(filePath, 'r');
  try {
    // UTF-8 is at most 4 bytes per character
    const buf = Buffer.alloc(maxChars * 4);
    const { bytesRead } = await handle.read(buf, 0, buf.length, 0);
    return buf.subarray(0, bytesRead).toString('utf-8').slice(0, maxChars);
  } finally {
    await handle.close();
  }
}
