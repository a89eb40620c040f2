/**
 * Text sources: turn a document reference into plain text.
 * Anything that cannot be read surfaces as UnreadableSourceError, which the
 * dispatcher never retries.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { UnreadableSourceError } from '../shared/errors.js';
import { extractPdfText } from './pdf.js';

export interface TextSource {
  /**
   * @throws UnreadableSourceError when the document cannot be read or holds no text.
   */
  getText(sourceRef: string): Promise<string>;
}

/**
 * Normalize extracted text: collapse runs of spaces and tabs, keep at most one
 * blank line between blocks, trim the ends.
 */
export function cleanExtractedText(text: string): string {
  return text
    .replace(/[ \t]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/** Reads UTF-8 text files. */
export class PlainTextSource implements TextSource {
  async getText(sourceRef: string): Promise<string> {
    let raw: string;
    try {
      raw = await readFile(sourceRef, 'utf-8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new UnreadableSourceError(sourceRef, message);
    }
    return cleanExtractedText(raw);
  }
}

/** Extracts the text layer of PDF files. */
export class PdfTextSource implements TextSource {
  async getText(sourceRef: string): Promise<string> {
    let data: Uint8Array;
    try {
      data = new Uint8Array(await readFile(sourceRef));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new UnreadableSourceError(sourceRef, message);
    }

    try {
      return cleanExtractedText(await extractPdfText(data));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new UnreadableSourceError(sourceRef, `invalid PDF: ${message}`);
    }
  }
}

/** Routes by file extension: .pdf to the PDF source, everything else read as text. */
export class ExtensionTextSource implements TextSource {
  constructor(
    private readonly pdf: TextSource = new PdfTextSource(),
    private readonly plain: TextSource = new PlainTextSource(),
  ) {}

  getText(sourceRef: string): Promise<string> {
    return extname(sourceRef).toLowerCase() === '.pdf'
      ? this.pdf.getText(sourceRef)
      : this.plain.getText(sourceRef);
  }
}
