/**
 * PDF text extraction with pdfjs-dist.
 * Text items are grouped into lines by their Y position so label/value pairs
 * that sit on one visual line stay together for the model.
 */

import { createRequire } from 'node:module';
import { dirname, join } from 'node:path';
import { pathToFileURL } from 'node:url';

type PdfJs = typeof import('pdfjs-dist/legacy/build/pdf.mjs');

let pdfjsLoading: Promise<PdfJs> | undefined;

/** Load pdfjs once, on first use, and point it at its bundled worker. */
function loadPdfJs(): Promise<PdfJs> {
  if (pdfjsLoading === undefined) {
    pdfjsLoading = import('pdfjs-dist/legacy/build/pdf.mjs').then((pdfjs) => {
      const require = createRequire(import.meta.url);
      const workerPath = join(
        dirname(require.resolve('pdfjs-dist/package.json')),
        'legacy/build/pdf.worker.mjs',
      );
      pdfjs.GlobalWorkerOptions.workerSrc = pathToFileURL(workerPath).href;
      return pdfjs;
    });
  }
  return pdfjsLoading;
}

interface Fragment {
  x: number;
  text: string;
}

/**
 * Extract the text layer of a PDF, one output line per visual line,
 * pages separated by a blank line.
 */
export async function extractPdfText(data: Uint8Array): Promise<string> {
  const pdfjs = await loadPdfJs();
  const doc = await pdfjs.getDocument({ data, isEvalSupported: false, useSystemFonts: true }).promise;

  try {
    const pages: string[] = [];

    for (let pageNum = 1; pageNum <= doc.numPages; pageNum++) {
      const page = await doc.getPage(pageNum);
      const content = await page.getTextContent();

      // Round Y so fragments on the same visual line share a key
      const rows = new Map<number, Fragment[]>();
      for (const item of content.items) {
        if (!('str' in item) || item.str.trim() === '') continue;

        const y = Math.round(Number(item.transform[5]));
        const x = Number(item.transform[4]);
        const row = rows.get(y) ?? [];
        row.push({ x, text: item.str.trim() });
        rows.set(y, row);
      }

      // PDF space grows upwards: highest Y is the top of the page
      const lines = [...rows.entries()]
        .sort(([a], [b]) => b - a)
        .map(([, row]) =>
          row
            .sort((a, b) => a.x - b.x)
            .map((f) => f.text)
            .join(' '),
        );

      pages.push(lines.join('\n'));
      page.cleanup();
    }

    return pages.join('\n\n');
  } finally {
    await doc.destroy();
  }
}
