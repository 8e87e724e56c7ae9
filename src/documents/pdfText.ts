// src/documents/pdfText.ts
// PDF → plain text via pdfjs. Text layer only; scanned pages yield nothing.

import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

export interface PdfTextResult {
  text: string;
  pages: number;
}

/**
 * Extract the text of every page, in page order.
 * Items on a page are joined as-is, with a newline wherever pdfjs marks end-of-line;
 * each page ends with a newline. The concatenation is trimmed.
 *
 * Rejects when the bytes are not a parseable PDF.
 */
export async function extractPdfText(bytes: Uint8Array): Promise<PdfTextResult> {
  // pdfjs may detach the buffer it receives
  const loading = getDocument({
    data: new Uint8Array(bytes),
    isEvalSupported: false,
    useSystemFonts: false,
    disableFontFace: true,
    verbosity: 0,
  });

  try {
    const pdf = await loading.promise;
    const pageTexts: string[] = [];

    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const content = await page.getTextContent();

      let pageText = '';
      for (const item of content.items) {
        if (!('str' in item)) continue; // marked-content boundaries carry no text
        pageText += item.str;
        if (item.hasEOL) pageText += '\n';
      }
      pageTexts.push(pageText + '\n');
      page.cleanup();
    }

    return { text: pageTexts.join('').trim(), pages: pdf.numPages };
  } finally {
    await loading.destroy();
  }
}
