import * as mupdf from 'mupdf';

// MuPDF handles live in WASM memory: every handle opened here is destroyed in a
// finally block, on success, failure and early return alike.

/** Info-dictionary keys read by the metadata tool. */
export type InfoKey = 'Title' | 'Author' | 'Subject' | 'Creator' | 'Producer' | 'CreationDate' | 'ModDate';

/**
 * Opens a PDF from its bytes, hands it to `use` and destroys it afterwards.
 * Opening only parses the trailer and catalog; pages are loaded on demand.
 */
export function withPdfDocument<T>(data: Uint8Array, use: (doc: mupdf.Document) => T): T {
  const doc = mupdf.Document.openDocument(data, 'application/pdf');
  try {
    return use(doc);
  } finally {
    doc.destroy();
  }
}

/**
 * Loads one page (0-based index) as structured text, whitespace preserved.
 * `asText()` gives the plain text, `asJSON()` the blocks and lines with their boxes.
 */
export function withStructuredText<T>(
  doc: mupdf.Document,
  pageIndex: number,
  use: (stext: mupdf.StructuredText) => T,
): T {
  const page = doc.loadPage(pageIndex);
  try {
    const stext = page.toStructuredText('preserve-whitespace');
    try {
      return use(stext);
    } finally {
      stext.destroy();
    }
  } finally {
    page.destroy();
  }
}

/** Raw value of an info-dictionary entry; dates come back unparsed (`D:2024...`). */
export function readInfoField(doc: mupdf.Document, key: InfoKey): string {
  return doc.getMetaData(`info:${key}`) ?? '';
}
