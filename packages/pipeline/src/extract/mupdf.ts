import { EncryptedDocumentError, looksLikePasswordError, type ExtractionStrategy } from './strategy.js';

// MuPDF writes repair warnings straight to stderr while it reads damaged files.
function quietly<T>(work: () => T): T {
  const writeStderr = process.stderr.write;
  process.stderr.write = () => true;
  try {
    return work();
  } finally {
    process.stderr.write = writeStderr;
  }
}

/** MuPDF structured text; a different parser than PDF.js, so it recovers files PDF.js rejects. */
export const mupdfStrategy: ExtractionStrategy = {
  name: 'mupdf',

  async extract(bytes) {
    const { default: mupdf } = await import('mupdf');

    return quietly(() => {
      let doc: InstanceType<typeof mupdf.Document>;
      try {
        doc = mupdf.Document.openDocument(bytes, 'application/pdf');
      } catch (error) {
        if (looksLikePasswordError(error)) throw new EncryptedDocumentError('mupdf');
        throw error;
      }

      if (doc.needsPassword()) {
        throw new EncryptedDocumentError('mupdf');
      }

      const pageCount = doc.countPages();
      const pages: string[] = [];
      for (let i = 0; i < pageCount; i++) {
        const page = doc.loadPage(i);
        pages.push(page.toStructuredText('').asText());
      }

      const title = doc.getMetaData('info:Title')?.trim();

      return {
        text: pages.join('\n\n'),
        pageCount,
        title: title || undefined,
      };
    });
  },
};
