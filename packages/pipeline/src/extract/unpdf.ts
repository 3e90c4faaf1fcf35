import { EncryptedDocumentError, looksLikePasswordError, type ExtractionStrategy } from './strategy.js';

/** PDF.js text layer via unpdf's serverless build. */
export const unpdfStrategy: ExtractionStrategy = {
  name: 'unpdf',

  async extract(bytes) {
    const { extractText, getDocumentProxy, getMeta } = await import('unpdf');

    // PDF.js may detach the buffer it is handed; later strategies need the original.
    const pdf = await getDocumentProxy(new Uint8Array(bytes)).catch((error: unknown) => {
      if (looksLikePasswordError(error)) throw new EncryptedDocumentError('unpdf');
      throw error;
    });

    try {
      const { totalPages, text } = await extractText(pdf, { mergePages: true });

      // title is optional
      const meta = await getMeta(pdf).catch(() => null);
      const rawTitle: unknown = meta?.info?.Title;
      const title = typeof rawTitle === 'string' && rawTitle.trim() ? rawTitle.trim() : undefined;

      return { text, pageCount: totalPages, title };
    } finally {
      await pdf.destroy();
    }
  },
};
