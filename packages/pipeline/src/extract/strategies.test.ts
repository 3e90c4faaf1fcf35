import { describe, expect, it } from 'vitest';
import { ExtractionError, NoTextLayerError } from '../errors.js';
import { extractDocument, mupdfStrategy, unpdfStrategy } from './index.js';

const paperLines = [
  'Sparse attention lets the model skip distant tokens',
  'We evaluate the method on three long document benchmarks',
  'Recall improves by nine points over the dense baseline',
  'Training cost falls because fewer pairs are scored',
  'The gains hold for inputs of up to sixty thousand tokens',
  'Ablations show the routing step matters most',
  'We release the code and the evaluation scripts',
];

/** One-page PDF with a Helvetica text stream; offsets in the xref table are computed here. */
function buildPdf(content: string): Uint8Array {
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 4 0 R >> >> /Contents 5 0 R >>',
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
  ];

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  for (const [index, body] of objects.entries()) {
    offsets.push(pdf.length);
    pdf += `${index + 1} 0 obj\n${body}\nendobj\n`;
  }

  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  pdf += offsets.map((offset) => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return new Uint8Array(Buffer.from(pdf, 'latin1'));
}

function textPdf(lines: string[]): Uint8Array {
  const shown = lines.map((line) => `(${line}) Tj T*`).join('\n');
  return buildPdf(`BT\n/F1 11 Tf\n14 TL\n72 720 Td\n${shown}\nET`);
}

describe('default extraction strategies', () => {
  it('reads the text layer with the primary strategy', async () => {
    const document = await extractDocument(textPdf(paperLines));

    expect(document).toMatchObject({
      extractionMethod: 'primary',
      strategy: 'unpdf',
      pageCount: 1,
      status: 'extracted',
    });
    expect(document.text).toContain('Sparse attention lets the model skip distant tokens');
    expect(document.text).toContain('We release the code and the evaluation scripts');
  });

  it('reads the same page with the fallback strategy', async () => {
    const output = await mupdfStrategy.extract(textPdf(paperLines));

    expect(output.pageCount).toBe(1);
    expect(output.text).toContain('Recall improves by nine points over the dense baseline');
  });

  it('leaves the caller bytes intact for the next strategy', async () => {
    const bytes = textPdf(paperLines);

    await unpdfStrategy.extract(bytes);

    expect(bytes.byteLength).toBeGreaterThan(0);
    expect((await mupdfStrategy.extract(bytes)).pageCount).toBe(1);
  });

  it('reports a blank page as having no text layer', async () => {
    const error = await extractDocument(buildPdf('')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NoTextLayerError);
    expect(error).toMatchObject({ reason: 'no_text' });
    if (error instanceof NoTextLayerError) {
      expect(error.attempts.map((attempt) => [attempt.strategy, attempt.outcome])).toEqual([
        ['unpdf', 'unusable'],
        ['mupdf', 'unusable'],
      ]);
    }
  });

  it('fails every strategy on a signature followed by garbage', async () => {
    const garbage = new Uint8Array(Buffer.from('%PDF-1.7\nthis is not a real document body\n', 'latin1'));
    const writeStderr = process.stderr.write;

    const error = await extractDocument(garbage).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).not.toBeInstanceOf(NoTextLayerError);
    expect(error).toMatchObject({ code: 'ALL_STRATEGIES_FAILED' });
    expect(process.stderr.write).toBe(writeStderr);
  });
});
