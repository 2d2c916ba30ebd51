import fs from 'fs';
import PDFDocument from 'pdfkit';
import { logInfo } from '@/lib/utils/api-response-utils';

// 1 pulgada de margen, tamaño carta
const PAGE_SIZE = 'LETTER';
const PAGE_MARGIN = 72;
const FONT_SIZE = 10;
const LINE_GAP = 2;

export interface DocumentRenderer {
  render(content: string, outputPath: string): Promise<void>;
}

/**
 * Genera el PDF del artículo como un único párrafo continuo.
 * pdfkit se encarga del ajuste de líneas y de los saltos de página.
 */
export class ArticlePdfService implements DocumentRenderer {
  render(content: string, outputPath: string): Promise<void> {
    logInfo('ArticlePdf', `Generando PDF en ${outputPath} (${content.length} caracteres)`);

    return new Promise<void>((resolve, reject) => {
      const doc = new PDFDocument({ size: PAGE_SIZE, margin: PAGE_MARGIN });
      const output = fs.createWriteStream(outputPath);

      output.on('finish', () => resolve());
      output.on('error', reject);
      doc.on('error', reject);

      doc.pipe(output);
      doc.font('Helvetica').fontSize(FONT_SIZE).text(content, { lineGap: LINE_GAP });
      doc.end();
    });
  }
}
