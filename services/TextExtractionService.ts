import mammoth from 'mammoth';
import { InputError } from '../utils/errors';

export interface ExtractionResult {
  text: string;
}

type DocumentFormat = 'pdf' | 'docx' | 'text';

const DOCX_MIMETYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

const FORMAT_BY_EXTENSION: Partial<Record<string, DocumentFormat>> = {
  '.pdf': 'pdf',
  '.docx': 'docx',
  '.txt': 'text',
  '.md': 'text',
  '.csv': 'text'
};

const FORMAT_BY_MIMETYPE: Partial<Record<string, DocumentFormat>> = {
  'application/pdf': 'pdf',
  [DOCX_MIMETYPE]: 'docx',
  'text/plain': 'text',
  'text/markdown': 'text',
  'text/csv': 'text'
};

export class TextExtractionService {
  /**
   * The file extension wins over the declared mimetype, which browsers
   * often report as application/octet-stream.
   */
  detectFormat(mimetype: string, filename: string): DocumentFormat | undefined {
    const dot = filename.lastIndexOf('.');
    const extension = dot >= 0 ? filename.slice(dot).toLowerCase() : '';
    return FORMAT_BY_EXTENSION[extension] ?? FORMAT_BY_MIMETYPE[mimetype];
  }

  isSupported(mimetype: string, filename: string): boolean {
    return this.detectFormat(mimetype, filename) !== undefined;
  }

  async extractText(buffer: Buffer, mimetype: string, filename: string): Promise<ExtractionResult> {
    const format = this.detectFormat(mimetype, filename);
    switch (format) {
      case 'pdf':
        return this.extractFromPDF(buffer);
      case 'docx':
        return this.extractFromDOCX(buffer);
      case 'text':
        return { text: buffer.toString('utf-8') };
      default:
        throw new InputError(`Unsupported file type: ${mimetype}. Allowed: PDF, DOCX, TXT, MD, CSV`);
    }
  }

  private async extractFromPDF(buffer: Buffer): Promise<ExtractionResult> {
    try {
      // pdf-parse does work at require time, so load it on first use.
      const { default: pdfParse } = await import('pdf-parse');
      const data = await pdfParse(buffer);
      return { text: data.text };
    } catch (error) {
      throw new InputError(`Failed to extract text from PDF: ${errorMessage(error)}`);
    }
  }

  private async extractFromDOCX(buffer: Buffer): Promise<ExtractionResult> {
    try {
      const result = await mammoth.extractRawText({ buffer });
      return { text: result.value };
    } catch (error) {
      throw new InputError(`Failed to extract text from DOCX: ${errorMessage(error)}`);
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
