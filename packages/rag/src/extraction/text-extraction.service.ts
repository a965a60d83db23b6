import { Injectable } from '@nestjs/common';
import { fromBuffer } from 'file-type';
import mammoth from 'mammoth';
import pdfParse from 'pdf-parse';
import {
  EmptyDocumentError,
  ExtractionFailedError,
  UnsupportedFormatError,
  logger,
  type DocumentFormat,
} from '@docqa/core';
import { cleanText } from '../utils/text.js';

export const DOCX_MIME_TYPE =
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

export const MIME_TYPES: Record<DocumentFormat, string> = {
  pdf: 'application/pdf',
  docx: DOCX_MIME_TYPE,
  txt: 'text/plain',
};

const DECLARED_TYPES: Record<string, DocumentFormat> = {
  pdf: 'pdf',
  'application/pdf': 'pdf',
  docx: 'docx',
  [DOCX_MIME_TYPE]: 'docx',
  txt: 'txt',
  'text/plain': 'txt',
};

/**
 * Map a declared type (MIME type, optionally with parameters, or short name) to a supported format.
 */
export function toDocumentFormat(declaredType: string): DocumentFormat | undefined {
  const normalized = declaredType.split(';')[0].trim().toLowerCase();
  return DECLARED_TYPES[normalized];
}

@Injectable()
export class TextExtractionService {
  /**
   * Extract plain text from a document. The buffer is only read.
   * @param buffer - Raw file content
   * @param declaredType - MIME type or short name (pdf, docx, txt)
   * @throws UnsupportedFormatError, EmptyDocumentError, ExtractionFailedError
   */
  async extract(buffer: Buffer, declaredType: string): Promise<string> {
    const format = toDocumentFormat(declaredType);
    if (!format) {
      throw new UnsupportedFormatError(declaredType);
    }

    const text = cleanText(await this.extractRaw(buffer, format));
    if (text.length === 0) {
      throw new EmptyDocumentError();
    }
    return text;
  }

  /**
   * Decide the format of an upload: the declared MIME type when supported, then the
   * file signature, then the file extension.
   */
  async resolveDocumentType(
    buffer: Buffer,
    filename: string,
    mimeType: string
  ): Promise<DocumentFormat> {
    const declared = toDocumentFormat(mimeType);
    if (declared) {
      return declared;
    }

    try {
      const detected = await fromBuffer(buffer);
      const sniffed = detected ? toDocumentFormat(detected.mime) : undefined;
      if (sniffed) {
        return sniffed;
      }
    } catch (error) {
      logger.warn(
        `Failed to detect file type for ${filename}, using extension-based detection`,
        error
      );
    }

    const extension = filename.toLowerCase().split('.').pop() ?? '';
    const byExtension = toDocumentFormat(extension);
    if (byExtension) {
      return byExtension;
    }
    throw new UnsupportedFormatError(mimeType || extension);
  }

  private async extractRaw(buffer: Buffer, format: DocumentFormat): Promise<string> {
    switch (format) {
      case 'pdf':
        return this.extractPdf(buffer);
      case 'docx':
        return this.extractDocx(buffer);
      case 'txt':
        return this.extractPlainText(buffer);
    }
  }

  private async extractPdf(buffer: Buffer): Promise<string> {
    try {
      const data = await pdfParse(buffer);
      return data.text ?? '';
    } catch (err) {
      logger.error(`PDF extraction failed:`, err);
      throw new ExtractionFailedError('pdf', err instanceof Error ? err.message : String(err));
    }
  }

  private async extractDocx(buffer: Buffer): Promise<string> {
    try {
      const { value, messages } = await mammoth.extractRawText({ buffer });
      for (const message of messages) {
        logger.debug(`DOCX extraction ${message.type}: ${message.message}`);
      }
      return value;
    } catch (err) {
      logger.error(`DOCX extraction failed:`, err);
      throw new ExtractionFailedError('docx', err instanceof Error ? err.message : String(err));
    }
  }

  private extractPlainText(buffer: Buffer): string {
    const text = buffer.toString('utf8');
    return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  }
}
