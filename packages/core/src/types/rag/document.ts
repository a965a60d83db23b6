export const DOCUMENT_STATUSES = [
  'uploading',
  'extracting',
  'chunking',
  'embedding',
  'ready',
  'failed',
] as const;

export type DocumentStatus = (typeof DOCUMENT_STATUSES)[number];

export type DocumentFormat = 'pdf' | 'docx' | 'txt';

export interface DocumentRecord {
  id: string;
  filename: string;
  mimeType: string;
  size: number;
  status: DocumentStatus;
  error?: string;
  chunkIds: string[];
  embeddingConfigId?: string;
  createdAt: string;
  updatedAt: string;
}

/**
 * Listing view of a document, without its chunk references.
 */
export interface DocumentSummary {
  id: string;
  filename: string;
  mimeType: string;
  size: number;
  status: DocumentStatus;
  error?: string;
  chunkCount: number;
  createdAt: string;
}

export interface DocumentStatusReport {
  id: string;
  status: DocumentStatus;
  error?: string;
  chunkCount: number;
}
