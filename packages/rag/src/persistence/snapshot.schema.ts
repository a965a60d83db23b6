import { z } from 'zod';

export const SNAPSHOT_VERSION = 1;

const nonNegativeInt = z.number().int().min(0);

export const SnapshotChunkSchema = z
  .object({
    id: z.string().min(1),
    documentId: z.string().min(1),
    sequenceIndex: nonNegativeInt,
    text: z.string(),
    start: nonNegativeInt,
    end: nonNegativeInt,
    tokenEstimate: nonNegativeInt,
    vector: z.array(z.number().finite()).min(1),
  })
  .strict()
  .refine((chunk) => chunk.end >= chunk.start, {
    message: 'end must not be lower than start',
    path: ['end'],
  });

export const SnapshotDocumentSchema = z
  .object({
    id: z.string().min(1),
    filename: z.string().min(1),
    mimeType: z.string().min(1),
    size: nonNegativeInt,
    createdAt: z.string().datetime(),
    updatedAt: z.string().datetime(),
  })
  .strict();

export const SnapshotSchema = z
  .object({
    version: z.literal(SNAPSHOT_VERSION),
    embeddingConfigId: z.string().min(1),
    exportedAt: z.string().datetime(),
    documents: z.array(SnapshotDocumentSchema),
    chunks: z.array(SnapshotChunkSchema),
  })
  .strict();

export type RagSnapshot = z.infer<typeof SnapshotSchema>;
export type SnapshotChunk = z.infer<typeof SnapshotChunkSchema>;
