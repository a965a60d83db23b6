import { Injectable } from '@nestjs/common';
import {
  DimensionMismatchError,
  InvalidArgumentError,
  logger,
  type Answer,
  type Chunk,
  type Citation,
  type DocumentRecord,
  type SearchHit,
} from '@docqa/core';
import { metrics } from '@docqa/metrics';
import { ConfigurationService } from '../../config/configuration.js';
import { DocumentStoreService } from '../documents/document-store.service.js';
import { EmbeddingsService } from '../embeddings/embeddings.service.js';
import { LlmGatewayService } from '../llm/llm-gateway.service.js';
import { VectorStoreService } from '../vector-store/vector-store.service.js';
import { cutAtWord } from '../utils/text.js';
import {
  NO_CONTEXT_MARKER,
  formatContextHeader,
  qaPrompt,
  qaSystemPrompt,
} from './qa.prompts.js';

export interface AnswerOptions {
  k?: number;
  providers?: readonly string[];
  signal?: AbortSignal;
}

interface ContextSelection {
  context: string;
  cited: { hit: SearchHit; chunk: Chunk; filename: string }[];
}

const BLOCK_SEPARATOR = '\n\n';

@Injectable()
export class QaService {
  constructor(
    private readonly documents: DocumentStoreService,
    private readonly vectorStore: VectorStoreService,
    private readonly embeddings: EmbeddingsService,
    private readonly gateway: LlmGatewayService,
    private readonly config: ConfigurationService
  ) {}

  /**
   * Answer a question from the chunks of the given documents.
   * Only documents in `ready` status contribute context.
   * @throws InvalidArgumentError, NotFoundError, DimensionMismatchError,
   * AllProvidersExhaustedError, CancelledError
   */
  async answer(
    question: string,
    documentIds: readonly string[],
    options: AnswerOptions = {}
  ): Promise<Answer> {
    try {
      const answer = await this.run(question, documentIds, options);
      metrics.qaRequest('success');
      return answer;
    } catch (error) {
      metrics.qaRequest('failure');
      throw error;
    }
  }

  private async run(
    question: string,
    documentIds: readonly string[],
    options: AnswerOptions
  ): Promise<Answer> {
    const trimmed = question.trim();
    if (trimmed === '') {
      throw new InvalidArgumentError('Question must not be empty');
    }
    if (documentIds.length === 0) {
      throw new InvalidArgumentError('At least one document id is required');
    }
    const k = options.k ?? this.config.rag.qa.topK;
    if (!Number.isInteger(k) || k < 1) {
      throw new InvalidArgumentError(`k must be a positive integer, got ${k}`);
    }

    const ids = [...new Set(documentIds)];
    const records = ids.map((id) => this.documents.get(id));
    const ready = records.filter((doc) => doc.status === 'ready');
    this.assertSameEmbeddingConfig(ready);

    let hits: SearchHit[] = [];
    if (ready.length > 0) {
      const queryVector = await this.embeddings.embed(trimmed, options.signal);
      hits = this.vectorStore.search(queryVector, {
        k,
        documentIds: ready.map((doc) => doc.id),
      });
    } else {
      logger.info(`No ready document among ${ids.join(', ')}; answering without context`);
    }

    const { minScore } = this.config.rag.qa;
    const relevant = hits.filter((hit) => hit.score >= minScore);
    const filenames = new Map(records.map((doc) => [doc.id, doc.filename]));
    const { context, cited } = this.selectContext(relevant, filenames);
    const noContext = cited.length === 0;

    const prompt = await qaPrompt.format({
      context: noContext ? NO_CONTEXT_MARKER : context,
      question: trimmed,
    });
    const generation = await this.gateway.generate(prompt, {
      providers: options.providers,
      system: qaSystemPrompt,
      signal: options.signal,
    });

    const citations: Citation[] = cited.map(({ hit, chunk, filename }) => ({
      chunkId: chunk.id,
      documentId: hit.documentId,
      filename,
      sequenceIndex: chunk.sequenceIndex,
      score: hit.score,
    }));

    return {
      question: trimmed,
      documentIds: ids,
      retrievedChunkIds: hits.map((hit) => hit.chunkId),
      citedChunkIds: citations.map((c) => c.chunkId),
      citations,
      answer: generation.text,
      providerUsed: generation.provider,
      noContext,
      confidence: this.confidence(citations),
      timestamp: new Date().toISOString(),
    };
  }

  private assertSameEmbeddingConfig(ready: readonly DocumentRecord[]): void {
    const active = this.embeddings.configId;
    const mismatched = ready.filter((doc) => doc.embeddingConfigId !== active);
    if (mismatched.length > 0) {
      throw new DimensionMismatchError(
        `Documents ${mismatched.map((d) => d.id).join(', ')} were embedded with ` +
          `${mismatched.map((d) => d.embeddingConfigId ?? 'unknown').join(', ')}, ` +
          `active embedding configuration is ${active}`,
        { active, documentIds: mismatched.map((d) => d.id) }
      );
    }
  }

  /**
   * Fill the context budget with chunks in descending score order. The first chunk that
   * does not fit is cut at a word boundary when enough room is left; the rest are dropped.
   */
  private selectContext(
    hits: readonly SearchHit[],
    filenames: ReadonlyMap<string, string>
  ): ContextSelection {
    const { maxContextChars, minPartialChars } = this.config.rag.qa;
    const blocks: string[] = [];
    const cited: ContextSelection['cited'] = [];
    let used = 0;

    for (const hit of hits) {
      const chunk = this.documents.getChunk(hit.chunkId);
      const filename = filenames.get(hit.documentId) ?? hit.documentId;
      const header = formatContextHeader(cited.length + 1, filename, chunk.sequenceIndex);
      const separator = blocks.length > 0 ? BLOCK_SEPARATOR.length : 0;
      const room = maxContextChars - used - separator - header.length;

      if (chunk.text.length <= room) {
        blocks.push(header + chunk.text);
        cited.push({ hit, chunk, filename });
        used += separator + header.length + chunk.text.length;
        continue;
      }

      if (room >= minPartialChars && room > 0) {
        const partial = cutAtWord(chunk.text, room);
        if (partial !== '') {
          blocks.push(header + partial);
          cited.push({ hit, chunk, filename });
        }
      }
      break;
    }

    return { context: blocks.join(BLOCK_SEPARATOR), cited };
  }

  private confidence(citations: readonly Citation[]): number {
    if (citations.length === 0) {
      return 0;
    }
    const mean = citations.reduce((sum, c) => sum + c.score, 0) / citations.length;
    return Math.round(mean * 1000) / 1000;
  }
}
