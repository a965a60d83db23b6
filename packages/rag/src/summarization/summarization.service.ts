import { Injectable } from '@nestjs/common';
import {
  InvalidArgumentError,
  logger,
  type SummaryResult,
  type SummaryStrategy,
} from '@docqa/core';
import { metrics } from '@docqa/metrics';
import { ConfigurationService } from '../../config/configuration.js';
import { ChunkingService } from '../chunking/chunking.service.js';
import { LlmGatewayService, type GenerationResult } from '../llm/llm-gateway.service.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { countWords, truncateToSentence } from '../utils/text.js';
import {
  mapPrompt,
  reducePrompt,
  singlePassPrompt,
  summarySystemPrompt,
} from './summarization.prompts.js';

export interface SummarizeOptions {
  providers?: readonly string[];
  signal?: AbortSignal;
}

const MIN_PART_WORDS = 50;
const PART_SEPARATOR = '\n\n';

@Injectable()
export class SummarizationService {
  constructor(
    private readonly chunker: ChunkingService,
    private readonly gateway: LlmGatewayService,
    private readonly config: ConfigurationService
  ) {}

  /**
   * Summarize `text` in about `maxLength` words. Long texts are summarized part by part
   * first (map), then the part summaries are merged (reduce).
   * @throws InvalidArgumentError, AllProvidersExhaustedError, CancelledError
   */
  async summarize(
    text: string,
    maxLength: number,
    options: SummarizeOptions = {}
  ): Promise<SummaryResult> {
    if (!Number.isInteger(maxLength) || maxLength < 1) {
      throw new InvalidArgumentError(`maxLength must be a positive integer, got ${maxLength}`);
    }
    const source = text.trim();
    if (source === '') {
      throw new InvalidArgumentError('Text to summarize must not be empty');
    }

    const strategy: SummaryStrategy =
      source.length > this.config.rag.summary.singlePassChars ? 'map-reduce' : 'single-pass';

    try {
      const { generation, partCount } =
        strategy === 'single-pass'
          ? { generation: await this.singlePass(source, maxLength, options), partCount: 1 }
          : await this.mapReduce(source, maxLength, options);

      const summary = truncateToSentence(generation.text, maxLength);
      metrics.summary(strategy, 'success');
      return {
        summary,
        providerUsed: generation.provider,
        originalLength: countWords(source),
        summaryLength: countWords(summary),
        strategy,
        partCount,
      };
    } catch (error) {
      metrics.summary(strategy, 'failure');
      throw error;
    }
  }

  private async singlePass(
    text: string,
    maxWords: number,
    options: SummarizeOptions
  ): Promise<GenerationResult> {
    const prompt = await singlePassPrompt.format({ text, maxWords: String(maxWords) });
    return this.generate(prompt, options);
  }

  /**
   * Map rounds run until the joined part summaries fit a single pass or the round limit
   * is hit; one reduce call then merges them.
   */
  private async mapReduce(
    text: string,
    maxWords: number,
    options: SummarizeOptions
  ): Promise<{ generation: GenerationResult; partCount: number }> {
    const { singlePassChars, maxRounds } = this.config.rag.summary;
    let current = text;
    let partCount = 0;

    for (let round = 1; round <= maxRounds && current.length > singlePassChars; round++) {
      const parts = this.chunker.chunk(current, {
        maxChunkChars: singlePassChars,
        overlapChars: 0,
      });
      if (round === 1) {
        partCount = parts.length;
      }
      const partWords = Math.max(MIN_PART_WORDS, Math.ceil((2 * maxWords) / parts.length));
      logger.debug(`Map round ${round}: ${parts.length} parts of at most ${partWords} words`);

      const partials = await mapWithConcurrency(
        parts,
        this.config.rag.batchConcurrency,
        async (part) => {
          const prompt = await mapPrompt.format({
            text: part.text,
            part: String(part.index + 1),
            parts: String(parts.length),
            maxWords: String(partWords),
          });
          return this.generate(prompt, options);
        }
      );
      current = partials.map((p) => p.text).join(PART_SEPARATOR);
    }

    if (current.length > singlePassChars) {
      logger.warn(
        `Part summaries still hold ${current.length} characters after ${maxRounds} rounds`
      );
    }

    const prompt = await reducePrompt.format({
      summaries: current,
      maxWords: String(maxWords),
    });
    return { generation: await this.generate(prompt, options), partCount };
  }

  private generate(prompt: string, options: SummarizeOptions): Promise<GenerationResult> {
    return this.gateway.generate(prompt, {
      providers: options.providers,
      system: summarySystemPrompt,
      signal: options.signal,
    });
  }
}
