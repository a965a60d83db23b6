import { Injectable } from '@nestjs/common';
import { HumanMessage, SystemMessage, type BaseMessage } from '@langchain/core/messages';
import {
  AllProvidersExhaustedError,
  CancelledError,
  logger,
  type ProviderFailure,
} from '@docqa/core';
import { metrics } from '@docqa/metrics';
import { ConfigurationService } from '../../config/configuration.js';
import { describeAbort, linkedAbort, raceWithAbort, throwIfAborted } from '../utils/abort.js';
import {
  MalformedResponseError,
  classifyFailure,
  contentToText,
  failureOf,
} from './failures.js';
import { ProviderRegistryService } from './provider-registry.service.js';

export interface GenerateOptions {
  /** Provider names to try, in order. Defaults to every generation provider by priority. */
  providers?: readonly string[];
  system?: string;
  signal?: AbortSignal;
}

export interface GenerationResult {
  text: string;
  provider: string;
  /** Attempts that failed before `provider` answered. */
  failures: ProviderFailure[];
}

/**
 * Sends prompts through an ordered chain of generation providers and returns the first
 * usable answer.
 */
@Injectable()
export class LlmGatewayService {
  constructor(
    private readonly registry: ProviderRegistryService,
    private readonly config: ConfigurationService
  ) {}

  async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerationResult> {
    const { signal } = options;
    const { timeoutMs, maxTotalMs } = this.config.rag.llm;
    const order =
      options.providers && options.providers.length > 0
        ? [...options.providers]
        : this.registry.generationProviders().map((p) => p.name);

    const messages: BaseMessage[] = options.system
      ? [new SystemMessage(options.system), new HumanMessage(prompt)]
      : [new HumanMessage(prompt)];

    const failures: ProviderFailure[] = [];
    const deadline = Date.now() + maxTotalMs;

    for (const name of order) {
      throwIfAborted(signal);

      const provider = this.registry.get(name);
      if (!provider || provider.kind !== 'generation') {
        failures.push(
          failureOf(name, 'not_configured', `No generation provider named ${name}`)
        );
        continue;
      }
      if (!this.registry.isAvailable(name)) {
        const reason = this.registry.availabilityOf(name)?.reason ?? 'marked unavailable';
        failures.push(failureOf(name, 'unavailable', reason));
        continue;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        failures.push(
          failureOf(name, 'timeout', `Generation budget of ${maxTotalMs}ms exhausted`)
        );
        continue;
      }

      const attemptMs = Math.min(timeoutMs, remaining);
      const attempt = linkedAbort(signal, attemptMs, `${name} timed out`);
      const started = Date.now();
      try {
        const model = this.registry.generationModel(name);
        const response = await raceWithAbort(
          model.invoke(messages, { signal: attempt.signal }),
          attempt.signal
        );
        const text = contentToText(response.content);
        if (text === '') {
          throw new MalformedResponseError(`${name} returned no text`);
        }

        metrics.providerCall(name, 'success', (Date.now() - started) / 1000);
        this.registry.markAvailable(name);
        if (failures.length > 0) {
          logger.info(`Generation served by ${name} after ${failures.length} failed attempt(s)`);
        }
        return { text, provider: name, failures };
      } catch (error) {
        if (signal?.aborted) {
          throw new CancelledError(describeAbort(signal));
        }

        const durationMs = Date.now() - started;
        const kind = classifyFailure(error, attempt.signal.aborted);
        const message =
          kind === 'timeout' && attempt.signal.aborted
            ? `No answer within ${attemptMs}ms`
            : error instanceof Error
              ? error.message
              : String(error);
        failures.push(failureOf(name, kind, message, durationMs));
        metrics.providerCall(name, 'failure', durationMs / 1000);
        logger.warn(`Provider ${name} failed (${kind}): ${message}`);

        if (kind === 'authentication') {
          this.registry.markUnavailable(name, message);
        } else if (kind === 'unavailable') {
          this.registry.markUnavailable(name, message, this.config.rag.llm.retryAfterMs);
        }
      } finally {
        attempt.dispose();
      }
    }

    throw new AllProvidersExhaustedError(failures);
  }
}
