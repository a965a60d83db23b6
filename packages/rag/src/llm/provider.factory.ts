import { Injectable } from '@nestjs/common';
import axios from 'axios';
import type { BaseMessage, MessageContent } from '@langchain/core/messages';
import { ChatAnthropic } from '@langchain/anthropic';
import {
  ChatGoogleGenerativeAI,
  GoogleGenerativeAIEmbeddings,
} from '@langchain/google-genai';
import { ChatOllama, OllamaEmbeddings } from '@langchain/ollama';
import { ChatOpenAI, OpenAIEmbeddings } from '@langchain/openai';
import { ConfigurationError, type ProviderConfig } from '@docqa/core';
import { ConfigurationService } from '../../config/configuration.js';
import { LocalHashEmbeddings } from '../embeddings/local-hash.embeddings.js';

/**
 * The part of a LangChain chat model the gateway relies on.
 */
export interface GenerationModel {
  invoke(
    input: BaseMessage[],
    options?: { signal?: AbortSignal }
  ): Promise<{ content: MessageContent }>;
}

/**
 * The part of a LangChain `Embeddings` implementation the pipeline relies on.
 */
export interface EmbeddingModel {
  embedDocuments(texts: string[]): Promise<number[][]>;
  embedQuery(text: string): Promise<number[]>;
}

export interface HealthCheckResult {
  available: boolean;
  reason?: string;
}

export interface ProviderFactory {
  createGenerationModel(config: ProviderConfig): GenerationModel;
  createEmbeddingModel(config: ProviderConfig): EmbeddingModel;
  checkHealth(config: ProviderConfig): Promise<HealthCheckResult>;
}

export const PROVIDER_FACTORY = Symbol('PROVIDER_FACTORY');

const HEALTH_CHECK_TIMEOUT_MS = 5000;

/**
 * Builds LangChain models for the configured providers.
 */
@Injectable()
export class LangChainProviderFactory implements ProviderFactory {
  constructor(private readonly config: ConfigurationService) {}

  createGenerationModel(provider: ProviderConfig): GenerationModel {
    const { model, temperature } = provider;
    switch (provider.type) {
      case 'ollama':
        return new ChatOllama({
          model,
          baseUrl: this.baseUrlFor(provider),
          temperature,
          numPredict: provider.maxOutputTokens,
        });
      case 'openai':
        return new ChatOpenAI({
          model,
          apiKey: this.requireApiKey(provider),
          temperature,
          maxTokens: provider.maxOutputTokens,
          maxRetries: 0,
        });
      case 'anthropic':
        return new ChatAnthropic({
          model,
          apiKey: this.requireApiKey(provider),
          temperature,
          maxTokens: provider.maxOutputTokens,
          maxRetries: 0,
        });
      case 'gemini':
        return new ChatGoogleGenerativeAI({
          model,
          apiKey: this.requireApiKey(provider),
          temperature,
          maxOutputTokens: provider.maxOutputTokens,
          maxRetries: 0,
        });
      case 'local':
        throw new ConfigurationError(
          `Provider ${provider.name}: local providers cannot generate text`
        );
    }
  }

  createEmbeddingModel(provider: ProviderConfig): EmbeddingModel {
    const { model } = provider;
    switch (provider.type) {
      case 'local':
        return new LocalHashEmbeddings({ dimensions: provider.dimensions });
      case 'ollama':
        return new OllamaEmbeddings({ model, baseUrl: this.baseUrlFor(provider) });
      case 'openai':
        return new OpenAIEmbeddings({
          model,
          apiKey: this.requireApiKey(provider),
          dimensions: provider.dimensions,
        });
      case 'gemini':
        return new GoogleGenerativeAIEmbeddings({
          model,
          apiKey: this.requireApiKey(provider),
        });
      case 'anthropic':
        throw new ConfigurationError(
          `Provider ${provider.name}: anthropic has no embedding models`
        );
    }
  }

  async checkHealth(provider: ProviderConfig): Promise<HealthCheckResult> {
    switch (provider.type) {
      case 'local':
        return { available: true };
      case 'ollama':
        return this.pingOllama(this.baseUrlFor(provider));
      case 'openai':
      case 'anthropic':
      case 'gemini':
        return this.config.apiKeyFor(provider.type)
          ? { available: true }
          : { available: false, reason: `${provider.type.toUpperCase()}_API_KEY is not set` };
    }
  }

  private async pingOllama(baseUrl: string): Promise<HealthCheckResult> {
    try {
      await axios.get(`${baseUrl.replace(/\/+$/, '')}/api/tags`, {
        timeout: HEALTH_CHECK_TIMEOUT_MS,
      });
      return { available: true };
    } catch (error) {
      const reason = axios.isAxiosError(error)
        ? error.code ?? error.message
        : error instanceof Error
          ? error.message
          : String(error);
      return { available: false, reason: `Ollama unreachable at ${baseUrl}: ${reason}` };
    }
  }

  private baseUrlFor(provider: ProviderConfig): string {
    return provider.baseUrl ?? this.config.ollamaBaseUrl;
  }

  private requireApiKey(provider: ProviderConfig): string {
    const key = this.config.apiKeyFor(provider.type);
    if (!key) {
      throw new ConfigurationError(
        `Provider ${provider.name}: ${provider.type.toUpperCase()}_API_KEY is not set`
      );
    }
    return key;
  }
}
