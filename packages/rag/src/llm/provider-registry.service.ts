import {
  Inject,
  Injectable,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import {
  DEFAULT_EMBEDDING_PROVIDER,
  logger,
  type ProviderAvailability,
  type ProviderConfig,
  type ProviderDescriptor,
} from '@docqa/core';
import { ConfigurationService } from '../../config/configuration.js';
import {
  PROVIDER_FACTORY,
  type EmbeddingModel,
  type GenerationModel,
  type HealthCheckResult,
  type ProviderFactory,
} from './provider.factory.js';

const isUsable = (availability: ProviderAvailability): boolean =>
  availability.available ||
  (availability.retryAt !== undefined && Date.parse(availability.retryAt) <= Date.now());

/**
 * Holds the configured providers and their latest availability snapshot.
 *
 * Descriptors never change after startup. Availability is kept in an immutable map that
 * is replaced as a whole, so readers always see one consistent snapshot.
 */
@Injectable()
export class ProviderRegistryService implements OnModuleInit, OnModuleDestroy {
  private readonly providers: ReadonlyMap<string, ProviderConfig>;
  private availability: ReadonlyMap<string, ProviderAvailability>;
  /** Sequence number of the last change published for each provider. */
  private readonly lastChange = new Map<string, number>();
  private changes = 0;
  private readonly generationModels = new Map<string, GenerationModel>();
  private embeddingModelInstance?: EmbeddingModel;
  private refreshing?: Promise<ProviderDescriptor[]>;
  private timer?: NodeJS.Timeout;

  constructor(
    private readonly config: ConfigurationService,
    @Inject(PROVIDER_FACTORY) private readonly factory: ProviderFactory
  ) {
    const configured = config.providers;
    const withEmbedding = configured.some((p) => p.kind === 'embedding')
      ? configured
      : [DEFAULT_EMBEDDING_PROVIDER, ...configured];

    this.providers = new Map(withEmbedding.map((p) => [p.name, p]));
    const now = new Date().toISOString();
    this.availability = new Map(
      withEmbedding.map((p) => [
        p.name,
        { available: true, checkedAt: now, reason: 'not checked yet' },
      ])
    );
  }

  async onModuleInit(): Promise<void> {
    await this.refreshAvailability();

    const interval = this.config.rag.healthCheckIntervalMs;
    if (interval > 0) {
      this.timer = setInterval(() => {
        this.refreshAvailability().catch((error) => {
          logger.error('Periodic provider health check failed:', error);
        });
      }, interval);
      this.timer.unref();
    }
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  get(name: string): ProviderConfig | undefined {
    return this.providers.get(name);
  }

  /**
   * Generation providers in configured priority order.
   */
  generationProviders(): ProviderConfig[] {
    return [...this.providers.values()]
      .filter((p) => p.kind === 'generation')
      .sort((a, b) => a.priority - b.priority);
  }

  /**
   * The embedding provider with the lowest priority value. It stays fixed for the process.
   */
  embeddingProvider(): ProviderConfig {
    const [first] = [...this.providers.values()]
      .filter((p) => p.kind === 'embedding')
      .sort((a, b) => a.priority - b.priority);
    return first ?? DEFAULT_EMBEDDING_PROVIDER;
  }

  /**
   * True when the provider is up, or when its unavailable mark has passed its retry time.
   */
  isAvailable(name: string): boolean {
    const availability = this.availability.get(name);
    return availability ? isUsable(availability) : false;
  }

  availabilityOf(name: string): ProviderAvailability | undefined {
    return this.availability.get(name);
  }

  describe(): ProviderDescriptor[] {
    const snapshot = this.availability;
    return [...this.providers.values()]
      .sort((a, b) => a.priority - b.priority)
      .map((p) => this.toDescriptor(p, snapshot));
  }

  listAvailable(): ProviderDescriptor[] {
    return this.describe().filter((p) => p.available);
  }

  /**
   * Re-run every health check and publish a new snapshot.
   * Concurrent callers share the run in progress.
   */
  refreshAvailability(): Promise<ProviderDescriptor[]> {
    if (!this.refreshing) {
      this.refreshing = this.runHealthChecks().finally(() => {
        this.refreshing = undefined;
      });
    }
    return this.refreshing;
  }

  markAvailable(name: string): void {
    if (this.availability.get(name)?.available === true) {
      return;
    }
    this.publish(name, { available: true, checkedAt: new Date().toISOString() });
  }

  /**
   * @param retryAfterMs - Let callers try the provider again after this delay. Without it the
   * mark holds until the next health check or successful call.
   */
  markUnavailable(name: string, reason: string, retryAfterMs?: number): void {
    const now = Date.now();
    logger.warn(
      retryAfterMs === undefined
        ? `Provider ${name} marked unavailable: ${reason}`
        : `Provider ${name} marked unavailable for ${retryAfterMs}ms: ${reason}`
    );
    this.publish(name, {
      available: false,
      checkedAt: new Date(now).toISOString(),
      reason,
      ...(retryAfterMs !== undefined
        ? { retryAt: new Date(now + retryAfterMs).toISOString() }
        : {}),
    });
  }

  /**
   * Chat model for a generation provider, created on first use.
   */
  generationModel(name: string): GenerationModel {
    const cached = this.generationModels.get(name);
    if (cached) {
      return cached;
    }
    const provider = this.providers.get(name);
    if (!provider) {
      throw new Error(`Unknown provider ${name}`);
    }
    const model = this.factory.createGenerationModel(provider);
    this.generationModels.set(name, model);
    return model;
  }

  embeddingModel(): EmbeddingModel {
    if (!this.embeddingModelInstance) {
      this.embeddingModelInstance = this.factory.createEmbeddingModel(
        this.embeddingProvider()
      );
    }
    return this.embeddingModelInstance;
  }

  private async runHealthChecks(): Promise<ProviderDescriptor[]> {
    const startedAt = this.changes;
    const providers = [...this.providers.values()];
    const results = await Promise.all(
      providers.map(async (p): Promise<[string, ProviderAvailability]> => {
        const result = await this.safeCheck(p);
        return [
          p.name,
          {
            available: result.available,
            checkedAt: new Date().toISOString(),
            ...(result.reason ? { reason: result.reason } : {}),
          },
        ];
      })
    );

    // Marks published while the checks ran are newer than their results.
    const next = new Map(this.availability);
    for (const [name, availability] of results) {
      if ((this.lastChange.get(name) ?? 0) <= startedAt) {
        next.set(name, availability);
      }
    }
    this.availability = next;
    const unavailable = results.filter(([, a]) => !a.available).map(([name]) => name);
    if (unavailable.length > 0) {
      logger.warn(`Unavailable providers: ${unavailable.join(', ')}`);
    }
    logger.debug(`Provider health check done for ${results.length} providers`);
    return this.describe();
  }

  private async safeCheck(provider: ProviderConfig): Promise<HealthCheckResult> {
    try {
      return await this.factory.checkHealth(provider);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { available: false, reason: `Health check failed: ${message}` };
    }
  }

  private publish(name: string, availability: ProviderAvailability): void {
    if (!this.providers.has(name)) {
      return;
    }
    const next = new Map(this.availability);
    next.set(name, availability);
    this.availability = next;
    this.lastChange.set(name, ++this.changes);
  }

  private toDescriptor(
    provider: ProviderConfig,
    snapshot: ReadonlyMap<string, ProviderAvailability>
  ): ProviderDescriptor {
    const availability = snapshot.get(provider.name) ?? {
      available: false,
      checkedAt: new Date(0).toISOString(),
      reason: 'never checked',
    };
    return {
      name: provider.name,
      kind: provider.kind,
      type: provider.type,
      model: provider.model,
      priority: provider.priority,
      ...availability,
      available: isUsable(availability),
    };
  }
}
