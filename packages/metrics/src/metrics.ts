/**
 * @module metrics
 * @packageDocumentation
 *
 * Registers and updates Prometheus metrics for the document QA pipeline via [prom-client].
 *
 * The text dump returned by `metrics()` is meant to be served by the HTTP layer on /metrics.
 *
 * [prometheus]: https://prometheus.io/docs/introduction/overview/
 * [prom-client]: https://github.com/siimon/prom-client
 */

import client from 'prom-client';

export type IngestionOutcome = 'ready' | 'failed' | 'cancelled';
export type CallOutcome = 'success' | 'failure';

interface Instruments {
  documentsIngested: client.Counter<'status'>;
  ingestionDuration: client.Histogram<'status'>;
  providerCalls: client.Counter<'provider' | 'outcome'>;
  providerLatency: client.Histogram<'provider'>;
  qaRequests: client.Counter<'outcome'>;
  summaries: client.Counter<'strategy' | 'outcome'>;
}

/**
 * Singleton class managing Prometheus metrics.
 */
class Metrics {
  private instruments?: Instruments;

  public get contentType() {
    return client.register.contentType;
  }

  /**
   * Return the dump text of Prometheus metrics.
   *
   * @returns Plaintext Prometheus format.
   */
  public async metrics(): Promise<string> {
    this.register();
    return client.register.metrics();
  }

  private register(): Instruments {
    if (this.instruments) return this.instruments;

    this.instruments = {
      documentsIngested: new client.Counter({
        name: 'documents_ingested_total',
        help: 'Documents that finished the ingestion pipeline, by final status',
        labelNames: ['status'] as const,
      }),
      ingestionDuration: new client.Histogram({
        name: 'ingestion_duration_seconds',
        help: 'Time from upload acceptance to the final document status, in seconds',
        labelNames: ['status'] as const,
        buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120, 300],
      }),
      providerCalls: new client.Counter({
        name: 'llm_provider_calls_total',
        help: 'Generation provider attempts, by provider and outcome',
        labelNames: ['provider', 'outcome'] as const,
      }),
      providerLatency: new client.Histogram({
        name: 'llm_provider_latency_seconds',
        help: 'Latency of successful generation provider calls, in seconds',
        labelNames: ['provider'] as const,
        buckets: [0.5, 1, 2, 5, 10, 15, 30, 60, 120],
      }),
      qaRequests: new client.Counter({
        name: 'qa_requests_total',
        help: 'Question answering requests, by outcome',
        labelNames: ['outcome'] as const,
      }),
      summaries: new client.Counter({
        name: 'summaries_total',
        help: 'Summarization requests, by strategy and outcome',
        labelNames: ['strategy', 'outcome'] as const,
      }),
    };
    return this.instruments;
  }

  public documentIngested(status: IngestionOutcome, seconds: number): void {
    const { documentsIngested, ingestionDuration } = this.register();
    documentsIngested.labels({ status }).inc();
    ingestionDuration.labels({ status }).observe(seconds);
  }

  /**
   * Record one provider attempt of the generation fallback chain.
   *
   * @param provider - Provider name
   * @param outcome - Whether the attempt produced the returned text
   * @param seconds - Attempt duration, observed for successes only
   */
  public providerCall(provider: string, outcome: CallOutcome, seconds: number): void {
    const { providerCalls, providerLatency } = this.register();
    providerCalls.labels({ provider, outcome }).inc();
    if (outcome === 'success') {
      providerLatency.labels({ provider }).observe(seconds);
    }
  }

  public qaRequest(outcome: CallOutcome): void {
    this.register().qaRequests.labels({ outcome }).inc();
  }

  public summary(strategy: string, outcome: CallOutcome): void {
    this.register().summaries.labels({ strategy, outcome }).inc();
  }
}

const metrics = new Metrics();
export default metrics;
export { metrics };
