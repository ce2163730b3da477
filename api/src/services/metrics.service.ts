/**
 * Prometheus Metrics Service
 *
 * Metrics:
 * - dispatch_attempts_total{result}: send-once calls by result
 * - dispatch_outcomes_total{status}: terminal outcomes (delivered, exhausted)
 * - dispatch_retries_total{reason}: retries by relay error code
 * - dispatch_backoff_seconds_total: cumulative backoff slept
 * - dispatch_duration_seconds{status}: time from first attempt to outcome
 * - dispatch_queue_size: background dispatches queued or running
 * - http_requests_total{status_code,method,route}
 * - http_request_duration_seconds{method,route,status_code}
 * - recipients_recorded_total{result}: store inserts by result
 */

import { Registry, Counter, Histogram, Gauge } from 'prom-client';

export class MetricsService {
  private registry: Registry;

  // Counters
  public attemptsTotal: Counter<'result'>;
  public outcomesTotal: Counter<'status'>;
  public retriesTotal: Counter<'reason'>;
  public backoffSecondsTotal: Counter;
  public apiRequestsTotal: Counter<'status_code' | 'method' | 'route'>;
  public recipientsRecordedTotal: Counter<'result'>;

  // Histograms
  public dispatchDuration: Histogram<'status'>;
  public apiDuration: Histogram<'method' | 'route' | 'status_code'>;

  // Gauges
  public queueSize: Gauge;

  constructor() {
    this.registry = new Registry();

    this.registry.setDefaultLabels({
      app: 'relay-mailer-api',
    });

    this.attemptsTotal = new Counter({
      name: 'dispatch_attempts_total',
      help: 'Total number of relay send attempts by result',
      labelNames: ['result'] as const,
      registers: [this.registry],
    });

    this.outcomesTotal = new Counter({
      name: 'dispatch_outcomes_total',
      help: 'Total number of terminal dispatch outcomes by status',
      labelNames: ['status'] as const,
      registers: [this.registry],
    });

    this.retriesTotal = new Counter({
      name: 'dispatch_retries_total',
      help: 'Total number of retry attempts',
      labelNames: ['reason'] as const,
      registers: [this.registry],
    });

    this.backoffSecondsTotal = new Counter({
      name: 'dispatch_backoff_seconds_total',
      help: 'Cumulative backoff slept between relay attempts',
      registers: [this.registry],
    });

    this.apiRequestsTotal = new Counter({
      name: 'http_requests_total',
      help: 'Total number of API requests by status code',
      labelNames: ['status_code', 'method', 'route'] as const,
      registers: [this.registry],
    });

    this.recipientsRecordedTotal = new Counter({
      name: 'recipients_recorded_total',
      help: 'Recipient store inserts by result (new, seen, error)',
      labelNames: ['result'] as const,
      registers: [this.registry],
    });

    this.dispatchDuration = new Histogram({
      name: 'dispatch_duration_seconds',
      help: 'Time from first relay attempt to terminal outcome',
      labelNames: ['status'] as const,
      buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60], // seconds
      registers: [this.registry],
    });

    this.apiDuration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'API request duration in seconds',
      labelNames: ['method', 'route', 'status_code'] as const,
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10], // seconds
      registers: [this.registry],
    });

    this.queueSize = new Gauge({
      name: 'dispatch_queue_size',
      help: 'Background dispatches queued or running',
      registers: [this.registry],
    });
  }

  recordAttempt(result: 'success' | 'failure') {
    this.attemptsTotal.inc({ result });
  }

  recordRetry(reason: string, backoffMs: number) {
    this.retriesTotal.inc({ reason });
    this.backoffSecondsTotal.inc(backoffMs / 1000);
  }

  recordOutcome(status: 'delivered' | 'exhausted', durationSeconds: number) {
    this.outcomesTotal.inc({ status });
    this.dispatchDuration.observe({ status }, durationSeconds);
  }

  recordRecipient(result: 'new' | 'seen' | 'error') {
    this.recipientsRecordedTotal.inc({ result });
  }

  recordApiRequest(method: string, route: string, statusCode: number, durationSeconds: number) {
    const labels = { method, route, status_code: String(statusCode) };
    this.apiRequestsTotal.inc(labels);
    this.apiDuration.observe(labels, durationSeconds);
  }

  setQueueSize(size: number) {
    this.queueSize.set(size);
  }

  /**
   * Gets metrics in Prometheus text format
   */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  /**
   * Reads the current value of a labelled counter
   */
  async getCounterValue(counter: Counter<string>, labels: Record<string, string> = {}): Promise<number> {
    const data = await counter.get();
    const match = data.values.find((entry) =>
      Object.entries(labels).every(([key, value]) => entry.labels[key] === value)
    );
    return match?.value ?? 0;
  }
}
