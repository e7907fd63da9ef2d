/**
 * Prometheus request metrics, one registry per process.
 */
import { Counter, Gauge, Histogram, Registry } from 'prom-client';

type RequestLabel = 'method' | 'route' | 'status';

const REQUEST_LABELS: readonly RequestLabel[] = ['method', 'route', 'status'];

/** Route label for requests the router could not match */
export const UNMATCHED_ROUTE = 'unmatched';

export class HttpMetrics {
  readonly registry = new Registry();
  private readonly requests: Counter<RequestLabel>;
  private readonly duration: Histogram<RequestLabel>;

  constructor(version: string) {
    this.requests = new Counter({
      name: 'http_requests_total',
      help: 'HTTP requests handled, by route and status',
      labelNames: REQUEST_LABELS,
      registers: [this.registry],
    });
    this.duration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'HTTP request latency in seconds',
      labelNames: REQUEST_LABELS,
      buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
      registers: [this.registry],
    });

    new Gauge({
      name: 'app_info',
      help: 'Application version',
      labelNames: ['version'],
      registers: [this.registry],
    }).set({ version }, 1);
  }

  observe(method: string, route: string, status: number, seconds: number): void {
    const labels = { method, route, status: String(status) };
    this.requests.inc(labels);
    this.duration.observe(labels, seconds);
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  /** Exposition-format text of every metric */
  render(): Promise<string> {
    return this.registry.metrics();
  }
}
