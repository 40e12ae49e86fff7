import type { CompletionSource, DomainId } from '../models.js';

export interface CompletionMetric {
  domain: DomainId;
  source: CompletionSource;
  timestamp: number;
}

export interface DeliveryMetric {
  packet_id: string;
  dst_domain: DomainId;
  ok: boolean;
  timestamp: number;
}

export interface LedgerReport {
  completions_by_domain: Record<string, { direct: number; cross_domain: number }>;
  ignored_redeliveries: Record<string, number>;
  messages_sent: number;
  deliveries_succeeded: number;
  deliveries_failed: number;
  failure_rate: number;
}

export class MetricsCollector {
  private completions: CompletionMetric[] = [];
  private deliveries: DeliveryMetric[] = [];
  private ignored: DomainId[] = [];
  private sent = 0;

  trackCompletion(domain: DomainId, source: CompletionSource): void {
    this.completions.push({ domain, source, timestamp: Date.now() });
  }

  trackIgnoredRedelivery(domain: DomainId): void {
    this.ignored.push(domain);
  }

  trackMessageSent(): void {
    this.sent += 1;
  }

  trackDelivery(packet_id: string, dst_domain: DomainId, ok: boolean): void {
    this.deliveries.push({ packet_id, dst_domain, ok, timestamp: Date.now() });
  }

  reset(): void {
    this.completions = [];
    this.deliveries = [];
    this.ignored = [];
    this.sent = 0;
  }

  generateReport(): LedgerReport {
    const completions_by_domain: LedgerReport['completions_by_domain'] = {};
    const ignored_redeliveries: Record<string, number> = {};

    for (const completion of this.completions) {
      const bucket = (completions_by_domain[completion.domain] ??= { direct: 0, cross_domain: 0 });
      if (completion.source === 'direct') {
        bucket.direct += 1;
      } else {
        bucket.cross_domain += 1;
      }
    }

    for (const domain of this.ignored) {
      ignored_redeliveries[domain] = (ignored_redeliveries[domain] ?? 0) + 1;
    }

    const deliveries_succeeded = this.deliveries.filter((delivery) => delivery.ok).length;
    const deliveries_failed = this.deliveries.length - deliveries_succeeded;

    return {
      completions_by_domain,
      ignored_redeliveries,
      messages_sent: this.sent,
      deliveries_succeeded,
      deliveries_failed,
      failure_rate: this.deliveries.length > 0 ? deliveries_failed / this.deliveries.length : 0,
    };
  }
}

export const ledgerMetrics = new MetricsCollector();
