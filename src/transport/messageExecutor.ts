import { ledgerMetrics } from '../analytics/metrics.js';
import type { DomainId, OutboundPacket } from '../models.js';
import { formatErrorForLogging } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';
import type { LocalTransportEndpoint } from './localEndpoint.js';

const log = logger.child('executor');

export type DeliveryOrder = 'fifo' | 'lifo';

export interface DeliveryReport {
  packet_id: string;
  src_domain: DomainId;
  dst_domain: DomainId;
  status: 'delivered' | 'failed';
  attempt: number;
  error?: string;
}

/**
 * Stand-in for the off-domain delivery network. It picks up committed
 * outbound packets and hands them to the destination endpoint. Nothing about
 * ordering or uniqueness is promised: callers choose the order, and any
 * packet can be delivered again.
 */
export class MessageExecutor {
  private readonly endpoints = new Map<DomainId, LocalTransportEndpoint>();
  private readonly delivered = new Set<string>();
  private readonly attempts = new Map<string, number>();

  register(endpoint: LocalTransportEndpoint) {
    this.endpoints.set(endpoint.domainId, endpoint);
  }

  /** Committed packets that have not been delivered successfully yet. */
  pending(): OutboundPacket[] {
    return this.allPackets().filter((packet) => !this.delivered.has(packet.packet_id));
  }

  isDelivered(packetId: string): boolean {
    return this.delivered.has(packetId);
  }

  attemptsFor(packetId: string): number {
    return this.attempts.get(packetId) ?? 0;
  }

  /** Delivers one packet, whether or not it was delivered before. */
  deliver(packetId: string): DeliveryReport {
    const packet = this.allPackets().find((candidate) => candidate.packet_id === packetId);
    if (!packet) {
      throw new Error(`unknown packet ${packetId}`);
    }
    return this.attempt(packet);
  }

  deliverAll(order: DeliveryOrder = 'fifo'): DeliveryReport[] {
    const batch = this.pending();
    if (order === 'lifo') batch.reverse();
    return batch.map((packet) => this.attempt(packet));
  }

  private attempt(packet: OutboundPacket): DeliveryReport {
    const attempt = this.attemptsFor(packet.packet_id) + 1;
    this.attempts.set(packet.packet_id, attempt);
    const base = {
      packet_id: packet.packet_id,
      src_domain: packet.src_domain,
      dst_domain: packet.dst_domain,
      attempt,
    };

    const destination = this.endpoints.get(packet.dst_domain);
    if (!destination) {
      log.warn('No endpoint registered for destination domain', base);
      ledgerMetrics.trackDelivery(packet.packet_id, packet.dst_domain, false);
      return { ...base, status: 'failed', error: `no endpoint for domain ${packet.dst_domain}` };
    }

    try {
      destination.deliver(packet);
    } catch (error) {
      // The packet stays pending; the destination rolled the call back.
      log.warn('Delivery failed', formatErrorForLogging(error, base));
      ledgerMetrics.trackDelivery(packet.packet_id, packet.dst_domain, false);
      return { ...base, status: 'failed', error: error instanceof Error ? error.message : String(error) };
    }

    this.delivered.add(packet.packet_id);
    ledgerMetrics.trackDelivery(packet.packet_id, packet.dst_domain, true);
    log.debug('Packet delivered', base);
    return { ...base, status: 'delivered' };
  }

  private allPackets(): OutboundPacket[] {
    return Array.from(this.endpoints.values()).flatMap((endpoint) => endpoint.outbound());
  }
}
