import { nanoid } from 'nanoid';
import type { Domain } from '../chain/domain.js';
import type { Address, DomainId, OutboundPacket } from '../models.js';
import { toAddress } from '../utils/address.js';
import { StateError, ValidationError } from '../utils/errorhandler.js';

/** Send side of the external message transport on one domain. */
export interface TransportEndpoint {
  readonly address: Address;
  send(sender: Address, dstDomainId: DomainId, receiver: Address, payload: string, attachedValue: bigint): OutboundPacket;
}

/** Anything the transport can hand an inbound message to. */
export interface MessageReceiver {
  readonly address: Address;
  receiveMessage(caller: Address, srcAddress: Address, srcDomainId: DomainId, payload: string): unknown;
}

interface OutboxRow {
  packet_id: string;
  nonce: number;
  src_domain: number;
  sender: string;
  dst_domain: number;
  receiver: string;
  payload: string;
  value: string;
  sent_at: number;
}

function toPacket(row: OutboxRow): OutboundPacket {
  return { ...row, value: BigInt(row.value) };
}

/**
 * In-process stand-in for a transport endpoint. Outbound packets are written
 * to the domain's outbox inside the sender's transaction, so they only
 * become visible to the executor once the sending call commits.
 */
export class LocalTransportEndpoint implements TransportEndpoint {
  readonly address: Address;
  private readonly receivers = new Map<Address, MessageReceiver>();

  constructor(private readonly domain: Domain) {
    this.address = domain.allocateAddress();
  }

  get domainId(): DomainId {
    return this.domain.id;
  }

  bindReceiver(receiver: MessageReceiver) {
    this.receivers.set(receiver.address, receiver);
  }

  send(sender: Address, dstDomainId: DomainId, receiver: Address, payload: string, attachedValue: bigint): OutboundPacket {
    const from = toAddress(sender, 'sender');
    const to = toAddress(receiver, 'receiver');
    if (!Number.isSafeInteger(dstDomainId) || dstDomainId <= 0) {
      throw new ValidationError('destination domain id must be a positive integer', 'dstDomainId', dstDomainId);
    }
    if (dstDomainId === this.domain.id) {
      throw new ValidationError('destination domain must differ from the source domain', 'dstDomainId', dstDomainId);
    }
    if (attachedValue < 0n) {
      throw new ValidationError('attached value cannot be negative', 'attachedValue', attachedValue.toString());
    }

    return this.domain.execute(() => {
      const packet: OutboundPacket = {
        packet_id: nanoid(),
        nonce: this.nextNonce(from, dstDomainId),
        src_domain: this.domain.id,
        sender: from,
        dst_domain: dstDomainId,
        receiver: to,
        payload,
        value: attachedValue,
        sent_at: Date.now(),
      };

      this.domain.db
        .prepare<[string, string, number, number, string, number, string, string, string, number]>(
          `INSERT INTO outbox (packet_id, endpoint, nonce, src_domain, sender, dst_domain, receiver, payload, value, sent_at)
           VALUES (?,?,?,?,?,?,?,?,?,?)`
        )
        .run(
          packet.packet_id,
          this.address,
          packet.nonce,
          packet.src_domain,
          packet.sender,
          packet.dst_domain,
          packet.receiver,
          packet.payload,
          packet.value.toString(),
          packet.sent_at
        );
      return packet;
    });
  }

  /** Committed outbound packets in send order. */
  outbound(): OutboundPacket[] {
    return this.domain.db
      .prepare<[string], OutboxRow>(
        `SELECT packet_id, nonce, src_domain, sender, dst_domain, receiver, payload, value, sent_at
         FROM outbox WHERE endpoint=? ORDER BY rowid ASC`
      )
      .all(this.address)
      .map(toPacket);
  }

  /** Inbound side: hands a packet from another domain to its receiver here. */
  deliver(packet: OutboundPacket): unknown {
    if (packet.dst_domain !== this.domain.id) {
      throw new ValidationError(`packet is addressed to domain ${packet.dst_domain}`, 'dst_domain', packet.dst_domain);
    }
    const receiver = this.receivers.get(packet.receiver);
    if (!receiver) {
      throw new StateError(`no receiver bound at ${packet.receiver}`, { packet: packet.packet_id });
    }
    return receiver.receiveMessage(this.address, packet.sender, packet.src_domain, packet.payload);
  }

  private nextNonce(sender: Address, dstDomainId: DomainId): number {
    const row = this.domain.db
      .prepare<[string, string, number], { last: number | null }>(
        'SELECT MAX(nonce) AS last FROM outbox WHERE endpoint=? AND sender=? AND dst_domain=?'
      )
      .get(this.address, sender, dstDomainId);
    return (row?.last ?? 0) + 1;
  }
}
