import type { Domain } from '../chain/domain.js';
import { ledgerMetrics } from '../analytics/metrics.js';
import type { CompletionRelay } from '../engine/completionAuthority.js';
import type { Address, CompletionResult, DomainId, OutboundPacket, QuestId } from '../models.js';
import type { MessageReceiver, TransportEndpoint } from '../transport/localEndpoint.js';
import { toAddress, tryAddress } from '../utils/address.js';
import { AuthorizationError, StateError, ValidationError } from '../utils/errorhandler.js';
import { logger, type Logger } from '../utils/logger.js';
import { decodeCompletion, encodeCompletion } from './codec.js';

/** Inbound side of the ledger, as seen by the relay that applies remote completions. */
export interface CrossDomainUpdateTarget {
  readonly address: Address;
  updateCrossChainQuestStatus(caller: Address, questId: QuestId, user: Address): CompletionResult | null;
}

export interface RelayConfig {
  ledger: CrossDomainUpdateTarget;
  transport: TransportEndpoint;
  counterpartDomainId: DomainId;
  counterpartRelay: Address;
}

export interface ReceiveOutcome {
  quest_id: QuestId;
  user: Address;
  applied: CompletionResult | null;
}

/**
 * Translates local completions into transport messages and inbound messages
 * into cross-domain updates. Both mirrored instances are this class; they
 * differ only in their configuration.
 */
export class CrossDomainRelay implements CompletionRelay, MessageReceiver {
  readonly address: Address;
  readonly owner: Address;
  private config: RelayConfig | null = null;
  private readonly log: Logger;

  constructor(
    private readonly domain: Domain,
    owner: Address,
    readonly label: string = domain.label,
  ) {
    this.address = domain.allocateAddress();
    this.owner = toAddress(owner, 'owner');
    this.log = logger.child(`relay:${label}`);
  }

  get configured(): boolean {
    return this.config !== null;
  }

  get counterpartDomainId(): DomainId | undefined {
    return this.config?.counterpartDomainId;
  }

  configure(caller: Address, config: RelayConfig) {
    if (tryAddress(caller) !== this.owner) {
      throw new AuthorizationError('only the owner can configure the relay', caller, 'configure');
    }
    if (this.config) {
      throw new StateError('relay is already configured', { relay: this.address });
    }
    if (!Number.isSafeInteger(config.counterpartDomainId) || config.counterpartDomainId <= 0) {
      throw new ValidationError('counterpart domain id must be a positive integer', 'counterpartDomainId', config.counterpartDomainId);
    }
    if (config.counterpartDomainId === this.domain.id) {
      throw new ValidationError('counterpart domain must differ from the local domain', 'counterpartDomainId', config.counterpartDomainId);
    }

    this.config = { ...config, counterpartRelay: toAddress(config.counterpartRelay, 'counterpartRelay') };
    this.log.info('Relay configured', {
      domain: this.domain.id,
      counterpartDomainId: config.counterpartDomainId,
      counterpartRelay: this.config.counterpartRelay,
    });
  }

  sendQuestCompletion(caller: Address, questId: QuestId, user: Address, attachedValue: bigint = 0n): OutboundPacket {
    const config = this.requireConfig();
    if (tryAddress(caller) !== config.ledger.address) {
      throw new AuthorizationError('only the local ledger can send completions', caller, 'sendQuestCompletion');
    }
    const payload = encodeCompletion({ quest_id: questId, user });
    const player = toAddress(user, 'user');

    const packet = this.domain.execute(() => {
      const sent = config.transport.send(this.address, config.counterpartDomainId, config.counterpartRelay, payload, attachedValue);
      this.domain.events.append(this.address, {
        kind: 'MessageSent',
        quest_id: questId,
        user: player,
        target_domain_id: config.counterpartDomainId,
      });
      return sent;
    });

    this.domain.afterCommit(() => {
      ledgerMetrics.trackMessageSent();
      this.log.debug('Completion message sent', { questId, user: player, packet: packet.packet_id });
    });
    return packet;
  }

  receiveMessage(caller: Address, srcAddress: Address, srcDomainId: DomainId, payload: string): ReceiveOutcome {
    const config = this.requireConfig();
    if (tryAddress(caller) !== config.transport.address) {
      throw new AuthorizationError('only the transport can deliver messages', caller, 'receiveMessage');
    }
    if (srcDomainId !== config.counterpartDomainId) {
      throw new ValidationError(
        `message from domain ${srcDomainId}, expected ${config.counterpartDomainId}`,
        'srcDomainId',
        srcDomainId
      );
    }
    if (tryAddress(srcAddress) !== config.counterpartRelay) {
      throw new ValidationError('message does not come from the counterpart relay', 'srcAddress', srcAddress);
    }
    const message = decodeCompletion(payload);

    const outcome = this.domain.execute(() => {
      const applied = config.ledger.updateCrossChainQuestStatus(this.address, message.quest_id, message.user);
      this.domain.events.append(this.address, {
        kind: 'MessageReceived',
        quest_id: message.quest_id,
        user: message.user,
        source_domain_id: srcDomainId,
      });
      return { quest_id: message.quest_id, user: message.user, applied };
    });

    this.domain.afterCommit(() => {
      this.log.debug('Completion message received', {
        questId: message.quest_id,
        user: message.user,
        applied: outcome.applied !== null,
      });
    });
    return outcome;
  }

  private requireConfig(): RelayConfig {
    if (!this.config) {
      throw new StateError('relay is not configured', { relay: this.address });
    }
    return this.config;
  }
}
