import type { Domain } from '../chain/domain.js';
import { CapabilityRegistry } from '../access/capabilityRegistry.js';
import { ledgerMetrics } from '../analytics/metrics.js';
import type {
  Address,
  CompletionResult,
  CompletionSource,
  NewQuest,
  Quest,
  QuestId,
  RelayForwarding,
  UserProgress,
} from '../models.js';
import { UserProgressLedger } from '../progress/userProgressLedger.js';
import { QuestRegistry } from '../quests/questRegistry.js';
import { toAddress, tryAddress } from '../utils/address.js';
import { AuthorizationError, StateError } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';

const log = logger.child('authority');

/** Outbound side of a relay, as seen by the ledger that forwards to it. */
export interface CompletionRelay {
  readonly address: Address;
  sendQuestCompletion(caller: Address, questId: QuestId, user: Address, attachedValue: bigint): unknown;
}

export interface AuthorityOptions {
  owner: Address;
  forwarding?: RelayForwarding;
}

/**
 * Gatekeeper for the NotCompleted -> Completed transition of every
 * (quest, user) pair on one domain.
 */
export class QuestCompletionAuthority {
  readonly address: Address;
  readonly owner: Address;
  readonly forwarding: RelayForwarding;
  readonly quests: QuestRegistry;
  readonly progress: UserProgressLedger;
  readonly capabilities: CapabilityRegistry;
  private readonly relays = new Map<Address, CompletionRelay>();

  constructor(
    private readonly domain: Domain,
    options: AuthorityOptions,
  ) {
    this.address = domain.allocateAddress();
    this.owner = toAddress(options.owner, 'owner');
    this.forwarding = options.forwarding ?? 'fan-out';
    this.quests = new QuestRegistry(domain, this.address);
    this.progress = new UserProgressLedger(domain, this.address);
    this.capabilities = new CapabilityRegistry(domain, this.address, this.owner);
  }

  get domainId() {
    return this.domain.id;
  }

  createQuest(creator: Address, input: NewQuest): Quest {
    return this.quests.createQuest(creator, input);
  }

  registerUser(identity: Address): UserProgress {
    return this.progress.registerUser(identity);
  }

  hasCompleted(identity: Address, questId: QuestId): boolean {
    return this.progress.hasCompleted(identity, questId);
  }

  setQuestActive(caller: Address, questId: QuestId, active: boolean): Quest {
    this.assertOwner(caller, 'setQuestActive');
    return this.quests.setActive(questId, active);
  }

  grantModule(caller: Address, module: Address): boolean {
    return this.capabilities.grant(caller, 'quest-module', module);
  }

  revokeModule(caller: Address, module: Address): boolean {
    return this.capabilities.revoke(caller, 'quest-module', module);
  }

  /** Lets `relay` deliver cross-domain updates and makes it a forwarding target. */
  attachRelay(caller: Address, relay: CompletionRelay) {
    this.domain.execute(() => {
      this.capabilities.grant(caller, 'relay', relay.address);
    });
    this.relays.set(relay.address, relay);
    if (this.forwarding === 'primary' && this.relays.size > 1) {
      log.warn('Additional relay attached under primary forwarding; it only receives updates', {
        relay: relay.address,
        primary: this.forwardingTargets()[0]?.address,
      });
    }
  }

  detachRelay(caller: Address, relay: Address) {
    const address = toAddress(relay, 'relay');
    this.domain.execute(() => {
      this.capabilities.revoke(caller, 'relay', address);
    });
    this.relays.delete(address);
  }

  forwardingTargets(): CompletionRelay[] {
    const attached = Array.from(this.relays.values());
    return this.forwarding === 'primary' ? attached.slice(0, 1) : attached;
  }

  completeQuest(caller: Address, questId: QuestId, user: Address, attachedValue: bigint = 0n): CompletionResult {
    const module = tryAddress(caller);
    if (!module || !this.capabilities.has('quest-module', module)) {
      log.warn('Rejected completion from unauthorized caller', { caller, questId });
      throw new AuthorizationError('caller is not an authorized quest module', caller, 'completeQuest');
    }
    const player = toAddress(user, 'user');

    const result = this.domain.execute(() => {
      const quest = this.quests.requireQuest(questId);
      if (!quest.active) {
        throw new StateError(`quest ${questId} is not active`, { questId });
      }
      if (!this.progress.isRegistered(player)) {
        throw new StateError('user is not registered', { user: player });
      }
      if (this.progress.hasCompleted(player, questId)) {
        throw new StateError(`quest ${questId} already completed`, { questId, user: player });
      }

      const credited = this.credit(quest, player, 'direct');
      for (const relay of this.forwardingTargets()) {
        relay.sendQuestCompletion(this.address, questId, player, attachedValue);
      }
      return credited;
    });

    this.domain.afterCommit(() => {
      ledgerMetrics.trackCompletion(this.domain.id, 'direct');
      log.info('Quest completed', { domain: this.domain.id, questId, user: player, module, xp: result.xp });
    });
    return result;
  }

  /**
   * Applies a completion that happened on the counterpart domain. Redelivery
   * of an already applied pair returns null and changes nothing.
   */
  updateCrossChainQuestStatus(caller: Address, questId: QuestId, user: Address): CompletionResult | null {
    const relay = tryAddress(caller);
    if (!relay || !this.capabilities.has('relay', relay)) {
      log.warn('Rejected cross-domain update from unauthorized caller', { caller, questId });
      throw new AuthorizationError('caller is not a configured relay', caller, 'updateCrossChainQuestStatus');
    }
    const player = toAddress(user, 'user');

    const result = this.domain.execute(() => {
      if (this.progress.hasCompleted(player, questId)) {
        return null;
      }
      const quest = this.quests.requireQuest(questId);
      this.progress.ensureRegistered(player);
      return this.credit(quest, player, 'cross-domain');
    });

    this.domain.afterCommit(() => {
      if (result === null) {
        ledgerMetrics.trackIgnoredRedelivery(this.domain.id);
        log.debug('Cross-domain update already applied', { domain: this.domain.id, questId, user: player });
      } else {
        ledgerMetrics.trackCompletion(this.domain.id, 'cross-domain');
        log.info('Cross-domain completion applied', { domain: this.domain.id, questId, user: player, xp: result.xp });
      }
    });
    return result;
  }

  private credit(quest: Quest, user: Address, source: CompletionSource): CompletionResult {
    const outcome = this.progress.applyCompletion(user, quest, source);
    const leveledUp = outcome.level > outcome.previousLevel;

    if (leveledUp) {
      this.domain.events.append(this.address, { kind: 'UserLevelUp', user, new_level: outcome.level });
    }
    this.domain.events.append(this.address, {
      kind: 'QuestCompleted',
      quest_id: quest.quest_id,
      user,
      xp_earned: quest.xp_reward,
    });

    return {
      quest_id: quest.quest_id,
      user,
      xp_earned: quest.xp_reward,
      xp: outcome.xp,
      level: outcome.level,
      leveled_up: leveledUp,
      source,
    };
  }

  private assertOwner(caller: Address, entryPoint: string) {
    if (tryAddress(caller) !== this.owner) {
      throw new AuthorizationError('only the owner can configure the ledger', caller, entryPoint);
    }
  }
}
