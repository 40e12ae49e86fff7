import type { Domain } from '../chain/domain.js';
import type { Address, CompletionResult, QuestId } from '../models.js';
import { toAddress, tryAddress } from '../utils/address.js';
import { AuthorizationError } from '../utils/errorhandler.js';

/** What a quest-variant module needs from the completion authority. */
export interface CompletionEntry {
  completeQuest(caller: Address, questId: QuestId, user: Address, attachedValue?: bigint): CompletionResult;
  hasCompleted(identity: Address, questId: QuestId): boolean;
}

/**
 * Base for modules that check their own unlock condition and then call
 * `completeQuest` once. The module's address must hold the `quest-module`
 * capability on the authority.
 */
export abstract class QuestModule {
  readonly address: Address;
  readonly owner: Address;

  constructor(
    protected readonly domain: Domain,
    protected readonly authority: CompletionEntry,
    owner: Address,
  ) {
    this.address = domain.allocateAddress();
    this.owner = toAddress(owner, 'owner');
  }

  protected complete(questId: QuestId, user: Address): CompletionResult {
    return this.authority.completeQuest(this.address, questId, user);
  }

  protected assertOwner(caller: Address, entryPoint: string) {
    if (tryAddress(caller) !== this.owner) {
      throw new AuthorizationError('only the module owner can do this', caller, entryPoint);
    }
  }
}
