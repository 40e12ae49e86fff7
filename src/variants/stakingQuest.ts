import type { Address, CompletionResult, QuestId } from '../models.js';
import { toAddress } from '../utils/address.js';
import { StateError, TransferError, ValidationError } from '../utils/errorhandler.js';
import { QuestModule } from './questModule.js';

export interface StakeOutcome {
  staked: bigint;
  threshold: bigint;
  completion: CompletionResult | null;
}

/** DeFi quests: completes once a user's accumulated stake reaches the threshold. */
export class StakingQuest extends QuestModule {
  setThreshold(caller: Address, questId: QuestId, threshold: bigint) {
    this.assertOwner(caller, 'setThreshold');
    if (threshold <= 0n) {
      throw new ValidationError('threshold must be positive', 'threshold', threshold.toString());
    }
    this.domain.execute(() => {
      this.domain.db
        .prepare<[string, number, string]>(
          `INSERT INTO stake_thresholds (module, quest_id, threshold) VALUES (?,?,?)
           ON CONFLICT(module, quest_id) DO UPDATE SET threshold=excluded.threshold`
        )
        .run(this.address, questId, threshold.toString());
    });
  }

  stakeOf(questId: QuestId, staker: Address): bigint {
    const row = this.domain.db
      .prepare<[string, number, string], { amount: string }>(
        'SELECT amount FROM stakes WHERE module=? AND quest_id=? AND staker=?'
      )
      .get(this.address, questId, toAddress(staker, 'staker'));
    return row ? BigInt(row.amount) : 0n;
  }

  stake(caller: Address, questId: QuestId, amount: bigint): StakeOutcome {
    const staker = toAddress(caller, 'caller');
    if (amount <= 0n) {
      throw new TransferError('stake amount must be positive', { amount: amount.toString() });
    }

    return this.domain.execute(() => {
      const threshold = this.thresholdFor(questId);
      if (this.authority.hasCompleted(staker, questId)) {
        throw new StateError(`quest ${questId} already completed`, { questId, user: staker });
      }

      const staked = this.stakeOf(questId, staker) + amount;
      this.domain.db
        .prepare<[string, number, string, string]>(
          `INSERT INTO stakes (module, quest_id, staker, amount) VALUES (?,?,?,?)
           ON CONFLICT(module, quest_id, staker) DO UPDATE SET amount=excluded.amount`
        )
        .run(this.address, questId, staker, staked.toString());

      const completion = staked >= threshold ? this.complete(questId, staker) : null;
      return { staked, threshold, completion };
    });
  }

  private thresholdFor(questId: QuestId): bigint {
    const row = this.domain.db
      .prepare<[string, number], { threshold: string }>(
        'SELECT threshold FROM stake_thresholds WHERE module=? AND quest_id=?'
      )
      .get(this.address, questId);
    if (!row) {
      throw new StateError(`no stake threshold configured for quest ${questId}`, { questId });
    }
    return BigInt(row.threshold);
  }
}
