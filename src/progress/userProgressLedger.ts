import type { Domain } from '../chain/domain.js';
import type { Address, CompletionSource, Quest, QuestId, UserId, UserProgress } from '../models.js';
import { toAddress } from '../utils/address.js';
import { StateError } from '../utils/errorhandler.js';
import { levelForXp } from './levels.js';

interface UserRow {
  user_id: number;
  owner: string;
  xp: number;
  level: number;
}

export interface CreditOutcome {
  xp: number;
  previousLevel: number;
  level: number;
}

export class UserProgressLedger {
  constructor(
    private readonly domain: Domain,
    readonly ledger: Address,
  ) {}

  registerUser(identity: Address): UserProgress {
    const owner = toAddress(identity, 'identity');
    return this.domain.execute(() => {
      if (this.findUser(owner)) {
        throw new StateError('user is already registered', { user: owner });
      }
      return this.insertUser(owner);
    });
  }

  isRegistered(identity: Address): boolean {
    return this.findUser(toAddress(identity, 'identity')) !== undefined;
  }

  getProgress(identity: Address): UserProgress | undefined {
    const row = this.findUser(toAddress(identity, 'identity'));
    return row ? this.toProgress(row) : undefined;
  }

  listUsers(): UserProgress[] {
    return this.domain.db
      .prepare<[string], UserRow>('SELECT user_id, owner, xp, level FROM users WHERE ledger=? ORDER BY user_id ASC')
      .all(this.ledger)
      .map((row) => this.toProgress(row));
  }

  hasCompleted(identity: Address, questId: QuestId): boolean {
    const row = this.domain.db
      .prepare<[string, string, number], { quest_id: number }>(
        'SELECT quest_id FROM completions WHERE ledger=? AND owner=? AND quest_id=?'
      )
      .get(this.ledger, toAddress(identity, 'identity'), questId);
    return row !== undefined;
  }

  /** Creates a record for an identity seen first through a cross-domain update. */
  ensureRegistered(identity: Address): UserProgress {
    const owner = toAddress(identity, 'identity');
    return this.domain.execute(() => {
      const row = this.findUser(owner);
      return row ? this.toProgress(row) : this.insertUser(owner);
    });
  }

  /**
   * Credits a quest once. Callers check `hasCompleted` first; a second credit
   * for the same pair violates the completions primary key and aborts.
   */
  applyCompletion(identity: Address, quest: Quest, source: CompletionSource): CreditOutcome {
    const owner = toAddress(identity, 'identity');
    return this.domain.execute(() => {
      const row = this.findUser(owner);
      if (!row) {
        throw new StateError('user is not registered', { user: owner });
      }

      const xp = row.xp + quest.xp_reward;
      if (!Number.isSafeInteger(xp)) {
        throw new StateError('xp total would exceed the representable range', {
          user: owner,
          questId: quest.quest_id,
          xp: row.xp,
          xpReward: quest.xp_reward,
        });
      }
      const level = Math.max(row.level, levelForXp(xp));

      this.domain.db
        .prepare<[string, string, number, string, number]>(
          'INSERT INTO completions (ledger, owner, quest_id, source, completed_at) VALUES (?,?,?,?,?)'
        )
        .run(this.ledger, owner, quest.quest_id, source, Date.now());
      this.domain.db
        .prepare<[number, number, string, string]>('UPDATE users SET xp=?, level=? WHERE ledger=? AND owner=?')
        .run(xp, level, this.ledger, owner);

      return { xp, previousLevel: row.level, level };
    });
  }

  private findUser(owner: Address): UserRow | undefined {
    return this.domain.db
      .prepare<[string, string], UserRow>('SELECT user_id, owner, xp, level FROM users WHERE ledger=? AND owner=?')
      .get(this.ledger, owner);
  }

  private insertUser(owner: Address): UserProgress {
    const userId = this.nextUserId();
    this.domain.db
      .prepare<[string, number, string, number]>(
        'INSERT INTO users (ledger, user_id, owner, xp, level, registered_at) VALUES (?,?,?,0,1,?)'
      )
      .run(this.ledger, userId, owner, Date.now());
    return { user_id: userId, owner, xp: 0, level: 1, completed_quests: [] };
  }

  private completedQuests(owner: Address): QuestId[] {
    return this.domain.db
      .prepare<[string, string], { quest_id: number }>(
        'SELECT quest_id FROM completions WHERE ledger=? AND owner=? ORDER BY rowid ASC'
      )
      .all(this.ledger, owner)
      .map((row) => row.quest_id);
  }

  private nextUserId(): UserId {
    const row = this.domain.db
      .prepare<[string], { last: number | null }>('SELECT MAX(user_id) AS last FROM users WHERE ledger=?')
      .get(this.ledger);
    return (row?.last ?? 0) + 1;
  }

  private toProgress(row: UserRow): UserProgress {
    return {
      user_id: row.user_id,
      owner: row.owner,
      xp: row.xp,
      level: row.level,
      completed_quests: this.completedQuests(row.owner),
    };
  }
}
