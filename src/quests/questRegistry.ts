import type { Domain } from '../chain/domain.js';
import { QUEST_TYPES, type Address, type NewQuest, type Quest, type QuestId, type QuestType } from '../models.js';
import { toAddress } from '../utils/address.js';
import { StateError, ValidationError } from '../utils/errorhandler.js';

interface QuestRow {
  quest_id: number;
  name: string;
  description: string;
  xp_reward: number;
  active: number;
  creator: string;
  quest_type: string;
  created_at: number;
}

function toQuestType(value: string): QuestType {
  const type = QUEST_TYPES.find((candidate) => candidate === value);
  if (!type) {
    throw new ValidationError(`quest type must be one of ${QUEST_TYPES.join(', ')}`, 'quest_type', value);
  }
  return type;
}

function toQuest(row: QuestRow): Quest {
  return {
    quest_id: row.quest_id,
    name: row.name,
    description: row.description,
    xp_reward: row.xp_reward,
    active: row.active === 1,
    creator: row.creator,
    quest_type: toQuestType(row.quest_type),
    created_at: row.created_at,
  };
}

const QUEST_COLUMNS = 'quest_id, name, description, xp_reward, active, creator, quest_type, created_at';

export class QuestRegistry {
  constructor(
    private readonly domain: Domain,
    readonly ledger: Address,
  ) {}

  createQuest(creator: Address, input: NewQuest): Quest {
    const author = toAddress(creator, 'creator');
    const name = typeof input.name === 'string' ? input.name.trim() : '';
    if (!name) {
      throw new ValidationError('quest name is required', 'name', input.name);
    }
    if (!Number.isSafeInteger(input.xp_reward) || input.xp_reward < 0) {
      throw new ValidationError('xp reward must be a non-negative integer', 'xp_reward', input.xp_reward);
    }
    const questType = toQuestType(input.quest_type);

    return this.domain.execute(() => {
      const questId = this.nextQuestId();
      const createdAt = Date.now();
      this.domain.db
        .prepare<[string, number, string, string, number, string, string, number]>(
          `INSERT INTO quests (ledger, quest_id, name, description, xp_reward, active, creator, quest_type, created_at)
           VALUES (?,?,?,?,?,1,?,?,?)`
        )
        .run(this.ledger, questId, name, input.description ?? '', input.xp_reward, author, questType, createdAt);

      this.domain.events.append(this.ledger, { kind: 'QuestCreated', quest_id: questId, name, creator: author });

      return {
        quest_id: questId,
        name,
        description: input.description ?? '',
        xp_reward: input.xp_reward,
        active: true,
        creator: author,
        quest_type: questType,
        created_at: createdAt,
      };
    });
  }

  getQuest(questId: QuestId): Quest | undefined {
    const row = this.domain.db
      .prepare<[string, number], QuestRow>(`SELECT ${QUEST_COLUMNS} FROM quests WHERE ledger=? AND quest_id=?`)
      .get(this.ledger, questId);
    return row ? toQuest(row) : undefined;
  }

  requireQuest(questId: QuestId): Quest {
    const quest = this.getQuest(questId);
    if (!quest) {
      throw new StateError(`quest ${questId} does not exist`, { questId });
    }
    return quest;
  }

  listQuests(): Quest[] {
    return this.domain.db
      .prepare<[string], QuestRow>(`SELECT ${QUEST_COLUMNS} FROM quests WHERE ledger=? ORDER BY quest_id ASC`)
      .all(this.ledger)
      .map(toQuest);
  }

  setActive(questId: QuestId, active: boolean): Quest {
    return this.domain.execute(() => {
      this.requireQuest(questId);
      this.domain.db
        .prepare<[number, string, number]>('UPDATE quests SET active=? WHERE ledger=? AND quest_id=?')
        .run(active ? 1 : 0, this.ledger, questId);
      return this.requireQuest(questId);
    });
  }

  private nextQuestId(): QuestId {
    const row = this.domain.db
      .prepare<[string], { last: number | null }>('SELECT MAX(quest_id) AS last FROM quests WHERE ledger=?')
      .get(this.ledger);
    return (row?.last ?? 0) + 1;
  }
}
