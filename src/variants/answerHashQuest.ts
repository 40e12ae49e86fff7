import { isHexString, keccak256, toUtf8Bytes } from 'ethers';
import type { Address, CompletionResult, QuestId } from '../models.js';
import { toAddress } from '../utils/address.js';
import { StateError, ValidationError } from '../utils/errorhandler.js';
import { QuestModule } from './questModule.js';

export function hashAnswer(answer: string): string {
  return keccak256(toUtf8Bytes(answer));
}

/** Educational quests: the user proves they know the answer whose hash is stored. */
export class AnswerHashQuest extends QuestModule {
  setAnswerHash(caller: Address, questId: QuestId, answerHash: string) {
    this.assertOwner(caller, 'setAnswerHash');
    if (!isHexString(answerHash, 32)) {
      throw new ValidationError('answer hash must be 32 bytes of hex', 'answerHash', answerHash);
    }
    this.domain.execute(() => {
      this.domain.db
        .prepare<[string, number, string]>(
          `INSERT INTO quest_answers (module, quest_id, answer_hash) VALUES (?,?,?)
           ON CONFLICT(module, quest_id) DO UPDATE SET answer_hash=excluded.answer_hash`
        )
        .run(this.address, questId, answerHash.toLowerCase());
    });
  }

  submitAnswer(caller: Address, questId: QuestId, answer: string): CompletionResult {
    const user = toAddress(caller, 'caller');
    return this.domain.execute(() => {
      const row = this.domain.db
        .prepare<[string, number], { answer_hash: string }>(
          'SELECT answer_hash FROM quest_answers WHERE module=? AND quest_id=?'
        )
        .get(this.address, questId);
      if (!row) {
        throw new StateError(`no answer configured for quest ${questId}`, { questId });
      }
      if (hashAnswer(answer) !== row.answer_hash) {
        throw new ValidationError('incorrect answer', 'answer');
      }
      return this.complete(questId, user);
    });
  }
}
