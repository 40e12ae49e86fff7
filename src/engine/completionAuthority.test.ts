import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Domain } from '../chain/domain.js';
import type { Address, QuestId } from '../models.js';
import { ADMIN, ALICE, BOB, MODULE, STRANGER, newQuest, setupLedger } from '../testing/fixtures.js';
import { AuthorizationError, StateError } from '../utils/errorhandler.js';
import type { CompletionRelay, QuestCompletionAuthority } from './completionAuthority.js';

const RELAY_A = '0x6000000000000000000000000000000000000006';
const RELAY_B = '0x7000000000000000000000000000000000000007';

function stubRelay(address: Address) {
  const sendQuestCompletion = vi.fn((_caller: Address, _questId: QuestId, _user: Address, _value: bigint) => undefined);
  const relay: CompletionRelay = { address, sendQuestCompletion };
  return { relay, sendQuestCompletion };
}

describe('QuestCompletionAuthority', () => {
  let domain: Domain;
  let authority: QuestCompletionAuthority;

  beforeEach(() => {
    ({ domain, authority } = setupLedger());
    authority.createQuest(ADMIN, newQuest({ xp_reward: 250 }));
    authority.registerUser(ALICE);
  });

  afterEach(() => {
    domain.close();
  });

  describe('completeQuest', () => {
    it('credits xp, levels up and emits level-up before completion', () => {
      const result = authority.completeQuest(MODULE, 1, ALICE);

      expect(result).toEqual({
        quest_id: 1,
        user: ALICE,
        xp_earned: 250,
        xp: 250,
        level: 3,
        leveled_up: true,
        source: 'direct',
      });
      expect(authority.progress.getProgress(ALICE)).toMatchObject({ xp: 250, level: 3, completed_quests: [1] });

      const events = domain.events.list({ afterSeq: 1 });
      expect(events.map((event) => event.kind)).toEqual(['UserLevelUp', 'QuestCompleted']);
      expect(events[0]).toMatchObject({ user: ALICE, new_level: 3, emitter: authority.address });
      expect(events[1]).toMatchObject({ quest_id: 1, user: ALICE, xp_earned: 250 });
    });

    it('emits no level-up when the level stays the same', () => {
      authority.createQuest(ADMIN, newQuest({ xp_reward: 50 }));
      const result = authority.completeQuest(MODULE, 2, ALICE);

      expect(result.leveled_up).toBe(false);
      expect(result.level).toBe(1);
      expect(domain.events.count('UserLevelUp')).toBe(0);
      expect(domain.events.count('QuestCompleted')).toBe(1);
    });

    it('rejects callers that are not quest modules and changes nothing', () => {
      for (const caller of [STRANGER, ALICE, ADMIN, 'not-an-address']) {
        expect(() => authority.completeQuest(caller, 1, ALICE)).toThrow(AuthorizationError);
      }
      expect(authority.progress.getProgress(ALICE)).toMatchObject({ xp: 0, level: 1, completed_quests: [] });
      expect(domain.events.count()).toBe(1);
    });

    it('stops accepting a module once it is revoked', () => {
      authority.revokeModule(ADMIN, MODULE);
      expect(() => authority.completeQuest(MODULE, 1, ALICE)).toThrow(AuthorizationError);
    });

    it('accepts a module granted later', () => {
      authority.grantModule(ADMIN, BOB);
      expect(authority.completeQuest(BOB, 1, ALICE).xp).toBe(250);
    });

    it('rejects a duplicate completion without crediting twice', () => {
      authority.completeQuest(MODULE, 1, ALICE);
      expect(() => authority.completeQuest(MODULE, 1, ALICE)).toThrow(StateError);
      expect(authority.progress.getProgress(ALICE)?.xp).toBe(250);
      expect(domain.events.count('QuestCompleted')).toBe(1);
    });

    it('rejects inactive, unknown quests and unregistered users', () => {
      authority.setQuestActive(ADMIN, 1, false);
      expect(() => authority.completeQuest(MODULE, 1, ALICE)).toThrow(StateError);
      expect(() => authority.completeQuest(MODULE, 99, ALICE)).toThrow(StateError);

      authority.setQuestActive(ADMIN, 1, true);
      expect(() => authority.completeQuest(MODULE, 1, BOB)).toThrow(StateError);
      expect(authority.completeQuest(MODULE, 1, ALICE).xp).toBe(250);
    });

    it('only lets the owner toggle quests', () => {
      expect(() => authority.setQuestActive(STRANGER, 1, false)).toThrow(AuthorizationError);
      expect(authority.quests.getQuest(1)?.active).toBe(true);
    });
  });

  describe('relay forwarding', () => {
    it('forwards the completion and the attached value', () => {
      const { relay, sendQuestCompletion } = stubRelay(RELAY_A);
      authority.attachRelay(ADMIN, relay);

      authority.completeQuest(MODULE, 1, ALICE, 7n);

      expect(sendQuestCompletion).toHaveBeenCalledTimes(1);
      expect(sendQuestCompletion).toHaveBeenCalledWith(authority.address, 1, ALICE, 7n);
    });

    it('rolls the whole completion back when forwarding fails', () => {
      const failing: CompletionRelay = {
        address: RELAY_A,
        sendQuestCompletion: () => {
          throw new Error('transport unavailable');
        },
      };
      authority.attachRelay(ADMIN, failing);

      expect(() => authority.completeQuest(MODULE, 1, ALICE)).toThrow('transport unavailable');
      expect(authority.hasCompleted(ALICE, 1)).toBe(false);
      expect(authority.progress.getProgress(ALICE)).toMatchObject({ xp: 0, level: 1 });
      expect(domain.events.count()).toBe(1);

      authority.detachRelay(ADMIN, RELAY_A);
      expect(authority.completeQuest(MODULE, 1, ALICE).xp).toBe(250);
    });

    it('fans out to every attached relay by default', () => {
      const first = stubRelay(RELAY_A);
      const second = stubRelay(RELAY_B);
      authority.attachRelay(ADMIN, first.relay);
      authority.attachRelay(ADMIN, second.relay);

      authority.completeQuest(MODULE, 1, ALICE);

      expect(first.sendQuestCompletion).toHaveBeenCalledTimes(1);
      expect(second.sendQuestCompletion).toHaveBeenCalledTimes(1);
    });

    it('only uses the first relay under the primary policy', () => {
      domain.close();
      ({ domain, authority } = setupLedger(1, 'primary'));
      authority.createQuest(ADMIN, newQuest());
      authority.registerUser(ALICE);

      const first = stubRelay(RELAY_A);
      const second = stubRelay(RELAY_B);
      authority.attachRelay(ADMIN, first.relay);
      authority.attachRelay(ADMIN, second.relay);

      authority.completeQuest(MODULE, 1, ALICE);

      expect(authority.forwardingTargets().map((relay) => relay.address)).toEqual([RELAY_A]);
      expect(first.sendQuestCompletion).toHaveBeenCalledTimes(1);
      expect(second.sendQuestCompletion).not.toHaveBeenCalled();
      expect(authority.capabilities.has('relay', RELAY_B)).toBe(true);
    });

    it('only lets the owner attach relays', () => {
      const { relay } = stubRelay(RELAY_A);
      expect(() => authority.attachRelay(STRANGER, relay)).toThrow(AuthorizationError);
      expect(authority.forwardingTargets()).toEqual([]);
    });
  });

  describe('updateCrossChainQuestStatus', () => {
    let forwarded: ReturnType<typeof stubRelay>;

    beforeEach(() => {
      forwarded = stubRelay(RELAY_A);
      authority.attachRelay(ADMIN, forwarded.relay);
    });

    it('applies a remote completion without forwarding it again', () => {
      const result = authority.updateCrossChainQuestStatus(RELAY_A, 1, ALICE);

      expect(result).toMatchObject({ quest_id: 1, user: ALICE, xp: 250, level: 3, source: 'cross-domain' });
      expect(forwarded.sendQuestCompletion).not.toHaveBeenCalled();
      expect(domain.events.list({ afterSeq: 1 }).map((event) => event.kind)).toEqual(['UserLevelUp', 'QuestCompleted']);
    });

    it('ignores a redelivered completion', () => {
      authority.updateCrossChainQuestStatus(RELAY_A, 1, ALICE);
      const eventsBefore = domain.events.count();

      expect(authority.updateCrossChainQuestStatus(RELAY_A, 1, ALICE)).toBeNull();
      expect(authority.progress.getProgress(ALICE)?.xp).toBe(250);
      expect(domain.events.count()).toBe(eventsBefore);
      expect(domain.events.count('QuestCompleted')).toBe(1);
    });

    it('ignores a remote completion of a pair completed here', () => {
      authority.completeQuest(MODULE, 1, ALICE);
      expect(authority.updateCrossChainQuestStatus(RELAY_A, 1, ALICE)).toBeNull();
      expect(authority.progress.getProgress(ALICE)?.xp).toBe(250);
    });

    it('blocks a later direct completion of a remotely completed pair', () => {
      authority.updateCrossChainQuestStatus(RELAY_A, 1, ALICE);
      expect(() => authority.completeQuest(MODULE, 1, ALICE)).toThrow(StateError);
      expect(authority.progress.getProgress(ALICE)?.xp).toBe(250);
    });

    it('registers users it has not seen yet', () => {
      authority.updateCrossChainQuestStatus(RELAY_A, 1, BOB);
      expect(authority.progress.getProgress(BOB)).toMatchObject({ user_id: 2, xp: 250, completed_quests: [1] });
    });

    it('applies updates to inactive quests', () => {
      authority.setQuestActive(ADMIN, 1, false);
      expect(authority.updateCrossChainQuestStatus(RELAY_A, 1, ALICE)?.xp).toBe(250);
    });

    it('fails on a quest unknown to this ledger', () => {
      expect(() => authority.updateCrossChainQuestStatus(RELAY_A, 5, BOB)).toThrow(StateError);
      expect(authority.progress.isRegistered(BOB)).toBe(false);
    });

    it('rejects callers that are not relays', () => {
      expect(() => authority.updateCrossChainQuestStatus(MODULE, 1, ALICE)).toThrow(AuthorizationError);
      expect(() => authority.updateCrossChainQuestStatus(STRANGER, 1, ALICE)).toThrow(AuthorizationError);
      expect(authority.hasCompleted(ALICE, 1)).toBe(false);
    });

    it('stops accepting a detached relay', () => {
      authority.detachRelay(ADMIN, RELAY_A);
      expect(() => authority.updateCrossChainQuestStatus(RELAY_A, 1, ALICE)).toThrow(AuthorizationError);
    });
  });

  it('credits each pair at most once across mixed direct and remote calls', () => {
    authority.attachRelay(ADMIN, stubRelay(RELAY_A).relay);
    const attempts: Array<() => unknown> = [
      () => authority.updateCrossChainQuestStatus(RELAY_A, 1, ALICE),
      () => authority.completeQuest(MODULE, 1, ALICE),
      () => authority.updateCrossChainQuestStatus(RELAY_A, 1, ALICE),
      () => authority.completeQuest(MODULE, 1, ALICE),
    ];
    for (const attempt of attempts) {
      try {
        attempt();
      } catch (error) {
        expect(error).toBeInstanceOf(StateError);
      }
    }
    expect(authority.progress.getProgress(ALICE)?.xp).toBe(250);
    expect(domain.events.count('QuestCompleted')).toBe(1);
  });
});
