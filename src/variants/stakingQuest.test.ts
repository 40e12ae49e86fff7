import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Domain } from '../chain/domain.js';
import type { QuestCompletionAuthority } from '../engine/completionAuthority.js';
import { ADMIN, ALICE, BOB, STRANGER, newQuest, setupLedger } from '../testing/fixtures.js';
import { AuthorizationError, StateError, TransferError, ValidationError } from '../utils/errorhandler.js';
import { StakingQuest } from './stakingQuest.js';

describe('StakingQuest', () => {
  let domain: Domain;
  let authority: QuestCompletionAuthority;
  let staking: StakingQuest;

  beforeEach(() => {
    ({ domain, authority } = setupLedger());
    staking = new StakingQuest(domain, authority, ADMIN);
    authority.grantModule(ADMIN, staking.address);
    authority.createQuest(ADMIN, newQuest({ quest_type: 'DeFi', xp_reward: 150 }));
    authority.registerUser(ALICE);
    staking.setThreshold(ADMIN, 1, 100n);
  });

  afterEach(() => {
    domain.close();
  });

  it('accumulates stake and completes once the threshold is reached', () => {
    expect(staking.stake(ALICE, 1, 40n)).toEqual({ staked: 40n, threshold: 100n, completion: null });
    expect(authority.hasCompleted(ALICE, 1)).toBe(false);

    const outcome = staking.stake(ALICE, 1, 60n);
    expect(outcome.staked).toBe(100n);
    expect(outcome.completion).toMatchObject({ quest_id: 1, user: ALICE, xp: 150, level: 2 });
    expect(staking.stakeOf(1, ALICE)).toBe(100n);
  });

  it('refuses further stake after completion', () => {
    staking.stake(ALICE, 1, 250n);
    expect(() => staking.stake(ALICE, 1, 1n)).toThrow(StateError);
    expect(staking.stakeOf(1, ALICE)).toBe(250n);
  });

  it('rejects non-positive amounts', () => {
    expect(() => staking.stake(ALICE, 1, 0n)).toThrow(TransferError);
    expect(() => staking.stake(ALICE, 1, -5n)).toThrow(TransferError);
  });

  it('requires a configured threshold', () => {
    authority.createQuest(ADMIN, newQuest());
    expect(() => staking.stake(ALICE, 2, 10n)).toThrow(StateError);
  });

  it('only lets the owner set positive thresholds', () => {
    expect(() => staking.setThreshold(STRANGER, 1, 10n)).toThrow(AuthorizationError);
    expect(() => staking.setThreshold(ADMIN, 1, 0n)).toThrow(ValidationError);
  });

  it('rolls the stake back when the ledger refuses the completion', () => {
    authority.revokeModule(ADMIN, staking.address);
    expect(() => staking.stake(ALICE, 1, 200n)).toThrow(AuthorizationError);
    expect(staking.stakeOf(1, ALICE)).toBe(0n);

    expect(() => staking.stake(BOB, 1, 20n)).not.toThrow();
    expect(() => staking.stake(BOB, 1, 200n)).toThrow(AuthorizationError);
    expect(staking.stakeOf(1, BOB)).toBe(20n);
  });

  it('rolls the stake back for users the ledger does not know', () => {
    expect(() => staking.stake(BOB, 1, 100n)).toThrow(StateError);
    expect(staking.stakeOf(1, BOB)).toBe(0n);
  });
});
