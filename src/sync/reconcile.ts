import equal from 'fast-deep-equal';
import type { QuestCompletionAuthority } from '../engine/completionAuthority.js';
import type { Address, DomainId, QuestId } from '../models.js';

export interface ProgressSnapshot {
  xp: number;
  level: number;
  completed_quests: QuestId[];
}

export interface LedgerSnapshot {
  domain_id: DomainId;
  users: Record<Address, ProgressSnapshot>;
}

export interface Divergence {
  user: Address;
  left: ProgressSnapshot | null;
  right: ProgressSnapshot | null;
}

export interface ConvergenceReport {
  converged: boolean;
  divergent: Divergence[];
}

// User ids are assigned per domain and are not compared.
export function snapshotLedger(authority: QuestCompletionAuthority): LedgerSnapshot {
  const users: Record<Address, ProgressSnapshot> = {};
  for (const progress of authority.progress.listUsers()) {
    users[progress.owner] = {
      xp: progress.xp,
      level: progress.level,
      completed_quests: [...progress.completed_quests].sort((a, b) => a - b),
    };
  }
  return { domain_id: authority.domainId, users };
}

const EMPTY: ProgressSnapshot = { xp: 0, level: 1, completed_quests: [] };

/**
 * Compares two mirrored ledgers user by user. A user missing on one side
 * counts as converged only while it has no progress on the other.
 */
export function compareLedgers(left: LedgerSnapshot, right: LedgerSnapshot): ConvergenceReport {
  const owners = new Set([...Object.keys(left.users), ...Object.keys(right.users)]);
  const divergent: Divergence[] = [];

  for (const user of Array.from(owners).sort()) {
    const a = left.users[user] ?? null;
    const b = right.users[user] ?? null;
    if (!equal(a ?? EMPTY, b ?? EMPTY)) {
      divergent.push({ user, left: a, right: b });
    }
  }

  return { converged: divergent.length === 0, divergent };
}
