import { Domain } from '../chain/domain.js';
import { QuestCompletionAuthority } from '../engine/completionAuthority.js';
import type { NewQuest, RelayForwarding } from '../models.js';

export const ADMIN = '0x1000000000000000000000000000000000000001';
export const ALICE = '0x2000000000000000000000000000000000000002';
export const BOB = '0x3000000000000000000000000000000000000003';
export const MODULE = '0x4000000000000000000000000000000000000004';
export const STRANGER = '0x5000000000000000000000000000000000000005';

export function newQuest(overrides: Partial<NewQuest> = {}): NewQuest {
  return {
    name: 'Bridge basics',
    description: 'Move a test token across domains.',
    xp_reward: 250,
    quest_type: 'DeFi',
    ...overrides,
  };
}

export function setupLedger(domainId = 1, forwarding?: RelayForwarding) {
  const domain = new Domain({ domainId, label: 'CoreDomain' });
  const authority = new QuestCompletionAuthority(domain, { owner: ADMIN, forwarding });
  authority.grantModule(ADMIN, MODULE);
  return { domain, authority };
}
