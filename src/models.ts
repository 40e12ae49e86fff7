export type Address = string; // checksummed 0x-prefixed 20-byte hex
export type DomainId = number;
export type QuestId = number;
export type UserId = number;

export const QUEST_TYPES = ['DeFi', 'NFT', 'Social', 'Educational'] as const;
export type QuestType = (typeof QUEST_TYPES)[number];

export const RELAY_FORWARDING_POLICIES = ['fan-out', 'primary'] as const;
export type RelayForwarding = (typeof RELAY_FORWARDING_POLICIES)[number];

export interface Quest {
  quest_id: QuestId;
  name: string;
  description: string;
  xp_reward: number;
  active: boolean;
  creator: Address;
  quest_type: QuestType;
  created_at: number;
}

export interface NewQuest {
  name: string;
  description: string;
  xp_reward: number;
  quest_type: QuestType;
}

export interface UserProgress {
  user_id: UserId;
  owner: Address;
  xp: number;
  level: number;
  completed_quests: QuestId[];
}

export type CompletionSource = 'direct' | 'cross-domain';

export interface CompletionResult {
  quest_id: QuestId;
  user: Address;
  xp_earned: number;
  xp: number;
  level: number;
  leveled_up: boolean;
  source: CompletionSource;
}

export interface CompletionMessage {
  quest_id: QuestId;
  user: Address;
}

export type LedgerEventPayload =
  | { kind: 'QuestCreated'; quest_id: QuestId; name: string; creator: Address }
  | { kind: 'QuestCompleted'; quest_id: QuestId; user: Address; xp_earned: number }
  | { kind: 'UserLevelUp'; user: Address; new_level: number }
  | { kind: 'MessageSent'; quest_id: QuestId; user: Address; target_domain_id: DomainId }
  | { kind: 'MessageReceived'; quest_id: QuestId; user: Address; source_domain_id: DomainId };

export type LedgerEventKind = LedgerEventPayload['kind'];

export type LedgerEvent = LedgerEventPayload & {
  seq: number;
  domain_id: DomainId;
  emitter: Address;
  ts: number;
};

export interface OutboundPacket {
  packet_id: string;
  nonce: number;
  src_domain: DomainId;
  sender: Address;
  dst_domain: DomainId;
  receiver: Address;
  payload: string;
  value: bigint;
  sent_at: number;
}
