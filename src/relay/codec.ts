import { AbiCoder, dataLength, getAddress, isHexString } from 'ethers';
import type { CompletionMessage } from '../models.js';
import { toAddress } from '../utils/address.js';
import { ValidationError } from '../utils/errorhandler.js';

// (uint256 questId, address user): two 32-byte words, no framing
const COMPLETION_TYPES = ['uint256', 'address'] as const;
export const COMPLETION_PAYLOAD_BYTES = 64;

const coder = AbiCoder.defaultAbiCoder();

export function encodeCompletion(message: CompletionMessage): string {
  if (!Number.isSafeInteger(message.quest_id) || message.quest_id <= 0) {
    throw new ValidationError('quest id must be a positive integer', 'quest_id', message.quest_id);
  }
  return coder.encode(COMPLETION_TYPES, [message.quest_id, toAddress(message.user, 'user')]);
}

export function decodeCompletion(payload: string): CompletionMessage {
  if (!isHexString(payload) || dataLength(payload) !== COMPLETION_PAYLOAD_BYTES) {
    throw new ValidationError(`payload must be ${COMPLETION_PAYLOAD_BYTES} bytes of hex`, 'payload', payload);
  }

  let fields: readonly unknown[];
  try {
    fields = Array.from(coder.decode(COMPLETION_TYPES, payload));
  } catch (error) {
    throw new ValidationError(
      `payload could not be decoded: ${error instanceof Error ? error.message : String(error)}`,
      'payload',
      payload
    );
  }

  const [rawQuestId, rawUser] = fields;
  if (typeof rawQuestId !== 'bigint' || typeof rawUser !== 'string') {
    throw new ValidationError('payload fields have unexpected types', 'payload', payload);
  }
  if (rawQuestId <= 0n || rawQuestId > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new ValidationError('quest id is out of range', 'quest_id', rawQuestId.toString());
  }

  const message: CompletionMessage = { quest_id: Number(rawQuestId), user: getAddress(rawUser) };

  // Only the canonical encoding is accepted (e.g. no dirty bytes above the address)
  if (encodeCompletion(message) !== payload.toLowerCase()) {
    throw new ValidationError('payload is not canonically encoded', 'payload', payload);
  }
  return message;
}
