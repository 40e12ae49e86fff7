import 'dotenv/config';
import type { Address, DomainId } from './models.js';
import { RELAY_FORWARDING_POLICIES, type RelayForwarding } from './models.js';
import { toAddress } from './utils/address.js';
import { ValidationError } from './utils/errorhandler.js';
import { logger, parseLogLevel, type LogLevelName } from './utils/logger.js';

export interface LedgerConfig {
  logLevel: LogLevelName;
  coreDomainId: DomainId;
  counterpartDomainId: DomainId;
  adminAddress: Address;
  relayForwarding: RelayForwarding;
}

const DEFAULT_ADMIN = '0x1000000000000000000000000000000000000001';

function parseDomainId(raw: string | undefined, fallback: DomainId, field: string): DomainId {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive integer`, field, raw);
  }
  return value;
}

function parseForwarding(raw: string | undefined): RelayForwarding {
  const value = (raw || 'fan-out').trim();
  const policy = RELAY_FORWARDING_POLICIES.find((candidate) => candidate === value);
  if (!policy) {
    throw new ValidationError(`RELAY_FORWARDING must be one of ${RELAY_FORWARDING_POLICIES.join(', ')}`, 'RELAY_FORWARDING', raw);
  }
  return policy;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const coreDomainId = parseDomainId(env.CORE_DOMAIN_ID, 1, 'CORE_DOMAIN_ID');
  const counterpartDomainId = parseDomainId(env.COUNTERPART_DOMAIN_ID, 5, 'COUNTERPART_DOMAIN_ID');

  if (coreDomainId === counterpartDomainId) {
    throw new ValidationError('CORE_DOMAIN_ID and COUNTERPART_DOMAIN_ID must differ', 'COUNTERPART_DOMAIN_ID', counterpartDomainId);
  }

  return {
    logLevel: parseLogLevel(env.LOG_LEVEL),
    coreDomainId,
    counterpartDomainId,
    adminAddress: toAddress(env.ADMIN_ADDRESS || DEFAULT_ADMIN, 'ADMIN_ADDRESS'),
    relayForwarding: parseForwarding(env.RELAY_FORWARDING),
  };
}

export const CFG = loadConfig();

logger.setLevel(CFG.logLevel);
