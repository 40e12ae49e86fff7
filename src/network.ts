import { Domain } from './chain/domain.js';
import { QuestCompletionAuthority } from './engine/completionAuthority.js';
import type { Address, DomainId, RelayForwarding } from './models.js';
import { CrossDomainRelay } from './relay/crossDomainRelay.js';
import { LocalTransportEndpoint } from './transport/localEndpoint.js';
import { MessageExecutor } from './transport/messageExecutor.js';
import { toAddress } from './utils/address.js';
import { ValidationError } from './utils/errorhandler.js';
import { logger } from './utils/logger.js';

export interface MirroredNetworkOptions {
  admin: Address;
  coreDomainId: DomainId;
  counterpartDomainId: DomainId;
  coreDbPath?: string;
  counterpartDbPath?: string;
  forwarding?: RelayForwarding;
}

export interface DomainStack {
  domain: Domain;
  authority: QuestCompletionAuthority;
  relay: CrossDomainRelay;
  endpoint: LocalTransportEndpoint;
}

export interface MirroredNetwork {
  admin: Address;
  core: DomainStack;
  counterpart: DomainStack;
  executor: MessageExecutor;
  close(): void;
}

function deployStack(domainId: DomainId, label: string, admin: Address, dbPath?: string, forwarding?: RelayForwarding): DomainStack {
  const domain = new Domain({ domainId, label, dbPath });
  const authority = new QuestCompletionAuthority(domain, { owner: admin, forwarding });
  const endpoint = new LocalTransportEndpoint(domain);
  const relay = new CrossDomainRelay(domain, admin, label);
  return { domain, authority, relay, endpoint };
}

function link(local: DomainStack, remote: DomainStack, admin: Address) {
  local.relay.configure(admin, {
    ledger: local.authority,
    transport: local.endpoint,
    counterpartDomainId: remote.domain.id,
    counterpartRelay: remote.relay.address,
  });
  local.endpoint.bindReceiver(local.relay);
  local.authority.attachRelay(admin, local.relay);
}

/**
 * Deploys a ledger, relay and transport endpoint on each of two domains and
 * wires them to mirror each other. Quest modules are granted separately.
 */
export function createMirroredNetwork(options: MirroredNetworkOptions): MirroredNetwork {
  if (options.coreDomainId === options.counterpartDomainId) {
    throw new ValidationError('the two domains need distinct ids', 'counterpartDomainId', options.counterpartDomainId);
  }
  const admin = toAddress(options.admin, 'admin');

  const core = deployStack(options.coreDomainId, 'CoreDomain', admin, options.coreDbPath, options.forwarding);
  const counterpart = deployStack(
    options.counterpartDomainId,
    'CounterpartDomain',
    admin,
    options.counterpartDbPath,
    options.forwarding
  );

  link(core, counterpart, admin);
  link(counterpart, core, admin);

  const executor = new MessageExecutor();
  executor.register(core.endpoint);
  executor.register(counterpart.endpoint);

  logger.info('Mirrored network ready', {
    core: { domain: core.domain.id, ledger: core.authority.address, relay: core.relay.address },
    counterpart: { domain: counterpart.domain.id, ledger: counterpart.authority.address, relay: counterpart.relay.address },
  });

  return {
    admin,
    core,
    counterpart,
    executor,
    close() {
      core.domain.close();
      counterpart.domain.close();
    },
  };
}
