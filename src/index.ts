export * from './models.js';
export { CFG, loadConfig, type LedgerConfig } from './config.js';
export { Domain, type DomainOptions } from './chain/domain.js';
export { EventLog, type EventFilter } from './events/eventLog.js';
export { CapabilityRegistry, type CapabilityRole } from './access/capabilityRegistry.js';
export { QuestRegistry } from './quests/questRegistry.js';
export { UserProgressLedger } from './progress/userProgressLedger.js';
export { levelForXp, xpToNextLevel, XP_PER_LEVEL } from './progress/levels.js';
export { QuestCompletionAuthority, type AuthorityOptions, type CompletionRelay } from './engine/completionAuthority.js';
export { encodeCompletion, decodeCompletion, COMPLETION_PAYLOAD_BYTES } from './relay/codec.js';
export {
  CrossDomainRelay,
  type CrossDomainUpdateTarget,
  type RelayConfig,
  type ReceiveOutcome,
} from './relay/crossDomainRelay.js';
export { LocalTransportEndpoint, type MessageReceiver, type TransportEndpoint } from './transport/localEndpoint.js';
export { MessageExecutor, type DeliveryOrder, type DeliveryReport } from './transport/messageExecutor.js';
export { QuestModule, type CompletionEntry } from './variants/questModule.js';
export { AnswerHashQuest, hashAnswer } from './variants/answerHashQuest.js';
export { StakingQuest, type StakeOutcome } from './variants/stakingQuest.js';
export { createMirroredNetwork, type DomainStack, type MirroredNetwork, type MirroredNetworkOptions } from './network.js';
export { snapshotLedger, compareLedgers, type ConvergenceReport, type LedgerSnapshot } from './sync/reconcile.js';
export { MetricsCollector, ledgerMetrics, type LedgerReport } from './analytics/metrics.js';
export {
  LedgerError,
  AuthorizationError,
  StateError,
  ValidationError,
  TransferError,
  DatabaseError,
  formatErrorForUser,
  formatErrorForLogging,
} from './utils/errorhandler.js';
export { logger, Logger } from './utils/logger.js';
