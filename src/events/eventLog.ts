import type { DatabaseManager } from '../persistence/db.js';
import type { Address, DomainId, LedgerEvent, LedgerEventKind, LedgerEventPayload } from '../models.js';
import { DatabaseError } from '../utils/errorhandler.js';

interface EventRow {
  seq: number;
  emitter: string;
  kind: string;
  quest_id: number | null;
  subject: string | null;
  label: string | null;
  amount: number | null;
  peer_domain: number | null;
  ts: number;
}

interface EventColumns {
  quest_id: number | null;
  subject: string | null;
  label: string | null;
  amount: number | null;
  peer_domain: number | null;
}

export interface EventFilter {
  kind?: LedgerEventKind;
  emitter?: Address;
  afterSeq?: number;
}

function toColumns(event: LedgerEventPayload): EventColumns {
  switch (event.kind) {
    case 'QuestCreated':
      return { quest_id: event.quest_id, subject: event.creator, label: event.name, amount: null, peer_domain: null };
    case 'QuestCompleted':
      return { quest_id: event.quest_id, subject: event.user, label: null, amount: event.xp_earned, peer_domain: null };
    case 'UserLevelUp':
      return { quest_id: null, subject: event.user, label: null, amount: event.new_level, peer_domain: null };
    case 'MessageSent':
      return { quest_id: event.quest_id, subject: event.user, label: null, amount: null, peer_domain: event.target_domain_id };
    case 'MessageReceived':
      return { quest_id: event.quest_id, subject: event.user, label: null, amount: null, peer_domain: event.source_domain_id };
  }
}

function required<T>(value: T | null, row: EventRow, column: string): T {
  if (value === null) {
    throw new DatabaseError(`event ${row.seq} (${row.kind}) is missing ${column}`, 'readEvent');
  }
  return value;
}

function toPayload(row: EventRow): LedgerEventPayload {
  switch (row.kind) {
    case 'QuestCreated':
      return {
        kind: 'QuestCreated',
        quest_id: required(row.quest_id, row, 'quest_id'),
        name: required(row.label, row, 'label'),
        creator: required(row.subject, row, 'subject'),
      };
    case 'QuestCompleted':
      return {
        kind: 'QuestCompleted',
        quest_id: required(row.quest_id, row, 'quest_id'),
        user: required(row.subject, row, 'subject'),
        xp_earned: required(row.amount, row, 'amount'),
      };
    case 'UserLevelUp':
      return {
        kind: 'UserLevelUp',
        user: required(row.subject, row, 'subject'),
        new_level: required(row.amount, row, 'amount'),
      };
    case 'MessageSent':
      return {
        kind: 'MessageSent',
        quest_id: required(row.quest_id, row, 'quest_id'),
        user: required(row.subject, row, 'subject'),
        target_domain_id: required(row.peer_domain, row, 'peer_domain'),
      };
    case 'MessageReceived':
      return {
        kind: 'MessageReceived',
        quest_id: required(row.quest_id, row, 'quest_id'),
        user: required(row.subject, row, 'subject'),
        source_domain_id: required(row.peer_domain, row, 'peer_domain'),
      };
    default:
      throw new DatabaseError(`unknown event kind ${row.kind}`, 'readEvent', { seq: row.seq });
  }
}

/**
 * Append-only, strictly ordered record of everything observable on one domain.
 * Rows are written inside the caller's transaction, so a rolled back call
 * leaves no events behind and `seq` stays dense.
 */
export class EventLog {
  constructor(
    private readonly db: DatabaseManager,
    readonly domainId: DomainId,
  ) {}

  append(emitter: Address, event: LedgerEventPayload): LedgerEvent {
    const ts = Date.now();
    const columns = toColumns(event);
    const result = this.db
      .prepare<[string, string, number | null, string | null, string | null, number | null, number | null, number]>(
        `INSERT INTO events (emitter, kind, quest_id, subject, label, amount, peer_domain, ts)
         VALUES (?,?,?,?,?,?,?,?)`
      )
      .run(emitter, event.kind, columns.quest_id, columns.subject, columns.label, columns.amount, columns.peer_domain, ts);

    return { ...event, seq: Number(result.lastInsertRowid), domain_id: this.domainId, emitter, ts };
  }

  list(filter: EventFilter = {}): LedgerEvent[] {
    const rows = this.db
      .prepare<[number, string | null, string | null, string | null, string | null], EventRow>(
        `SELECT seq, emitter, kind, quest_id, subject, label, amount, peer_domain, ts FROM events
         WHERE seq > ?
           AND (? IS NULL OR kind = ?)
           AND (? IS NULL OR emitter = ?)
         ORDER BY seq ASC`
      )
      .all(filter.afterSeq ?? 0, filter.kind ?? null, filter.kind ?? null, filter.emitter ?? null, filter.emitter ?? null);

    return rows.map((row) => ({
      ...toPayload(row),
      seq: row.seq,
      domain_id: this.domainId,
      emitter: row.emitter,
      ts: row.ts,
    }));
  }

  count(kind?: LedgerEventKind): number {
    const row = this.db
      .prepare<[string | null, string | null], { total: number }>(
        'SELECT COUNT(*) AS total FROM events WHERE (? IS NULL OR kind = ?)'
      )
      .get(kind ?? null, kind ?? null);
    return row?.total ?? 0;
  }

  lastSeq(): number {
    const row = this.db
      .prepare<[], { seq: number | null }>('SELECT MAX(seq) AS seq FROM events')
      .get();
    return row?.seq ?? 0;
  }
}
