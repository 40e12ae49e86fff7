import { getAddress, getCreateAddress, toBeHex, zeroPadValue } from 'ethers';
import { DatabaseManager, IN_MEMORY } from '../persistence/db.js';
import { EventLog } from '../events/eventLog.js';
import type { Address, DomainId } from '../models.js';
import { ValidationError } from '../utils/errorhandler.js';

export interface DomainOptions {
  domainId: DomainId;
  label: string;
  dbPath?: string;
}

/**
 * One independent execution environment. Calls into components living on a
 * domain run one at a time and all-or-nothing; `execute` is that boundary.
 */
export class Domain {
  readonly id: DomainId;
  readonly label: string;
  readonly db: DatabaseManager;
  readonly events: EventLog;
  private readonly deployer: Address;
  private deployNonce = 0;
  private onCommit: Array<() => void> = [];

  constructor(options: DomainOptions) {
    if (!Number.isSafeInteger(options.domainId) || options.domainId <= 0) {
      throw new ValidationError('domain id must be a positive integer', 'domainId', options.domainId);
    }
    this.id = options.domainId;
    this.label = options.label;
    this.db = new DatabaseManager(options.dbPath ?? IN_MEMORY);
    this.events = new EventLog(this.db, this.id);
    this.deployer = getAddress(zeroPadValue(toBeHex(this.id), 20));
  }

  /** Hands out the address of the next component deployed on this domain. */
  allocateAddress(): Address {
    const address = getCreateAddress({ from: this.deployer, nonce: this.deployNonce });
    this.deployNonce += 1;
    return address;
  }

  execute<T>(fn: () => T): T {
    if (this.db.inTransaction) {
      const mark = this.onCommit.length;
      try {
        return this.db.transaction(fn);
      } catch (error) {
        this.onCommit.length = mark;
        throw error;
      }
    }

    let result: T;
    try {
      result = this.db.transaction(fn);
    } catch (error) {
      this.onCommit = [];
      throw error;
    }
    const hooks = this.onCommit;
    this.onCommit = [];
    hooks.forEach((hook) => hook());
    return result;
  }

  /**
   * Runs `hook` once the outermost `execute` commits, or right away when no
   * call is open. Hooks from work that rolls back are dropped.
   */
  afterCommit(hook: () => void) {
    if (this.db.inTransaction) {
      this.onCommit.push(hook);
    } else {
      hook();
    }
  }

  close() {
    this.db.close();
  }
}
