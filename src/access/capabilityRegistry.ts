import type { Domain } from '../chain/domain.js';
import type { Address } from '../models.js';
import { toAddress, tryAddress } from '../utils/address.js';
import { AuthorizationError } from '../utils/errorhandler.js';

export type CapabilityRole = 'quest-module' | 'relay';

/**
 * Allow-list of identities per role, owned by one component (the scope).
 * Only the owner may grant or revoke.
 */
export class CapabilityRegistry {
  constructor(
    private readonly domain: Domain,
    readonly scope: Address,
    readonly owner: Address,
  ) {}

  grant(caller: Address, role: CapabilityRole, holder: Address): boolean {
    return this.domain.execute(() => {
      this.assertOwner(caller, 'grant');
      const result = this.domain.db
        .prepare<[string, string, string, number]>(
          'INSERT OR IGNORE INTO capabilities (scope, role, holder, granted_at) VALUES (?,?,?,?)'
        )
        .run(this.scope, role, toAddress(holder, 'holder'), Date.now());
      return result.changes > 0;
    });
  }

  revoke(caller: Address, role: CapabilityRole, holder: Address): boolean {
    return this.domain.execute(() => {
      this.assertOwner(caller, 'revoke');
      const result = this.domain.db
        .prepare<[string, string, string]>('DELETE FROM capabilities WHERE scope=? AND role=? AND holder=?')
        .run(this.scope, role, toAddress(holder, 'holder'));
      return result.changes > 0;
    });
  }

  has(role: CapabilityRole, holder: Address): boolean {
    const normalized = tryAddress(holder);
    if (!normalized) return false;
    const row = this.domain.db
      .prepare<[string, string, string], { holder: string }>(
        'SELECT holder FROM capabilities WHERE scope=? AND role=? AND holder=?'
      )
      .get(this.scope, role, normalized);
    return row !== undefined;
  }

  list(role: CapabilityRole): Address[] {
    return this.domain.db
      .prepare<[string, string], { holder: string }>(
        'SELECT holder FROM capabilities WHERE scope=? AND role=? ORDER BY granted_at ASC, rowid ASC'
      )
      .all(this.scope, role)
      .map((row) => row.holder);
  }

  private assertOwner(caller: Address, entryPoint: string) {
    if (tryAddress(caller) !== this.owner) {
      throw new AuthorizationError('only the owner can change capabilities', caller, entryPoint);
    }
  }
}
