import { ONE_UNIT } from '../config/constants';
import type { ContributionBook } from './ContributionBook';
import { LedgerError } from './errors';
import type { LedgerTransaction } from './LedgerTransaction';
import type { Identity, RewardTokenMinter } from './types';

/** Source of badge ids. Ids are drawn once and never handed back. */
export class TokenIdSequence {
  constructor(private nextId = 1) {}

  next(): number {
    const id = this.nextId;
    this.nextId += 1;
    return id;
  }

  peek(): number {
    return this.nextId;
  }
}

export function entitlementFor(amountContributed: bigint): number {
  return Number(amountContributed / ONE_UNIT);
}

/**
 * Converts cumulative contribution into badges: one per whole unit ever
 * pledged, issued only on claim.
 */
export class RewardIssuer {
  constructor(
    private readonly book: ContributionBook,
    private readonly tokenIds: TokenIdSequence,
    private readonly minter: RewardTokenMinter,
  ) {}

  entitlementOf(identity: Identity): number {
    return entitlementFor(this.book.get(identity).amountContributed);
  }

  /** Badges owed right now; never negative, even after a refund. */
  claimable(identity: Identity): number {
    const owed = this.entitlementOf(identity) - this.book.get(identity).tokensClaimed;
    return owed > 0 ? owed : 0;
  }

  async claim(identity: Identity, to: Identity, tx: LedgerTransaction): Promise<number[]> {
    const entitled = this.entitlementOf(identity);
    const owed = entitled - this.book.get(identity).tokensClaimed;
    if (owed <= 0) {
      throw new LedgerError('nothing-to-claim', { claimer: identity });
    }

    // Bookkeeping is final before the first mint call.
    this.book.setClaimed(identity, entitled);
    let minted = 0;
    tx.onRollback(() => this.book.releaseClaimed(identity, owed - minted));
    tx.emit({ type: 'Claimed', claimer: to, tokenCount: owed });

    const tokenIds: number[] = [];
    while (minted < owed) {
      const tokenId = this.tokenIds.next();
      try {
        await this.minter.mint(to, tokenId);
      } catch (err) {
        throw new LedgerError('transfer-failed', { to, tokenId: String(tokenId) }, { cause: err });
      }
      tokenIds.push(tokenId);
      minted += 1;
    }
    return tokenIds;
  }
}
