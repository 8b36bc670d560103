import type { Identity, RewardTokenMinter } from '../ledger/types';

export interface BadgeRecord {
  tokenId: number;
  owner: Identity;
}

/**
 * In-process badge collection for one campaign. Covers minting and ownership
 * queries only; transfers and approvals belong to whatever token standard
 * the badges are eventually bridged to.
 */
export class BadgeRegistry implements RewardTokenMinter {
  private readonly owners = new Map<number, Identity>();

  constructor(
    readonly name: string,
    readonly symbol: string,
    minted: Iterable<BadgeRecord> = [],
  ) {
    for (const badge of minted) {
      this.owners.set(badge.tokenId, badge.owner);
    }
  }

  mint(owner: Identity, tokenId: number): void {
    if (!owner.trim()) throw new Error('badge-owner-required');
    if (!Number.isInteger(tokenId) || tokenId <= 0) throw new Error('badge-id-invalid');
    if (this.owners.has(tokenId)) throw new Error('badge-already-minted');
    this.owners.set(tokenId, owner);
  }

  ownerOf(tokenId: number): Identity | undefined {
    return this.owners.get(tokenId);
  }

  balanceOf(owner: Identity): number {
    return this.tokensOf(owner).length;
  }

  tokensOf(owner: Identity): number[] {
    const tokens: number[] = [];
    for (const [tokenId, holder] of this.owners) {
      if (holder === owner) tokens.push(tokenId);
    }
    return tokens.sort((a, b) => a - b);
  }

  totalSupply(): number {
    return this.owners.size;
  }

  list(): BadgeRecord[] {
    return Array.from(this.owners, ([tokenId, owner]) => ({ tokenId, owner })).sort(
      (a, b) => a.tokenId - b.tokenId,
    );
  }
}
