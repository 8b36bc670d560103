export type Identity = string;

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Moves value out of the campaign. Resolves `false` (or rejects) when the
 * recipient does not accept the funds; the ledger never assumes delivery.
 */
export interface ValueTransfer {
  send(to: Identity, amount: bigint): Promise<boolean>;
}

/**
 * Non-fungible badge capability. The ledger never hands out the same id
 * twice; a mint that throws fails the claim.
 */
export interface RewardTokenMinter {
  mint(owner: Identity, tokenId: number): Promise<void> | void;
}

export interface ContributionRecord {
  amountContributed: bigint;
  tokensClaimed: number;
}

export interface ContributionEntry extends ContributionRecord {
  identity: Identity;
}

export interface CampaignSnapshot {
  id: string;
  owner: Identity;
  name: string;
  symbol: string;
  goal: bigint;
  createdAt: number;
  deadline: number;
  cancelled: boolean;
  totalContributed: bigint;
  currentFunds: bigint;
  nextTokenId: number;
  contributions: ContributionEntry[];
}
