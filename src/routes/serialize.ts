import type { CampaignLedger } from '../ledger/CampaignLedger';
import { isTerminalStatus } from '../ledger/campaignStatus';
import type { Identity } from '../ledger/types';
import { formatUnits } from '../utils/amount';

export function serializeCampaign(ledger: CampaignLedger) {
  const totalContributed = ledger.getTotalContributed();
  const status = ledger.getStatus();
  return {
    id: ledger.id,
    name: ledger.name,
    symbol: ledger.symbol,
    owner: ledger.owner,
    status,
    acceptingContributions: !isTerminalStatus(status),
    goal: ledger.goal.toString(),
    goalDisplay: formatUnits(ledger.goal),
    totalContributed: totalContributed.toString(),
    totalContributedDisplay: formatUnits(totalContributed),
    currentFunds: ledger.getCurrentFunds().toString(),
    progress: Number((totalContributed * 100n) / ledger.goal),
    cancelled: ledger.isCancelled(),
    nextTokenId: ledger.getNextTokenId(),
    createdAt: new Date(ledger.createdAt).toISOString(),
    deadline: new Date(ledger.deadline).toISOString(),
  };
}

export function serializeContribution(ledger: CampaignLedger, identity: Identity) {
  const amount = ledger.contributionOf(identity);
  return {
    campaignId: ledger.id,
    identity,
    amountContributed: amount.toString(),
    amountContributedDisplay: formatUnits(amount),
    tokensClaimed: ledger.tokensClaimedOf(identity),
    claimable: ledger.claimable(identity),
  };
}
