import type { GovernanceProposal } from "@ordergate/shared";

/**
 * Pre-approval gate an order must pass before it is submitted on-chain.
 * A real DAO client can replace the simulated one without touching the orchestrator.
 */
export interface GovernanceGateway {
  propose(orderId: number, title: string, proposer: string): Promise<GovernanceProposal>;
  simulateApproval(orderId: number): Promise<GovernanceProposal>;
  getProposal(proposalId: number): GovernanceProposal;
}
