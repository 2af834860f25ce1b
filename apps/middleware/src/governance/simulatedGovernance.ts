import { createClock, type Clock, type GovernanceProposal, type Logger } from "@ordergate/shared";
import { ProposalNotFoundError } from "../errors.js";
import type { GovernanceGateway } from "./governanceGateway.js";

// In-memory governance: every proposal is approved as soon as it is asked to be.
export class SimulatedGovernance implements GovernanceGateway {
  private readonly proposals = new Map<number, GovernanceProposal>();
  private readonly byOrder = new Map<number, number>();
  private nextId: number;

  constructor(private readonly logger: Logger, private readonly clock: Clock = createClock()) {
    this.nextId = clock.nowMs();
  }

  async propose(orderId: number, title: string, proposer: string): Promise<GovernanceProposal> {
    const proposal: GovernanceProposal = {
      id: this.nextId++,
      orderId,
      title,
      proposer,
      status: "pending",
      createdAt: this.clock.nowIso(),
    };
    this.proposals.set(proposal.id, proposal);
    this.byOrder.set(orderId, proposal.id);
    this.logger.info(`Governance proposal ${proposal.id} created: ${title}`);
    return { ...proposal };
  }

  async simulateApproval(orderId: number): Promise<GovernanceProposal> {
    const id = this.byOrder.get(orderId);
    const proposal = id === undefined ? undefined : this.proposals.get(id);
    if (!proposal) throw new ProposalNotFoundError(`order ${orderId}`);
    proposal.status = "approved";
    this.logger.info(`Governance proposal ${proposal.id} approved (simulated)`);
    return { ...proposal };
  }

  getProposal(proposalId: number): GovernanceProposal {
    const proposal = this.proposals.get(proposalId);
    if (!proposal) throw new ProposalNotFoundError(String(proposalId));
    return { ...proposal };
  }
}
