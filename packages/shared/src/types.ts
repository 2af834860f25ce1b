export type OrderStatus =
  | "CREATED"
  | "APPROVAL_PENDING"
  | "APPROVED"
  | "GOVERNANCE_PENDING"
  | "GOVERNANCE_APPROVED"
  | "ONCHAIN_SUBMITTED"
  | "EXECUTED"
  | "FAILED_ONCHAIN"
  | "CANCELED";

export type RuleFinding = {
  severity: "info" | "warning" | "critical";
  message: string;
  rule?: string;            // e.g. "ORACLE_INTEGRATION"
  matched?: string[];       // patterns that triggered it
};

export type Order = {
  id: number;
  prompt: string;
  fromToken: string;        // symbol as requested, e.g. "WETH"
  toToken: string;
  fromTokenAddress: string; // resolved address, or the symbol when unknown
  toTokenAddress: string;
  amount: string;           // decimal string, human units of fromToken
  price: string;            // decimal string, quote per base unit
  wallet: string;
  sourceCode: string;       // advisory only, never compiled here
  status: OrderStatus;
  createdAt: string;        // ISO
  canceledAt: string | null;
  approvalTxHash: string | null;
  governanceProposalId: number | null;
  orderTxHash: string | null;
  ruleFindings: RuleFinding[];
  lastError: string | null;
};

export type ProposalStatus = "pending" | "approved";

export type GovernanceProposal = {
  id: number;
  orderId: number;
  title: string;
  proposer: string;
  status: ProposalStatus;
  createdAt: string;
};

// wei amounts
export type FeeQuote =
  | { kind: "eip1559"; maxFeePerGas: bigint; maxPriorityFeePerGas: bigint }
  | { kind: "legacy"; gasPrice: bigint };

export type GovernanceResult = {
  orderId: number;
  proposal: GovernanceProposal;
  status: OrderStatus;
};

// CANCELED when the order was canceled while the submission was in flight
export type ExecutionResult = {
  orderId: number;
  status: "EXECUTED" | "FAILED_ONCHAIN" | "CANCELED";
  txHash: string | null;
  error?: string;
};

export type CancellationResult = {
  orderId: number;
  status: "CANCELED";
  canceledAt: string;
};

export type AuditDetails = {
  orderId: number;
  sourceCode: string;
  ruleFindings: RuleFinding[];
};
