import type { RuleFinding } from "@ordergate/shared";

export interface RuleChecker {
  check(source: string): Promise<RuleFinding[]>;
}

export class StaticRuleChecker implements RuleChecker {
  async check(_source: string): Promise<RuleFinding[]> {
    return [{ severity: "info", message: "No critical issues found." }];
  }
}

type PatternRule = {
  rule: string;
  severity: RuleFinding["severity"];
  keywords: string[];
  message: string;
};

export const PATTERN_RULES: readonly PatternRule[] = [
  {
    rule: "ZK_FEATURES",
    severity: "info",
    keywords: ["zkSNARK", "zk-SNARK", "plonk", "groth16", "verifier", "verifyProof", "proof", "publicInputs", "bellman", "sapling"],
    message: "Zero-knowledge proof features detected.",
  },
  {
    rule: "ORACLE_INTEGRATION",
    severity: "warning",
    keywords: ["chainlink", "priceFeed", "AggregatorV3Interface", "VRFConsumerBase", "DataFeed", "oracle", "i_coordinator", "getRandomNumber"],
    message: "External data oracle integration detected; execution depends on off-chain data.",
  },
  {
    rule: "KYC_AML_COMPLIANCE",
    severity: "warning",
    keywords: ["KYC", "AML", "whitelist", "blacklist", "identity", "kycRequired", "isVerified", "restrictAccess"],
    message: "Identity or access-restriction logic detected; the order may exclude some counterparties.",
  },
];

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Case-insensitive keyword scan. Substring matches count, so "AML" also hits "amlCheck". */
export class PatternRuleChecker implements RuleChecker {
  private readonly compiled = PATTERN_RULES.map((r) => ({
    ...r,
    patterns: r.keywords.map((k) => ({ keyword: k, re: new RegExp(escapeRegExp(k), "i") })),
  }));

  async check(source: string): Promise<RuleFinding[]> {
    const findings: RuleFinding[] = [];
    for (const rule of this.compiled) {
      const matched = rule.patterns.filter((p) => p.re.test(source)).map((p) => p.keyword);
      if (matched.length > 0) {
        findings.push({ severity: rule.severity, rule: rule.rule, message: rule.message, matched });
      }
    }
    if (findings.length === 0) findings.push({ severity: "info", message: "No critical issues found." });
    return findings;
  }
}
