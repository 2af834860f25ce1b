import type { Transport } from "viem";
import { createClock, createLogger, type Clock, type Logger } from "@ordergate/shared";
import type { AppConfig } from "../config.js";
import { AuditLog } from "../audit/auditLog.js";
import { PatternRuleChecker, StaticRuleChecker, type RuleChecker } from "../advisory/ruleChecker.js";
import { LlmSourceGenerator, PlaceholderSourceGenerator, type SourceGenerator } from "../advisory/sourceGenerator.js";
import { ChainConnectionError, ConfigurationError, describeError, ServiceUnavailableError } from "../errors.js";
import { ChainClient } from "../execution/chainClient.js";
import type { ChainGateway } from "../execution/types.js";
import type { GovernanceGateway } from "../governance/governanceGateway.js";
import { SimulatedGovernance } from "../governance/simulatedGovernance.js";
import { OrderOrchestrator, settingsFromConfig } from "../orders/orderOrchestrator.js";

export type ChainStatus =
  | { available: true; address: string; contractAddress: string; contractUsable: boolean }
  | { available: false; reason: string };

export type AppContext = {
  config: AppConfig;
  clock: Clock;
  logger: Logger;
  audit: AuditLog;
  chainStatus: ChainStatus;
  governance: GovernanceGateway;
  /** Throws ServiceUnavailableError when the chain client could not be built. */
  chain(): ChainGateway;
  /** Throws ServiceUnavailableError when the chain client could not be built. */
  orchestrator(): OrderOrchestrator;
};

export type AppContextOverrides = {
  clock?: Clock;
  logger?: Logger;
  transport?: Transport;
  chain?: ChainGateway;
  governance?: GovernanceGateway;
  fetchImpl?: typeof fetch;
};

function buildSourceGenerator(config: AppConfig, clock: Clock, logger: Logger, fetchImpl?: typeof fetch): SourceGenerator {
  const placeholder = new PlaceholderSourceGenerator(clock);
  return config.llmEnabled ? new LlmSourceGenerator(config, placeholder, logger, fetchImpl) : placeholder;
}

function buildRuleChecker(config: AppConfig): RuleChecker {
  return config.ruleChecker === "pattern" ? new PatternRuleChecker() : new StaticRuleChecker();
}

/**
 * Builds every long-lived collaborator once. An unreachable RPC or a bad chain
 * configuration leaves the context up with no orchestrator so the API can
 * still report why.
 */
export async function createAppContext(config: AppConfig, overrides: AppContextOverrides = {}): Promise<AppContext> {
  const clock = overrides.clock ?? createClock();
  const logger = overrides.logger ?? createLogger("ordergate", config.logLevel, clock);
  const audit = new AuditLog(config.auditPath, clock, logger);
  const governance = overrides.governance ?? new SimulatedGovernance(logger, clock);

  let chain: ChainGateway | null = overrides.chain ?? null;
  let unavailableReason = "";
  if (!chain) {
    try {
      chain = await ChainClient.connect(config, { logger, clock, transport: overrides.transport });
    } catch (e) {
      if (!(e instanceof ChainConnectionError || e instanceof ConfigurationError)) throw e;
      unavailableReason = describeError(e);
      logger.error(`Chain client unavailable: ${unavailableReason}`);
      audit.error(e, { stage: "startup" });
    }
  }

  const connected = chain;
  const orchestrator = connected
    ? new OrderOrchestrator({
        chain: connected,
        governance,
        sourceGenerator: buildSourceGenerator(config, clock, logger, overrides.fetchImpl),
        ruleChecker: buildRuleChecker(config),
        audit,
        logger,
        clock,
        settings: settingsFromConfig(config),
      })
    : null;

  const chainStatus: ChainStatus = connected
    ? { available: true, address: connected.address, contractAddress: connected.contractAddress, contractUsable: connected.isContractUsable() }
    : { available: false, reason: unavailableReason };

  return {
    config,
    clock,
    logger,
    audit,
    chainStatus,
    governance,
    chain() {
      if (!connected) throw new ServiceUnavailableError(unavailableReason);
      return connected;
    },
    orchestrator() {
      if (!orchestrator) throw new ServiceUnavailableError(unavailableReason);
      return orchestrator;
    },
  };
}
