import "dotenv/config";
import { isLogLevel, type LogLevel } from "@ordergate/shared";

type Env = Record<string, string | undefined>;

function num(value: string | undefined, fallback: number): number {
  const n = Number(value ?? fallback);
  return Number.isFinite(n) ? n : fallback;
}

function optionalNum(value: string | undefined): number | undefined {
  if (value == null || value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

export function loadConfig(env: Env = process.env) {
  const logLevel = env.LOG_LEVEL ?? "info";
  return {
    rpcUrl: env.RPC_URL ?? "",
    chainId: num(env.CHAIN_ID, 11155111),
    apiPort: num(env.API_PORT, 3001),

    executorPrivateKey: env.EXECUTOR_PRIVATE_KEY ?? "",
    orderBookAddress: env.ORDER_BOOK_ADDRESS ?? "",

    // Fees & gas
    priorityFeeGwei: env.PRIORITY_FEE_GWEI ?? "1",
    fallbackGasPriceGwei: env.FALLBACK_GAS_PRICE_GWEI ?? "20",
    approvalGasLimit: BigInt(num(env.APPROVAL_GAS_LIMIT, 200_000)),
    orderGasLimit: BigInt(num(env.ORDER_GAS_LIMIT, 500_000)),

    // Confirmation waits
    approvalTimeoutSeconds: num(env.APPROVAL_TIMEOUT_SECONDS, 180),
    submitTimeoutSeconds: num(env.SUBMIT_TIMEOUT_SECONDS, 300),
    receiptPollMs: optionalNum(env.RECEIPT_POLL_MS), // unset: 100ms on loopback, 5s otherwise
    connectRetries: num(env.CHAIN_CONNECT_RETRIES, 2),

    auditPath: env.AUDIT_PATH ?? "./audit.jsonl",
    logLevel: (isLogLevel(logLevel) ? logLevel : "info") satisfies LogLevel,
    ruleChecker: env.RULE_CHECKER === "pattern" ? "pattern" as const : "static" as const,

    // LLM (OpenAI-compatible, optional local)
    llmEnabled: String(env.LLM_ENABLED ?? "false").toLowerCase() === "true",
    llmChatUrl: env.LLM_CHAT_URL ?? "",
    llmApiKey: env.LLM_API_KEY ?? "",
    llmModel: env.LLM_MODEL ?? "gpt-4o-mini",
    llmTemperature: num(env.LLM_TEMPERATURE, 0.2),
    llmMaxTokens: num(env.LLM_MAX_TOKENS, 1024),
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const CONFIG: AppConfig = loadConfig();
