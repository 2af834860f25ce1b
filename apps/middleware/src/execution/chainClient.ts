import {
  createPublicClient,
  createWalletClient,
  encodeFunctionData,
  getAddress,
  http,
  isAddress,
  parseGwei,
  TransactionReceiptNotFoundError,
  type Address,
  type Chain,
  type Hash,
  type Hex,
  type PrivateKeyAccount,
  type PublicClient,
  type Transport,
  type WalletClient,
} from "viem";
import { privateKeyToAccount } from "viem/accounts";

import { createClock, Effect, sleep, type Clock, type FeeQuote, type Logger } from "@ordergate/shared";
import type { AppConfig } from "../config.js";
import {
  BroadcastError,
  ChainConnectionError,
  ConfigurationError,
  ConfirmationTimeoutError,
  describeError,
  InsufficientFundsError,
  OnchainExecutionFailedError,
  RpcRequestError,
  TransactionBuildError,
} from "../errors.js";
import { Erc20Abi, SENTINEL_CONTRACT_ADDRESS } from "./abis.js";
import { NonceManager } from "./nonceManager.js";
import type { ChainGateway, ConfirmationOptions, GenericCall, Receipt, TransactionHandle, TxIntent } from "./types.js";

export type ChainClientConfig = Pick<
  AppConfig,
  | "rpcUrl"
  | "chainId"
  | "executorPrivateKey"
  | "orderBookAddress"
  | "priorityFeeGwei"
  | "fallbackGasPriceGwei"
  | "approvalGasLimit"
  | "receiptPollMs"
  | "connectRetries"
>;

export type ChainClientDeps = {
  logger: Logger;
  clock?: Clock;
  // tests pass viem's `custom` transport here
  transport?: Transport;
};

const LOOPBACK_HOSTS = new Set(["localhost", "127.0.0.1", "[::1]", "::1"]);
const LOCAL_POLL_MS = 100;
const REMOTE_POLL_MS = 5_000;

export function defaultPollMs(rpcUrl: string): number {
  try {
    return LOOPBACK_HOSTS.has(new URL(rpcUrl).hostname) ? LOCAL_POLL_MS : REMOTE_POLL_MS;
  } catch {
    return REMOTE_POLL_MS;
  }
}

function toPrivateKey(raw: string): Hex {
  const body = raw.trim().replace(/^0x/i, "");
  if (!/^[0-9a-fA-F]{64}$/.test(body)) {
    throw new ConfigurationError("EXECUTOR_PRIVATE_KEY must be a 32-byte hex string");
  }
  return `0x${body}`;
}

function toAddress(value: string, what: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new TransactionBuildError(`Invalid ${what} address: ${value}`);
  }
  return getAddress(value);
}

/**
 * Holds one RPC connection and one signing identity.
 *
 * Per-call failures surface as typed errors and leave the client usable; only
 * `connect` failures leave no client.
 */
export class ChainClient implements ChainGateway {
  readonly address: Address;
  readonly contractAddress: Address;

  private readonly priorityFee: bigint;
  private readonly fallbackGasPrice: bigint;
  private readonly approvalGasLimit: bigint;
  private readonly pollMs: number;

  private constructor(
    private readonly publicClient: PublicClient<Transport, Chain>,
    private readonly walletClient: WalletClient<Transport, Chain, PrivateKeyAccount>,
    private readonly account: PrivateKeyAccount,
    private readonly nonces: NonceManager,
    private readonly logger: Logger,
    private readonly clock: Clock,
    config: ChainClientConfig,
    contractAddress: Address
  ) {
    this.address = account.address;
    this.contractAddress = contractAddress;
    this.priorityFee = parseGwei(config.priorityFeeGwei);
    this.fallbackGasPrice = parseGwei(config.fallbackGasPriceGwei);
    this.approvalGasLimit = config.approvalGasLimit;
    this.pollMs = config.receiptPollMs ?? defaultPollMs(config.rpcUrl);
  }

  static async connect(config: ChainClientConfig, deps: ChainClientDeps): Promise<ChainClient> {
    const { logger } = deps;
    const clock = deps.clock ?? createClock();
    if (!config.rpcUrl && !deps.transport) throw new ConfigurationError("RPC_URL is not set");
    if (!config.executorPrivateKey) throw new ConfigurationError("EXECUTOR_PRIVATE_KEY is not set");

    const account = privateKeyToAccount(toPrivateKey(config.executorPrivateKey));
    const chain: Chain = {
      id: config.chainId,
      name: `EVM ${config.chainId}`,
      nativeCurrency: { name: "Ether", symbol: "ETH", decimals: 18 },
      rpcUrls: { default: { http: [config.rpcUrl] } },
    };
    const transport = deps.transport ?? http(config.rpcUrl);
    const publicClient = createPublicClient({ chain, transport });
    const walletClient = createWalletClient({ chain, transport, account });

    const rpcLabel = config.rpcUrl || "custom transport";
    const probe = Effect.retry<PublicClient<Transport, Chain>, number>(
      (client) => client.getChainId(),
      { retries: config.connectRetries, delayMs: 250 }
    );
    let remoteChainId: number;
    let pendingNonce: number;
    try {
      remoteChainId = await probe(publicClient, new AbortController().signal);
      pendingNonce = await publicClient.getTransactionCount({ address: account.address, blockTag: "pending" });
    } catch (e) {
      throw new ChainConnectionError(rpcLabel, e);
    }
    if (remoteChainId !== config.chainId) {
      throw new ConfigurationError(`CHAIN_ID ${config.chainId} does not match the RPC chain id ${remoteChainId}`);
    }
    logger.info(`Connected to ${rpcLabel} (chain ${remoteChainId})`);
    logger.info(`Signing as ${account.address}, next nonce ${pendingNonce}`);

    const contractAddress = resolveContractAddress(config.orderBookAddress, logger);
    const nonces = new NonceManager(pendingNonce, () =>
      publicClient.getTransactionCount({ address: account.address, blockTag: "pending" })
    );
    return new ChainClient(publicClient, walletClient, account, nonces, logger, clock, config, contractAddress);
  }

  isContractUsable(): boolean {
    return this.contractAddress !== SENTINEL_CONTRACT_ADDRESS;
  }

  getNonce(): number {
    return this.nonces.current();
  }

  /** Re-reads the pending nonce from the node, e.g. after a dropped transaction. */
  async resyncNonce(): Promise<number> {
    try {
      const nonce = await this.nonces.sync();
      this.logger.info(`Nonce resynced to ${nonce}`);
      return nonce;
    } catch (e) {
      throw new RpcRequestError("getTransactionCount", e);
    }
  }

  async getBalance(): Promise<bigint> {
    try {
      return await this.publicClient.getBalance({ address: this.account.address });
    } catch (e) {
      throw new RpcRequestError("getBalance", e);
    }
  }

  /** EIP-1559 pair from the latest base fee, else the legacy gas price. Never throws. */
  async estimateFees(): Promise<FeeQuote> {
    try {
      const block = await this.publicClient.getBlock({ blockTag: "latest" });
      if (block.baseFeePerGas == null) throw new Error("latest block carries no base fee");
      const maxPriorityFeePerGas = this.priorityFee;
      return {
        kind: "eip1559",
        maxPriorityFeePerGas,
        maxFeePerGas: block.baseFeePerGas * 2n + maxPriorityFeePerGas,
      };
    } catch (e) {
      this.logger.warn(`EIP-1559 fee estimation failed (${describeError(e)}); using legacy gas price`);
      return { kind: "legacy", gasPrice: await this.legacyGasPrice() };
    }
  }

  private async legacyGasPrice(): Promise<bigint> {
    try {
      return await this.publicClient.getGasPrice();
    } catch (e) {
      this.logger.warn(`Gas price read failed (${describeError(e)}); using configured fallback`);
      return this.fallbackGasPrice;
    }
  }

  async buildApprovalTransaction(token: string, spender: string, amount: bigint): Promise<TxIntent> {
    const to = toAddress(token, "token");
    const data = encodeFunctionData({
      abi: Erc20Abi,
      functionName: "approve",
      args: [toAddress(spender, "spender"), amount],
    });
    return { label: "approve", to, data, value: 0n, gas: this.approvalGasLimit, fees: await this.estimateFees() };
  }

  async buildGenericCallTransaction(call: GenericCall): Promise<TxIntent> {
    const to = toAddress(call.contract, "contract");
    let data: Hex;
    try {
      data = encodeFunctionData({ abi: call.abi, functionName: call.functionName, args: call.args ?? [] });
    } catch (e) {
      throw new TransactionBuildError(`Cannot encode ${call.functionName}: ${describeError(e)}`, e);
    }
    return {
      label: call.label ?? call.functionName,
      to,
      data,
      value: call.value ?? 0n,
      gas: call.gasLimit ?? 3_000_000n,
      fees: await this.estimateFees(),
    };
  }

  /**
   * Assigns the next nonce, checks the balance, signs and broadcasts. The nonce
   * advances only when the node accepted the transaction.
   */
  async signAndBroadcast(intent: TxIntent): Promise<TransactionHandle> {
    return this.nonces.withNonce(async (nonce) => {
      await this.preflight(intent);
      const serialized = await this.sign(intent, nonce);
      let hash: Hash;
      try {
        hash = await this.walletClient.sendRawTransaction({ serializedTransaction: serialized });
      } catch (e) {
        throw new BroadcastError(nonce, e);
      }
      this.logger.info(`Sent ${intent.label} tx ${hash} (nonce ${nonce})`);
      return { hash, nonce, label: intent.label, broadcastAt: this.clock.nowIso() };
    });
  }

  private async preflight(intent: TxIntent): Promise<void> {
    const perGas = intent.fees.kind === "eip1559" ? intent.fees.maxFeePerGas : intent.fees.gasPrice;
    const required = intent.gas * perGas + intent.value;
    const balance = await this.getBalance();
    if (balance < required) throw new InsufficientFundsError(balance, required);
  }

  private async sign(intent: TxIntent, nonce: number): Promise<Hex> {
    const base = {
      chainId: this.publicClient.chain.id,
      to: intent.to,
      data: intent.data,
      value: intent.value,
      gas: intent.gas,
      nonce,
    };
    try {
      return intent.fees.kind === "eip1559"
        ? await this.account.signTransaction({
            ...base,
            type: "eip1559",
            maxFeePerGas: intent.fees.maxFeePerGas,
            maxPriorityFeePerGas: intent.fees.maxPriorityFeePerGas,
          })
        : await this.account.signTransaction({ ...base, type: "legacy", gasPrice: intent.fees.gasPrice });
    } catch (e) {
      throw new TransactionBuildError(`Signing ${intent.label} failed: ${describeError(e)}`, e);
    }
  }

  /**
   * Polls for the receipt until `timeoutMs` elapses. A timeout does not mean
   * the transaction failed: it may still be mined afterwards.
   */
  async awaitConfirmation(handle: TransactionHandle, options: ConfirmationOptions): Promise<Receipt> {
    const pollMs = options.pollMs ?? this.pollMs;
    const deadline = this.clock.nowMs() + options.timeoutMs;
    this.logger.debug(`Waiting for ${handle.hash} (poll ${pollMs}ms, timeout ${options.timeoutMs}ms)`);

    for (;;) {
      const receipt = await this.fetchReceipt(handle.hash, Math.max(0, deadline - this.clock.nowMs()));
      if (receipt === "deadline") throw new ConfirmationTimeoutError(handle.hash, options.timeoutMs);
      if (receipt) {
        if (receipt.status !== "success") {
          throw new OnchainExecutionFailedError(handle.hash, receipt.status, receipt.blockNumber);
        }
        this.logger.info(`${handle.label} tx ${handle.hash} confirmed in block ${receipt.blockNumber}`);
        return { hash: handle.hash, blockNumber: receipt.blockNumber, status: "success", gasUsed: receipt.gasUsed };
      }
      const remaining = deadline - this.clock.nowMs();
      if (remaining <= 0) throw new ConfirmationTimeoutError(handle.hash, options.timeoutMs);
      await sleep(Math.min(pollMs, remaining), options.signal);
    }
  }

  // A lookup still pending when the wait runs out yields "deadline".
  private async fetchReceipt(hash: Hash, withinMs: number) {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<"deadline">((resolve) => {
      timer = setTimeout(() => resolve("deadline"), withinMs);
    });
    try {
      return await Promise.race([this.readReceipt(hash), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async readReceipt(hash: Hash) {
    try {
      return await this.publicClient.getTransactionReceipt({ hash });
    } catch (e) {
      if (!(e instanceof TransactionReceiptNotFoundError)) {
        this.logger.debug(`Receipt lookup for ${hash} failed: ${describeError(e)}`);
      }
      return null;
    }
  }
}

function resolveContractAddress(raw: string, logger: Logger): Address {
  if (raw && isAddress(raw, { strict: false })) {
    const address = getAddress(raw);
    logger.info(`Order book contract: ${address}`);
    return address;
  }
  logger.warn(
    `ORDER_BOOK_ADDRESS '${raw}' is not a valid address; order book calls will be skipped (using ${SENTINEL_CONTRACT_ADDRESS})`
  );
  return SENTINEL_CONTRACT_ADDRESS;
}
