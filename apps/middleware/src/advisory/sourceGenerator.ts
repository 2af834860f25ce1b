import type { Clock, Logger } from "@ordergate/shared";
import { chatComplete, extractCodeBlock, type LlmOptions } from "../llm/llmClient.js";

/** Produces advisory contract source for an order description. Never compiled or deployed here. */
export interface SourceGenerator {
  generate(description: string): Promise<string>;
}

export function placeholderSource(description: string, stamp: number): string {
  const oneLine = description.replace(/\s+/g, " ").trim();
  return [
    "pragma solidity ^0.8.0;",
    "",
    `contract LimitOrderContract_${stamp} {`,
    `    // Prompt-based generation: ${oneLine}`,
    "    // ... (placeholder Solidity code)",
    "    function execute() public { /* ... */ }",
    "    function cancel() public { /* ... */ }",
    "}",
    "",
  ].join("\n");
}

export class PlaceholderSourceGenerator implements SourceGenerator {
  constructor(private readonly clock: Clock) {}

  async generate(description: string): Promise<string> {
    return placeholderSource(description, Math.floor(this.clock.nowMs() / 1000));
  }
}

const SYSTEM_PROMPT =
  "You write Solidity ^0.8 contracts for limit orders. Answer with a single fenced solidity code block and nothing else.";

export class LlmSourceGenerator implements SourceGenerator {
  constructor(
    private readonly options: LlmOptions,
    private readonly fallback: SourceGenerator,
    private readonly logger: Logger,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async generate(description: string): Promise<string> {
    const res = await chatComplete(
      this.options,
      [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: description },
      ],
      this.fetchImpl
    );
    const code = res.ok ? extractCodeBlock(res.content) : null;
    if (code) return code;
    this.logger.warn(`LLM source generation unavailable (${res.ok ? "no code in answer" : res.error}); using placeholder`);
    return this.fallback.generate(description);
  }
}
