import { z } from "zod";
import type { AppConfig } from "../config.js";

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type LlmOptions = Pick<AppConfig, "llmEnabled" | "llmChatUrl" | "llmApiKey" | "llmModel" | "llmTemperature" | "llmMaxTokens">;

export type ChatResult = { ok: true; content: string } | { ok: false; error: string };

const chatResponseSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullish() }).optional() })).optional(),
});

/** First fenced code block in a chat answer, else the whole answer trimmed. */
export function extractCodeBlock(text: string): string | null {
  const fenced = /```[a-zA-Z]*\n([\s\S]*?)```/.exec(text);
  const body = (fenced?.[1] ?? text).trim();
  return body ? body : null;
}

export async function chatComplete(
  options: LlmOptions,
  messages: ChatMessage[],
  fetchImpl: typeof fetch = fetch
): Promise<ChatResult> {
  if (!options.llmEnabled) return { ok: false, error: "LLM disabled" };
  const url = options.llmChatUrl;
  if (!url) return { ok: false, error: "LLM chat URL not configured" };
  try {
    const res = await fetchImpl(url, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        ...(options.llmApiKey ? { Authorization: `Bearer ${options.llmApiKey}` } : {}),
      },
      body: JSON.stringify({
        model: options.llmModel,
        messages,
        temperature: options.llmTemperature,
        max_tokens: options.llmMaxTokens,
      }),
    });
    if (!res.ok) return { ok: false, error: `HTTP ${res.status} ${await res.text()}` };
    const payload = chatResponseSchema.safeParse(await res.json());
    if (!payload.success) return { ok: false, error: "Unexpected LLM response shape" };
    const content = payload.data.choices?.[0]?.message?.content;
    if (!content) return { ok: false, error: "Empty LLM response" };
    return { ok: true, content };
  } catch (e) {
    return { ok: false, error: String(e) };
  }
}
