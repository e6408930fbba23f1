/**
 * OpenRouter client: uses Vercel AI SDK pointed at the OpenRouter endpoint.
 *
 * Every analyst and debate participant is a TextCapability backed by one
 * OpenRouter model. Conversation memory is kept per conversation id, so a
 * debate on one metric never sees the turns of another, and lives until the
 * caller releases the conversation.
 */

import { createOpenAI } from "@ai-sdk/openai";
import { generateText } from "ai";
import type { InvocationContext, TextCapability } from "./types";
import { CallTimeoutError, errorMessage } from "./errors";

const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

type ChatMessage = { role: "user" | "assistant"; content: string };

/**
 * Create a Vercel AI SDK provider configured for OpenRouter.
 */
function getOpenRouterProvider(env: NodeJS.ProcessEnv = process.env) {
  const apiKey = env.OPENROUTER_API_KEY;
  if (!apiKey) {
    throw new Error("OPENROUTER_API_KEY environment variable is not set");
  }

  return createOpenAI({
    baseURL: OPENROUTER_BASE_URL,
    apiKey,
  });
}

export interface OpenRouterCapabilityOptions {
  /** Display name; defaults to the model id */
  name?: string;
  system?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * A TextCapability for one OpenRouter model with per-conversation memory.
 *
 * Errors are logged and rethrown; callers decide how a failure is recorded.
 */
export function createOpenRouterCapability(
  model: string,
  options: OpenRouterCapabilityOptions = {}
): TextCapability & { release(conversationId: string): void } {
  const name = options.name ?? model;
  const memory = new Map<string, ChatMessage[]>();

  return {
    name,
    async invoke(prompt: string, context: InvocationContext): Promise<string> {
      const provider = getOpenRouterProvider(options.env);
      const history = memory.get(context.conversationId) ?? [];
      const messages: ChatMessage[] = [...history, { role: "user", content: prompt }];

      try {
        const result = await generateText({
          model: provider(model),
          ...(options.system ? { system: options.system } : {}),
          messages,
          abortSignal: context.signal,
        });

        memory.set(context.conversationId, [
          ...messages,
          { role: "assistant", content: result.text },
        ]);
        return result.text;
      } catch (error) {
        console.error(`[openrouter] Error querying ${model}: ${errorMessage(error)}`);
        throw error;
      }
    },
    release(conversationId: string) {
      memory.delete(conversationId);
    },
  };
}

/**
 * Invoke a capability with a per-call deadline.
 *
 * The abort signal is handed to the capability; the race guarantees the
 * caller is released at the deadline even if the capability ignores it.
 */
export async function invokeWithTimeout(
  capability: TextCapability,
  prompt: string,
  conversationId: string,
  timeoutMs: number
): Promise<string> {
  const signal = AbortSignal.timeout(timeoutMs);

  let rejectDeadline: (reason: unknown) => void = () => {};
  const deadline = new Promise<never>((_, reject) => {
    rejectDeadline = reject;
  });
  const onAbort = () =>
    rejectDeadline(new CallTimeoutError(capability.name, timeoutMs));
  signal.addEventListener("abort", onAbort, { once: true });

  try {
    return await Promise.race([
      capability.invoke(prompt, { conversationId, signal }),
      deadline,
    ]);
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
}
