import Anthropic from "@anthropic-ai/sdk";
import { OracleError, errorMessage } from "../errors.js";
import { logOracle } from "../logging.js";
import { withTimeout } from "../retry.js";
import { failAll, parseOracleResponse } from "./parse.js";
import { SYSTEM_PROMPT, buildUserPrompt, hashPrompt } from "./prompt.js";
import type { Oracle, OracleBatch, OracleResult } from "./types.js";

export interface AnthropicOracleOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

interface MessageParams {
  model: string;
  max_tokens: number;
  temperature: number;
  system: Array<{ type: "text"; text: string; cache_control: { type: "ephemeral" } }>;
  messages: Array<{ role: "user"; content: string }>;
}

interface MessageResponse {
  content: Array<{ type: string; text?: string }>;
  usage: { input_tokens: number; output_tokens: number };
  stop_reason: string | null;
}

/** The slice of the SDK client used here; tests pass a stub. */
export interface MessagesClient {
  messages: {
    create(params: MessageParams): Promise<MessageResponse>;
  };
}

export class AnthropicOracle implements Oracle {
  private client: MessagesClient | null;

  constructor(
    private readonly opts: AnthropicOracleOptions,
    client?: MessagesClient,
  ) {
    this.client = client ?? null;
  }

  private getClient(): MessagesClient {
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.opts.apiKey });
    }
    return this.client;
  }

  async evaluate(batch: OracleBatch): Promise<OracleResult> {
    const start = Date.now();
    const userPrompt = buildUserPrompt(batch);
    const promptHash = hashPrompt(SYSTEM_PROMPT, userPrompt);

    let raw: string;
    try {
      const response = await withTimeout(
        this.getClient().messages.create({
          model: this.opts.model,
          max_tokens: this.opts.maxTokens,
          temperature: this.opts.temperature,
          system: [
            {
              type: "text",
              text: SYSTEM_PROMPT,
              cache_control: { type: "ephemeral" },
            },
          ],
          messages: [{ role: "user", content: userPrompt }],
        }),
        this.opts.timeoutMs,
        "oracle",
      );
      const first = response.content[0];
      raw = first?.type === "text" && typeof first.text === "string" ? first.text : "";
      logOracle.debug(
        {
          promptHash,
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
          stopReason: response.stop_reason,
        },
        "Oracle responded",
      );
    } catch (e: unknown) {
      const error = new OracleError(`Oracle call failed: ${errorMessage(e)}`, null, { cause: e });
      logOracle.error({ err: e, promptHash, candidates: batch.candidates.length }, "Oracle call failed");
      return { ...failAll(batch, error), promptHash, latencyMs: Date.now() - start };
    }

    const parsed = parseOracleResponse(raw, batch);
    if (parsed.callError) {
      logOracle.error({ promptHash, error: parsed.callError.message }, "Oracle response rejected");
    }
    return { ...parsed, promptHash, latencyMs: Date.now() - start };
  }
}
