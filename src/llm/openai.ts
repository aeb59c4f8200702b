import { z } from "zod";
import type { OpenAIConfig } from "../config/types.js";
import type { ClassificationProvider, EmbeddingProvider } from "./types.js";

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .min(1),
});

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    }),
  ),
});

export class OpenAIHttpError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`OpenAI request failed with status ${status}${body ? `: ${body.slice(0, 200)}` : ""}`);
    this.name = "OpenAIHttpError";
  }
}

export class OpenAIClient implements ClassificationProvider, EmbeddingProvider {
  private readonly baseUrl: string;

  constructor(
    private readonly config: OpenAIConfig,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
  }

  async complete(systemPrompt: string, userText: string): Promise<string> {
    const json = await this.post("/chat/completions", {
      model: this.config.classificationModel,
      temperature: this.config.temperature,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userText },
      ],
    });

    const parsed = chatCompletionSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error("OpenAI chat completion response malformed");
    }
    return (parsed.data.choices[0]?.message.content ?? "").trim();
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const json = await this.post("/embeddings", {
      model: this.config.embeddingModel,
      input: texts,
    });

    const parsed = embeddingResponseSchema.safeParse(json);
    if (!parsed.success || parsed.data.data.length !== texts.length) {
      throw new Error("OpenAI embedding response malformed");
    }
    return [...parsed.data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  private async post(path: string, body: Record<string, unknown>): Promise<unknown> {
    const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new OpenAIHttpError(res.status, text);
    }

    return res.json();
  }
}
