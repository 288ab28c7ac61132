/**
 * @fileoverview OpenAI-compatible HTTP provider
 *
 * One client serves both the embedding and the completion side of the
 * pipeline over the `/embeddings` and `/chat/completions` endpoints that
 * OpenAI, Azure-style gateways, vLLM, Ollama and LM Studio all expose.
 * Responses are validated with zod before anything is read from them.
 *
 * Timeouts are applied by the stages; this client only maps HTTP and
 * payload problems to errors.
 */

import { z } from 'zod';
import type { ChatMessage } from '../types.js';
import type { CompletionProvider, EmbeddingProvider } from './types.js';

// ============================================================================
// CONFIG
// ============================================================================

export interface OpenAiCompatibleConfig {
  baseUrl: string;
  apiKey?: string;
  chatModel: string;
  embeddingModel: string;
  temperature?: number;
  maxTokens?: number;
  /** System message sent ahead of every completion */
  systemPrompt?: string;
}

// ============================================================================
// RESPONSE SCHEMAS
// ============================================================================

const embeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        embedding: z.array(z.number()),
        index: z.number().int().optional(),
      })
    )
    .min(1),
});

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          role: z.string().optional(),
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
});

// ============================================================================
// CLIENT
// ============================================================================

const normalizeBaseUrl = (baseUrl: string): string => (baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`);

export class OpenAiCompatibleClient implements EmbeddingProvider, CompletionProvider {
  readonly name = 'openai-compatible';

  constructor(private readonly config: OpenAiCompatibleConfig) {}

  async embed(text: string): Promise<number[]> {
    const payload = await this.post('embeddings', {
      model: this.config.embeddingModel,
      input: text,
    });
    const parsed = embeddingResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error(`OpenAI-compatible embeddings response invalid: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    const [first] = parsed.data.data;
    return first ? first.embedding : [];
  }

  async complete(prompt: string, history: readonly ChatMessage[] = []): Promise<string> {
    const messages: Array<{ role: string; content: string }> = [];
    if (this.config.systemPrompt) {
      messages.push({ role: 'system', content: this.config.systemPrompt });
    }
    for (const message of history) {
      messages.push({ role: message.role, content: message.content });
    }
    messages.push({ role: 'user', content: prompt });

    const payload = await this.post('chat/completions', {
      model: this.config.chatModel,
      messages,
      temperature: this.config.temperature,
      max_tokens: this.config.maxTokens,
      stream: false,
    });
    const parsed = chatResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error(`OpenAI-compatible chat response invalid: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    return parsed.data.choices[0]?.message.content ?? '';
  }

  private async post(path: string, body: Record<string, unknown>): Promise<unknown> {
    const url = new URL(path, normalizeBaseUrl(this.config.baseUrl)).toString();
    const headers: Record<string, string> = {
      'content-type': 'application/json',
    };
    if (this.config.apiKey) {
      headers.authorization = `Bearer ${this.config.apiKey}`;
    }

    const response = await fetch(url, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const errorBody = await response.text();
      throw new Error(`OpenAI-compatible error ${response.status}: ${errorBody.slice(0, 500)}`);
    }

    return response.json();
  }
}
