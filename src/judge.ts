/**
 * Structured-output judgment calls (duplicate adjudication, reranking)
 */

import { zodResponseFormat } from 'openai/helpers/zod';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { z } from 'zod';
import { hashCacheKey, ResponseCache } from './cache';
import { errorMessage } from './errors';
import { logger } from './logger';
import type { JudgeResult } from './types';

const log = logger.child({ module: 'judge' });

/** A named result schema; the name is sent to the model with the JSON schema */
export interface JudgmentSchema<T> {
  name: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface JudgmentProvider {
  judge<T>(
    systemPrompt: string,
    userPrompt: string,
    resultSchema: JudgmentSchema<T>
  ): Promise<JudgeResult<T>>;
}

/** The slice of the OpenAI client this module calls */
export interface ChatClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface JudgeOptions {
  model: string;
  maxTokens?: number;
}

/**
 * Judgment provider backed by chat completions with a `json_schema` response
 * format. Raw JSON payloads are cached; they are validated against the
 * schema on every read, and a payload that no longer validates is evicted.
 */
export class OpenAIJudgmentProvider implements JudgmentProvider {
  private client: ChatClient;
  private cache: ResponseCache<unknown>;
  private model: string;
  private maxTokens: number;

  constructor(client: ChatClient, cache: ResponseCache<unknown>, options: JudgeOptions) {
    this.client = client;
    this.cache = cache;
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 1000;
  }

  async judge<T>(
    systemPrompt: string,
    userPrompt: string,
    resultSchema: JudgmentSchema<T>
  ): Promise<JudgeResult<T>> {
    const responseFormat = zodResponseFormat(resultSchema.schema, resultSchema.name);
    const key = hashCacheKey(
      'judge',
      this.model,
      systemPrompt,
      userPrompt,
      resultSchema.name,
      JSON.stringify(responseFormat.json_schema.schema)
    );

    const cached = this.cache.get(key);
    if (cached !== undefined) {
      const revalidated = resultSchema.schema.safeParse(cached);
      if (revalidated.success) {
        log.debug({ schema: resultSchema.name }, 'judgment cache hit');
        return { ok: true, value: revalidated.data };
      }
      log.warn(
        { schema: resultSchema.name, issues: revalidated.error.issues.length },
        'cached judgment failed validation; evicting'
      );
      this.cache.delete(key);
    }

    let content: string | null;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        response_format: responseFormat,
        max_tokens: this.maxTokens,
      });
      content = completion.choices[0]?.message.content ?? null;
    } catch (err) {
      const error = `LLM API call failed: ${errorMessage(err)}`;
      log.error({ schema: resultSchema.name }, error);
      return { ok: false, error };
    }

    if (!content) {
      const error = 'LLM returned an empty response';
      log.error({ schema: resultSchema.name }, error);
      return { ok: false, error };
    }

    let payload: unknown;
    try {
      payload = JSON.parse(content);
    } catch (err) {
      const error = `Failed to parse JSON response: ${errorMessage(err)}`;
      log.error({ schema: resultSchema.name, content }, error);
      return { ok: false, error };
    }

    const parsed = resultSchema.schema.safeParse(payload);
    if (!parsed.success) {
      const error = `Failed to validate response data: ${parsed.error.message}`;
      log.error({ schema: resultSchema.name }, error);
      return { ok: false, error };
    }

    this.cache.set(key, payload);
    return { ok: true, value: parsed.data };
  }
}
