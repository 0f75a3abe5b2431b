/**
 * In-process stand-ins for the embedding and judgment providers
 */

import type { JudgmentProvider, JudgmentSchema } from './judge';
import type { EmbeddingProvider, EmbeddingVector, JudgeResult } from './types';

/** Returns a fixed vector per text; unknown texts get `fallback` */
export class FakeEmbeddings implements EmbeddingProvider {
  calls: string[] = [];
  /** Number of upcoming calls that reject */
  failures = 0;
  private vectors = new Map<string, EmbeddingVector>();
  private fallback: EmbeddingVector;

  constructor(fallback: EmbeddingVector = [1, 0, 0]) {
    this.fallback = fallback;
  }

  define(text: string, vector: EmbeddingVector): this {
    this.vectors.set(text, vector);
    return this;
  }

  async embed(text: string): Promise<EmbeddingVector> {
    this.calls.push(text);
    if (this.failures > 0) {
      this.failures--;
      throw new Error('embedding transport down');
    }
    return this.vectors.get(text) ?? this.fallback;
  }
}

export interface JudgeCall {
  systemPrompt: string;
  userPrompt: string;
  schemaName: string;
}

/**
 * Judgment provider whose payload comes from `reply`. The payload is
 * validated against the requested schema as the real provider does; a thrown
 * error becomes `{ ok: false }`.
 */
export class ScriptedJudge implements JudgmentProvider {
  calls: JudgeCall[] = [];
  reply: (call: JudgeCall) => unknown;

  constructor(reply: (call: JudgeCall) => unknown = () => ({})) {
    this.reply = reply;
  }

  async judge<T>(
    systemPrompt: string,
    userPrompt: string,
    resultSchema: JudgmentSchema<T>
  ): Promise<JudgeResult<T>> {
    const call = { systemPrompt, userPrompt, schemaName: resultSchema.name };
    this.calls.push(call);

    let payload: unknown;
    try {
      payload = this.reply(call);
    } catch (err) {
      return { ok: false, error: err instanceof Error ? err.message : String(err) };
    }

    const parsed = resultSchema.schema.safeParse(payload);
    return parsed.success
      ? { ok: true, value: parsed.data }
      : { ok: false, error: parsed.error.message };
  }
}
