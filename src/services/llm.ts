/**
 * LLM integration layer using the Vercel AI SDK.
 * Structured outputs are requested with a zod schema and validated again on return.
 *
 * Providers: Anthropic, OpenAI, Google Generative AI.
 */

import { generateObject } from 'ai';
import type { LanguageModel } from 'ai';
import type { z } from 'zod';
import type { LLMProvider } from '../config.js';
import { LLMError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  apiKey?: string;
  maxTokens?: number;
  /** First retry delay; doubles on each attempt. */
  retryDelayMs?: number;
}

const API_KEY_VARS: Record<LLMProvider, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  google: 'GOOGLE_API_KEY',
};

/**
 * Service for interacting with LLM APIs via AI SDK.
 */
export class LLMService {
  private model: LanguageModel | null = null;
  private modelPromise: Promise<LanguageModel> | null = null;
  private readonly maxTokens: number;
  private readonly retryDelayMs: number;

  constructor(private config: LLMConfig) {
    this.maxTokens = config.maxTokens || 4096;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
  }

  /**
   * Lazy initialization of the model, shared by concurrent callers.
   */
  private async initializeModel(): Promise<LanguageModel> {
    if (this.model) {
      return this.model;
    }
    if (!this.modelPromise) {
      this.modelPromise = this.loadModel().catch((error: unknown) => {
        this.modelPromise = null;
        throw error;
      });
    }
    return this.modelPromise;
  }

  private async loadModel(): Promise<LanguageModel> {
    const { provider, model: modelId, apiKey } = this.config;
    if (!apiKey) {
      throw new LLMError(`No API key configured for LLM provider '${provider}'`, [
        `Set ${API_KEY_VARS[provider]} in the environment or .env file`,
        'Or switch LLM_PROVIDER to a provider you have a key for',
      ]);
    }

    logger.info(`Initializing LLM: ${provider}/${modelId}`);

    let model: LanguageModel;
    switch (provider) {
      case 'anthropic': {
        const { createAnthropic } = await import('@ai-sdk/anthropic');
        model = createAnthropic({ apiKey })(modelId);
        break;
      }

      case 'openai': {
        const { createOpenAI } = await import('@ai-sdk/openai');
        model = createOpenAI({ apiKey })(modelId);
        break;
      }

      case 'google': {
        const { createGoogleGenerativeAI } = await import('@ai-sdk/google');
        model = createGoogleGenerativeAI({ apiKey })(modelId);
        break;
      }
    }

    this.model = model;
    return model;
  }

  /**
   * Call the LLM with a structured output schema.
   *
   * @param temperature Sampling temperature (0.0 for deterministic)
   * @param maxRetries Maximum number of attempts
   * @throws LLMError if all attempts fail
   */
  async callStructured<T>(
    prompt: string,
    system: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    temperature: number = 0.0,
    maxRetries: number = 3,
  ): Promise<T> {
    const model = await this.initializeModel();

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      try {
        const result = await generateObject({
          model,
          system,
          prompt,
          schema,
          temperature,
          maxOutputTokens: this.maxTokens,
          maxRetries: 0,
        });

        logger.info(
          `LLM API call successful (structured) - ` +
            `Input: ${result.usage.inputTokens}, ` +
            `Output: ${result.usage.outputTokens}`,
        );

        return schema.parse(result.object);
      } catch (error) {
        const waitTime = this.retryDelayMs * Math.pow(2, attempt); // 1s, 2s, 4s
        logger.warn(`LLM API call failed (attempt ${attempt + 1}/${maxRetries}): ${error}`);

        if (attempt < maxRetries - 1) {
          await new Promise((resolve) => setTimeout(resolve, waitTime));
        } else {
          throw new LLMError(`LLM API failed after ${maxRetries} attempts: ${error}`);
        }
      }
    }

    throw new LLMError('Unexpected error in callStructured');
  }
}
