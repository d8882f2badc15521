import { beforeEach, describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { LLMService } from '../src/services/llm.js';
import { LLMError } from '../src/types/errors.js';

const { generateObject } = vi.hoisted(() => ({ generateObject: vi.fn() }));

vi.mock('ai', () => ({ generateObject }));

const AnswerSchema = z.object({ answer: z.number() });

function reply(object: unknown) {
  return { object, usage: { inputTokens: 12, outputTokens: 3 } };
}

describe('LLMService.callStructured', () => {
  beforeEach(() => {
    generateObject.mockReset();
  });

  const service = () =>
    new LLMService({ provider: 'anthropic', model: 'test-model', apiKey: 'test-secret', retryDelayMs: 0 });

  it('returns the validated object', async () => {
    generateObject.mockResolvedValueOnce(reply({ answer: 42 }));

    const result = await service().callStructured('question', 'system text', AnswerSchema);

    expect(result).toEqual({ answer: 42 });
    expect(generateObject).toHaveBeenCalledWith(
      expect.objectContaining({
        prompt: 'question',
        system: 'system text',
        schema: AnswerSchema,
        temperature: 0,
        maxOutputTokens: 4096,
        maxRetries: 0,
      }),
    );
  });

  it('retries after a failed call', async () => {
    generateObject.mockRejectedValueOnce(new Error('overloaded')).mockResolvedValueOnce(reply({ answer: 1 }));

    expect(await service().callStructured('q', 's', AnswerSchema)).toEqual({ answer: 1 });
    expect(generateObject).toHaveBeenCalledTimes(2);
  });

  it('retries when the object does not match the schema', async () => {
    generateObject.mockResolvedValueOnce(reply({ answer: 'many' })).mockResolvedValueOnce(reply({ answer: 2 }));

    expect(await service().callStructured('q', 's', AnswerSchema)).toEqual({ answer: 2 });
  });

  it('gives up after the last attempt', async () => {
    generateObject.mockRejectedValue(new Error('overloaded'));

    await expect(service().callStructured('q', 's', AnswerSchema, 0, 3)).rejects.toThrow(
      /^LLM API failed after 3 attempts: Error: overloaded/,
    );
    expect(generateObject).toHaveBeenCalledTimes(3);
  });

  it('reports a missing API key before calling the provider', async () => {
    const keyless = new LLMService({ provider: 'openai', model: 'test-model' });

    const failure = keyless.callStructured('q', 's', AnswerSchema);

    await expect(failure).rejects.toBeInstanceOf(LLMError);
    await expect(failure).rejects.toMatchObject({
      suggestions: expect.arrayContaining(['Set OPENAI_API_KEY in the environment or .env file']),
    });
    expect(generateObject).not.toHaveBeenCalled();
  });
});
