/**
 * Tests for BaseAIHandler retry, timeout and error handling.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { BaseAIHandler, type AIHandlerOptions, type AIModelConfig, type AIModelParameters, type AIModelResponse } from '../base-handler';
import { AIError, ERROR_CODES } from '@shared/errors';

// Mock implementation for testing
class TestAIHandler extends BaseAIHandler {
  public callCount = 0;
  public mockResponses: Array<AIModelResponse | Error> = [];
  public sleeps: number[] = [];

  constructor(options: AIHandlerOptions = {}) {
    super('test-model', options);
  }

  async callInternal(
    _prompt: string,
    _config: AIModelConfig,
    _options?: AIModelParameters & { signal?: AbortSignal }
  ): Promise<AIModelResponse> {
    this.callCount++;

    const response = this.mockResponses.shift();
    if (response === undefined) {
      return { content: 'Test response', duration: 100 };
    }
    if (response instanceof Error) {
      throw response;
    }
    return response;
  }

  validateParameters(config: AIModelConfig): void {
    if (config.temperature !== undefined && config.temperature < 0) {
      throw new AIError('Temperature must be positive', ERROR_CODES.VALIDATION_FAILED, 400);
    }
  }

  // Geen echte vertraging in tests
  protected override sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    return Promise.resolve();
  }

  public testCalculateRetryDelay(attempt: number): number {
    return this.calculateRetryDelay(attempt);
  }
}

/** Wacht tot het verzoek wordt afgebroken */
class HangingHandler extends BaseAIHandler {
  callInternal(
    _prompt: string,
    _config: AIModelConfig,
    options?: AIModelParameters & { signal?: AbortSignal }
  ): Promise<AIModelResponse> {
    return new Promise((_resolve, reject) => {
      options?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
    });
  }

  validateParameters(): void {}
}

const config: AIModelConfig = { provider: 'openai', model: 'gpt-test', temperature: 0 };

describe('BaseAIHandler', () => {
  let handler: TestAIHandler;

  beforeEach(() => {
    handler = new TestAIHandler({ maxRetries: 2, baseRetryDelay: 1000 });
  });

  it('returns the response on the first successful call', async () => {
    const response = await handler.call('Test prompt', config);

    expect(response.content).toBe('Test response');
    expect(handler.callCount).toBe(1);
  });

  it('rejects an empty prompt without calling the provider', async () => {
    await expect(handler.call('   ', config)).rejects.toMatchObject({ code: ERROR_CODES.VALIDATION_FAILED });
    expect(handler.callCount).toBe(0);
  });

  it('validates parameters before calling', async () => {
    await expect(handler.call('Test prompt', { ...config, temperature: -1 })).rejects.toThrow('Temperature must be positive');
    expect(handler.callCount).toBe(0);
  });

  it('retries retryable errors with exponential backoff', async () => {
    const error503 = AIError.fromHttpError(503, 'test-provider');
    handler.mockResponses = [error503, error503, { content: 'Success after retries', duration: 10 }];

    const response = await handler.call('Test prompt', config);

    expect(response.content).toBe('Success after retries');
    expect(handler.callCount).toBe(3);
    expect(handler.sleeps).toEqual([1000, 2000]);
  });

  it('uses retryAfter when the provider sends one', async () => {
    handler.mockResponses = [
      new AIError('slow down', ERROR_CODES.AI_RATE_LIMITED, 503, { isRetryable: true, retryAfter: 5000, category: 'rate_limit' }),
    ];

    await handler.call('Test prompt', config);

    expect(handler.sleeps).toEqual([5000]);
  });

  it('does not retry authentication errors', async () => {
    handler.mockResponses = [AIError.fromHttpError(401, 'test-provider')];

    await expect(handler.call('Test prompt', config)).rejects.toMatchObject({
      code: ERROR_CODES.AI_AUTHENTICATION_FAILED,
      category: 'authentication',
    });
    expect(handler.callCount).toBe(1);
  });

  it('does not retry plain errors', async () => {
    handler.mockResponses = [new Error('unexpected')];

    await expect(handler.call('Test prompt', config)).rejects.toThrow('unexpected');
    expect(handler.callCount).toBe(1);
  });

  it('throws the last error after max retries', async () => {
    const networkError = AIError.networkError('test-provider', new Error('ECONNREFUSED'));
    handler.mockResponses = [networkError, networkError, networkError];

    await expect(handler.call('Test prompt', config)).rejects.toBe(networkError);
    expect(handler.callCount).toBe(3);
  });

  it('caps the retry delay', () => {
    expect(handler.testCalculateRetryDelay(0)).toBe(1000);
    expect(handler.testCalculateRetryDelay(3)).toBe(8000);
    expect(handler.testCalculateRetryDelay(10)).toBe(10_000);
  });

  it('converts an aborted call into a timeout error', async () => {
    const hanging = new HangingHandler('hanging-model', { maxRetries: 0 });

    await expect(hanging.call('Test prompt', config, { timeout: 20 })).rejects.toMatchObject({
      category: 'timeout',
      statusCode: 504,
      message: 'Request to gpt-test timed out after 20ms',
    });
  });
});
