import { AIError, ERROR_CODES } from "@shared/errors";
import { RETRY, TIMEOUTS } from "../../config/constants";
import { logger } from "../logger";

export interface AIModelResponse {
  content: string;
  duration: number;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
  metadata?: Record<string, unknown>;
}

export interface AIModelConfig {
  provider: 'openai';
  model: string;
  temperature?: number;
  maxOutputTokens?: number;
  /** Vraag het model om uitsluitend een JSON object terug te geven */
  jsonMode?: boolean;
}

export interface AIModelParameters {
  systemPrompt?: string;
  jobId?: string;
  timeout?: number; // Timeout in milliseconds
}

export interface AIHandlerOptions {
  maxRetries?: number;
  baseRetryDelay?: number;
  defaultTimeout?: number;
}

export abstract class BaseAIHandler {
  protected modelName: string;
  protected maxRetries: number;
  protected baseRetryDelay: number;
  protected defaultTimeout: number;

  constructor(modelName: string, options: AIHandlerOptions = {}) {
    this.modelName = modelName;
    this.maxRetries = options.maxRetries ?? RETRY.MAX_ATTEMPTS;
    this.baseRetryDelay = options.baseRetryDelay ?? RETRY.BASE_DELAY_MS;
    this.defaultTimeout = options.defaultTimeout ?? TIMEOUTS.AI_REQUEST;
  }

  // Abstract methods that each handler must implement
  abstract callInternal(prompt: string, config: AIModelConfig, options?: AIModelParameters & { signal?: AbortSignal }): Promise<AIModelResponse>;
  abstract validateParameters(config: AIModelConfig): void;

  // Main call method with retry logic
  async call(prompt: string, config: AIModelConfig, options?: AIModelParameters): Promise<AIModelResponse> {
    const jobId = options?.jobId;

    if (!prompt.trim()) {
      throw new AIError('Prompt is empty', ERROR_CODES.VALIDATION_FAILED, 400);
    }
    this.validateParameters(config);

    let lastError: unknown;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        return await this.callWithTimeout(prompt, config, options);
      } catch (error) {
        lastError = error;

        if (!(error instanceof AIError) || !error.isRetryable || attempt === this.maxRetries) {
          this.logError(jobId, error);
          break;
        }

        const delay = error.retryAfter || this.calculateRetryDelay(attempt);
        logger.warn(this.modelName, `Retry ${attempt + 1}/${this.maxRetries} in ${delay}ms`, {
          jobId,
          reason: error.message,
        });
        await this.sleep(delay);
      }
    }

    if (lastError instanceof Error) throw lastError;
    throw new AIError(`Unknown error during ${this.modelName} call`);
  }

  // Call with unified timeout handling
  private async callWithTimeout(prompt: string, config: AIModelConfig, options?: AIModelParameters): Promise<AIModelResponse> {
    const timeout = options?.timeout || this.defaultTimeout;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      return await this.callInternal(prompt, config, { ...options, signal: controller.signal });
    } catch (error) {
      if (controller.signal.aborted) {
        throw AIError.timeout(config.model, timeout);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  protected calculateRetryDelay(attempt: number): number {
    return Math.min(this.baseRetryDelay * Math.pow(2, attempt), RETRY.MAX_DELAY_MS);
  }

  protected sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  protected logStart(jobId: string | undefined, additionalInfo?: Record<string, unknown>) {
    logger.info(this.modelName, `🚀 [${jobId || 'unknown'}] Starting call`, additionalInfo);
  }

  protected logSuccess(jobId: string | undefined, response: AIModelResponse) {
    logger.info(this.modelName, `✅ [${jobId || 'unknown'}] Response received`, {
      contentLength: response.content.length,
      duration: `${response.duration}ms`,
      usage: response.usage,
    });
  }

  protected logError(jobId: string | undefined, error: unknown) {
    const details: Record<string, unknown> = { jobId };
    if (error instanceof AIError) {
      details.errorCode = error.code;
      details.category = error.category;
      details.isRetryable = error.isRetryable;
    }
    logger.error(this.modelName, 'Call failed', details, error instanceof Error ? error : undefined);
  }
}
