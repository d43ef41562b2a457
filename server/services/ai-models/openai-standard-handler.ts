import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import { BaseAIHandler, type AIHandlerOptions, type AIModelConfig, type AIModelParameters, type AIModelResponse } from "./base-handler";
import { AIError, ERROR_CODES } from "@shared/errors";

const PROVIDER = 'OpenAI Standard';

export type ChatCompletionCreate = (
  body: ChatCompletionCreateParamsNonStreaming,
  options: { signal?: AbortSignal }
) => Promise<ChatCompletion>;

type ResponseHeaders = Record<string, string | null | undefined>;

/**
 * `retry-after` in seconden of als HTTP datum, omgezet naar milliseconden.
 */
export function parseRetryAfter(headers: ResponseHeaders | undefined, now = Date.now()): number | undefined {
  const value = headers?.['retry-after']?.trim();
  if (!value) {
    return undefined;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? Math.round(seconds * 1000) : undefined;
  }

  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

export class OpenAIStandardHandler extends BaseAIHandler {
  private createCompletion: ChatCompletionCreate;

  constructor(apiKey: string, options: AIHandlerOptions = {}, createCompletion?: ChatCompletionCreate) {
    super(PROVIDER, options);
    if (createCompletion) {
      this.createCompletion = createCompletion;
    } else {
      // Retries doen we zelf in BaseAIHandler
      const client = new OpenAI({ apiKey, maxRetries: 0 });
      this.createCompletion = (body, requestOptions) => client.chat.completions.create(body, requestOptions);
    }
  }

  async callInternal(
    prompt: string,
    config: AIModelConfig,
    options?: AIModelParameters & { signal?: AbortSignal }
  ): Promise<AIModelResponse> {
    const startTime = Date.now();
    const jobId = options?.jobId;

    this.logStart(jobId, {
      model: config.model,
      promptLength: prompt.length,
      temperature: config.temperature,
      maxOutputTokens: config.maxOutputTokens,
      jsonMode: config.jsonMode ?? false,
    });

    const messages: ChatCompletionMessageParam[] = [];
    if (options?.systemPrompt) {
      messages.push({ role: "system", content: options.systemPrompt });
    }
    messages.push({ role: "user", content: prompt });

    try {
      const response = await this.createCompletion(
        {
          model: config.model,
          messages,
          temperature: config.temperature,
          max_tokens: config.maxOutputTokens,
          ...(config.jsonMode ? { response_format: { type: "json_object" as const } } : {}),
        },
        { signal: options?.signal }
      );
      const duration = Date.now() - startTime;
      const content = response.choices[0]?.message?.content || "";

      if (!content) {
        throw AIError.invalidResponse(PROVIDER, `Empty response from ${config.model}`);
      }

      const result: AIModelResponse = {
        content,
        duration,
        usage: response.usage,
        metadata: {
          model: config.model,
          finishReason: response.choices[0]?.finish_reason,
        },
      };

      this.logSuccess(jobId, result);
      return result;
    } catch (error) {
      if (error instanceof AIError) {
        throw error;
      }

      // Connection errors hebben geen HTTP status
      if (error instanceof OpenAI.APIConnectionError) {
        throw AIError.networkError(PROVIDER, error);
      }

      if (error instanceof OpenAI.APIError && error.status !== undefined) {
        throw AIError.fromHttpError(error.status, PROVIDER, error.message, parseRetryAfter(error.headers));
      }

      const message = error instanceof Error ? error.message : `Unknown ${PROVIDER} error`;
      throw new AIError(message, ERROR_CODES.EXTERNAL_API_ERROR);
    }
  }

  validateParameters(config: AIModelConfig): void {
    if (config.temperature !== undefined && (config.temperature < 0 || config.temperature > 2)) {
      throw new AIError(`Temperature must be between 0 and 2 for OpenAI, got ${config.temperature}`, ERROR_CODES.VALIDATION_FAILED, 400);
    }
    if (config.maxOutputTokens !== undefined && config.maxOutputTokens < 1) {
      throw new AIError(`MaxOutputTokens must be greater than 0 for OpenAI, got ${config.maxOutputTokens}`, ERROR_CODES.VALIDATION_FAILED, 400);
    }
  }
}
