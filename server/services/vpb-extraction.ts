/**
 * VPB Extraction
 *
 * Laat een taalmodel de cijfers uit de documenttekst halen in het JSON contract
 * dat `processFinancialDocument` verwacht. De berekening zelf gebeurt nooit in het model.
 */

import { AIError } from "@shared/errors";
import { EXTRACTION_CONFIG, type ExtractionConfig } from "../config";
import type { BaseAIHandler } from "./ai-models/base-handler";
import { OpenAIStandardHandler } from "./ai-models/openai-standard-handler";
import { logger } from "./logger";

export const VPB_EXTRACTION_PROMPT = `
You read financial statements of Dutch companies and return the figures needed for a
corporate income tax (VPB) computation. You only extract; you never calculate tax.

Return exactly one JSON object with this shape:
{
  "company_name": string | null,
  "country": string | null,
  "accounting_period_year": string | null,
  "currency": string | null,
  "quarters": {
    "Q1": <period>, "Q2": <period>, "Q3": <period>, "Q4": <period>
  },
  "overall_figures_if_available": {
    "available_loss_carryforward_at_start_of_year": number
  }
}

where <period> is:
{
  "total_revenue": number,
  "total_operating_expenses": number,
  "book_depreciation": number,
  "tax_adjustments": {
    "non_deductible_expenses": number,
    "tax_exempt_income": number
  }
}

Rules:
- Amounts are plain numbers without currency symbols or thousand separators.
- Use 0 for any figure the document does not state.
- If the document only reports figures for the whole year, put them under "Q4"
  and set every figure of Q1, Q2 and Q3 to 0.
- "available_loss_carryforward_at_start_of_year" is the balance of unused tax
  losses from earlier years, 0 if not mentioned.
- Do not add keys, comments or text outside the JSON object.
`.trim();

export interface FinancialDataExtractor {
  extract(text: string, tables: string): Promise<unknown>;
}

export function combineExtractionInput(text: string, tables: string): string {
  return `DOCUMENT TEXT:\n${text}\n\nTABLES DATA:\n${tables}`;
}

export function buildExtractionInput(text: string, tables: string, maxChars: number): string {
  return combineExtractionInput(text, tables).slice(0, maxChars);
}

/**
 * Parse de ruwe modeloutput. Alleen een JSON object is bruikbaar als extractie.
 */
export function parseExtractionResponse(content: string, provider: string): object {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw AIError.invalidResponse(provider, 'Model output is not valid JSON', {
      parseError: error instanceof Error ? error.message : String(error),
      preview: content.slice(0, 200),
    });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw AIError.invalidResponse(provider, 'Model output is not a JSON object', {
      preview: content.slice(0, 200),
    });
  }
  return parsed;
}

export interface OpenAIVpbExtractorOptions {
  apiKey?: string;
  handler?: BaseAIHandler;
  config?: ExtractionConfig;
}

export class OpenAIVpbExtractor implements FinancialDataExtractor {
  private readonly handler: BaseAIHandler | null;
  private readonly config: ExtractionConfig;

  constructor(options: OpenAIVpbExtractorOptions = {}) {
    this.config = options.config ?? EXTRACTION_CONFIG;

    if (options.handler) {
      this.handler = options.handler;
    } else if (options.apiKey) {
      this.handler = new OpenAIStandardHandler(options.apiKey, {
        maxRetries: this.config.maxRetries,
        defaultTimeout: this.config.timeoutMs,
      });
    } else {
      this.handler = null;
    }
  }

  async extract(text: string, tables: string): Promise<unknown> {
    if (!this.handler) {
      throw AIError.notConfigured('OpenAI');
    }

    const combined = combineExtractionInput(text, tables);
    const input = combined.slice(0, this.config.maxInputChars);
    logger.info('vpb-extraction', '🔍 Requesting structured figures', {
      model: this.config.model,
      inputChars: input.length,
      truncated: combined.length > this.config.maxInputChars,
    });

    const response = await this.handler.call(
      input,
      {
        provider: this.config.provider,
        model: this.config.model,
        temperature: this.config.temperature,
        maxOutputTokens: this.config.maxOutputTokens,
        jsonMode: true,
      },
      { systemPrompt: VPB_EXTRACTION_PROMPT }
    );

    return parseExtractionResponse(response.content, this.config.model);
  }
}
