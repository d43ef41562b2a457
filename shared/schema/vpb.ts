/**
 * VPB Schema - Data model voor de vennootschapsbelasting berekening
 *
 * ## Principe:
 * - LLM extraheert ruwe cijfers per kwartaal → `VpbExtraction`
 * - Backend rekent ermee (deterministic) → `PeriodComputation` / `AnnualReport`
 * - Ontbrekende of onleesbare bedragen worden 0, nooit een fout
 *
 * De snake_case velden volgen het JSON contract van de AI extractie.
 */

import { z } from "zod";
import type { QuarterLabel } from "../constants";

// ═══════════════════════════════════════════════════════════════════════════
// INPUT COERCION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Een bedrag uit de extractie. Getallen en numerieke strings worden geaccepteerd,
 * al het andere (null, "n.v.t.", NaN, objecten) wordt 0.
 */
export const amountSchema = z.preprocess(
  (value) => (typeof value === "string" ? Number(value.trim()) : value),
  z.number().finite()
).catch(0);

const nonNegativeAmountSchema = amountSchema.transform((value) => Math.max(0, value));

const optionalTextSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .nullable()
  .catch(null);

export const taxAdjustmentsSchema = z.object({
  non_deductible_expenses: amountSchema,
  tax_exempt_income: amountSchema,
}).catch(() => ({ non_deductible_expenses: 0, tax_exempt_income: 0 }));

const periodFiguresObjectSchema = z.object({
  total_revenue: amountSchema,
  total_operating_expenses: amountSchema,
  book_depreciation: amountSchema,
  tax_adjustments: taxAdjustmentsSchema,
});

export type PeriodFigures = z.infer<typeof periodFiguresObjectSchema>;

export const periodFiguresSchema = periodFiguresObjectSchema.catch(() => emptyPeriodFigures());

export function emptyPeriodFigures(): PeriodFigures {
  return {
    total_revenue: 0,
    total_operating_expenses: 0,
    book_depreciation: 0,
    tax_adjustments: { non_deductible_expenses: 0, tax_exempt_income: 0 },
  };
}

export const quarterFiguresSchema = z.object({
  Q1: periodFiguresSchema,
  Q2: periodFiguresSchema,
  Q3: periodFiguresSchema,
  Q4: periodFiguresSchema,
}).catch(() => ({
  Q1: emptyPeriodFigures(),
  Q2: emptyPeriodFigures(),
  Q3: emptyPeriodFigures(),
  Q4: emptyPeriodFigures(),
}));

export type QuarterFigures = Record<QuarterLabel, PeriodFigures>;

const vpbExtractionObjectSchema = z.object({
  company_name: optionalTextSchema,
  country: optionalTextSchema,
  accounting_period_year: optionalTextSchema,
  currency: optionalTextSchema,
  quarters: quarterFiguresSchema,
  overall_figures_if_available: z.object({
    available_loss_carryforward_at_start_of_year: nonNegativeAmountSchema,
  }).catch(() => ({ available_loss_carryforward_at_start_of_year: 0 })),
});

export type VpbExtraction = z.infer<typeof vpbExtractionObjectSchema>;

/** Een extractie die geen object is levert een lege extractie op */
export const vpbExtractionSchema = vpbExtractionObjectSchema.catch(() => vpbExtractionObjectSchema.parse({}));

// ═══════════════════════════════════════════════════════════════════════════
// COMPUTATION TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface CompanyContext {
  companyName: string | null;
  accountingYear: string | null;
  /** Compensabele verliezen aan het begin van het jaar, altijd >= 0 */
  availableLossCarryforward: number;
}

export interface PeriodComputation {
  revenue: number;
  /** Operationele kosten + afschrijvingen */
  totalExpenses: number;
  accountingProfitBeforeTax: number;
  nonDeductibleExpenses: number;
  taxExemptIncome: number;
  /** Mag negatief zijn (verlies) */
  taxableProfit: number;
  /** Nooit negatief */
  taxOwed: number;
}

export interface QuarterComputation {
  label: QuarterLabel;
  computation: PeriodComputation;
}

export interface LossOffset {
  offsetFirstMillion: number;
  offsetRemainder: number;
  lossesUtilized: number;
}

export interface AnnualReport {
  context: CompanyContext;
  /** Alleen kwartalen met omzet > 0, in vaste Q1..Q4 volgorde */
  quarters: QuarterComputation[];
  /** Som van alle kwartaalberekeningen */
  totals: PeriodComputation;
  profitBeforeLosses: number;
  lossOffset: LossOffset;
  finalTaxableProfit: number;
  finalTaxOwed: number;
  auditFlags: string[];
}

export type VpbComputationError =
  | { type: "NO_VALID_PERIODS"; message: string }
  | { type: "COMPUTATION_FAILED"; message: string; cause: string };

export type VpbResult<T> =
  | { success: true; data: T }
  | { success: false; error: VpbComputationError };

export type VpbComputationResult = VpbResult<AnnualReport>;

// ═══════════════════════════════════════════════════════════════════════════
// RESPONSE PAYLOAD
// ═══════════════════════════════════════════════════════════════════════════

export interface BreakdownLine {
  label: string;
  value: number;
}

export type Breakdown = Record<string, number>;

export interface VpbTaxReportPayload {
  company_info: { name: string | null; year: string | null };
  quarters: Partial<Record<QuarterLabel, Breakdown>>;
  overall: Breakdown;
  audit_flags: string[];
  raw_ai_extraction: unknown;
}

export type VpbProcessingResult = VpbResult<VpbTaxReportPayload>;
