/**
 * VPB Period Calculator
 *
 * Stap-voor-stap belastingberekening voor één periode (kwartaal),
 * vóór jaarcorrecties zoals verliesverrekening.
 */

import { VPB_RATES } from "@shared/constants";
import type { PeriodComputation, PeriodFigures } from "@shared/schema/vpb";

/**
 * Progressief tarief. Werkt ook voor negatieve winst (levert dan negatieve belasting op);
 * de aanroeper rondt af naar 0.
 */
export function applyRateSchedule(taxableProfit: number): number {
  const { LOW_BRACKET_LIMIT, LOW_RATE, HIGH_RATE } = VPB_RATES;

  if (taxableProfit <= LOW_BRACKET_LIMIT) {
    return taxableProfit * LOW_RATE;
  }
  return LOW_BRACKET_LIMIT * LOW_RATE + (taxableProfit - LOW_BRACKET_LIMIT) * HIGH_RATE;
}

export function computePeriod(figures: PeriodFigures): PeriodComputation {
  const revenue = figures.total_revenue;
  const expenses = figures.total_operating_expenses;
  const depreciation = figures.book_depreciation;
  const { non_deductible_expenses: nonDeductible, tax_exempt_income: taxExempt } = figures.tax_adjustments;

  // Step 1: Accounting Profit Before Tax
  const apbt = revenue - expenses - depreciation;

  // Step 2: fiscale correcties
  const taxableProfit = apbt + nonDeductible - taxExempt;

  // Step 3: tarief, een verliesperiode levert nooit negatieve belasting op
  const taxOwed = Math.max(0, applyRateSchedule(taxableProfit));

  return {
    revenue,
    totalExpenses: expenses + depreciation,
    accountingProfitBeforeTax: apbt,
    nonDeductibleExpenses: nonDeductible,
    taxExemptIncome: taxExempt,
    taxableProfit,
    taxOwed,
  };
}
