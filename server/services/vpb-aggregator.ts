/**
 * VPB Annual Aggregator
 *
 * 1. Berekent elk kwartaal met omzet apart (vpb-calculator)
 * 2. Telt de kwartalen op tot een controleerbaar jaartotaal
 * 3. Past jaar-only correcties toe: verliesverrekening
 * 4. Berekent de jaarbelasting op de winst na verliesverrekening
 */

import { LOSS_CARRYFORWARD, QUARTER_LABELS } from "@shared/constants";
import type {
  AnnualReport,
  CompanyContext,
  LossOffset,
  PeriodComputation,
  QuarterComputation,
  QuarterFigures,
  VpbComputationError,
  VpbComputationResult,
} from "@shared/schema/vpb";
import { applyRateSchedule, computePeriod } from "./vpb-calculator";
import { deriveAuditFlags } from "./vpb-audit-flags";
import { logger } from "./logger";

const NO_LOSS_OFFSET: LossOffset = { offsetFirstMillion: 0, offsetRemainder: 0, lossesUtilized: 0 };

/**
 * Verliesverrekening: winst tot €1.000.000 volledig, daarboven maximaal 50%.
 */
export function computeLossOffset(profitBeforeLosses: number, availableLosses: number): LossOffset {
  if (profitBeforeLosses <= 0 || availableLosses <= 0) {
    return { ...NO_LOSS_OFFSET };
  }

  const { FULL_OFFSET_THRESHOLD, EXCESS_OFFSET_RATIO } = LOSS_CARRYFORWARD;

  if (profitBeforeLosses <= FULL_OFFSET_THRESHOLD) {
    const lossesUtilized = Math.min(profitBeforeLosses, availableLosses);
    return { offsetFirstMillion: lossesUtilized, offsetRemainder: 0, lossesUtilized };
  }

  const offsetFirstMillion = Math.min(FULL_OFFSET_THRESHOLD, availableLosses);
  const remainingProfit = profitBeforeLosses - FULL_OFFSET_THRESHOLD;
  const remainingLosses = availableLosses - offsetFirstMillion;
  const offsetRemainder = Math.min(remainingProfit * EXCESS_OFFSET_RATIO, remainingLosses);

  return {
    offsetFirstMillion,
    offsetRemainder,
    lossesUtilized: offsetFirstMillion + offsetRemainder,
  };
}

export function sumComputations(computations: PeriodComputation[]): PeriodComputation {
  return computations.reduce<PeriodComputation>(
    (total, c) => ({
      revenue: total.revenue + c.revenue,
      totalExpenses: total.totalExpenses + c.totalExpenses,
      accountingProfitBeforeTax: total.accountingProfitBeforeTax + c.accountingProfitBeforeTax,
      nonDeductibleExpenses: total.nonDeductibleExpenses + c.nonDeductibleExpenses,
      taxExemptIncome: total.taxExemptIncome + c.taxExemptIncome,
      taxableProfit: total.taxableProfit + c.taxableProfit,
      taxOwed: total.taxOwed + c.taxOwed,
    }),
    {
      revenue: 0,
      totalExpenses: 0,
      accountingProfitBeforeTax: 0,
      nonDeductibleExpenses: 0,
      taxExemptIncome: 0,
      taxableProfit: 0,
      taxOwed: 0,
    }
  );
}

function buildAnnualReport(quarters: QuarterFigures, context: CompanyContext): VpbComputationResult {
  const computed: QuarterComputation[] = [];
  for (const label of QUARTER_LABELS) {
    const figures = quarters[label];
    if (figures.total_revenue > 0) {
      computed.push({ label, computation: computePeriod(figures) });
    }
  }

  if (computed.length === 0) {
    return {
      success: false,
      error: {
        type: 'NO_VALID_PERIODS',
        message: 'No valid quarterly data with revenue was found to process.',
      },
    };
  }

  const totals = sumComputations(computed.map(q => q.computation));
  const profitBeforeLosses = totals.taxableProfit;
  const lossOffset = computeLossOffset(profitBeforeLosses, context.availableLossCarryforward);
  const finalTaxableProfit = profitBeforeLosses - lossOffset.lossesUtilized;
  const finalTaxOwed = Math.max(0, applyRateSchedule(finalTaxableProfit));

  return {
    success: true,
    data: {
      context,
      quarters: computed,
      totals,
      profitBeforeLosses,
      lossOffset,
      finalTaxableProfit,
      finalTaxOwed,
      auditFlags: deriveAuditFlags(totals),
    },
  };
}

export function aggregateAnnual(quarters: QuarterFigures, context: CompanyContext): VpbComputationResult {
  try {
    const result = buildAnnualReport(quarters, context);

    if (result.success) {
      logger.info('vpb-aggregator', 'Annual VPB computed', {
        company: context.companyName,
        year: context.accountingYear,
        quarters: result.data.quarters.map(q => q.label),
        finalTaxOwed: result.data.finalTaxOwed,
      });
    } else {
      logger.warn('vpb-aggregator', result.error.message, { company: context.companyName });
    }

    return result;
  } catch (error) {
    return computationFailed(error);
  }
}

export function computationFailed(error: unknown): { success: false; error: VpbComputationError } {
  const cause = error instanceof Error ? error.message : String(error);
  logger.error('vpb-aggregator', 'Computation failed', { cause }, error instanceof Error ? error : undefined);
  return {
    success: false,
    error: {
      type: 'COMPUTATION_FAILED',
      message: `An error occurred during computation: ${cause}`,
      cause,
    },
  };
}
