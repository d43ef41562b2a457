import { describe, it, expect } from 'vitest';
import { aggregateAnnual, computeLossOffset, sumComputations } from '../vpb-aggregator';
import { computePeriod } from '../vpb-calculator';
import {
  emptyPeriodFigures,
  type CompanyContext,
  type PeriodFigures,
  type QuarterFigures,
} from '@shared/schema/vpb';

const context: CompanyContext = { companyName: 'Test B.V.', accountingYear: '2024', availableLossCarryforward: 0 };

function quarter(revenue: number, expenses: number, depreciation = 0): PeriodFigures {
  return {
    total_revenue: revenue,
    total_operating_expenses: expenses,
    book_depreciation: depreciation,
    tax_adjustments: { non_deductible_expenses: 0, tax_exempt_income: 0 },
  };
}

function quarters(overrides: Partial<QuarterFigures>): QuarterFigures {
  return {
    Q1: emptyPeriodFigures(),
    Q2: emptyPeriodFigures(),
    Q3: emptyPeriodFigures(),
    Q4: emptyPeriodFigures(),
    ...overrides,
  };
}

describe('computeLossOffset', () => {
  it('uses nothing when there is no profit or no losses', () => {
    expect(computeLossOffset(0, 50_000).lossesUtilized).toBe(0);
    expect(computeLossOffset(-10_000, 50_000).lossesUtilized).toBe(0);
    expect(computeLossOffset(100_000, 0).lossesUtilized).toBe(0);
  });

  it('offsets fully up to the profit below the threshold', () => {
    expect(computeLossOffset(300_000, 50_000)).toEqual({
      offsetFirstMillion: 50_000,
      offsetRemainder: 0,
      lossesUtilized: 50_000,
    });
    expect(computeLossOffset(300_000, 500_000).lossesUtilized).toBe(300_000);
  });

  it('offsets the full million at the boundary', () => {
    expect(computeLossOffset(1_000_000, 1_200_000)).toEqual({
      offsetFirstMillion: 1_000_000,
      offsetRemainder: 0,
      lossesUtilized: 1_000_000,
    });
  });

  it('caps the offset above the threshold at half the excess profit', () => {
    expect(computeLossOffset(1_500_000, 2_000_000)).toEqual({
      offsetFirstMillion: 1_000_000,
      offsetRemainder: 250_000,
      lossesUtilized: 1_250_000,
    });
  });

  it('never uses more than the available losses', () => {
    expect(computeLossOffset(3_000_000, 1_100_000)).toEqual({
      offsetFirstMillion: 1_000_000,
      offsetRemainder: 100_000,
      lossesUtilized: 1_100_000,
    });
    expect(computeLossOffset(3_000_000, 400_000).lossesUtilized).toBe(400_000);
  });
});

describe('sumComputations', () => {
  it('returns zeros for an empty list', () => {
    expect(sumComputations([]).taxableProfit).toBe(0);
  });

  it('adds every field', () => {
    const a = computePeriod(quarter(100_000, 40_000));
    const b = computePeriod(quarter(50_000, 70_000, 5_000));
    const total = sumComputations([a, b]);

    expect(total.revenue).toBe(150_000);
    expect(total.totalExpenses).toBe(115_000);
    expect(total.accountingProfitBeforeTax).toBe(35_000);
    expect(total.taxableProfit).toBe(35_000);
    expect(total.taxOwed).toBeCloseTo(11_400, 6);
  });
});

describe('aggregateAnnual', () => {
  it('computes four identical profitable quarters', () => {
    const q = quarter(100_000, 40_000);
    const result = aggregateAnnual(quarters({ Q1: q, Q2: q, Q3: q, Q4: q }), context);

    expect(result.success).toBe(true);
    if (!result.success) return;

    const report = result.data;
    expect(report.quarters.map(entry => entry.label)).toEqual(['Q1', 'Q2', 'Q3', 'Q4']);
    for (const entry of report.quarters) {
      expect(entry.computation.taxableProfit).toBe(60_000);
      expect(entry.computation.taxOwed).toBeCloseTo(11_400, 6);
    }
    expect(report.profitBeforeLosses).toBe(240_000);
    expect(report.lossOffset.lossesUtilized).toBe(0);
    expect(report.finalTaxableProfit).toBe(240_000);
    expect(report.finalTaxOwed).toBeCloseTo(48_320, 6);
    expect(report.auditFlags).toEqual([]);
  });

  it('excludes quarters without revenue from every sum', () => {
    const result = aggregateAnnual(
      quarters({ Q2: quarter(80_000, 30_000), Q3: quarter(0, 999_999, 12_345) }),
      context
    );

    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.data.quarters.map(entry => entry.label)).toEqual(['Q2']);
    expect(result.data.totals.totalExpenses).toBe(30_000);
    expect(result.data.profitBeforeLosses).toBe(50_000);
  });

  it('keeps Q1..Q4 order regardless of input key order', () => {
    const shuffled: QuarterFigures = {
      Q4: quarter(10, 0),
      Q2: quarter(20, 0),
      Q1: quarter(30, 0),
      Q3: quarter(40, 0),
    };
    const result = aggregateAnnual(shuffled, context);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.quarters.map(entry => entry.label)).toEqual(['Q1', 'Q2', 'Q3', 'Q4']);
  });

  it('applies the loss carryforward to the annual profit', () => {
    const result = aggregateAnnual(
      quarters({ Q4: quarter(2_000_000, 500_000) }),
      { ...context, availableLossCarryforward: 2_000_000 }
    );

    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.data.profitBeforeLosses).toBe(1_500_000);
    expect(result.data.lossOffset.lossesUtilized).toBe(1_250_000);
    expect(result.data.finalTaxableProfit).toBe(250_000);
    expect(result.data.finalTaxOwed).toBeCloseTo(38_000 + 0.258 * 50_000, 6);
  });

  it('does not use losses in a loss-making year', () => {
    const result = aggregateAnnual(
      quarters({ Q1: quarter(20_000, 25_000) }),
      { ...context, availableLossCarryforward: 100_000 }
    );

    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.data.lossOffset.lossesUtilized).toBe(0);
    expect(result.data.finalTaxableProfit).toBe(-5_000);
    expect(result.data.finalTaxOwed).toBe(0);
    expect(result.data.auditFlags).toEqual([
      'Company reported an accounting loss for the year.',
      '⚠️ Total annual expenses exceed total annual revenue.',
    ]);
  });

  it('returns NO_VALID_PERIODS when no quarter has revenue', () => {
    const result = aggregateAnnual(quarters({ Q1: quarter(0, 10_000) }), context);

    expect(result).toEqual({
      success: false,
      error: {
        type: 'NO_VALID_PERIODS',
        message: 'No valid quarterly data with revenue was found to process.',
      },
    });
  });

  it('returns COMPUTATION_FAILED when aggregation throws', () => {
    const broken: PeriodFigures = {
      ...emptyPeriodFigures(),
      get total_revenue(): number {
        throw new Error('boom');
      },
    };
    const result = aggregateAnnual(quarters({ Q3: broken }), context);

    expect(result).toEqual({
      success: false,
      error: {
        type: 'COMPUTATION_FAILED',
        message: 'An error occurred during computation: boom',
        cause: 'boom',
      },
    });
  });

  it('is idempotent', () => {
    const input = quarters({ Q1: quarter(120_000, 20_000), Q3: quarter(90_000, 95_000) });
    const first = aggregateAnnual(input, { ...context, availableLossCarryforward: 30_000 });
    const second = aggregateAnnual(input, { ...context, availableLossCarryforward: 30_000 });

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });
});
