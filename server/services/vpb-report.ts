/**
 * VPB Report
 *
 * Entry point voor de serving layer: ruwe AI extractie in, rapport payload uit.
 * Labels en volgorde van de regels zijn onderdeel van het contract met de frontend,
 * daarom worden ze als geordende lijsten opgebouwd en pas aan het eind een object.
 */

import type {
  AnnualReport,
  Breakdown,
  BreakdownLine,
  PeriodComputation,
  VpbProcessingResult,
  VpbExtraction,
  VpbTaxReportPayload,
} from "@shared/schema/vpb";
import { aggregateAnnual, computationFailed } from "./vpb-aggregator";
import { parseVpbExtraction, toCompanyContext } from "./vpb-input";

export function periodBreakdownLines(c: PeriodComputation): BreakdownLine[] {
  return [
    { label: 'Total Revenue', value: c.revenue },
    { label: 'Total Expenses (incl. Depreciation)', value: c.totalExpenses },
    { label: 'Accounting Profit Before Tax', value: c.accountingProfitBeforeTax },
    { label: 'Add: Non-Deductible Expenses', value: c.nonDeductibleExpenses },
    { label: 'Subtract: Tax-Exempt Income', value: c.taxExemptIncome },
    { label: 'Taxable Profit for Period', value: c.taxableProfit },
    { label: 'Tax Owed for Period', value: c.taxOwed },
  ];
}

export function annualBreakdownLines(report: AnnualReport): BreakdownLine[] {
  const { lossesUtilized } = report.lossOffset;

  return [
    { label: 'Total Revenue', value: report.totals.revenue },
    { label: 'Total Expenses (incl. Depreciation)', value: report.totals.totalExpenses },
    { label: 'Accounting Profit Before Tax', value: report.totals.accountingProfitBeforeTax },
    { label: 'Profit Before Loss Compensation', value: report.profitBeforeLosses },
    // Getoond als aftrekpost; geen -0 in de JSON
    { label: 'Subtract: Losses Utilized', value: lossesUtilized === 0 ? 0 : -lossesUtilized },
    { label: 'Final Taxable Profit for Year', value: report.finalTaxableProfit },
    { label: 'FINAL TAX OWED FOR YEAR', value: report.finalTaxOwed },
  ];
}

export function toBreakdown(lines: BreakdownLine[]): Breakdown {
  return Object.fromEntries(lines.map(line => [line.label, line.value]));
}

export function buildReportPayload(report: AnnualReport, rawExtraction: unknown): VpbTaxReportPayload {
  const quarters: VpbTaxReportPayload['quarters'] = {};
  for (const { label, computation } of report.quarters) {
    quarters[label] = toBreakdown(periodBreakdownLines(computation));
  }

  return {
    company_info: {
      name: report.context.companyName,
      year: report.context.accountingYear,
    },
    quarters,
    overall: toBreakdown(annualBreakdownLines(report)),
    audit_flags: report.auditFlags,
    raw_ai_extraction: rawExtraction,
  };
}

/**
 * Orchestrator: parse → per kwartaal → jaartotaal → verliesverrekening → payload.
 */
export function processFinancialDocument(rawExtraction: unknown): VpbProcessingResult {
  let extraction: VpbExtraction;
  try {
    extraction = parseVpbExtraction(rawExtraction);
  } catch (error) {
    return computationFailed(error);
  }

  const result = aggregateAnnual(extraction.quarters, toCompanyContext(extraction));

  if (!result.success) {
    return result;
  }
  return { success: true, data: buildReportPayload(result.data, rawExtraction) };
}
