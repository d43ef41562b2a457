/**
 * VPB input boundary
 *
 * Alle ruwe AI output gaat hier doorheen voordat er gerekend wordt.
 * De "ontbrekend = 0" regel zit in de zod schemas van @shared/schema/vpb.
 */

import {
  amountSchema,
  periodFiguresSchema,
  vpbExtractionSchema,
  type CompanyContext,
  type PeriodFigures,
  type VpbExtraction,
} from "@shared/schema/vpb";

export function parseAmount(value: unknown): number {
  return amountSchema.parse(value);
}

export function parsePeriodFigures(raw: unknown): PeriodFigures {
  return periodFiguresSchema.parse(raw);
}

export function parseVpbExtraction(raw: unknown): VpbExtraction {
  return vpbExtractionSchema.parse(raw);
}

export function toCompanyContext(extraction: VpbExtraction): CompanyContext {
  return {
    companyName: extraction.company_name,
    accountingYear: extraction.accounting_period_year,
    availableLossCarryforward:
      extraction.overall_figures_if_available.available_loss_carryforward_at_start_of_year,
  };
}
