/**
 * Audit risk flags
 *
 * Eenvoudige controles op de jaarcijfers. Puur adviserend, geen effect op de belasting.
 * De volgorde van AUDIT_RULES is zichtbaar voor de gebruiker: nieuwe regels achteraan toevoegen.
 */

import type { PeriodComputation } from "@shared/schema/vpb";

export interface AuditRule {
  id: string;
  message: string;
  applies: (totals: PeriodComputation) => boolean;
}

export const AUDIT_RULES: readonly AuditRule[] = [
  {
    id: 'accounting_loss',
    message: 'Company reported an accounting loss for the year.',
    applies: (totals) => totals.accountingProfitBeforeTax < 0,
  },
  {
    id: 'expenses_exceed_revenue',
    message: '⚠️ Total annual expenses exceed total annual revenue.',
    // Zonder omzet geen melding
    applies: (totals) => totals.totalExpenses > totals.revenue && totals.revenue > 0,
  },
];

export function deriveAuditFlags(totals: PeriodComputation): string[] {
  return AUDIT_RULES.filter(rule => rule.applies(totals)).map(rule => rule.message);
}
