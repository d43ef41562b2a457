/**
 * Shared Constants
 *
 * Gedeelde constanten voor de VPB berekening en de API laag.
 * Fiscale parameters staan hier op één plek.
 */

// ═══════════════════════════════════════════════════════════════════════════
// QUARTERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Vaste volgorde van de kwartalen. De output volgt altijd deze volgorde,
 * ongeacht de volgorde waarin de AI extractie de kwartalen teruggeeft.
 */
export const QUARTER_LABELS = ['Q1', 'Q2', 'Q3', 'Q4'] as const;

export type QuarterLabel = typeof QUARTER_LABELS[number];

// ═══════════════════════════════════════════════════════════════════════════
// VPB RATES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Vennootschapsbelasting tarieven (twee schijven).
 * Wordt identiek toegepast op kwartaal- en jaarniveau.
 */
export const VPB_RATES = {
  /** Bovengrens van de eerste schijf */
  LOW_BRACKET_LIMIT: 200_000,

  /** Tarief eerste schijf (19%) */
  LOW_RATE: 0.19,

  /** Tarief boven de eerste schijf (25,8%) */
  HIGH_RATE: 0.258,
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// LOSS CARRYFORWARD (verliesverrekening)
// ═══════════════════════════════════════════════════════════════════════════

export const LOSS_CARRYFORWARD = {
  /** Winst tot dit bedrag mag volledig met verliezen verrekend worden */
  FULL_OFFSET_THRESHOLD: 1_000_000,

  /** Deel van de winst boven de drempel dat verrekend mag worden */
  EXCESS_OFFSET_RATIO: 0.5,
} as const;
