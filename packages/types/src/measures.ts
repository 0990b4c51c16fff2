/**
 * Measure and Ratio Types
 *
 * Named figures extracted from statements, derived by formula,
 * and combined into ratios.
 */

/**
 * Measure name → value.
 * Built incrementally: canonical → extra → derived.
 */
export type MeasureMap = Readonly<Record<string, number>>;

/**
 * Where a measure comes from.
 *
 * - "canonical" → tagged on a mapping template row
 * - "extra"     → caller-supplied or derived by formula
 */
export type MeasureKind = "canonical" | "extra";

/**
 * Display metadata for a measure.
 */
export interface MeasureMeta {
  readonly key: string;
  readonly label: string;
  /** "amount", "percent", "days", "ratio", ... */
  readonly unit: string;
  readonly notes: string;
  readonly kind: MeasureKind;
}

/**
 * A named formula computing one derived measure.
 */
export interface DerivedMeasureRule {
  readonly key: string;
  readonly formula: string;
  readonly label?: string | undefined;
  readonly unit?: string | undefined;
  readonly notes?: string | undefined;
}

/**
 * Ratio tier. "basic" < "advanced" < "full"; other names are custom tiers.
 */
export type RatioLevel = "basic" | "advanced" | "full" | (string & {});

export interface RatioDefinition {
  readonly key: string;
  readonly label: string;
  /** Expression over measure names, or a single measure name */
  readonly formula?: string | undefined;
  /** Direct measure reference, used when no formula is given */
  readonly measure?: string | undefined;
  readonly unit: string;
  readonly notes: string;
  readonly level: RatioLevel;
}

export interface RatioResult {
  readonly key: string;
  readonly label: string;
  /** null when the ratio cannot be evaluated */
  readonly value: number | null;
  readonly unit: string;
  readonly notes: string;
  readonly level: RatioLevel;
}
