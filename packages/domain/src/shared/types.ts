// ---------------------------------------------------------------------------
// Shared primitives used across all bounded contexts.
// Nothing in this file may import from a sibling context.
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Branding utility
// ---------------------------------------------------------------------------

/** Nominal / branded type: prevents accidental substitution of e.g. UnitId for MissionId. */
export type Brand<T, B extends string> = T & { readonly __brand: B }

// ---------------------------------------------------------------------------
// Location value object
// ---------------------------------------------------------------------------

/**
 * Opaque label for a named place ("Base Central", "Hangar Norte", ...).
 * Two locations are the same place iff their labels are strictly equal.
 */
export type Location = string

// ---------------------------------------------------------------------------
// Number formatting shared by the status read models
// ---------------------------------------------------------------------------

/** Formats a weight in kilograms with two decimals, e.g. `500.00 kg`. */
export function formatKg(value: number): string {
  return `${value.toFixed(2)} kg`
}

/** Formats a vertical distance in metres with one decimal, e.g. `100.0 m`. */
export function formatMetres(value: number): string {
  return `${value.toFixed(1)} m`
}

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

/** True for strings that contain at least one non-whitespace character. */
export function isNonBlank(value: string): boolean {
  return value.trim() !== ''
}
