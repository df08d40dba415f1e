const MINOR_UNITS_PER_MAJOR = 100;

export function toMinorUnits(amount: number): number {
  return Math.round(amount * MINOR_UNITS_PER_MAJOR);
}

export function fromMinorUnits(minorUnits: number): number {
  return minorUnits / MINOR_UNITS_PER_MAJOR;
}

/** Positive, finite, and no finer than one cent. */
export function isValidAmount(amount: number): boolean {
  if (!Number.isFinite(amount) || amount <= 0) {
    return false;
  }
  const minorUnits = amount * MINOR_UNITS_PER_MAJOR;
  return Math.abs(minorUnits - Math.round(minorUnits)) < 1e-6;
}

export function subtractAmount(balance: number, amount: number): number {
  return fromMinorUnits(toMinorUnits(balance) - toMinorUnits(amount));
}

export function addAmount(balance: number, amount: number): number {
  return fromMinorUnits(toMinorUnits(balance) + toMinorUnits(amount));
}
