export interface ClockPort {
  nowMs(): number;
}

/**
 * Create a system clock adapter that uses Date.now()
 *
 * Only composition roots (createProductionContext) should call this.
 * Workflows take the clock from their context.
 */
export function createSystemClock(): ClockPort {
  return { nowMs: () => Date.now() };
}
