import { BudgetExceededError } from '@collector/shared';

export type Reservation =
  | { granted: true; used: number }
  | { granted: false; used: number; ceiling: number };

/**
 * Local ceiling on logical upstream calls for one session.
 *
 * One instance is shared by reference across every concurrent entity
 * pipeline of a client. `tryReserve` increments and compares in a single
 * synchronous step, so no interleaving can observe a half-done reservation.
 * The counter is never reset.
 */
export class BudgetGuard {
  private used = 0;

  constructor(readonly ceiling: number) {
    if (!Number.isInteger(ceiling) || ceiling < 0) {
      throw new Error(`Budget ceiling must be a non-negative integer, got ${ceiling}`);
    }
  }

  /** Reserve one call. Call once per logical request, before any network I/O. */
  tryReserve(): Reservation {
    const previous = this.used;
    this.used = previous + 1;
    if (previous >= this.ceiling) {
      this.used = previous;
      return { granted: false, used: previous, ceiling: this.ceiling };
    }
    return { granted: true, used: this.used };
  }

  /** Like tryReserve, but throws BudgetExceededError when the ceiling is reached. */
  reserve(): void {
    const reservation = this.tryReserve();
    if (!reservation.granted) {
      throw new BudgetExceededError(reservation.used, reservation.ceiling);
    }
  }

  get usedCount(): number {
    return this.used;
  }

  get remaining(): number {
    return this.ceiling - this.used;
  }

  get exhausted(): boolean {
    return this.used >= this.ceiling;
  }
}
