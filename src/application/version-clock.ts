/**
 * Strictly increasing version source for analytical rows.
 *
 * Values are microsecond-scaled wall-clock readings, bumped by one when the
 * clock has not moved, so versions also keep increasing across restarts
 * as long as the wall clock does.
 */
export class VersionClock {
  private last = 0;

  constructor(private readonly now: () => number = Date.now) {}

  next(): number {
    const candidate = this.now() * 1000;
    this.last = candidate > this.last ? candidate : this.last + 1;
    return this.last;
  }
}
