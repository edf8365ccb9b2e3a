/**
 * Capped additive backoff: the interval starts at `initialSec`, grows by
 * `stepSec` after every completed iteration and never exceeds `ceilingSec`.
 * After k iterations the interval is `min(initial + k * step, ceiling)`.
 */
export class AdditiveBackoff {
  private intervalSec: number;

  constructor(
    initialSec: number,
    private readonly ceilingSec: number,
    private readonly stepSec = 1,
  ) {
    this.intervalSec = Math.min(initialSec, ceilingSec);
  }

  /** Interval to sleep before the next iteration, in seconds. */
  get currentSec(): number {
    return this.intervalSec;
  }

  /** Records a completed iteration and returns the new interval. */
  advance(): number {
    this.intervalSec = Math.min(this.intervalSec + this.stepSec, this.ceilingSec);
    return this.intervalSec;
  }
}
