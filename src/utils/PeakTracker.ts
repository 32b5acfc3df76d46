export const PEAK_DECAY_INCREMENT = 0.01;

// Peak-hold meter state: snaps up, then falls with growing speed
export class PeakTracker {
  private peaks: number[] = [];
  private decayRates: number[] = [];
  private readonly increment: number;

  constructor(increment: number = PEAK_DECAY_INCREMENT) {
    this.increment = increment;
  }

  public update(values: readonly number[]): number[] {
    if (this.peaks.length !== values.length) {
      this.peaks = new Array<number>(values.length).fill(0);
      this.decayRates = new Array<number>(values.length).fill(0);
    }

    for (let i = 0; i < values.length; i++) {
      if (values[i] > this.peaks[i]) {
        this.peaks[i] = values[i];
        this.decayRates[i] = 0;
      } else {
        this.decayRates[i] += this.increment;
        this.peaks[i] = Math.max(0, this.peaks[i] - this.decayRates[i]);
      }
    }

    return [...this.peaks];
  }

  public reset(): void {
    this.peaks = [];
    this.decayRates = [];
  }
}
