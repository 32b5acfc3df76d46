// Exponential moving average across frames: smoothed = a·prev + (1 - a)·new
export class TemporalSmoother {
  private previous: number[] | null = null;
  private readonly factor: number;

  constructor(factor: number = 0.6) {
    // Keep the factor strictly inside (0, 1)
    this.factor = Math.min(0.999, Math.max(0.001, factor));
  }

  public get smoothingFactor(): number {
    return this.factor;
  }

  public apply(values: readonly number[]): number[] {
    // Shape change (or first frame): reseed without smoothing
    if (this.previous === null || this.previous.length !== values.length) {
      this.previous = [...values];
      return [...values];
    }

    const a = this.factor;
    const prev = this.previous;
    const smoothed = values.map((v, i) => a * prev[i] + (1 - a) * v);
    this.previous = smoothed;
    return [...smoothed];
  }

  public reset(): void {
    this.previous = null;
  }

  public get length(): number {
    return this.previous?.length ?? 0;
  }
}

// Frames until a step input is within `tolerance` (relative) of its target
export function framesToConverge(factor: number, tolerance: number = 0.01): number {
  return Math.ceil(Math.log(tolerance) / Math.log(factor));
}
