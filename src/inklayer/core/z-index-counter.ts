/**
 * Hands out increasing z-indices shared by strokes and text fields so that
 * newer elements paint above older ones regardless of their kind.
 */
export class ZIndexCounter {
  private value: number;

  constructor(initial = 0) {
    this.value = initial;
  }

  next(): number {
    const z = this.value;
    this.value += 1;
    return z;
  }

  current(): number {
    return this.value;
  }

  reset(value = 0) {
    this.value = value;
  }

  /** Moves the counter past `z` so the next element lands above it. */
  ensureAbove(z: number) {
    if (Number.isFinite(z) && z >= this.value) {
      this.value = Math.floor(z) + 1;
    }
  }
}
