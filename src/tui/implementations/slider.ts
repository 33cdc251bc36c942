import { InvalidValueError } from '../../errors.js';

/**
 * Bounded numeric value moved in steps; every update clamps to `[min, max]`.
 */
export class SliderModel {
  private value: number;

  constructor(
    private readonly min: number,
    private readonly max: number,
    private step: number,
    initial: number
  ) {
    if (min > max) {
      throw new InvalidValueError(`min value ${min} is greater than max value ${max}`);
    }
    if (initial < min || initial > max) {
      throw new InvalidValueError(`initial value must be between ${min} and ${max}`);
    }
    this.value = initial;
  }

  /** Move by `offset` steps and return the new value. */
  update(offset: number): number {
    this.value = Math.min(this.max, Math.max(this.min, this.value + offset * this.step));
    return this.value;
  }

  getValue(): number {
    return this.value;
  }

  getMin(): number {
    return this.min;
  }

  getMax(): number {
    return this.max;
  }

  getStep(): number {
    return this.step;
  }

  setStep(step: number): void {
    this.step = step;
  }
}
