import { BaseValidator } from "./base";
import { EnumValidator } from "./enum";

export class NumberValidator extends BaseValidator<number> {
  protected assertType(arg: unknown): asserts arg is number {
    if (typeof arg !== "number" || Number.isNaN(arg)) {
      throw this.isnt(arg, "number");
    }
  }

  min(min: number) {
    this.useValidators.push((arg) => {
      if (arg < min) {
        throw this.validationError(arg, `must be at least ${min}`);
      }
    });
    return this;
  }

  max(max: number) {
    this.useValidators.push((arg) => {
      if (arg > max) {
        throw this.validationError(arg, `must be at most ${max}`);
      }
    });
    return this;
  }

  integer() {
    this.useValidators.push((arg) => {
      if (!Number.isInteger(arg)) {
        throw this.validationError(arg, "must be an integer");
      }
    });
    return this;
  }

  enum<E extends readonly number[]>(accepted: E) {
    return new EnumValidator<E>(accepted);
  }
}
