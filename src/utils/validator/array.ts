import { ValidationError } from "../errors";
import { BaseValidator, Parser } from "./base";

type LengthCheck = (arg: readonly unknown[]) => void;

export class ArrayValidator<T = unknown> extends BaseValidator<T[]> {
  constructor(
    private readonly elementValidator?: Parser<T>,
    private readonly lengthChecks: LengthCheck[] = []
  ) {
    super();
  }

  protected assertType(arg: unknown): asserts arg is T[] {
    if (!Array.isArray(arg)) {
      throw this.isnt(arg, "array");
    }

    if (this.elementValidator) {
      for (let i = 0; i < arg.length; i++) {
        try {
          this.elementValidator.parse(arg[i]);
        } catch (err) {
          throw ValidationError.at(`[${i}]`, err);
        }
      }
    }

    for (const check of this.lengthChecks) {
      check(arg);
    }
  }

  of<U>(validator: Parser<U>): ArrayValidator<U> {
    return new ArrayValidator<U>(validator, [...this.lengthChecks]);
  }

  minLength(length: number) {
    this.lengthChecks.push((arg) => {
      if (arg.length < length) {
        throw new ValidationError(`Array must have at least ${length} elements`);
      }
    });
    return this;
  }

  maxLength(length: number) {
    this.lengthChecks.push((arg) => {
      if (arg.length > length) {
        throw new ValidationError(`Array must have at most ${length} elements`);
      }
    });
    return this;
  }

  notEmpty() {
    this.lengthChecks.push((arg) => {
      if (arg.length === 0) {
        throw new ValidationError("Array must not be empty");
      }
    });
    return this;
  }
}
