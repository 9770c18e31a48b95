import { BaseValidator } from "./base";

export class EnumValidator<
  E extends readonly (string | number)[],
> extends BaseValidator<E[number]> {
  constructor(readonly values: E) {
    super();
  }

  protected assertType(arg: unknown): asserts arg is E[number] {
    if (!this.values.some((value) => value === arg)) {
      throw this.validationError(
        arg,
        `must be one of ${this.values.join(", ")}`
      );
    }
  }
}
