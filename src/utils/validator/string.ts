import { BaseValidator } from "./base";
import { EnumValidator } from "./enum";

export class StringValidator extends BaseValidator<string> {
  protected assertType(arg: unknown): asserts arg is string {
    if (typeof arg !== "string") {
      throw this.isnt(arg, "string");
    }
  }

  isNotEmpty() {
    this.useValidators.push((arg) => {
      if (arg.length === 0) {
        throw this.validationError(arg, "must not be empty");
      }
    });
    return this;
  }

  minLength(length: number) {
    this.useValidators.push((arg) => {
      if (arg.length < length) {
        throw this.validationError(
          arg,
          `must be at least ${length} characters long`
        );
      }
    });
    return this;
  }

  maxLength(length: number) {
    this.useValidators.push((arg) => {
      if (arg.length > length) {
        throw this.validationError(
          arg,
          `must be at most ${length} characters long`
        );
      }
    });
    return this;
  }

  matches(pattern: RegExp, message = `must match ${pattern}`) {
    this.useValidators.push((arg) => {
      if (!pattern.test(arg)) {
        throw this.validationError(arg, message);
      }
    });
    return this;
  }

  /** Decimal digits only, as used by environment variables holding numbers */
  numeric() {
    return this.matches(/^\d+$/, "must be a non-negative integer");
  }

  url() {
    return this.matches(
      /^(?:https?|wss?):\/\/[^\s/$.?#][^\s]*$/,
      "must be a valid URL"
    );
  }

  enum<E extends readonly string[]>(accepted: E) {
    return new EnumValidator<E>(accepted);
  }
}
