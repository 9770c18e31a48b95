import { BaseValidator } from "./base";

export class BooleanValidator extends BaseValidator<boolean> {
  protected assertType(arg: unknown): asserts arg is boolean {
    if (typeof arg !== "boolean") {
      throw this.isnt(arg, "boolean");
    }
  }
}
