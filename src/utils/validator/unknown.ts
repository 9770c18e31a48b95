import { BaseValidator } from "./base";

/** Accepts any value; used for payload fields that are carried but never inspected */
export class UnknownValidator extends BaseValidator<unknown> {
  protected assertType(_arg: unknown): asserts _arg is unknown {}
}
