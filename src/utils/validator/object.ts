import { ValidationError } from "../errors";
import { BaseValidator, Infer, Parser, isRecord } from "./base";

export type Shape = Record<string, Parser<unknown>>;

type OptionalKeys<S extends Shape> = {
  [K in keyof S]: undefined extends Infer<S[K]> ? K : never;
}[keyof S];

type Simplify<T> = { [K in keyof T]: T[K] } & {};

/** Keys whose parser accepts `undefined` become optional properties */
export type InferShape<S extends Shape> = Simplify<
  { [K in Exclude<keyof S, OptionalKeys<S>>]: Infer<S[K]> } & {
    [K in OptionalKeys<S>]?: Infer<S[K]>;
  }
>;

/**
 * Validates the listed keys and passes unlisted keys through untouched, so a
 * payload keeps the fields this library never inspects.
 */
export class ObjectValidator<S extends Shape> extends BaseValidator<
  InferShape<S>
> {
  constructor(readonly schema: S) {
    super();
  }

  protected assertType(arg: unknown): asserts arg is InferShape<S> {
    if (!isRecord(arg)) {
      throw this.isnt(arg, "object");
    }

    const schema: Shape = this.schema;
    for (const [key, parser] of Object.entries(schema)) {
      try {
        parser.parse(arg[key]);
      } catch (err) {
        throw ValidationError.at(key, err);
      }
    }
  }
}
