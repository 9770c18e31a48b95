import { NumberValidator } from "./number";
import { StringValidator } from "./string";
import { ObjectValidator, Shape } from "./object";
import { BooleanValidator } from "./boolean";
import { ArrayValidator } from "./array";
import { OptionalValidator, Parser } from "./base";
import { EnumValidator } from "./enum";
import { UnknownValidator } from "./unknown";

export type { Infer, Parser } from "./base";
export type { InferShape } from "./object";

export const v = {
  string: () => new StringValidator(),
  number: () => new NumberValidator(),
  object: <S extends Shape>(schema: S) => new ObjectValidator<S>(schema),
  boolean: () => new BooleanValidator(),
  array: () => new ArrayValidator(),
  enum: <E extends readonly (string | number)[]>(enumValues: E) =>
    new EnumValidator<E>(enumValues),
  unknown: () => new UnknownValidator(),
  optional: <T>(validator: Parser<T>) => new OptionalValidator<T>(validator),
};
