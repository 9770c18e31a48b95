import { ValidationError, toError } from "../errors";
import { logger } from "../logger";

export type AssertFn<T> = (arg: unknown) => asserts arg is T;
export type ParseFn<T> = (arg: unknown) => T;
export type Parser<T> = {
  parse: ParseFn<T>;
};

/** Static type produced by a parser, e.g. `Infer<typeof userSchema>` */
export type Infer<P> = P extends Parser<infer T> ? T : never;

export const isRecord = (arg: unknown): arg is Record<string, unknown> =>
  typeof arg === "object" && arg !== null && !Array.isArray(arg);

export abstract class BaseValidator<T> implements Parser<T> {
  protected readonly useValidators: ((arg: T) => void)[] = [];

  protected abstract assertType(arg: unknown): asserts arg is T;

  parse(arg: unknown): T {
    this.assertType(arg);
    for (const validator of this.useValidators) {
      validator(arg);
    }
    return arg;
  }

  safeParse(arg: unknown): T | undefined {
    try {
      return this.parse(arg);
    } catch (err) {
      logger.error(toError(err).message);
      return undefined;
    }
  }

  custom(func: (arg: T) => boolean, message = "does not match validator") {
    this.useValidators.push((arg) => {
      if (!func(arg)) {
        throw this.validationError(arg, message);
      }
    });
    return this;
  }

  optional(): OptionalValidator<T> {
    return new OptionalValidator(this);
  }

  nullable(): NullableValidator<T> {
    return new NullableValidator(this);
  }

  validationError(arg: unknown, message: string) {
    return new ValidationError(`\`${preview(arg)}\` ${message}`);
  }

  isnt(arg: unknown, type: string) {
    return this.validationError(arg, `is not a ${type}`);
  }
}

const preview = (arg: unknown) => {
  if (typeof arg === "string") return arg;
  if (Array.isArray(arg)) return "array";
  if (arg === null) return "null";
  return typeof arg === "object" ? "object" : String(arg);
};

export class OptionalValidator<T> extends BaseValidator<T | undefined> {
  constructor(private readonly wrappedValidator: Parser<T>) {
    super();
  }

  protected assertType(arg: unknown): asserts arg is T | undefined {
    if (arg === undefined) return;
    this.wrappedValidator.parse(arg);
  }
}

export class NullableValidator<T> extends BaseValidator<T | null> {
  constructor(private readonly wrappedValidator: Parser<T>) {
    super();
  }

  protected assertType(arg: unknown): asserts arg is T | null {
    if (arg === null) return;
    this.wrappedValidator.parse(arg);
  }
}
