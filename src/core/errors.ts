export type FrequentErrorCode =
  | "INVALID_ARGUMENT"
  | "EMPTY_INPUT"
  | "NO_MAJORITY_ELEMENT"
  | "NO_FREQUENT_ELEMENTS";

export class FrequentElementsError extends Error {
  constructor(
    message: string,
    readonly code: FrequentErrorCode,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed call: bad capacity, unknown policy, etc. */
export class InvalidArgumentError extends FrequentElementsError {
  constructor(message: string) {
    super(message, "INVALID_ARGUMENT");
  }
}

export class EmptyInputError extends FrequentElementsError {
  constructor(message: string = "sequence is empty") {
    super(message, "EMPTY_INPUT");
  }
}

/**
 * Not a malformed call: the sequence simply has no element above half.
 */
export class NoMajorityElementError extends FrequentElementsError {
  constructor(readonly n: number) {
    super(`no element occurs more than ${Math.floor(n / 2)} times in ${n} elements`, "NO_MAJORITY_ELEMENT");
  }
}

export class NoFrequentElementsError extends FrequentElementsError {
  constructor(
    readonly n: number,
    readonly threshold: number,
  ) {
    super(`no element occurs more than ${threshold} times in ${n} elements`, "NO_FREQUENT_ELEMENTS");
  }
}

export function isMalformedCall(err: unknown): err is InvalidArgumentError | EmptyInputError {
  return err instanceof InvalidArgumentError || err instanceof EmptyInputError;
}

export function isNoSuchElement(err: unknown): err is NoMajorityElementError | NoFrequentElementsError {
  return err instanceof NoMajorityElementError || err instanceof NoFrequentElementsError;
}
