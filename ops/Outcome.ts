/**
 The result of running an op: either a value, or a named failure.
 */
export interface Success<T>
{
  readonly ok: true;
  readonly value: T;
}

export interface Failure<F extends string>
{
  readonly ok: false;
  readonly failure: F;
  readonly debugData?: string;
}

export type Outcome<T, F extends string> = Success<T> | Failure<F>;

/**
 The failure name of an outcome type, e.g. `FailureOf<ReturnType<op['run']>>`.
 */
export type FailureOf<O> = O extends Failure<infer F> ? F : never;
