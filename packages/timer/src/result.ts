export type Result<E, A> = { _tag: "Ok"; value: A } | { _tag: "Err"; error: E };

export function ok<A>(value: A): Result<never, A> {
  return { _tag: "Ok", value };
}

export function err<E>(error: E): Result<E, never> {
  return { _tag: "Err", error };
}

export function isOk<E, A>(result: Result<E, A>): result is { _tag: "Ok"; value: A } {
  return result._tag === "Ok";
}

export function isErr<E, A>(result: Result<E, A>): result is { _tag: "Err"; error: E } {
  return result._tag === "Err";
}
