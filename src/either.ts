/**
 * Either Data Type
 *
 * An Either<E, A> is Left<E> (failure) or Right<A> (success). The resolver
 * returns its single failure mode as a Left so callers handle it explicitly.
 */

export type Either<E, A> = Left<E> | Right<A>;

export interface Left<E> {
  readonly _tag: "Left";
  readonly left: E;
}

export interface Right<A> {
  readonly _tag: "Right";
  readonly right: A;
}

export function Left<E, A = never>(left: E): Either<E, A> {
  return { _tag: "Left", left };
}

export function Right<E = never, A = unknown>(right: A): Either<E, A> {
  return { _tag: "Right", right };
}

export function isLeft<E, A>(either: Either<E, A>): either is Left<E> {
  return either._tag === "Left";
}

export function isRight<E, A>(either: Either<E, A>): either is Right<A> {
  return either._tag === "Right";
}

/**
 * Pattern match on an Either.
 */
export function fold<E, A, B>(
  either: Either<E, A>,
  onLeft: (e: E) => B,
  onRight: (a: A) => B
): B {
  return either._tag === "Left" ? onLeft(either.left) : onRight(either.right);
}

/**
 * Extract the Right value, or throw the error built from the Left.
 */
export function getOrThrow<E, A>(either: Either<E, A>, toError: (e: E) => Error): A {
  if (either._tag === "Left") {
    throw toError(either.left);
  }
  return either.right;
}
