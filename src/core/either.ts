export type Left<L> = { readonly tag: 'left'; readonly value: L };
export type Right<R> = { readonly tag: 'right'; readonly value: R };

export type Either<L, R> = Readonly<Left<L>> | Readonly<Right<R>>;

export const left = <L, R = never>(value: L): Either<L, R> => ({ tag: 'left', value });
export const right = <R, L = never>(value: R): Either<L, R> => ({ tag: 'right', value });

export const isLeft = <L, R>(either: Either<L, R>): either is Readonly<Left<L>> =>
  either.tag === 'left';
export const isRight = <L, R>(either: Either<L, R>): either is Readonly<Right<R>> =>
  either.tag === 'right';

// Attempts an async computation, capturing only errors accepted by the guard.
export const attempt = async <L, R>(
  run: () => Promise<R>,
  accepts: (error: unknown) => error is L,
): Promise<Either<L, R>> => {
  try {
    return right<R, L>(await run());
  } catch (error) {
    if (accepts(error)) return left<L, R>(error);
    throw error;
  }
};
