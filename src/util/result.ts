/**
 * Result type returned by every provider call. Providers MUST NOT throw.
 */
export type Result<TData, TMeta = unknown> =
  | { ok: true; data: TData; meta?: TMeta }
  | { ok: false; error: string; meta?: TMeta };

export function ok<TData>(data: TData): Result<TData, never> {
  return { ok: true, data };
}

export function fail<TMeta>(error: string, meta?: TMeta): Result<never, TMeta> {
  return meta === undefined ? { ok: false, error } : { ok: false, error, meta };
}

/**
 * Returns the data of a successful result, or undefined for a failure.
 */
export function unwrapOr<TData>(
  result: Result<TData, unknown>
): TData | undefined {
  return result.ok ? result.data : undefined;
}
