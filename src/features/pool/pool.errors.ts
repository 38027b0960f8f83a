export type PoolErrorCode =
  | "zero-amount"
  | "zero-address"
  | "insufficient-balance"
  | "transfer-failed"
  | "not-privileged";

export const poolErrorStatus: Record<PoolErrorCode, number> = {
  "zero-amount": 400,
  "zero-address": 400,
  "insufficient-balance": 400,
  "not-privileged": 403,
  "transfer-failed": 422,
};

export class PoolError extends Error {
  readonly code: PoolErrorCode;

  constructor(code: PoolErrorCode, message: string) {
    super(message);
    this.name = "PoolError";
    this.code = code;
  }
}

export function isPoolError(error: unknown): error is PoolError {
  return error instanceof PoolError;
}
