export type PaymentErrorCode = "ValidationFailed" | "StoreUnavailable" | "QueueUnavailable" | "NotFound";

const HTTP_STATUS: Record<PaymentErrorCode, number> = {
  ValidationFailed: 400,
  NotFound: 404,
  StoreUnavailable: 503,
  QueueUnavailable: 503,
};

export class PaymentError extends Error {
  readonly status: number;
  readonly details?: Record<string, unknown>;

  constructor(
    public readonly code: PaymentErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "PaymentError";
    this.status = HTTP_STATUS[code];
    this.details = options?.details;
  }
}

export function isPaymentError(err: unknown, code?: PaymentErrorCode): err is PaymentError {
  return err instanceof PaymentError && (code === undefined || err.code === code);
}

export function storeUnavailable(err: unknown): PaymentError {
  if (err instanceof PaymentError) return err;
  return new PaymentError("StoreUnavailable", `Payment store unavailable: ${errorMessage(err)}`, { cause: err });
}

export function queueUnavailable(err: unknown): PaymentError {
  if (err instanceof PaymentError) return err;
  return new PaymentError("QueueUnavailable", `Payment queue unavailable: ${errorMessage(err)}`, { cause: err });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
