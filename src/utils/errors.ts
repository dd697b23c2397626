import type { ErrorCode, ErrorContext } from "@/types";

/**
 * SDK 錯誤基底類別
 *
 * 所有錯誤都會原樣拋給呼叫端，SDK 內部不做重試或復原。
 * 閘道回傳的業務結果碼（例如 15400）不會被轉成錯誤，請以 isSuccessful 判斷。
 */
export class PaymentError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context: ErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PaymentError";
  }
}

/** 請求內容無法序列化為 JSON */
export class EncodeError extends PaymentError {
  constructor(message: string, context?: ErrorContext, options?: { cause?: unknown }) {
    super("ENCODE_ERROR", message, context, options);
    this.name = "EncodeError";
  }
}

/** 網路呼叫失敗（DNS、連線、逾時） */
export class TransportError extends PaymentError {
  constructor(message: string, context?: ErrorContext, options?: { cause?: unknown }) {
    super("TRANSPORT_ERROR", message, context, options);
    this.name = "TransportError";
  }
}

/** 回應內容或 payload 不符合預期結構 */
export class DecodeError extends PaymentError {
  constructor(message: string, context?: ErrorContext, options?: { cause?: unknown }) {
    super("DECODE_ERROR", message, context, options);
    this.name = "DecodeError";
  }
}

export class ConfigError extends PaymentError {
  constructor(message: string, context?: ErrorContext) {
    super("CONFIG_ERROR", message, context);
    this.name = "ConfigError";
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * 錯誤工廠
 *
 * @example
 * throw PaymentErrors.Transport(error, { method: "GET", url });
 */
export const PaymentErrors = {
  Encode: (cause: unknown, context?: ErrorContext) =>
    new EncodeError(`無法編碼請求內容: ${describe(cause)}`, context, { cause }),
  Transport: (cause: unknown, context?: ErrorContext) =>
    new TransportError(`請求發送失敗: ${describe(cause)}`, context, { cause }),
  Decode: (message: string, context?: ErrorContext, cause?: unknown) =>
    new DecodeError(cause === undefined ? message : `${message}: ${describe(cause)}`, context, { cause }),
  Config: (message: string, context?: ErrorContext) => new ConfigError(message, context),
};
