/**
 * Payriff Node SDK 匯出入口
 *
 * @example
 * import { PayriffSDK, loadConfigFromEnv } from "payriff-node-sdk";
 *
 * const sdk = new PayriffSDK(loadConfigFromEnv());
 */

export { PayriffSDK, createPayriffSDK, isSuccessful, resolveConfig } from "./services/payment/PayriffSDK";
export { RequestDispatcher } from "./services/payment/request-dispatcher";
export { getPayriffSDK, initPayriffSDK, resetPayriffSDK } from "./services/payment/provider";
export { ENDPOINTS, ENV_VARS, PAYRIFF_DEFAULTS, loadConfigFromEnv, readConfigFromEnv } from "./config/constants";
export { ConfigError, DecodeError, EncodeError, PaymentError, PaymentErrors, TransportError } from "./utils/errors";
export { createLogger } from "./utils/logger";
export * from "./types";
