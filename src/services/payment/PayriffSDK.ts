/**
 * Payriff SDK 類
 * 將 Payriff 閘道的 REST 端點封裝為具型別的方法
 *
 * 使用範例：
 *   const sdk = new PayriffSDK({ secretKey, defaultCallbackUrl });
 *   const order = await sdk.createOrder({ amount: 10.99, description: "課程", operation: "PURCHASE", cardSave: false });
 *   if (sdk.isSuccessful(order.code)) redirect(order.payload?.paymentUrl);
 *   const info = await sdk.getOrderInfo(orderId);
 */

import axios from "axios";
import type { z } from "zod";
import { ENDPOINTS, PAYRIFF_DEFAULTS } from "@/config/constants";
import { ResultCode } from "@/types";
import type {
  ApiResponse,
  AutoPayRequest,
  ClientConfig,
  CompleteRequest,
  CreateOrderRequest,
  OrderInfo,
  OrderPayload,
  RawResponse,
  RefundRequest,
  ResolvedConfig,
} from "@/types";
import { PaymentErrors } from "@/utils/errors";
import defaultLogger from "@/utils/logger";
import { RequestDispatcher } from "./request-dispatcher";
import { describeIssues, orderInfoSchema, orderPayloadSchema } from "./schemas";

/**
 * 判斷結果碼是否代表成功
 * 只有 00000 與 00 視為成功，其他（包含 APPROVED）一律為否。
 */
export function isSuccessful(code: string): boolean {
  return code === ResultCode.Success || code === ResultCode.SuccessGateway;
}

/** 建構時套用預設值，空字串視為未設定 */
export function resolveConfig(config: ClientConfig): ResolvedConfig {
  return Object.freeze({
    baseUrl: config.baseUrl || PAYRIFF_DEFAULTS.BASE_URL,
    secretKey: config.secretKey || "",
    defaultCallbackUrl: config.defaultCallbackUrl || "",
    defaultLanguage: config.defaultLanguage || PAYRIFF_DEFAULTS.LANGUAGE,
    defaultCurrency: config.defaultCurrency || PAYRIFF_DEFAULTS.CURRENCY,
    timeoutMs: config.timeoutMs,
  });
}

export class PayriffSDK {
  readonly config: ResolvedConfig;
  private readonly dispatcher: RequestDispatcher;

  /**
   * 初始化 SDK
   * 不讀取環境變數；需要時請先呼叫 loadConfigFromEnv()。
   */
  constructor(config: ClientConfig = {}) {
    this.config = resolveConfig(config);

    const logger = config.logger ?? defaultLogger;
    this.dispatcher = new RequestDispatcher(this.config, config.httpClient ?? axios.create(), logger);

    if (!this.config.secretKey) {
      logger.warn("Payriff secretKey 未設定，請求將無法通過驗證");
    }

    logger.info("PayriffSDK 已初始化", {
      baseUrl: this.config.baseUrl,
      defaultLanguage: this.config.defaultLanguage,
      defaultCurrency: this.config.defaultCurrency,
    });
  }

  // ========================================
  // 訂單
  // ========================================

  /**
   * 建立訂單
   * 未指定的 language、currency、callbackUrl 以預設值補上
   */
  async createOrder(req: CreateOrderRequest): Promise<ApiResponse<OrderPayload | null>> {
    const callbackUrl = req.callbackUrl || this.config.defaultCallbackUrl;
    const body = {
      amount: req.amount,
      description: req.description,
      operation: req.operation,
      cardSave: req.cardSave,
      language: req.language || this.config.defaultLanguage,
      currency: req.currency || this.config.defaultCurrency,
      ...(callbackUrl ? { callbackUrl } : {}),
    };

    const resp = await this.dispatcher.dispatch(ENDPOINTS.ORDERS, "POST", body);
    return this.withPayload(resp, orderPayloadSchema, "訂單 payload");
  }

  /**
   * 查詢訂單
   * 不檢查 orderId，空字串會查詢 /orders/
   */
  async getOrderInfo(orderId: string): Promise<ApiResponse<OrderInfo | null>> {
    const resp = await this.dispatcher.dispatch(`${ENDPOINTS.ORDERS}/${orderId}`, "GET");
    return this.withPayload(resp, orderInfoSchema, "訂單資訊");
  }

  // ========================================
  // 退款與請款
  // ========================================

  /** 退款，payload 結構未定義，原樣回傳 */
  async refund(req: RefundRequest): Promise<ApiResponse<unknown>> {
    return this.dispatcher.dispatch(ENDPOINTS.REFUND, "POST", {
      amount: req.amount,
      orderId: req.orderId,
    });
  }

  /** 預授權請款，只回報呼叫是否成功送達 */
  async complete(req: CompleteRequest): Promise<void> {
    await this.dispatcher.dispatch(ENDPOINTS.COMPLETE, "POST", {
      amount: req.amount,
      orderId: req.orderId,
    });
  }

  /**
   * 以已儲存的卡片自動扣款
   * 未指定的 currency、callbackUrl 以預設值補上
   */
  async autoPay(req: AutoPayRequest): Promise<ApiResponse<OrderInfo | null>> {
    const callbackUrl = req.callbackUrl || this.config.defaultCallbackUrl;
    const body = {
      cardUuid: req.cardUuid,
      amount: req.amount,
      description: req.description,
      operation: req.operation,
      currency: req.currency || this.config.defaultCurrency,
      ...(callbackUrl ? { callbackUrl } : {}),
    };

    const resp = await this.dispatcher.dispatch(ENDPOINTS.AUTO_PAY, "POST", body);
    return this.withPayload(resp, orderInfoSchema, "自動扣款結果");
  }

  isSuccessful(code: string): boolean {
    return isSuccessful(code);
  }

  /**
   * 以指定 schema 解析 payload 並附上回應中繼資料
   * 業務失敗時閘道不帶 payload，此時回傳 null
   */
  private withPayload<T>(resp: RawResponse, schema: z.ZodType<T>, label: string): ApiResponse<T | null> {
    const { payload, ...meta } = resp;
    if (payload === null || payload === undefined) {
      return { ...meta, payload: null };
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const details = describeIssues(parsed.error);
      throw PaymentErrors.Decode(`無法解析${label}`, { code: resp.code, responseId: resp.responseId, details }, parsed.error);
    }

    return { ...meta, payload: parsed.data };
  }
}

/**
 * 建立 PayriffSDK 實例的工廠函數
 */
export function createPayriffSDK(config: ClientConfig = {}): PayriffSDK {
  return new PayriffSDK(config);
}

export default PayriffSDK;
