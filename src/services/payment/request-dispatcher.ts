/**
 * Payriff 共用請求發送器
 *
 * 所有 API 呼叫都經過 dispatch：編碼 JSON、附上 Authorization 標頭、
 * 解析回應的 envelope。payload 保持未解析，交給上層依操作處理。
 */

import axios from "axios";
import type { AxiosInstance, AxiosResponse } from "axios";
import type { Logger } from "winston";
import type { ErrorContext, HttpMethod, RawResponse, ResolvedConfig } from "@/types";
import { PaymentErrors } from "@/utils/errors";
import { describeIssues, envelopeSchema } from "./schemas";

// 編碼與解碼由 dispatcher 自行處理，關閉 axios 的預設轉換
const passThrough = (data: unknown): unknown => data;

export class RequestDispatcher {
  constructor(
    private readonly config: ResolvedConfig,
    private readonly http: AxiosInstance,
    private readonly logger: Logger
  ) {}

  /**
   * 發送請求並解析 envelope
   *
   * @param endpoint - 以 / 開頭的 API 路徑
   * @param body - 請求內容，省略時不送 body
   * @throws {EncodeError} body 無法序列化
   * @throws {TransportError} 網路呼叫失敗
   * @throws {DecodeError} 回應不是合法的 envelope
   */
  async dispatch(endpoint: string, method: HttpMethod, body?: unknown): Promise<RawResponse> {
    const url = `${this.config.baseUrl}${endpoint}`;
    const context: ErrorContext = { method, url };
    const data = this.encode(body, context);

    this.logger.debug("發送 Payriff 請求", context);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.request<unknown>({
        url,
        method,
        data,
        headers: {
          Authorization: this.config.secretKey,
          "Content-Type": "application/json",
        },
        responseType: "text",
        transformRequest: [passThrough],
        transformResponse: [passThrough],
        // 業務失敗也可能以 4xx 回傳 envelope，一律交給解碼
        validateStatus: () => true,
        timeout: this.config.timeoutMs ?? 0,
      });
    } catch (error: unknown) {
      this.logger.error("Payriff 請求失敗", {
        ...context,
        errorCode: axios.isAxiosError(error) ? error.code : undefined,
        errorMessage: error instanceof Error ? error.message : String(error),
      });
      throw PaymentErrors.Transport(error, context);
    }

    const envelope = this.decode(response.data, { ...context, status: response.status });

    this.logger.info("Payriff 回應", {
      ...context,
      status: response.status,
      code: envelope.code,
      responseId: envelope.responseId,
    });

    return envelope;
  }

  private encode(body: unknown, context: ErrorContext): string | undefined {
    if (body === undefined || body === null) {
      return undefined;
    }

    let encoded: string | undefined;
    try {
      encoded = JSON.stringify(body);
    } catch (error: unknown) {
      this.logger.warn("請求內容編碼失敗", context);
      throw PaymentErrors.Encode(error, context);
    }

    if (encoded === undefined) {
      throw PaymentErrors.Encode(new TypeError(`無法序列化 ${typeof body}`), context);
    }
    return encoded;
  }

  private decode(raw: unknown, context: ErrorContext): RawResponse {
    if (typeof raw !== "string") {
      throw PaymentErrors.Decode("回應內容不是文字", context);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error: unknown) {
      this.logger.warn("回應不是合法的 JSON", { ...context, bodyLength: raw.length });
      throw PaymentErrors.Decode("無法解析回應", context, error);
    }

    const parsed = envelopeSchema.safeParse(json);
    if (!parsed.success) {
      const details = describeIssues(parsed.error);
      this.logger.warn("回應結構不符", { ...context, details });
      throw PaymentErrors.Decode("回應結構不符", { ...context, details }, parsed.error);
    }

    const { code, message, route, internalMessage, responseId, payload } = parsed.data;
    return { code, message, route, internalMessage, responseId, payload };
  }
}
