/**
 * API 請求/回應型別定義
 */

/** Payriff 所有回應共用的外層結構，payload 尚未解析 */
export interface RawResponse {
  code: string;
  message: string;
  route: string;
  internalMessage: string | null;
  responseId: string;
  payload: unknown;
}

/** 已依操作解析 payload 的回應 */
export interface ApiResponse<T = unknown> extends Omit<RawResponse, 'payload'> {
  payload: T;
}

/** 回應的中繼資料（不含 payload） */
export type ResponseMeta = Omit<RawResponse, 'payload'>;
