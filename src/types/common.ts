/**
 * 通用型別定義
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export const LANGUAGES = ['AZ', 'EN', 'RU'] as const;
export type Language = (typeof LANGUAGES)[number];

export const CURRENCIES = ['AZN', 'USD', 'EUR'] as const;
export type Currency = (typeof CURRENCIES)[number];

export const OPERATIONS = ['PURCHASE', 'PRE_AUTH'] as const;
export type Operation = (typeof OPERATIONS)[number];

export const PAYMENT_STATUSES = [
  'CREATED',
  'APPROVED',
  'CANCELED',
  'DECLINED',
  'REFUNDED',
  'PREAUTH_APPROVED',
  'EXPIRED',
  'REVERSE',
  'PARTIAL_REFUND',
] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

/**
 * Payriff 回傳的業務結果碼
 *
 * 與 HTTP 狀態碼無關，HTTP 200 仍可能帶有失敗的結果碼。
 */
export const ResultCode = {
  Success: '00000',
  SuccessGateway: '00',
  SuccessApprove: 'APPROVED',
  SuccessPreauth: 'PREAUTH-APPROVED',
  Warning: '01000',
  Error: '15000',
  InvalidParameters: '15400',
  Unauthorized: '14010',
  TokenNotPresent: '14013',
  InvalidToken: '14014',
} as const;
export type ResultCode = (typeof ResultCode)[keyof typeof ResultCode];
