/**
 * 錯誤型別定義
 */

export type ErrorCode =
  | 'ENCODE_ERROR'
  | 'TRANSPORT_ERROR'
  | 'DECODE_ERROR'
  | 'CONFIG_ERROR';

export interface ErrorContext {
  method?: string;
  url?: string;
  status?: number;
  details?: unknown;
  [key: string]: unknown;
}
