/**
 * SDK 設定型別定義
 */

import type { AxiosInstance } from 'axios';
import type { Logger } from 'winston';
import type { Currency, Language } from './common';

export interface ClientConfig {
  baseUrl?: string;
  secretKey?: string;
  defaultCallbackUrl?: string;
  defaultLanguage?: Language;
  defaultCurrency?: Currency;
  /** 傳輸層逾時（毫秒），未設定則不逾時 */
  timeoutMs?: number;
  httpClient?: AxiosInstance;
  logger?: Logger;
}

/** 建構時套用預設值後的設定 */
export interface ResolvedConfig {
  readonly baseUrl: string;
  readonly secretKey: string;
  readonly defaultCallbackUrl: string;
  readonly defaultLanguage: Language;
  readonly defaultCurrency: Currency;
  readonly timeoutMs?: number;
}
