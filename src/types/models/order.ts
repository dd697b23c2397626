/**
 * 訂單型別定義
 */

import type { Currency, Language, Operation, PaymentStatus } from '../common';

/** 建立訂單後回傳的 payload */
export interface OrderPayload {
  orderId: string;
  paymentUrl: string;
  /** 閘道端為 64 位元整數；超過 Number.MAX_SAFE_INTEGER (2^53 - 1) 的值在 JSON 解析時即失去精度 */
  transactionId: number;
}

/** 已儲存卡片的資訊 */
export interface CardDetails {
  maskedPan: string;
  brand: string;
  cardHolderName: string;
}

export interface Installment {
  type: string | null;
  period: string | null;
}

export interface Transaction {
  uuid: string;
  createdDate: string;
  status: PaymentStatus;
  channel: string;
  channelType: string;
  requestRrn: string;
  responseRrn: string | null;
  pan: string;
  paymentWay: string;
  cardDetails: CardDetails;
  cardUuid: string | null;
  merchantCategory: string;
  installment: Installment;
  deliveryAddress: string | null;
}

export interface OrderInfo {
  orderId: string;
  invoiceUuid: string | null;
  amount: number;
  currencyType: Currency;
  merchantName: string;
  commissionRate: number | null;
  operationType: Operation;
  paymentStatus: PaymentStatus;
  auto: boolean;
  createdDate: string;
  description: string;
  transactions: Transaction[];
}

/**
 * 建立訂單參數
 *
 * language、currency、callbackUrl 未指定時使用 SDK 的預設值。
 */
export interface CreateOrderRequest {
  amount: number;
  description: string;
  operation: Operation;
  cardSave: boolean;
  language?: Language;
  currency?: Currency;
  callbackUrl?: string;
}

export interface RefundRequest {
  amount: number;
  orderId: string;
}

/** 預授權請款參數 */
export interface CompleteRequest {
  amount: number;
  orderId: string;
}

/** 以已儲存卡片自動扣款 */
export interface AutoPayRequest {
  cardUuid: string;
  amount: number;
  description: string;
  operation: Operation;
  currency?: Currency;
  callbackUrl?: string;
}
