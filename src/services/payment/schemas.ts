/**
 * Payriff 回應結構驗證
 *
 * 外層 envelope 只要求 code，其他欄位缺少或為 null 時補空值；
 * payload 則依各操作以對應 schema 再解析一次，null 欄位一律換成零值
 * （""、0、false），列舉欄位仍須為已知值。
 */

import { z } from "zod";
import { CURRENCIES, OPERATIONS, PAYMENT_STATUSES } from "@/types";
import type { CardDetails, OrderInfo, OrderPayload, Transaction } from "@/types";

const nullableString = z.string().nullable().default(null);
const text = z.string().nullish().transform((value) => value ?? "");
const amount = z.number().nullish().transform((value) => value ?? 0);
const flag = z.boolean().nullish().transform((value) => value ?? false);

export const envelopeSchema = z.object({
  code: z.string(),
  message: text,
  route: text,
  internalMessage: nullableString,
  responseId: text,
  payload: z.unknown(),
});

export const orderPayloadSchema: z.ZodType<OrderPayload> = z.object({
  orderId: text,
  paymentUrl: text,
  transactionId: z.number().int().nullish().transform((value) => value ?? 0),
});

const cardDetailsSchema = z
  .object({
    maskedPan: text,
    brand: text,
    cardHolderName: text,
  })
  .nullish()
  .transform((card): CardDetails => card ?? { maskedPan: "", brand: "", cardHolderName: "" });

export const transactionSchema: z.ZodType<Transaction> = z.object({
  uuid: text,
  createdDate: text,
  status: z.enum(PAYMENT_STATUSES),
  channel: text,
  channelType: text,
  requestRrn: text,
  responseRrn: nullableString,
  pan: text,
  paymentWay: text,
  cardDetails: cardDetailsSchema,
  cardUuid: nullableString,
  merchantCategory: text,
  installment: z
    .object({ type: nullableString, period: nullableString })
    .nullish()
    .transform((value) => value ?? { type: null, period: null }),
  deliveryAddress: nullableString,
});

export const orderInfoSchema: z.ZodType<OrderInfo> = z.object({
  orderId: text,
  invoiceUuid: nullableString,
  amount,
  currencyType: z.enum(CURRENCIES),
  merchantName: text,
  commissionRate: z.number().nullable().default(null),
  operationType: z.enum(OPERATIONS),
  paymentStatus: z.enum(PAYMENT_STATUSES),
  auto: flag,
  createdDate: text,
  description: text,
  // 部分回應會帶 null 或省略交易清單
  transactions: z
    .array(transactionSchema)
    .nullish()
    .transform((list) => list ?? []),
});

/** 將 zod 驗證問題整理成簡短描述 */
export function describeIssues(error: Pick<z.ZodError, "issues">): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}
