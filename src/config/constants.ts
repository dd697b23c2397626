import dotenv from "dotenv";
import { z } from "zod";
import { CURRENCIES, LANGUAGES } from "@/types";
import type { ClientConfig, Currency, Language } from "@/types";
import { PaymentErrors } from "@/utils/errors";

// ========================================
// Payriff 預設值
// ========================================

export const PAYRIFF_DEFAULTS = {
  BASE_URL: "https://api.payriff.com/api/v3",
  LANGUAGE: "AZ" satisfies Language,
  CURRENCY: "AZN" satisfies Currency,
} as const;

export const ENDPOINTS = {
  ORDERS: "/orders",
  REFUND: "/refund",
  COMPLETE: "/complete",
  AUTO_PAY: "/autoPay",
} as const;

/** 可讀取的環境變數名稱 */
export const ENV_VARS = {
  BASE_URL: "PAYRIFF_BASE_URL",
  SECRET_KEY: "PAYRIFF_SECRET_KEY",
  CALLBACK_URL: "PAYRIFF_CALLBACK_URL",
  LANGUAGE: "PAYRIFF_LANGUAGE",
  CURRENCY: "PAYRIFF_CURRENCY",
  TIMEOUT_MS: "PAYRIFF_TIMEOUT_MS",
} as const;

// 空字串視為未設定
const blank = <T extends z.ZodType>(schema: T) =>
  z.preprocess((value) => (value === "" ? undefined : value), schema.optional());

const envSchema = z.object({
  [ENV_VARS.BASE_URL]: blank(z.string()),
  [ENV_VARS.SECRET_KEY]: blank(z.string()),
  [ENV_VARS.CALLBACK_URL]: blank(z.string()),
  [ENV_VARS.LANGUAGE]: blank(z.enum(LANGUAGES)),
  [ENV_VARS.CURRENCY]: blank(z.enum(CURRENCIES)),
  [ENV_VARS.TIMEOUT_MS]: blank(z.coerce.number().int().positive()),
});

/**
 * 從環境變數組出 SDK 設定
 *
 * 只回傳有設定的欄位，其餘交由 SDK 建構時套用預設值。
 *
 * @throws {ConfigError} 語系、幣別或逾時設定不合法
 */
export function readConfigFromEnv(env: NodeJS.ProcessEnv): ClientConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw PaymentErrors.Config("Payriff 環境變數設定不正確", {
      details: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }

  const values = parsed.data;
  const config: ClientConfig = {};
  if (values.PAYRIFF_BASE_URL) config.baseUrl = values.PAYRIFF_BASE_URL;
  if (values.PAYRIFF_SECRET_KEY) config.secretKey = values.PAYRIFF_SECRET_KEY;
  if (values.PAYRIFF_CALLBACK_URL) config.defaultCallbackUrl = values.PAYRIFF_CALLBACK_URL;
  if (values.PAYRIFF_LANGUAGE) config.defaultLanguage = values.PAYRIFF_LANGUAGE;
  if (values.PAYRIFF_CURRENCY) config.defaultCurrency = values.PAYRIFF_CURRENCY;
  if (values.PAYRIFF_TIMEOUT_MS !== undefined) config.timeoutMs = values.PAYRIFF_TIMEOUT_MS;
  return config;
}

/**
 * 載入 .env 後讀取 process.env
 */
export function loadConfigFromEnv(): ClientConfig {
  dotenv.config();
  return readConfigFromEnv(process.env);
}
