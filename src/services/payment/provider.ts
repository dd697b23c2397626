/**
 * Payriff SDK 提供者
 *
 * 應用程式共用一個 PayriffSDK：第一次取用時才透過 dotenv 載入 .env，
 * 以 PAYRIFF_* 環境變數組出設定。需要多組商戶金鑰時請直接 new PayriffSDK。
 */

import { PayriffSDK } from "./PayriffSDK";
import { loadConfigFromEnv } from "../../config/constants";
import logger from "../../utils/logger";

let sdkInstance: PayriffSDK | null = null;

/**
 * 讀取 PAYRIFF_* 環境變數並建立共用實例；已建立時直接回傳
 * @throws {ConfigError} 例如 PAYRIFF_CURRENCY 不是支援的幣別、PAYRIFF_TIMEOUT_MS 不是數字
 */
export function initPayriffSDK(): PayriffSDK {
  try {
    if (!sdkInstance) {
      sdkInstance = new PayriffSDK(loadConfigFromEnv());
      logger.info("PayriffSDK 實例已初始化");
    }
    return sdkInstance;
  } catch (error: unknown) {
    logger.error("初始化 PayriffSDK 失敗", { error: error instanceof Error ? error.message : String(error) });
    throw error;
  }
}

/**
 * 取得共用的 PayriffSDK，尚未建立時才讀取環境變數
 */
export function getPayriffSDK(): PayriffSDK {
  if (!sdkInstance) {
    return initPayriffSDK();
  }
  return sdkInstance;
}

/**
 * 丟棄共用實例，下次取用時重新讀取環境變數（測試或輪替金鑰時使用）
 */
export function resetPayriffSDK(): void {
  sdkInstance = null;
}

export default {
  initPayriffSDK,
  getPayriffSDK,
  resetPayriffSDK,
};
