import winston from "winston";

// 敏感欄位清單（比對時不分大小寫、採包含比對）
const sensitiveFields: string[] = ["authorization", "secret", "token", "cardHolderName", "cardUuid"];
// 卡號欄位需完全相符，避免 company、expand 之類的鍵被誤遮
const cardNumberFields: string[] = ["pan", "maskedPan"];

function isSensitive(key: string): boolean {
  const lowered = key.toLowerCase();
  return (
    cardNumberFields.some((field) => lowered === field.toLowerCase()) ||
    sensitiveFields.some((field) => lowered.includes(field.toLowerCase()))
  );
}

// 遞迴過濾敏感資訊
export function sanitizeLog(data: unknown): unknown {
  if (typeof data !== "object" || data === null) return data;

  if (Array.isArray(data)) {
    return data.map((item) => sanitizeLog(item));
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (isSensitive(key)) {
      sanitized[key] = "***REDACTED***";
    } else if (typeof value === "object") {
      sanitized[key] = sanitizeLog(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

const redact = winston.format((info) => {
  Object.keys(info).forEach((key) => {
    if (!["level", "message", "timestamp", "service"].includes(key)) {
      info[key] = sanitizeLog(info[key]);
    }
  });
  return info;
});

export function createLogger(level: string = process.env.LOG_LEVEL || "info"): winston.Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
      winston.format.errors({ stack: true }),
      winston.format.splat(),
      redact(),
      winston.format.json()
    ),
    defaultMeta: { service: "payriff-sdk" },
    transports: [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ level, message, timestamp, ...meta }) => {
            return `${timestamp} [${level}]: ${message} ${Object.keys(meta).length > 0 ? JSON.stringify(meta, null, 2) : ""}`;
          })
        ),
      }),
    ],
  });
}

const logger = createLogger();

export default logger;
