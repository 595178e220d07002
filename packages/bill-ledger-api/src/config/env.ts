export type ApiConfig = {
  port: number;
  jsonLimit: string;
  uploadTimeoutMs: number;
  maxItemPrice: number;
  minItemsBeforeRetry: number;
};

export function readApiConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  return {
    port: readInteger(env, "BILL_LEDGER_API_PORT", 8790, 0),
    jsonLimit: env.BILL_LEDGER_JSON_LIMIT?.trim() || "20mb",
    uploadTimeoutMs: readInteger(env, "BILL_LEDGER_UPLOAD_TIMEOUT_MS", 30000, 1),
    maxItemPrice: readPositiveNumber(env, "BILL_LEDGER_MAX_ITEM_PRICE", 1000),
    minItemsBeforeRetry: readInteger(env, "BILL_LEDGER_MIN_ITEMS_BEFORE_RETRY", 2, 0),
  };
}

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`invalid ${name}: ${raw}`);
  }
  return value;
}

function readPositiveNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`invalid ${name}: ${raw}`);
  }
  return value;
}
