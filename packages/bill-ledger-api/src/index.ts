export * from "./app.js";
export * from "./config/env.js";
export * from "./domain/spend-analysis.js";
export * from "./routes/http-utils.js";
export * from "./storage/in-memory-bill-store.js";
export * from "./types/bill-store.js";
