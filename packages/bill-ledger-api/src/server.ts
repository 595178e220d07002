import { BillTextParser, createImageBillProcessorFromEnv } from "@bill-ledger/extraction";
import { createApp } from "./app.js";
import { readApiConfigFromEnv } from "./config/env.js";
import { InMemoryBillStore } from "./storage/in-memory-bill-store.js";

async function main() {
  const config = readApiConfigFromEnv();
  const parser = new BillTextParser({
    maxItemPrice: config.maxItemPrice,
    minItemsBeforeRetry: config.minItemsBeforeRetry,
  });
  const imageProcessor = createImageBillProcessorFromEnv(process.env, {
    parser,
    timeoutMs: config.uploadTimeoutMs,
  });
  const app = createApp({ config, store: new InMemoryBillStore(), imageProcessor, parser });

  app.listen(config.port, () => {
    // eslint-disable-next-line no-console
    console.log(`[bill-ledger-api] listening on :${config.port}`);
  });
}

void main();
