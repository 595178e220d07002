import {
  BillCreatedResponseSchema,
  BillListQuerySchema,
  BillListResponseSchema,
  CsvBillUploadRequestSchema,
  CsvBillUploadResponseSchema,
  DeleteBillsResponseSchema,
  DuplicateBillResponseSchema,
  HealthResponseSchema,
  ImageBillUploadRequestSchema,
  MonthlyAnalysisQuerySchema,
  MonthlyAnalysisResponseSchema,
  SpendSummaryResponseSchema,
  TextBillUploadRequestSchema,
  type HealthResponse,
} from "@bill-ledger/contracts";
import {
  assembleBill,
  assembleCsvBatch,
  BillTextParser,
  consoleExtractionLogger,
  describeDuplicate,
  normalizeCsvTable,
  readCsvTable,
  type BillImageProcessor,
  type CsvTable,
  type ParsedBill,
} from "@bill-ledger/extraction";
import express, { type Express, type Response } from "express";
import type { ApiConfig } from "./config/env.js";
import { monthlyAnalysis, spendSummary } from "./domain/spend-analysis.js";
import { createErrorHandler, parseBody, parseQuery, type ApiLogger } from "./routes/http-utils.js";
import type { BillStore } from "./types/bill-store.js";

type CreateAppParams = {
  config: ApiConfig;
  store: BillStore;
  imageProcessor: BillImageProcessor;
  parser?: BillTextParser;
  logger?: ApiLogger;
  now?: () => Date;
};

export function createApp(params: CreateAppParams): Express {
  const { config, store, imageProcessor } = params;
  const logger = params.logger ?? consoleExtractionLogger;
  const now = params.now ?? (() => new Date());
  const parser =
    params.parser ??
    new BillTextParser({
      maxItemPrice: config.maxItemPrice,
      minItemsBeforeRetry: config.minItemsBeforeRetry,
      now,
      logger,
    });

  const app = express();
  // Image uploads arrive inline as base64 data URLs.
  app.use(express.json({ limit: config.jsonLimit }));

  app.get("/health", (_req, res) => {
    const payload: HealthResponse = {
      ok: true,
      service: "bill-ledger-api",
      now: now().toISOString(),
    };
    HealthResponseSchema.parse(payload);
    res.json(payload);
  });

  const respondWithBill = (parsed: ParsedBill, res: Response) => {
    const result = assembleBill(parsed.bill, store);
    if (result.status === "duplicate") {
      const message = describeDuplicate(parsed.bill);
      logger.info(`[bill-ledger-api] ${message} (existing ${result.existingBillId})`);
      res.status(409).json(
        DuplicateBillResponseSchema.parse({
          error: "duplicate_bill",
          message,
          existingBillId: result.existingBillId,
          shopName: parsed.bill.shopName,
          date: parsed.bill.date,
          totalAmount: parsed.bill.totalAmount,
        }),
      );
      return;
    }

    res.status(201).json(
      BillCreatedResponseSchema.parse({
        billId: result.billId,
        bill: parsed.bill,
        extraction: {
          pass: parsed.pass,
          usedFallback: parsed.usedFallback,
          needsReview: parsed.needsReview,
        },
      }),
    );
  };

  app.post("/v1/bills/image", async (req, res) => {
    const body = parseBody(ImageBillUploadRequestSchema, req, res);
    if (!body) {
      return;
    }

    const parsed = await imageProcessor.process(body.imageDataUrl);
    respondWithBill(parsed, res);
  });

  app.post("/v1/bills/text", (req, res) => {
    const body = parseBody(TextBillUploadRequestSchema, req, res);
    if (!body) {
      return;
    }

    respondWithBill(parser.parse(body.ocrText), res);
  });

  app.post("/v1/bills/csv", (req, res) => {
    const body = parseBody(CsvBillUploadRequestSchema, req, res);
    if (!body) {
      return;
    }

    let table: CsvTable;
    try {
      table = readCsvTable(body.csvText);
    } catch (error) {
      res.status(400).json({
        error: "invalid_csv",
        message: error instanceof Error ? error.message : String(error),
      });
      return;
    }

    const normalized = normalizeCsvTable(table, { now });
    const batch = assembleCsvBatch(normalized.bills, store);
    for (const duplicate of batch.duplicates) {
      logger.info(`[bill-ledger-api] ${duplicate}`);
    }

    res.status(201).json(
      CsvBillUploadResponseSchema.parse({
        billsCreated: batch.created.length,
        bills: batch.created,
        duplicates: batch.duplicates,
        errors: normalized.errors,
      }),
    );
  });

  app.get("/v1/bills", (req, res) => {
    const query = parseQuery(BillListQuerySchema, req, res);
    if (!query) {
      return;
    }

    res.json(BillListResponseSchema.parse({ bills: store.listBills(query) }));
  });

  app.delete("/v1/bills", (_req, res) => {
    res.json(DeleteBillsResponseSchema.parse(store.deleteAll()));
  });

  app.get("/v1/analysis/monthly", (req, res) => {
    const query = parseQuery(MonthlyAnalysisQuerySchema, req, res);
    if (!query) {
      return;
    }

    const analysis = monthlyAnalysis(store.listBills(query), query.month, query.year);
    res.json(MonthlyAnalysisResponseSchema.parse(analysis));
  });

  app.get("/v1/analysis/summary", (req, res) => {
    const query = parseQuery(BillListQuerySchema, req, res);
    if (!query) {
      return;
    }

    res.json(SpendSummaryResponseSchema.parse(spendSummary(store.listBills(query), query)));
  });

  app.use((req, res) => {
    res
      .status(404)
      .json({ error: "not_found", message: `route not found: ${req.method} ${req.path}` });
  });

  app.use(createErrorHandler(logger));

  return app;
}
