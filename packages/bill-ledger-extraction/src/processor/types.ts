import type {
  CanonicalBill,
  DuplicateKey,
  ExtractedItem,
  ExtractionPass,
} from "@bill-ledger/contracts";

export type ExtractionLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export const consoleExtractionLogger: ExtractionLogger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

export type TextRecognitionInput = {
  imageDataUrl: string;
};

export type TextRecognizer = {
  recognize: (input: TextRecognitionInput) => Promise<string>;
};

export type ImagePreprocessor = {
  preprocess: (imageDataUrl: string) => Promise<string | undefined>;
};

export type BillDraft = {
  shopName: string;
  date: string;
  totalAmount: number;
  items: ExtractedItem[];
};

export type ParsedBill = {
  bill: CanonicalBill;
  pass: ExtractionPass;
  usedFallback: boolean;
  needsReview: boolean;
};

export type BillRepository = {
  findDuplicate: (key: DuplicateKey) => string | null;
  persist: (bill: CanonicalBill) => string;
};

export class RecognitionError extends Error {
  readonly provider: string;

  constructor(message: string, provider: string, options?: { cause?: unknown }) {
    super(`[${provider}] ${message}`, options);
    this.name = "RecognitionError";
    this.provider = provider;
  }
}
