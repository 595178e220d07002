import { BillTextParser } from "./bill-parser.js";
import { SharpImagePreprocessor } from "./image-preprocessor.js";
import {
  consoleExtractionLogger,
  RecognitionError,
  type ExtractionLogger,
  type ImagePreprocessor,
  type ParsedBill,
  type TextRecognizer,
} from "./types.js";
import { createTextRecognizerFromEnv } from "./vision-recognizer.js";

export type BillImageProcessor = {
  process: (imageDataUrl: string) => Promise<ParsedBill>;
};

export type ImageBillProcessorOptions = {
  recognizer: TextRecognizer | null;
  parser?: BillTextParser;
  preprocessor?: ImagePreprocessor;
  logger?: ExtractionLogger;
  timeoutMs?: number;
};

const DEFAULT_UPLOAD_TIMEOUT_MS = 30000;

/**
 * preprocess -> recognize -> parse. Any recognition problem yields the parser's fallback bill.
 */
export class ImageBillProcessor implements BillImageProcessor {
  private readonly recognizer: TextRecognizer | null;
  private readonly parser: BillTextParser;
  private readonly preprocessor?: ImagePreprocessor;
  private readonly logger: ExtractionLogger;
  private readonly timeoutMs: number;

  constructor(options: ImageBillProcessorOptions) {
    this.recognizer = options.recognizer;
    this.logger = options.logger ?? consoleExtractionLogger;
    this.parser = options.parser ?? new BillTextParser({ logger: this.logger });
    this.preprocessor = options.preprocessor;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_UPLOAD_TIMEOUT_MS;
  }

  async process(imageDataUrl: string): Promise<ParsedBill> {
    if (!this.recognizer) {
      this.logger.warn(
        "[bill-ledger-extraction] no text recognizer configured; using fallback bill",
      );
      return this.parser.fallback();
    }

    let rawText: string;
    try {
      rawText = await this.withTimeout(this.recognize(this.recognizer, imageDataUrl));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `[bill-ledger-extraction] text recognition failed: ${message}; using fallback bill`,
      );
      return this.parser.fallback();
    }

    return this.parser.parse(rawText);
  }

  private async recognize(recognizer: TextRecognizer, imageDataUrl: string): Promise<string> {
    const prepared = (await this.preprocessor?.preprocess(imageDataUrl)) ?? imageDataUrl;
    return recognizer.recognize({ imageDataUrl: prepared });
  }

  private async withTimeout(work: Promise<string>): Promise<string> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () =>
          reject(new RecognitionError(`timed out after ${this.timeoutMs}ms`, "bill-processor")),
        this.timeoutMs,
      );
    });

    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

export type ImageBillProcessorEnvOptions = {
  parser?: BillTextParser;
  logger?: ExtractionLogger;
  timeoutMs?: number;
};

export function createImageBillProcessorFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  options: ImageBillProcessorEnvOptions = {},
): ImageBillProcessor {
  return new ImageBillProcessor({
    recognizer: createTextRecognizerFromEnv(env),
    preprocessor: new SharpImagePreprocessor({ logger: options.logger }),
    parser: options.parser,
    logger: options.logger,
    timeoutMs: options.timeoutMs,
  });
}
