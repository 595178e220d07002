import sharp from "sharp";
import { consoleExtractionLogger, type ExtractionLogger, type ImagePreprocessor } from "./types.js";

export type BillImagePreprocessOptions = {
  maxLongestSide?: number;
  jpegQuality?: number;
  logger?: ExtractionLogger;
};

const DEFAULT_MAX_LONGEST_SIDE = 1600;
const DEFAULT_JPEG_QUALITY = 85;
const DATA_URL_PREFIX = "data:image/";

/**
 * Greyscale, contrast-stretched JPEG no larger than `maxLongestSide`. Payloads sharp cannot
 * decode are passed through untouched so recognition can still try them.
 */
export async function preprocessBillImageDataUrl(
  dataUrl: string | undefined,
  options: BillImagePreprocessOptions = {},
): Promise<string | undefined> {
  const normalized = normalizeImageDataUrl(dataUrl);
  if (!normalized) {
    return undefined;
  }

  const parsed = parseImageDataUrl(normalized);
  if (!parsed) {
    return normalized;
  }

  const maxLongestSide = options.maxLongestSide ?? DEFAULT_MAX_LONGEST_SIDE;
  const jpegQuality = options.jpegQuality ?? DEFAULT_JPEG_QUALITY;
  const logger = options.logger ?? consoleExtractionLogger;

  const inputBuffer = Buffer.from(parsed.base64, "base64");
  if (inputBuffer.length === 0) {
    return normalized;
  }

  try {
    const outputBuffer = await sharp(inputBuffer)
      .rotate()
      .greyscale()
      .normalise()
      .resize({
        width: maxLongestSide,
        height: maxLongestSide,
        fit: "inside",
        withoutEnlargement: true,
      })
      .jpeg({ quality: jpegQuality })
      .toBuffer();

    return `data:image/jpeg;base64,${outputBuffer.toString("base64")}`;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`[bill-ledger-extraction] image preprocessing skipped: ${message}`);
    return normalized;
  }
}

export class SharpImagePreprocessor implements ImagePreprocessor {
  constructor(private readonly options: BillImagePreprocessOptions = {}) {}

  preprocess(imageDataUrl: string): Promise<string | undefined> {
    return preprocessBillImageDataUrl(imageDataUrl, this.options);
  }
}

function normalizeImageDataUrl(value: string | undefined): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  if (!trimmed.startsWith(DATA_URL_PREFIX)) {
    return undefined;
  }

  return trimmed;
}

function parseImageDataUrl(dataUrl: string): { base64: string } | null {
  const match = dataUrl.match(/^data:image\/[A-Za-z0-9.+-]+;base64,(?<base64>[A-Za-z0-9+/=]+)$/);
  const base64 = match?.groups?.base64;
  if (!base64) {
    return null;
  }

  return { base64 };
}
