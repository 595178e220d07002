import { z } from "zod";
import { RecognitionError, type TextRecognitionInput, type TextRecognizer } from "./types.js";

export type SupportedOcrProvider =
  | "openai"
  | "openrouter"
  | "gemini"
  | "lmstudio"
  | "openai-compatible";
export type OcrRequestMode = "responses" | "chat_completions";

export type VisionTextRecognizerOptions = {
  provider?: SupportedOcrProvider;
  apiKey?: string;
  model: string;
  baseUrl?: string;
  requestMode?: OcrRequestMode;
  extraHeaders?: Record<string, string>;
  timeoutMs?: number;
};

export type RecognizerConfig = {
  provider: SupportedOcrProvider;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  requestMode: OcrRequestMode;
  extraHeaders: Record<string, string>;
};

const DEFAULT_TIMEOUT_MS = 25000;

const SUPPORTED_PROVIDERS: readonly SupportedOcrProvider[] = [
  "openai",
  "openrouter",
  "gemini",
  "lmstudio",
  "openai-compatible",
];

const TRANSCRIPTION_PROMPT = [
  "Transcribe the text of this shopping bill or receipt exactly as printed.",
  "Keep one printed line per output line, in top-to-bottom order.",
  "Do not summarise, translate, reorder, or add commentary.",
].join(" ");

const ResponsesPayloadSchema = z.object({
  output_text: z.string().optional(),
  output: z
    .array(
      z.object({
        content: z.array(z.object({ text: z.string().optional() }).loose()).optional(),
      }).loose(),
    )
    .optional(),
}).loose();

const ChatCompletionsPayloadSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z
              .union([
                z.string(),
                z.array(z.object({ text: z.string().optional() }).loose()),
                z.null(),
              ])
              .optional(),
          })
          .loose()
          .optional(),
      }).loose(),
    )
    .optional(),
}).loose();

type ResponsesPayload = z.infer<typeof ResponsesPayloadSchema>;
type ChatCompletionsPayload = z.infer<typeof ChatCompletionsPayloadSchema>;

export class VisionTextRecognizer implements TextRecognizer {
  private readonly provider: SupportedOcrProvider;
  private readonly apiKey?: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly requestMode: OcrRequestMode;
  private readonly extraHeaders: Record<string, string>;
  private readonly timeoutMs: number;

  constructor(options: VisionTextRecognizerOptions) {
    this.provider = options.provider ?? "openai";
    this.apiKey = options.apiKey?.trim() || undefined;
    this.model = options.model;
    this.baseUrl = resolveBaseUrl(this.provider, options.baseUrl);
    this.requestMode = options.requestMode ?? defaultRequestMode(this.provider);
    this.extraHeaders = sanitizeHeaders(options.extraHeaders);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async recognize(input: TextRecognitionInput): Promise<string> {
    const imageDataUrl = input.imageDataUrl.trim();
    if (!imageDataUrl.startsWith("data:image/")) {
      throw new RecognitionError("input is not an image data url", this.provider);
    }

    if (this.requestMode === "chat_completions") {
      const payload = await this.post("/chat/completions", this.chatCompletionsBody(imageDataUrl));
      const parsed = this.parsePayload(ChatCompletionsPayloadSchema, payload);
      return extractChatCompletionText(parsed) ?? "";
    }

    const payload = await this.post("/responses", this.responsesBody(imageDataUrl));
    return extractOutputText(this.parsePayload(ResponsesPayloadSchema, payload)) ?? "";
  }

  private parsePayload<T>(schema: z.ZodType<T>, payload: unknown): T {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new RecognitionError(
        `unexpected ${this.requestMode} payload: ${parsed.error.message}`,
        this.provider,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }

  private responsesBody(imageDataUrl: string): Record<string, unknown> {
    return {
      model: this.model,
      input: [
        {
          role: "system",
          content: [{ type: "input_text", text: TRANSCRIPTION_PROMPT }],
        },
        {
          role: "user",
          content: [
            { type: "input_text", text: "Transcribe this bill." },
            { type: "input_image", image_url: imageDataUrl },
          ],
        },
      ],
    };
  }

  private chatCompletionsBody(imageDataUrl: string): Record<string, unknown> {
    return {
      model: this.model,
      messages: [
        { role: "system", content: TRANSCRIPTION_PROMPT },
        {
          role: "user",
          content: [
            { type: "text", text: "Transcribe this bill." },
            { type: "image_url", image_url: { url: imageDataUrl } },
          ],
        },
      ],
    };
  }

  private async post(path: string, body: Record<string, unknown>): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: this.buildHeaders(),
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const text = await response.text();
        throw new RecognitionError(
          `recognition failed via ${this.requestMode} (${response.status}): ${text.slice(0, 200)}`,
          this.provider,
        );
      }

      return await response.json();
    } catch (error) {
      if (error instanceof RecognitionError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new RecognitionError(`recognition request failed: ${message}`, this.provider, {
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      "content-type": "application/json",
      ...this.extraHeaders,
    };
    if (this.apiKey) {
      headers.authorization = `Bearer ${this.apiKey}`;
    }
    return headers;
  }
}

export function createTextRecognizerFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): TextRecognizer | null {
  const config = resolveRecognizerConfigFromEnv(env);
  if (!config) {
    return null;
  }

  return new VisionTextRecognizer({
    provider: config.provider,
    apiKey: config.apiKey,
    model: config.model,
    baseUrl: config.baseUrl,
    requestMode: config.requestMode,
    extraHeaders: config.extraHeaders,
  });
}

/**
 * Hosted providers need a key; without one there is no recognizer and image uploads fall back.
 */
export function resolveRecognizerConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): RecognizerConfig | null {
  const provider = parseProvider(env.BILL_LEDGER_OCR_PROVIDER);
  const apiKey = resolveProviderApiKey(provider, env);
  const requiresApiKey =
    provider === "openai" || provider === "openrouter" || provider === "gemini";
  if (requiresApiKey && !apiKey) {
    return null;
  }

  return {
    provider,
    model: env.BILL_LEDGER_OCR_MODEL?.trim() || defaultModel(provider),
    apiKey,
    baseUrl: env.BILL_LEDGER_OCR_BASE_URL?.trim() || undefined,
    requestMode: resolveRequestMode(env.BILL_LEDGER_OCR_REQUEST_MODE, provider),
    extraHeaders: resolveProviderHeaders(provider, env),
  };
}

function parseProvider(value: string | undefined): SupportedOcrProvider {
  const lowered = value?.trim().toLowerCase();
  return SUPPORTED_PROVIDERS.find((provider) => provider === lowered) ?? "openai";
}

function resolveRequestMode(
  value: string | undefined,
  provider: SupportedOcrProvider,
): OcrRequestMode {
  const trimmed = value?.trim();
  if (trimmed === "responses" || trimmed === "chat_completions") {
    return trimmed;
  }
  return defaultRequestMode(provider);
}

function defaultRequestMode(provider: SupportedOcrProvider): OcrRequestMode {
  return provider === "openai" ? "responses" : "chat_completions";
}

function resolveBaseUrl(provider: SupportedOcrProvider, override?: string): string {
  const normalizedOverride = override?.trim();
  if (normalizedOverride) {
    return normalizedOverride.replace(/\/$/, "");
  }

  switch (provider) {
    case "openrouter":
      return "https://openrouter.ai/api/v1";
    case "gemini":
      return "https://generativelanguage.googleapis.com/v1beta/openai";
    case "lmstudio":
    case "openai-compatible":
      return "http://127.0.0.1:1234/v1";
    case "openai":
      return "https://api.openai.com/v1";
  }
}

function resolveProviderApiKey(
  provider: SupportedOcrProvider,
  env: NodeJS.ProcessEnv,
): string | undefined {
  const explicit = env.BILL_LEDGER_OCR_API_KEY?.trim();
  if (explicit) {
    return explicit;
  }

  switch (provider) {
    case "openrouter":
      return env.OPENROUTER_API_KEY?.trim() || undefined;
    case "gemini":
      return env.GEMINI_API_KEY?.trim() || env.GOOGLE_API_KEY?.trim() || undefined;
    case "openai":
      return env.OPENAI_API_KEY?.trim() || undefined;
    case "lmstudio":
    case "openai-compatible":
      return undefined;
  }
}

function resolveProviderHeaders(
  provider: SupportedOcrProvider,
  env: NodeJS.ProcessEnv,
): Record<string, string> {
  if (provider !== "openrouter") {
    return {};
  }

  const headers: Record<string, string> = {};
  const referer = env.OPENROUTER_HTTP_REFERER?.trim();
  const appName = env.OPENROUTER_APP_NAME?.trim();
  if (referer) {
    headers["HTTP-Referer"] = referer;
  }
  if (appName) {
    headers["X-Title"] = appName;
  }
  return headers;
}

function defaultModel(provider: SupportedOcrProvider): string {
  switch (provider) {
    case "gemini":
      return "gemini-2.5-flash";
    case "openrouter":
      return "openai/gpt-4o-mini";
    case "lmstudio":
    case "openai-compatible":
      return "local-model";
    case "openai":
      return "gpt-4o-mini";
  }
}

function sanitizeHeaders(headers?: Record<string, string>): Record<string, string> {
  const sanitized: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers ?? {})) {
    const headerKey = key.trim();
    const headerValue = value.trim();
    if (headerKey.length > 0 && headerValue.length > 0) {
      sanitized[headerKey] = headerValue;
    }
  }
  return sanitized;
}

function extractOutputText(payload: ResponsesPayload): string | null {
  if (payload.output_text && payload.output_text.length > 0) {
    return payload.output_text;
  }

  const chunks = (payload.output ?? [])
    .flatMap((entry) => entry.content ?? [])
    .map((content) => content.text)
    .filter((text): text is string => typeof text === "string" && text.length > 0);

  return chunks.length > 0 ? chunks.join("\n") : null;
}

function extractChatCompletionText(payload: ChatCompletionsPayload): string | null {
  const content = payload.choices?.[0]?.message?.content;
  if (typeof content === "string") {
    return content.length > 0 ? content : null;
  }
  if (!content) {
    return null;
  }

  const parts = content
    .map((chunk) => chunk.text)
    .filter((text): text is string => typeof text === "string" && text.length > 0);

  return parts.length > 0 ? parts.join("\n") : null;
}
