import { z } from "zod";
import { errorMessage } from "../../core/gate/errors";

export const DEFAULT_GEMINI_BASE_URL = "https://generativelanguage.googleapis.com";

const RETRYABLE_STATUS = [429, 500, 502, 503, 504];

const PartSchema = z
  .object({
    text: z.string().optional(),
    inlineData: z.object({ mimeType: z.string(), data: z.string() }).optional(),
  })
  .passthrough();

const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(PartSchema).default([]) }).optional(),
        finishReason: z.string().optional(),
      })
    )
    .default([]),
});

export type GeminiPart = z.infer<typeof PartSchema>;

export class GeminiHttpError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    readonly retryable: boolean
  ) {
    super(message);
    this.name = "GeminiHttpError";
  }
}

export type GenerateContentRequest = {
  apiKey: string;
  model: string;
  baseUrl: string;
  body: Record<string, unknown>;
  signal: AbortSignal;
  fetchImpl: typeof fetch;
};

/**
 * POST :generateContent y devuelve las parts del primer candidato.
 * Header x-goog-api-key (no ?key=). 429/5xx y errores de red se marcan como
 * reintentables; la política de reintentos es del llamador.
 */
export async function generateContent(req: GenerateContentRequest): Promise<GeminiPart[]> {
  const url = `${req.baseUrl.replace(/\/+$/, "")}/v1beta/models/${encodeURIComponent(req.model)}:generateContent`;

  let res: Response;
  try {
    res = await req.fetchImpl(url, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        "x-goog-api-key": req.apiKey,
      },
      body: JSON.stringify(req.body),
      signal: req.signal,
    });
  } catch (e) {
    if (req.signal.aborted) throw e;
    throw new GeminiHttpError(`Gemini request failed: ${errorMessage(e)}`, null, true);
  }

  if (!res.ok) {
    const txt = await res.text().catch(() => "");
    throw new GeminiHttpError(
      `Gemini ${res.status}: ${txt.slice(0, 200)}`,
      res.status,
      RETRYABLE_STATUS.includes(res.status)
    );
  }

  const json: unknown = await res.json().catch(() => null);
  const parsed = GenerateContentResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new GeminiHttpError(`Gemini returned an unexpected body: ${parsed.error.message.slice(0, 200)}`, res.status, true);
  }
  const first = parsed.data.candidates[0];
  if (!first?.content) {
    throw new GeminiHttpError(`Gemini returned no content (${first?.finishReason ?? "no candidates"})`, res.status, true);
  }
  return first.content.parts;
}
