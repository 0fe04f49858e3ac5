import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import { NotifierPort } from "../../core/ports/NotifierPort";

type TelegramOptions = {
  /** Largo máximo de cada mensaje; el tope de Telegram es 4096. */
  chunkSize?: number | undefined;
  /** Pausa entre los mensajes de una misma notificación. */
  delayMs?: number | undefined;
  fetchImpl?: typeof fetch | undefined;
};

// Body de error de la Bot API, ej. {"ok":false,"error_code":403,"description":"Forbidden: ..."}
const BotApiReply = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

/**
 * Envía el resumen final del pack al chat del operador vía la Bot API de
 * Telegram. Si no entra en un mensaje, se corta entre secciones.
 */
export class TelegramHttpNotifier extends NotifierPort {
  private readonly chunkSize: number;
  private readonly delayMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly token: string, opts: TelegramOptions = {}) {
    super();
    if (!this.token) throw new Error("Telegram token required");
    this.chunkSize = Math.max(128, Math.min(4096, opts.chunkSize ?? 3500));
    this.delayMs = Math.max(0, Math.min(10_000, opts.delayMs ?? 500));
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async sendText(chatId: string, text: string): Promise<void> {
    const messages = packMessages(text, this.chunkSize);
    for (let i = 0; i < messages.length; i++) {
      if (i > 0 && this.delayMs) await delay(this.delayMs);
      await this.sendMessage(chatId, messages[i] ?? "");
    }
  }

  private async sendMessage(chatId: string, text: string): Promise<void> {
    const res = await this.fetchImpl(`https://api.telegram.org/bot${this.token}/sendMessage`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ chat_id: chatId, text, disable_web_page_preview: true }),
    });
    if (res.ok) return;

    const body = await res.text();
    throw new Error(`Telegram sendMessage ${res.status}: ${describeFailure(body)}`);
  }
}

function describeFailure(body: string): string {
  const raw = body.slice(0, 300) || "(empty body)";
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return raw;
  }
  const reply = BotApiReply.safeParse(parsed);
  return reply.success && reply.data.description ? reply.data.description : raw;
}

const SEPARATORS = ["\n\n", "\n", " "] as const;

/**
 * Agrupa el texto en mensajes de hasta `max` caracteres. Las secciones
 * (separadas por línea en blanco) se juntan mientras entren; una demasiado
 * larga se corta por líneas, después por palabras y, en última instancia, a mitad de palabra.
 */
export function packMessages(text: string, max: number): string[] {
  return pack(text, max, 0).filter((m) => m.trim().length > 0);
}

function pack(text: string, max: number, level: number): string[] {
  if (text.length <= max) return [text];

  const sep = SEPARATORS[level];
  if (sep === undefined) {
    const slices: string[] = [];
    for (let at = 0; at < text.length; at += max) slices.push(text.slice(at, at + max));
    return slices;
  }

  const messages: string[] = [];
  let current = "";
  for (const part of text.split(sep)) {
    for (const piece of pack(part, max, level + 1)) {
      const joined = current ? `${current}${sep}${piece}` : piece;
      if (joined.length <= max) {
        current = joined;
      } else {
        if (current) messages.push(current);
        current = piece;
      }
    }
  }
  if (current) messages.push(current);
  return messages;
}
