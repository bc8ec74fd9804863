import { z } from "zod";
import { errorMessage } from "../errors";
import { silentLogger, type Logger } from "../logger";

export interface InlineButton {
  text: string;
  callbackData: string;
}

export interface SendOptions {
  buttons?: InlineButton[][];
  html?: boolean;
}

export type BotUpdate =
  | { kind: "message"; updateId: number; chatId: string; text: string; firstName?: string }
  | { kind: "callback"; updateId: number; chatId: string; data: string; callbackId: string };

export type UpdateHandler = (update: BotUpdate) => Promise<void>;

/**
 * The narrow slice of a chat bot the notifier and command handler need.
 */
export interface BotTransport {
  sendMessage(chatId: string, text: string, options?: SendOptions): Promise<void>;
  onUpdate(handler: UpdateHandler): void;
}

const chatSchema = z.object({ id: z.union([z.number(), z.string()]), first_name: z.string().optional() });

const updateSchema = z.object({
  update_id: z.number(),
  message: z.object({ chat: chatSchema, text: z.string().optional() }).optional(),
  callback_query: z
    .object({
      id: z.string(),
      data: z.string().optional(),
      message: z.object({ chat: chatSchema }).optional(),
    })
    .optional(),
});

const apiResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  result: z.unknown().optional(),
});

export function toBotUpdate(raw: z.infer<typeof updateSchema>): BotUpdate | null {
  if (raw.message?.text !== undefined) {
    return {
      kind: "message",
      updateId: raw.update_id,
      chatId: String(raw.message.chat.id),
      text: raw.message.text,
      firstName: raw.message.chat.first_name,
    };
  }
  const callback = raw.callback_query;
  if (callback?.data !== undefined && callback.message) {
    return {
      kind: "callback",
      updateId: raw.update_id,
      chatId: String(callback.message.chat.id),
      data: callback.data,
      callbackId: callback.id,
    };
  }
  return null;
}

export interface TelegramClientOptions {
  token: string;
  fetchImpl?: typeof fetch;
  pollTimeoutSec?: number;
  errorBackoffMs?: number;
  logger?: Logger;
}

export class TelegramClient implements BotTransport {
  private readonly api: string;
  private readonly fetchImpl: typeof fetch;
  private readonly pollTimeoutSec: number;
  private readonly errorBackoffMs: number;
  private readonly log: Logger;
  private readonly handlers: UpdateHandler[] = [];

  private offset = 0;
  private polling = false;
  private loop: Promise<void> | null = null;
  private abort: AbortController | null = null;

  constructor(options: TelegramClientOptions) {
    this.api = `https://api.telegram.org/bot${options.token}`;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.pollTimeoutSec = options.pollTimeoutSec ?? 30;
    this.errorBackoffMs = options.errorBackoffMs ?? 5000;
    this.log = options.logger ?? silentLogger;
  }

  onUpdate(handler: UpdateHandler): void {
    this.handlers.push(handler);
  }

  async sendMessage(chatId: string, text: string, options: SendOptions = {}): Promise<void> {
    const body: Record<string, unknown> = { chat_id: chatId, text };
    if (options.html) body.parse_mode = "HTML";
    if (options.buttons) {
      body.reply_markup = {
        inline_keyboard: options.buttons.map((row) =>
          row.map((button) => ({ text: button.text, callback_data: button.callbackData }))
        ),
      };
    }
    await this.call("sendMessage", body);
  }

  async answerCallbackQuery(callbackId: string, text?: string): Promise<void> {
    await this.call("answerCallbackQuery", text ? { callback_query_id: callbackId, text } : { callback_query_id: callbackId });
  }

  /**
   * Fetch one batch of updates and hand each to the registered handlers.
   * Returns the number of updates processed.
   */
  async pollOnce(signal?: AbortSignal): Promise<number> {
    const result = await this.call(
      "getUpdates",
      { offset: this.offset, timeout: this.pollTimeoutSec, allowed_updates: ["message", "callback_query"] },
      signal
    );
    const updates = z.array(updateSchema).safeParse(result);
    if (!updates.success) {
      throw new Error(`Telegram API returned malformed updates: ${updates.error.message}`);
    }

    for (const raw of updates.data) {
      this.offset = Math.max(this.offset, raw.update_id + 1);
      const update = toBotUpdate(raw);
      if (!update) continue;
      await this.dispatch(update);
    }
    return updates.data.length;
  }

  startPolling(): void {
    if (this.polling) return;
    this.polling = true;
    this.log.info("Telegram polling started");
    this.loop = this.runLoop();
  }

  async stop(): Promise<void> {
    this.polling = false;
    this.abort?.abort();
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
    this.log.info("Telegram polling stopped");
  }

  private async runLoop(): Promise<void> {
    while (this.polling) {
      this.abort = new AbortController();
      try {
        await this.pollOnce(this.abort.signal);
      } catch (error) {
        if (!this.polling) break;
        this.log.error({ err: error }, "Telegram polling failed");
        await new Promise<void>((r) => setTimeout(r, this.errorBackoffMs));
      }
    }
  }

  private async dispatch(update: BotUpdate): Promise<void> {
    if (update.kind === "callback") {
      try {
        await this.answerCallbackQuery(update.callbackId);
      } catch (error) {
        this.log.warn({ err: error }, "Failed to answer callback query");
      }
    }
    for (const handler of this.handlers) {
      try {
        await handler(update);
      } catch (error) {
        this.log.error({ updateId: update.updateId, err: error }, "Error processing update");
      }
    }
  }

  private async call(method: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const response = await this.fetchImpl(`${this.api}/${method}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Telegram API error: ${error}`);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new Error(`Telegram API returned invalid JSON: ${errorMessage(error)}`);
    }
    const parsed = apiResponseSchema.safeParse(json);
    if (!parsed.success || !parsed.data.ok) {
      throw new Error(`Telegram API error: ${parsed.success ? parsed.data.description ?? "unknown" : "malformed response"}`);
    }
    return parsed.data.result;
  }
}
