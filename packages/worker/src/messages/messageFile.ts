import fs from "fs/promises";
import { z } from "zod";
import { ChannelMessage } from "./types";

// Unix seconds (what bot updates carry) or an ISO string.
const DateZod = z
  .union([z.number(), z.string().datetime({ offset: true })])
  .nullish()
  .transform((v) => {
    if (v === null || v === undefined) return null;
    return typeof v === "number" ? new Date(v * 1000) : new Date(v);
  });

const ExportedMessageZod = z.object({
  id: z.number().int(),
  date: DateZod,
  text: z
    .string()
    .nullish()
    .transform((v) => v ?? ""),
  chat: z.object({
    id: z.number().int(),
    username: z.string().min(1).optional(),
    title: z.string().optional(),
  }),
});

export class MessageFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MessageFileError";
  }
}

function toMessage(raw: unknown, where: string): ChannelMessage {
  const parsed = ExportedMessageZod.safeParse(raw);
  if (!parsed.success) {
    const messages = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
    throw new MessageFileError(`Invalid message at ${where}: ${messages}`);
  }
  return parsed.data;
}

function parseJson(text: string, where: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MessageFileError(`Invalid JSON at ${where}: ${reason}`);
  }
}

/**
 * Reads a message export: either one JSON array, or JSON lines with one
 * message per line.
 */
export function parseMessageExport(content: string, source = "input"): ChannelMessage[] {
  const trimmed = content.trim();
  if (!trimmed) return [];

  if (trimmed.startsWith("[")) {
    const raw = parseJson(trimmed, source);
    if (!Array.isArray(raw)) {
      throw new MessageFileError(`Expected a JSON array in ${source}`);
    }
    return raw.map((item, idx) => toMessage(item, `${source}[${idx}]`));
  }

  const messages: ChannelMessage[] = [];
  content.split(/\r?\n/).forEach((line, idx) => {
    if (!line.trim()) return;
    const where = `${source}:${idx + 1}`;
    messages.push(toMessage(parseJson(line, where), where));
  });
  return messages;
}

export async function loadMessageFile(filePath: string): Promise<ChannelMessage[]> {
  const content = await fs.readFile(filePath, "utf8");
  return parseMessageExport(content, filePath);
}
