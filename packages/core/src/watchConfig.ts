import fs from "fs/promises";
import { z } from "zod";

const ChannelIdZod = z.union([z.string().min(1), z.number().int()]);

const ProductZod = z.object({
  name: z.string().min(1).default("Unknown"),
  keywords: z.array(z.string().min(1)).min(1, "a product needs at least one keyword"),
  excludeKeywords: z
    .array(z.string().min(1))
    .nullish()
    .transform((v) => v ?? []),
  priceRange: z
    .object({
      min: z.number().min(0).optional(),
      max: z.number().min(0).optional(),
    })
    .refine((r) => r.min === undefined || r.max === undefined || r.min <= r.max, "min must not exceed max")
    .nullish()
    .transform((v) => v ?? undefined),
  notify: z.boolean().default(true),
});

const PricePatternZod = z.object({
  pattern: z.string().min(1),
  minValue: z.number().default(0),
  description: z.string().optional(),
});

export const WatchConfigSchema = z.object({
  channels: z.array(ChannelIdZod).default([]),
  products: z.array(ProductZod).default([]),
  matching: z
    .object({
      caseSensitive: z.boolean().default(false),
      wholeWord: z.boolean().default(false),
      regexEnabled: z.boolean().default(true),
    })
    .default({}),
  pricePatterns: z.array(PricePatternZod).default([]),
  priceNumberFormat: z
    .object({
      regex: z.string().min(1).optional(),
    })
    .default({}),
  monitoring: z
    .object({
      saveMatches: z.boolean().default(true),
      maxAgeDays: z.number().nullish().transform((v) => v ?? undefined),
      notifyDelayMs: z.number().int().min(0).default(500),
    })
    .default({}),
  notifications: z
    .object({
      includeLink: z.boolean().default(true),
      includeKeywords: z.boolean().default(true),
      telegram: z
        .object({
          enabled: z.boolean().default(true),
          chatId: ChannelIdZod.optional(),
        })
        .default({}),
    })
    .default({}),
});

export type WatchConfig = z.infer<typeof WatchConfigSchema>;
export type ChannelId = z.infer<typeof ChannelIdZod>;

export class WatchConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WatchConfigError";
  }
}

export function parseWatchConfig(raw: unknown, source = "watch config"): WatchConfig {
  const parsed = WatchConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const messages = parsed.error.errors.map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`).join("\n");
    throw new WatchConfigError(`Invalid ${source}:\n${messages}`);
  }
  return parsed.data;
}

export async function loadWatchConfig(filePath: string): Promise<WatchConfig> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new WatchConfigError(`Cannot read watch config ${filePath}: ${reason}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new WatchConfigError(`Watch config ${filePath} is not valid JSON: ${reason}`);
  }

  return parseWatchConfig(raw, filePath);
}
