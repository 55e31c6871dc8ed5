import { z } from 'zod';

export const outputFormatSchema = z.enum(['json', 'text']);

/** 所有指令共用的選項 */
export const commonOptionsSchema = z.object({
  root: z.string().min(1).default('.'),
  format: outputFormatSchema.default('text'),
});

export const positiveIntOption = z.coerce.number().int().positive();

/**
 * 以 zod 驗證 commander 傳入的選項
 * @throws Error 訊息格式為 `Invalid option --name: reason`
 */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.output<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue.path.map(String).join('.').replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
    throw new Error(`Invalid option --${name}: ${issue.message}`);
  }
  return parsed.data;
}
