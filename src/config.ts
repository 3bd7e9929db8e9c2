import { z } from 'zod';

export const DEFAULT_MODEL = 'nvidia/llama-3.1-nemotron-nano-8b-v1:free';
export const DEFAULT_ENDPOINT = 'https://openrouter.ai/api/v1';

const envSchema = z.object({
  OPENROUTER_API_KEY: z.string().trim().min(1, 'OPENROUTER_API_KEY is missing from the environment.'),
  MODERATION_MODEL: z.string().trim().min(1).optional(),
  MODERATION_ENDPOINT: z.string().trim().url().optional(),
});

export type Env = z.infer<typeof envSchema>;

export const moderationConfigSchema = z.object({
  batchSize: z.number().int().positive().default(10),
  model: z.string().trim().min(1).default(DEFAULT_MODEL),
  endpoint: z.string().url().default(DEFAULT_ENDPOINT),
  interBatchDelayMs: z.number().int().nonnegative().default(2000),
  maxRetries: z.number().int().nonnegative().default(0),
  retryBackoffMs: z.number().int().nonnegative().default(2000),
  requestTimeoutMs: z.number().int().positive().optional(),
});

export type ModerationConfig = z.infer<typeof moderationConfigSchema>;
export type ModerationConfigInput = z.input<typeof moderationConfigSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse({
    OPENROUTER_API_KEY: source.OPENROUTER_API_KEY ?? '',
    MODERATION_MODEL: source.MODERATION_MODEL || undefined,
    MODERATION_ENDPOINT: source.MODERATION_ENDPOINT || undefined,
  });
  if (!parsed.success) {
    throw new Error(formatIssues(parsed.error));
  }
  return parsed.data;
}

export function resolveModerationConfig(input: ModerationConfigInput = {}): ModerationConfig {
  const parsed = moderationConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid moderation config: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path && !issue.message.includes(path) ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
