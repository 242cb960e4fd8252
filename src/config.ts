import { z } from 'zod';

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v, ctx) => {
      if (v === undefined || v.trim() === '') return fallback;
      const s = v.trim().toLowerCase();
      if (['1', 'true', 'yes', 'on'].includes(s)) return true;
      if (['0', 'false', 'no', 'off'].includes(s)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${v}"` });
      return z.NEVER;
    });

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  WEBHOOK_SHARED_SECRET: z.string().default(''),
  TAVUS_API_KEY: z.string().default(''),
  TAVUS_ECHO_URL: z.union([z.literal(''), z.string().url()]).default(''),
  ECHO_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  ECHO_PRINT_MESSAGES: flag(false),
  ANNOUNCE_JOINS: flag(false),
  WEBHOOK_LOG_DIR: z.string().min(1).default('logs/webhook'),
  RECORDINGS_DIR: z.string().min(1).default('recordings'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: flag(true)
});

export interface AppConfig {
  port: number;
  webhookSecret: string;
  tavusApiKey: string;
  echoUrl: string;
  echoTimeoutMs: number;
  echoPrintMessages: boolean;
  announceJoins: boolean;
  webhookLogDir: string;
  recordingsDir: string;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  logPretty: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  return Object.freeze({
    port: e.PORT,
    webhookSecret: e.WEBHOOK_SHARED_SECRET,
    tavusApiKey: e.TAVUS_API_KEY,
    echoUrl: e.TAVUS_ECHO_URL,
    echoTimeoutMs: e.ECHO_TIMEOUT_MS,
    echoPrintMessages: e.ECHO_PRINT_MESSAGES,
    announceJoins: e.ANNOUNCE_JOINS,
    webhookLogDir: e.WEBHOOK_LOG_DIR,
    recordingsDir: e.RECORDINGS_DIR,
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY
  });
}
