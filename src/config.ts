import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value.trim()));

const envSchema = z
  .object({
    API_KEY: z.string().min(1),
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

    REDIS_URL: z.string().default("redis://localhost:6379/0"),

    CRM_TENANT: optionalString,
    CRM_API_KEY: optionalString,
    CRM_BASE_URL: z.string().url().optional(),

    LLM_PROVIDER: z.enum(["mock", "yandexgpt"]).default("mock"),
    YANDEXGPT_API_KEY: optionalString,
    YANDEXGPT_FOLDER_ID: optionalString,

    TELEGRAM_BOT_TOKEN: optionalString,
    ADMIN_TELEGRAM_CHAT_ID: optionalString,

    MAX_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(30),
    MAX_TOKENS_PER_HOUR: z.coerce.number().int().positive().default(100_000),
    MAX_COST_PER_DAY_RUB: z.coerce.number().positive().default(900),
    MAX_ERRORS_PER_HOUR: z.coerce.number().int().positive().default(50),

    SESSION_TTL_HOURS: z.coerce.number().positive().default(24),
    TIMEZONE: z.string().default("Asia/Vladivostok"),
    KB_FILE_PATH: z.string().default("knowledge/studio.json")
  })
  .superRefine((env, ctx) => {
    if (!env.CRM_BASE_URL && !env.CRM_TENANT) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["CRM_TENANT"], message: "CRM_TENANT or CRM_BASE_URL is required" });
    }
    if (!env.CRM_API_KEY) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["CRM_API_KEY"], message: "CRM_API_KEY is required" });
    }
    if (env.LLM_PROVIDER === "yandexgpt" && (!env.YANDEXGPT_API_KEY || !env.YANDEXGPT_FOLDER_ID)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["LLM_PROVIDER"],
        message: "YANDEXGPT_API_KEY and YANDEXGPT_FOLDER_ID are required for the yandexgpt provider"
      });
    }
  });

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}
