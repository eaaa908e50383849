import { z } from "zod";

/** Parse an env flag the way operators write them ("true", "1", "yes"). */
function parseFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === "") return undefined;
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

const configSchema = z.object({
  port: z.coerce.number().default(3100),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** PostgreSQL connection string. */
  databaseUrl: z.string().min(1).default("postgres://localhost:5432/pressroom"),

  /** Public origin used to build links in outbound email (reset links). */
  appBaseUrl: z.string().url().default("http://127.0.0.1:3100"),

  /** Comma-separated browser origins allowed by CORS. */
  uiOrigins: z.array(z.string()).default(["http://localhost:3001"]),

  /** Page size of every paginated list endpoint. */
  pageSize: z.coerce.number().int().min(1).max(200).default(20),

  /** Transactional email (Resend). Without an API key, email is logged instead of sent. */
  email: z
    .object({
      resendApiKey: z.string().optional(),
      from: z.string().default("noreply@pressroom.local"),
      replyTo: z.string().optional(),
    })
    .default({ from: "noreply@pressroom.local" }),

  /** Posting approved articles to X. */
  social: z
    .object({
      enabled: z.boolean().default(false),
      accessToken: z.string().default(""),
      apiUrl: z.string().url().default("https://api.x.com/2/tweets"),
    })
    .default({ enabled: false, accessToken: "", apiUrl: "https://api.x.com/2/tweets" }),
});

export const config = configSchema.parse({
  port: process.env.PORT,
  nodeEnv: process.env.NODE_ENV,
  logLevel: process.env.LOG_LEVEL,
  databaseUrl: process.env.DATABASE_URL || undefined,
  appBaseUrl: process.env.APP_BASE_URL || undefined,
  uiOrigins: process.env.UI_ORIGIN
    ? process.env.UI_ORIGIN.split(",")
        .map((s) => s.trim())
        .filter(Boolean)
    : undefined,
  pageSize: process.env.API_PAGE_SIZE,
  email: {
    resendApiKey: process.env.RESEND_API_KEY || undefined,
    from: process.env.RESEND_FROM || undefined,
    replyTo: process.env.RESEND_REPLY_TO || undefined,
  },
  social: {
    enabled: parseFlag(process.env.X_ENABLED),
    accessToken: process.env.X_ACCESS_TOKEN || undefined,
    apiUrl: process.env.X_API_URL || undefined,
  },
});

export type Config = z.infer<typeof configSchema>;
