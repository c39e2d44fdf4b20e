import { z } from "zod";

const optionalBooleanString = z
  .union([z.literal("true"), z.literal("false"), z.literal("1"), z.literal("0")])
  .optional()
  .transform((value) => (value ? value === "true" || value === "1" : false));

const tableName = z
  .string()
  .regex(/^[a-z_][a-z0-9_]*$/, "table names must be lower-case identifiers");

const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    // Read by the logger itself; validated here so a typo fails at startup.
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),
    ENABLE_SUPABASE_STUB: optionalBooleanString,
    DONOR_REGISTRY_TABLE: tableName.default("donor_registry"),
    DONOR_AUDIT_TABLE: tableName.default("donor_upload_audit"),
    REGISTRY_TRACKS_BIRTHDATE: optionalBooleanString
  })
  .superRefine((values, ctx) => {
    if (values.SUPABASE_URL && !values.SUPABASE_SERVICE_ROLE_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SUPABASE_SERVICE_ROLE_KEY"],
        message: "SUPABASE_SERVICE_ROLE_KEY is required when SUPABASE_URL is set"
      });
    }
  });

type RawEnv = z.infer<typeof envSchema>;

export type AppEnv = {
  nodeEnv: RawEnv["NODE_ENV"];
  supabase: {
    url?: string;
    serviceRoleKey?: string;
    enableStub: boolean;
  };
  registry: {
    table: string;
    auditTable: string;
    tracksBirthdate: boolean;
  };
};

let cachedEnv: AppEnv | null = null;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  if (cachedEnv && source === process.env) {
    return cachedEnv;
  }

  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join(", ");
    throw new Error(`Environment validation failed: ${issues}`);
  }

  const raw = parsed.data;
  const loaded: AppEnv = {
    nodeEnv: raw.NODE_ENV,
    supabase: {
      url: raw.SUPABASE_URL,
      serviceRoleKey: raw.SUPABASE_SERVICE_ROLE_KEY,
      enableStub: raw.ENABLE_SUPABASE_STUB
    },
    registry: {
      table: raw.DONOR_REGISTRY_TABLE,
      auditTable: raw.DONOR_AUDIT_TABLE,
      tracksBirthdate: raw.REGISTRY_TRACKS_BIRTHDATE
    }
  };

  if (source === process.env) {
    cachedEnv = loaded;
  }
  return loaded;
}

export function env(): AppEnv {
  return loadEnv();
}
