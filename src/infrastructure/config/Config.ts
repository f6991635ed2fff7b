import { z } from 'zod';

export interface AppConfig {
  server: {
    port: number;
    corsOrigins: string[];
    uploadMaxBytes: number;
  };
  ledger: {
    storage: 'xlsx' | 'memory';
    path: string;
  };
  app: {
    timezone: string;
  };
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGINS: z.string().default('http://localhost:3000,http://127.0.0.1:3000'),
  UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  LEDGER_STORAGE: z.enum(['xlsx', 'memory']).default('xlsx'),
  LEDGER_PATH: z.string().min(1).default('ghost_fund_savings.xlsx'),
  APP_TIMEZONE: z
    .string()
    .default('Asia/Dhaka')
    .refine((zone) => {
      try {
        new Intl.DateTimeFormat('en-US', { timeZone: zone });
        return true;
      } catch {
        return false;
      }
    }, 'APP_TIMEZONE must be an IANA time zone'),
});

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.parse(env);

  return {
    server: {
      port: parsed.PORT,
      corsOrigins: parsed.CORS_ORIGINS.split(',')
        .map((origin) => origin.trim())
        .filter(Boolean),
      uploadMaxBytes: parsed.UPLOAD_MAX_BYTES,
    },
    ledger: {
      storage: parsed.LEDGER_STORAGE,
      path: parsed.LEDGER_PATH,
    },
    app: {
      timezone: parsed.APP_TIMEZONE,
    },
  };
};
