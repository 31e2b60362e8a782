import { z } from 'zod';
import { isValidTimezone } from '../common/time/zoned-time.js';

export const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1),
  PORT: z.coerce.number().int().positive().default(3000),
  JWT_SECRET: z.string().min(1),
  DEFAULT_TIMEZONE: z
    .string()
    .default('UTC')
    .refine(isValidTimezone, { message: 'Unknown IANA timezone' }),
});

export type AppConfig = z.infer<typeof EnvSchema>;

/** `validate` hook for ConfigModule.forRoot. */
export function validateEnv(raw: Record<string, unknown>): AppConfig {
  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}
