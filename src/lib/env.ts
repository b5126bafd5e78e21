// src/lib/env.ts
import { z } from 'zod';

/** Unset and blank both mean "not configured". */
const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  // adb binary; falls back to `adb` on PATH
  ADB_PATH: optionalText,
  // Device to sample; the first attached device otherwise
  DEVICE_SERIAL: optionalText,
  // Package id of the on-device monitor app that owns the bridge files
  BRIDGE_PACKAGE: optionalText,
  TRACE_PROCESSOR: optionalText,
  SAMPLER_STOP_JOIN_MS: z.coerce.number().int().positive().default(15_000),
});

export type Env = z.infer<typeof EnvSchema>;

export function readEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse({
    NODE_ENV: source.NODE_ENV,
    ADB_PATH: source.ADB_PATH,
    DEVICE_SERIAL: source.DEVICE_SERIAL,
    BRIDGE_PACKAGE: source.BRIDGE_PACKAGE,
    TRACE_PROCESSOR: source.TRACE_PROCESSOR,
    SAMPLER_STOP_JOIN_MS: source.SAMPLER_STOP_JOIN_MS || undefined,
  });

  if (!parsed.success) {
    // Print a friendly message and fail fast
    console.error('❌ Invalid environment:\n', parsed.error.flatten().fieldErrors);
    throw new Error('Invalid environment. Check your .env file.');
  }
  return parsed.data;
}

let cached: Env | null = null;

export function getEnv(): Env {
  cached ??= readEnv();
  return cached;
}
