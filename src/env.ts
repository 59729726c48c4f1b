import { z } from 'zod';

const optionalPath = z
  .string()
  .transform((value) => value.trim())
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DEFAULT_NO_PROXY: z.string().min(1).default('localhost,127.0.0.1'),
  DEFAULT_WPAD_URL: z.string().url().default('http://wpad.local/wpad.dat'),
  PROXYSWITCH_CONFIG_DIR: optionalPath,
  PROXYSWITCH_DATA_DIR: optionalPath,
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    console.error('Invalid environment variables:', parsed.error.flatten().fieldErrors);
    throw new Error('Invalid environment variables');
  }

  return parsed.data;
}
