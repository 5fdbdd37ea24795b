import { z } from 'zod';
import { OAuth2ConfigSchema } from '../oauth/types';
import { DEFAULT_USER_AGENT } from '../oauth/HeaderPolicy';

export const ConfigSchema = z.object({
  oauth: OAuth2ConfigSchema,
  http: z
    .object({
      userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
      timeout: z.number().int().min(1).default(30000), // ms
    })
    .optional()
    .default(() => ({ userAgent: DEFAULT_USER_AGENT, timeout: 30000 })),
  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
    })
    .optional()
    .default(() => ({ level: 'info' as const })),
});

export type ConfigData = z.infer<typeof ConfigSchema>;
