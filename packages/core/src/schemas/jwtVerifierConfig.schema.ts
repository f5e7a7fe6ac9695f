import { z } from 'zod';

export const HttpKeySetSourceSchema = z.object({
  baseUrl: z.url(),
  path: z.string().startsWith('/').optional(),
  timeoutMs: z.number().int().positive().optional(),
  userAgent: z.string().min(1).optional(),
});

export const ClaimsPolicySettingsSchema = z.object({
  issuer: z.string().min(1, 'issuer is required'),
  tokenUse: z.string().min(1, 'tokenUse is required'),
  clientIds: z.array(z.string().min(1)).min(1, 'at least one client ID is required'),
});
