import { z } from 'zod';

const headerMapSchema = z
  .record(z.string().min(1), z.string())
  .describe('Header name to value.');

const credentialsSchema = z.strictObject({
  username: z.string(),
  password: z.string(),
});

const proxySchema = z.strictObject({
  protocol: z.enum(['http', 'https']).optional(),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  auth: credentialsSchema.optional(),
});

export const requestOverridesSchema = z.strictObject({
  headers: headerMapSchema.optional(),
  params: z.record(z.string(), z.string()).optional(),
  timeout: z.number().int().positive().optional(),
  maxFileSize: z.number().int().positive().optional(),
  followRedirects: z.boolean().optional(),
});

export const targetOptionsSchema = z.strictObject({
  ...requestOverridesSchema.shape,
  userAgent: z.string().min(1).optional(),
  proxy: proxySchema.optional(),
  auth: credentialsSchema.optional(),
  verifyTls: z.boolean().optional(),
  maxRedirects: z.number().int().min(0).max(50).optional(),
  resolveTimeout: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Host lookup timeout in ms.'),
});
