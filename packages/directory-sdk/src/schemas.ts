/**
 * Zod schemas for client configuration and directory responses.
 */

import { z } from "zod";

export const RetryOptionsSchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).optional(),
  initialDelay: z.number().int().min(0).optional(),
  maxDelay: z.number().int().min(0).optional(),
  backoffMultiplier: z.number().min(1).optional(),
  retryableStatusCodes: z.array(z.number().int().min(100).max(599)).optional(),
});

export const ClientConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  timeout: z.number().int().min(1).max(300_000).optional(),
  retry: RetryOptionsSchema.optional(),
  headers: z.record(z.string(), z.string()).optional(),
});

export const ErrorResponseSchema = z.object({
  code: z.string(),
  message: z.string(),
  details: z.record(z.string(), z.unknown()).optional(),
});

export const FileUrlInfoSchema = z.object({
  url: z.string().default(""),
  variantUrls: z.record(z.string(), z.string()).default({}),
  success: z.boolean(),
  error: z.string().default(""),
});

export const GetFileUrlsResponseSchema = z.object({
  results: z.record(z.string(), FileUrlInfoSchema),
});
