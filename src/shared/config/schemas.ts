/**
 * Configuration schemas with Zod validation
 */

import { z } from 'zod';

export const TrustModelSchema = z.enum(['pgp', 'classic', 'direct', 'always', 'auto']);

export const GpgConfigSchema = z.object({
  path: z.string().optional(), // Discovered on PATH when not set
  homeDir: z.string().optional(),
  timeoutMs: z.number().int().nonnegative().default(30000),
  trustModel: TrustModelSchema.default('always'),
  batch: z.boolean().default(true),
  armor: z.boolean().default(false),
  // gpg 2.1+ only accepts --passphrase together with --pinentry-mode loopback
  pinentryLoopback: z.boolean().default(true),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  fileLogging: z.boolean().default(true),
});

export const ConfigSchema = z.object({
  gpg: GpgConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type TrustModel = z.infer<typeof TrustModelSchema>;
export type GpgConfig = z.infer<typeof GpgConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Shape accepted from config files, env and CLI flags before defaults apply
 */
export const PartialConfigSchema = z.object({
  gpg: GpgConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

export type PartialConfig = z.infer<typeof PartialConfigSchema>;
