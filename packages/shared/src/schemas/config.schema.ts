import { z } from 'zod';
import {
  DEFAULT_BACKEND_URL,
  DEFAULT_LOOPBACK_PREFIX,
  DEFAULT_PUBLISH_TIMEOUT,
  DEFAULT_RECEIVER_HOST,
  DEFAULT_RECEIVER_PORT,
  DEFAULT_SAMPLE_INTERVAL_SECONDS,
  DEFAULT_TOP_PROCESS_LIMIT,
} from '../constants.js';
import { parseDuration } from '../utils/parser.js';

const durationSchema = z
  .union([z.string().min(1), z.number().int().positive()])
  .refine(
    (value) => {
      try {
        return parseDuration(value) > 0;
      } catch {
        return false;
      }
    },
    { message: 'Expected a positive duration such as "10s" or 10000' },
  );

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export const agentConfigSchema = z.object({
  backend_url: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), { message: 'Backend URL must be http(s)' })
    .default(DEFAULT_BACKEND_URL),
  interval: z.number().int().positive().default(DEFAULT_SAMPLE_INTERVAL_SECONDS),
  timeout: durationSchema.default(DEFAULT_PUBLISH_TIMEOUT),
  top_processes: z.number().int().positive().max(100).default(DEFAULT_TOP_PROCESS_LIMIT),
  loopback_prefix: z.string().default(DEFAULT_LOOPBACK_PREFIX),
  log_level: logLevelSchema.default('info'),
});

export const receiverConfigSchema = z.object({
  host: z.string().min(1).default(DEFAULT_RECEIVER_HOST),
  port: z.number().int().min(0).max(65535).default(DEFAULT_RECEIVER_PORT),
});

export type ValidatedAgentConfig = z.infer<typeof agentConfigSchema>;
export type ValidatedReceiverConfig = z.infer<typeof receiverConfigSchema>;
