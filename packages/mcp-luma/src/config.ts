/**
 * Server and runtime configuration.
 * Environment variables are read once at startup; a missing API key is fatal.
 */

import { z } from 'zod';
import { ConfigError } from './utils/errors.ts';

export const SERVER_NAME = 'luma-mcp-server';
export const SERVER_VERSION = '1.0.0';

export const DEFAULT_LUMA_BASE_URL = 'https://api.lumalabs.ai/dream-machine/v1';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  LUMA_API_KEY: z
    .string({ required_error: 'LUMA_API_KEY environment variable is required' })
    .trim()
    .min(1, 'LUMA_API_KEY environment variable is required'),
  LUMA_BASE_URL: z.string().url().default(DEFAULT_LUMA_BASE_URL),
  LUMA_REQUEST_TIMEOUT_MS: positiveInt(30_000),
  LUMA_POLL_INTERVAL_MS: positiveInt(3_000),
  LUMA_IMAGE_TIMEOUT_MS: positiveInt(60_000),
  LUMA_VIDEO_TIMEOUT_MS: positiveInt(180_000),
  LUMA_EMBED_IMAGES: z
    .enum(['true', 'false', '1', '0'])
    .default('true')
    .transform((value) => value === 'true' || value === '1'),
  MCP_TRANSPORT: z.enum(['stdio', 'http']).default('stdio'),
  PORT: positiveInt(3001),
});

export interface AppConfig {
  apiKey: string;
  baseUrl: string;
  requestTimeoutMs: number;
  pollIntervalMs: number;
  imageTimeoutMs: number;
  videoTimeoutMs: number;
  embedImages: boolean;
  transport: 'stdio' | 'http';
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset so defaults still apply
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );

  const parsed = EnvSchema.safeParse(defined);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) =>
      issue.path.length > 0 && !issue.message.includes(String(issue.path[0]))
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    );
    throw new ConfigError(problems.join('; '));
  }

  const values = parsed.data;
  return {
    apiKey: values.LUMA_API_KEY,
    baseUrl: values.LUMA_BASE_URL,
    requestTimeoutMs: values.LUMA_REQUEST_TIMEOUT_MS,
    pollIntervalMs: values.LUMA_POLL_INTERVAL_MS,
    imageTimeoutMs: values.LUMA_IMAGE_TIMEOUT_MS,
    videoTimeoutMs: values.LUMA_VIDEO_TIMEOUT_MS,
    embedImages: values.LUMA_EMBED_IMAGES,
    transport: values.MCP_TRANSPORT,
    port: values.PORT,
  };
}

/** MCP server instructions for the agent. */
export const SERVER_INSTRUCTIONS = `You have access to Luma Dream Machine image and video generation.

Usage:
- Use create_image for stills (typically 5-15 seconds) and create_video for clips (typically 15-60 seconds).
- Write specific prompts: subject, setting, lighting, camera movement, mood.
- Reference images must be publicly reachable URLs. A generation_id from create_image can be passed to create_video as frame0_id or frame1_id.
- Give each create_video keyframe either as an image URL (frame0_image, frame1_image) or as a generation_id (frame0_id, frame1_id); a call that gives both for the same frame is rejected.
- If a call times out the generation keeps running; use get_generation with the returned generation_id instead of submitting again.
- Use list_models to see the available models and their options.`;
