import { z } from 'zod';
import {
  ASPECT_RATIOS,
  DEFAULT_ASPECT_RATIO,
  DEFAULT_IMAGE_MODEL,
  DEFAULT_VIDEO_DURATION,
  DEFAULT_VIDEO_MODEL,
  DEFAULT_VIDEO_RESOLUTION,
  IMAGE_MODELS,
  MAX_CHARACTER_REFS,
  MAX_IMAGE_REFS,
  MAX_MODIFY_IMAGE_REFS,
  MAX_STYLE_REFS,
  VIDEO_DURATIONS,
  VIDEO_MODELS,
  VIDEO_RESOLUTIONS,
} from '../constants/models.ts';

export const ImageRefSchema = z.object({
  url: z.string().url().describe('Publicly reachable URL of the reference image'),
  weight: z
    .number()
    .min(0)
    .max(1)
    .default(1)
    .describe('How strongly the reference influences the result, 0 to 1 (default: 1)'),
});

export type ImageRef = z.infer<typeof ImageRefSchema>;

// Accepts a single reference or a list holding at most `max` of them
function singleImageRef(max: number, description: string) {
  return z.union([ImageRefSchema, z.array(ImageRefSchema).max(max)]).optional().describe(description);
}

const promptField = z
  .string()
  .trim()
  .min(1)
  .describe('Text description of what to generate (required). Be specific: subject, setting, lighting, camera, mood.');

const aspectRatioField = z
  .enum(ASPECT_RATIOS)
  .default(DEFAULT_ASPECT_RATIO)
  .describe('Output dimensions: "1:1", "16:9", "9:16", "4:3", "3:4", "21:9" or "9:21" (default: "16:9")');

export const CreateImageSchema = z.object({
  prompt: promptField,
  aspect_ratio: aspectRatioField,
  model: z
    .enum(IMAGE_MODELS)
    .default(DEFAULT_IMAGE_MODEL)
    .describe('"photon-1" (higher quality) or "photon-flash-1" (faster) (default: "photon-1")'),
  image_ref: z
    .array(ImageRefSchema)
    .max(MAX_IMAGE_REFS)
    .optional()
    .describe(`Up to ${MAX_IMAGE_REFS} weighted reference images that influence the content`),
  style_ref: singleImageRef(MAX_STYLE_REFS, 'A single weighted reference image that influences the style'),
  character_ref: z
    .array(z.string().url())
    .max(MAX_CHARACTER_REFS)
    .optional()
    .describe(`Up to ${MAX_CHARACTER_REFS} image URLs of the same character to keep its identity consistent`),
  modify_image_ref: singleImageRef(MAX_MODIFY_IMAGE_REFS, 'A single weighted image to modify instead of generating from scratch'),
});

export type CreateImageInput = z.infer<typeof CreateImageSchema>;

export const CreateVideoSchema = z.object({
  prompt: promptField,
  aspect_ratio: aspectRatioField,
  model: z
    .enum(VIDEO_MODELS)
    .default(DEFAULT_VIDEO_MODEL)
    .describe('"ray-2" (standard), "ray-flash-2" (faster) or "ray-1-6" (legacy) (default: "ray-2")'),
  loop: z.boolean().default(false).describe('Whether the video should loop seamlessly (default: false)'),
  resolution: z
    .enum(VIDEO_RESOLUTIONS)
    .default(DEFAULT_VIDEO_RESOLUTION)
    .describe('"540p", "720p", "1080p" or "4k" (default: "720p")'),
  duration: z
    .enum(VIDEO_DURATIONS)
    .default(DEFAULT_VIDEO_DURATION)
    .describe('"5s" or "9s" (default: "5s")'),
  frame0_image: z.string().url().optional().describe('URL of an image to use as the first frame'),
  frame1_image: z.string().url().optional().describe('URL of an image to use as the last frame'),
  frame0_id: z.string().uuid().optional().describe('Generation ID (UUID) whose output becomes the first frame'),
  frame1_id: z.string().uuid().optional().describe('Generation ID (UUID) whose output becomes the last frame'),
});

export type CreateVideoInput = z.infer<typeof CreateVideoSchema>;

export const GetGenerationSchema = z.object({
  generation_id: z.string().uuid().describe('The generation_id returned by create_image or create_video'),
});

export type GetGenerationInput = z.infer<typeof GetGenerationSchema>;

/**
 * Shape announced to MCP clients. Each field documents its type but lets any value
 * through; the tool handler parses strictly and returns a structured ValidationError.
 */
export function toolInputShape(shape: z.ZodRawShape): z.ZodRawShape {
  const announced: z.ZodRawShape = {};
  for (const [key, field] of Object.entries(shape)) {
    const passThrough = z.union([field, z.unknown()]);
    announced[key] = field.description === undefined ? passThrough : passThrough.describe(field.description);
  }
  return announced;
}
