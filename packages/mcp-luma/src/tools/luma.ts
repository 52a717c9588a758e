import type { TextContent, ImageContent } from '@modelcontextprotocol/sdk/types.js';
import { GetGenerationSchema } from '../schemas/luma.schema.ts';
import { JobSubmitter } from '../services/job-submitter.ts';
import { Poller, extractAssets, toJobStatus, type Clock, type CompletedJob } from '../services/poller.ts';
import type { GenerationApi, LumaGeneration } from '../services/luma-client.ts';
import { CancelledError, RemoteError, ValidationError } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';
import type { ToolResult } from '../utils/tool-handler.ts';
import { KNOWN_MODELS } from '../constants/models.ts';
import { formatKnownModel, buildListModelsUsageText } from '../utils/model-formatting.ts';

export interface LumaToolContext {
  api: GenerationApi;
  submitter: JobSubmitter;
  poller: Poller;
  /** Download result images and return them as image content. */
  embedImages: boolean;
}

export interface ToolContextOptions {
  pollIntervalMs?: number;
  imageTimeoutMs?: number;
  videoTimeoutMs?: number;
  embedImages?: boolean;
  clock?: Clock;
}

export function createToolContext(api: GenerationApi, options: ToolContextOptions = {}): LumaToolContext {
  return {
    api,
    submitter: new JobSubmitter(api),
    poller: new Poller(api, {
      intervalMs: options.pollIntervalMs,
      timeoutsMs: { image: options.imageTimeoutMs, video: options.videoTimeoutMs },
      clock: options.clock,
    }),
    embedImages: options.embedImages ?? true,
  };
}

async function embedImage(
  context: LumaToolContext,
  job: CompletedJob,
  url: string | undefined,
  signal?: AbortSignal,
): Promise<ImageContent[]> {
  if (!context.embedImages || !url) return [];
  try {
    const { data, mimeType } = await context.api.fetchImage(url, signal);
    return [{ type: 'image', data, mimeType }];
  } catch (error) {
    if (signal?.aborted) throw new CancelledError(job.id);
    logger.warn(
      { jobId: job.id, url, error: error instanceof Error ? error.message : String(error) },
      'Could not embed result image; returning URL only',
    );
    return [];
  }
}

export async function createImage(
  input: unknown,
  context: LumaToolContext,
  signal?: AbortSignal,
): Promise<ToolResult> {
  const job = await context.submitter.submit('image', input, signal);
  logger.info({ jobId: job.id, kind: job.kind }, 'Image generation submitted');

  const completed = await context.poller.waitForCompletion(job, signal);
  const imageUrl = completed.assets.image;
  if (!imageUrl) {
    throw new RemoteError(`Generation ${job.id} returned no image`, undefined, undefined, job.id);
  }

  const images = await embedImage(context, completed, imageUrl, signal);
  const text: TextContent = {
    type: 'text',
    text: `Image generated successfully.\nimage_url: ${imageUrl}\ngeneration_id: ${completed.id}`,
  };

  return {
    content: [...images, text],
    structuredContent: {
      generation_id: completed.id,
      kind: 'image',
      image_url: imageUrl,
    },
  };
}

export async function createVideo(
  input: unknown,
  context: LumaToolContext,
  signal?: AbortSignal,
): Promise<ToolResult> {
  const job = await context.submitter.submit('video', input, signal);
  logger.info({ jobId: job.id, kind: job.kind }, 'Video generation submitted');

  const completed = await context.poller.waitForCompletion(job, signal);
  const videoUrl = completed.assets.video;
  if (!videoUrl) {
    throw new RemoteError(`Generation ${job.id} returned no video`, undefined, undefined, job.id);
  }
  const thumbnailUrl = completed.assets.image;

  const images = await embedImage(context, completed, thumbnailUrl, signal);
  const lines = [
    images.length > 0 ? 'Video generated successfully. The image above is its thumbnail.' : 'Video generated successfully.',
    `video_url: ${videoUrl}`,
    ...(thumbnailUrl ? [`image_url: ${thumbnailUrl}`] : []),
    `generation_id: ${completed.id}`,
  ];

  return {
    content: [...images, { type: 'text', text: lines.join('\n') }],
    structuredContent: {
      generation_id: completed.id,
      kind: 'video',
      video_url: videoUrl,
      ...(thumbnailUrl ? { image_url: thumbnailUrl } : {}),
    },
  };
}

/** Single status query for a generation submitted earlier, e.g. after a timeout. */
export async function getGeneration(
  input: unknown,
  context: LumaToolContext,
  signal?: AbortSignal,
): Promise<ToolResult> {
  const parsed = GetGenerationSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid get_generation parameters: generation_id must be a UUID');
  }
  const id = parsed.data.generation_id.toLowerCase();

  let generation: LumaGeneration;
  try {
    generation = await context.api.getGeneration(id, signal);
  } catch (error) {
    if (signal?.aborted) throw new CancelledError(id);
    throw error;
  }
  const status = toJobStatus(generation.state);
  const { image, video } = extractAssets(generation);
  const failureReason = status === 'failed' ? generation.failure_reason ?? 'unknown reason' : undefined;

  const lines = [
    `generation_id: ${id}`,
    `status: ${status}`,
    ...(failureReason ? [`failure_reason: ${failureReason}`] : []),
    ...(video ? [`video_url: ${video}`] : []),
    ...(image ? [`image_url: ${image}`] : []),
  ];

  return {
    content: [{ type: 'text', text: lines.join('\n') }],
    structuredContent: {
      generation_id: id,
      status,
      ...(failureReason ? { failure_reason: failureReason } : {}),
      ...(video ? { video_url: video } : {}),
      ...(image ? { image_url: image } : {}),
    },
  };
}

export function listModels(): ToolResult {
  const models = Object.values(KNOWN_MODELS);
  const section = (kind: 'image' | 'video') =>
    models
      .filter((model) => model.kind === kind)
      .map(formatKnownModel)
      .join('\n\n');

  return {
    content: [
      {
        type: 'text',
        text: `# Luma Models\n\n## Image models (create_image)\n\n${section('image')}\n\n## Video models (create_video)\n\n${section('video')}\n\n${buildListModelsUsageText()}`,
      },
    ],
  };
}
