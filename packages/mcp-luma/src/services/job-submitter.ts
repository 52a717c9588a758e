import type { z } from 'zod';
import { logger } from '../utils/logger.ts';
import { CancelledError, RemoteError, ValidationError } from '../utils/errors.ts';
import { KNOWN_MODELS } from '../constants/models.ts';
import {
  CreateImageSchema,
  CreateVideoSchema,
  type CreateImageInput,
  type CreateVideoInput,
  type ImageRef,
} from '../schemas/luma.schema.ts';
import type {
  GenerationApi,
  GenerationKind,
  GenerationPayload,
  ImageGenerationPayload,
  Keyframe,
  LumaGeneration,
  VideoGenerationPayload,
  WeightedImage,
} from './luma-client.ts';

export type { GenerationKind } from './luma-client.ts';

/** Server states plus the client-side `timed_out`. */
export type JobStatus = 'pending' | 'processing' | 'completed' | 'failed' | 'timed_out';

export type GenerationRequest =
  | ({ kind: 'image' } & CreateImageInput)
  | ({ kind: 'video' } & CreateVideoInput);

export interface Job {
  id: string;
  kind: GenerationKind;
  submittedAt: Date;
  status: JobStatus;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function toList(ref: ImageRef | ImageRef[] | undefined): ImageRef[] {
  if (ref === undefined) return [];
  return Array.isArray(ref) ? ref : [ref];
}

function toWeighted(ref: ImageRef): WeightedImage {
  return { url: ref.url, weight: ref.weight };
}

/**
 * Validates raw tool arguments into a GenerationRequest.
 * Throws ValidationError; never touches the network.
 */
export function parseGenerationRequest(kind: GenerationKind, input: unknown): GenerationRequest {
  if (kind === 'image') {
    const parsed = CreateImageSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(`Invalid create_image parameters: ${formatIssues(parsed.error)}`);
    }
    return { kind: 'image', ...parsed.data };
  }

  const parsed = CreateVideoSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid create_video parameters: ${formatIssues(parsed.error)}`);
  }
  const { frame0_image, frame0_id, frame1_image, frame1_id } = parsed.data;
  if (frame0_image && frame0_id) {
    throw new ValidationError('Invalid create_video parameters: give either frame0_image or frame0_id, not both');
  }
  if (frame1_image && frame1_id) {
    throw new ValidationError('Invalid create_video parameters: give either frame1_image or frame1_id, not both');
  }
  return { kind: 'video', ...parsed.data };
}

export function buildImagePayload(request: CreateImageInput): ImageGenerationPayload {
  const body: ImageGenerationPayload = {
    prompt: request.prompt,
    aspect_ratio: request.aspect_ratio,
    model: request.model,
  };

  if (request.image_ref && request.image_ref.length > 0) {
    body.image_ref = request.image_ref.map(toWeighted);
  }
  const styleRefs = toList(request.style_ref);
  if (styleRefs.length > 0) {
    body.style_ref = styleRefs.map(toWeighted);
  }
  if (request.character_ref && request.character_ref.length > 0) {
    body.character_ref = { identity0: { images: [...request.character_ref] } };
  }
  const [modifyRef] = toList(request.modify_image_ref);
  if (modifyRef) {
    body.modify_image_ref = toWeighted(modifyRef);
  }

  return body;
}

function keyframe(image: string | undefined, generationId: string | undefined): Keyframe | undefined {
  if (image) return { type: 'image', url: image };
  if (generationId) return { type: 'generation', id: generationId.toLowerCase() };
  return undefined;
}

export function buildVideoPayload(request: CreateVideoInput): VideoGenerationPayload {
  const body: VideoGenerationPayload = {
    prompt: request.prompt,
    aspect_ratio: request.aspect_ratio,
    model: request.model,
    loop: request.loop,
  };

  const model = KNOWN_MODELS[request.model];
  if (model.supportsResolution) {
    body.resolution = request.resolution;
  } else {
    logger.warn({ model: request.model, resolution: request.resolution }, 'Resolution not supported; ignoring');
  }
  if (model.supportsDuration) {
    body.duration = request.duration;
  } else {
    logger.warn({ model: request.model, duration: request.duration }, 'Duration not supported; ignoring');
  }

  const frame0 = keyframe(request.frame0_image, request.frame0_id);
  const frame1 = keyframe(request.frame1_image, request.frame1_id);
  if (frame0 || frame1) {
    body.keyframes = {
      ...(frame0 && { frame0 }),
      ...(frame1 && { frame1 }),
    };
  }

  return body;
}

export function buildPayload(request: GenerationRequest): GenerationPayload {
  switch (request.kind) {
    case 'image':
      return { kind: 'image', body: buildImagePayload(request) };
    case 'video':
      return { kind: 'video', body: buildVideoPayload(request) };
  }
}

export class JobSubmitter {
  constructor(private readonly api: GenerationApi) {}

  /**
   * Validates the parameters, submits the generation and returns a pending Job.
   * @throws ValidationError before any network call, RemoteError on a failed submission,
   *   CancelledError when `signal` aborts the submission
   */
  async submit(kind: GenerationKind, input: unknown, signal?: AbortSignal): Promise<Job> {
    const request = parseGenerationRequest(kind, input);
    const payload = buildPayload(request);

    logger.info({ kind, model: request.model, aspectRatio: request.aspect_ratio }, 'Submitting generation');

    let generation: LumaGeneration;
    try {
      generation = await this.api.createGeneration(payload, signal);
    } catch (error) {
      if (signal?.aborted) throw new CancelledError();
      throw error;
    }
    if (!generation.id) {
      throw new RemoteError('Luma API returned no generation id');
    }

    return {
      id: generation.id,
      kind,
      submittedAt: new Date(),
      status: 'pending',
    };
  }
}
