import axios, { type AxiosInstance } from 'axios';
import { logger } from '../utils/logger.ts';
import { RemoteError } from '../utils/errors.ts';
import type { AspectRatio, ImageModel, VideoDuration, VideoModel, VideoResolution } from '../constants/models.ts';

// --- Luma API types -----------------------------------------------------------

export type GenerationKind = 'image' | 'video';

/** Provider-side generation state. */
export type LumaState = 'queued' | 'dreaming' | 'completed' | 'failed';

export interface LumaGeneration {
  id?: string;
  state?: LumaState | string;
  failure_reason?: string | null;
  generation_type?: string;
  created_at?: string;
  model?: string;
  assets?: {
    image?: string | null;
    video?: string | null;
    progress_video?: string | null;
  } | null;
}

export interface WeightedImage {
  url: string;
  weight: number;
}

export type Keyframe =
  | { type: 'image'; url: string }
  | { type: 'generation'; id: string };

/** Request body for POST /generations/image. */
export interface ImageGenerationPayload {
  prompt: string;
  aspect_ratio: AspectRatio;
  model: ImageModel;
  image_ref?: WeightedImage[];
  style_ref?: WeightedImage[];
  character_ref?: { identity0: { images: string[] } };
  modify_image_ref?: WeightedImage;
}

/** Request body for POST /generations. */
export interface VideoGenerationPayload {
  prompt: string;
  aspect_ratio: AspectRatio;
  model: VideoModel;
  loop: boolean;
  resolution?: VideoResolution;
  duration?: VideoDuration;
  keyframes?: { frame0?: Keyframe; frame1?: Keyframe };
}

export type GenerationPayload =
  | { kind: 'image'; body: ImageGenerationPayload }
  | { kind: 'video'; body: VideoGenerationPayload };

export interface DownloadedImage {
  data: string;
  mimeType: string;
}

/** The remote operations the submitter and poller depend on. */
export interface GenerationApi {
  createGeneration(payload: GenerationPayload, signal?: AbortSignal): Promise<LumaGeneration>;
  getGeneration(id: string, signal?: AbortSignal): Promise<LumaGeneration>;
  fetchImage(url: string, signal?: AbortSignal): Promise<DownloadedImage>;
}

// --- Helpers ------------------------------------------------------------------

const CREATE_PATHS: Record<GenerationKind, string> = {
  image: '/generations/image',
  video: '/generations',
};

function messageFromBody(data: unknown): string | undefined {
  // arraybuffer responses keep their error body as bytes
  if (Buffer.isBuffer(data)) return messageFromBody(data.toString('utf8'));
  if (typeof data === 'string') return data || undefined;
  if (typeof data !== 'object' || data === null) return undefined;
  if ('detail' in data) {
    const { detail } = data;
    if (typeof detail === 'string') return detail;
    return JSON.stringify(detail);
  }
  if ('error' in data) {
    const { error } = data;
    if (typeof error === 'string') return error;
    if (typeof error === 'object' && error !== null && 'message' in error) return String(error.message);
  }
  return undefined;
}

function parseAxiosError(error: unknown): { message: string; status?: number } {
  if (!axios.isAxiosError(error)) {
    return { message: error instanceof Error ? error.message : String(error) };
  }
  const status = error.response?.status;
  const message = messageFromBody(error.response?.data) ?? error.message;
  return { message, status };
}

function guessMimeType(url: string): string {
  const path = url.split('?')[0]?.toLowerCase() ?? '';
  if (path.endsWith('.png')) return 'image/png';
  if (path.endsWith('.webp')) return 'image/webp';
  return 'image/jpeg';
}

// --- Client -------------------------------------------------------------------

export interface LumaClientOptions {
  /** Per-request timeout; independent of the poll ceiling. */
  timeoutMs?: number;
}

export class LumaClient implements GenerationApi {
  private readonly client: AxiosInstance;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    apiKey: string,
    baseUrl: string = 'https://api.lumalabs.ai/dream-machine/v1',
    options: LumaClientOptions = {},
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.client = axios.create({
      baseURL: this.baseUrl,
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      timeout: this.timeoutMs,
    });
  }

  async createGeneration(payload: GenerationPayload, signal?: AbortSignal): Promise<LumaGeneration> {
    const path = CREATE_PATHS[payload.kind];
    logger.debug({ kind: payload.kind, model: payload.body.model }, 'Submitting generation');

    try {
      const response = await this.client.post<LumaGeneration>(path, payload.body, { signal });
      return response.data;
    } catch (error) {
      if (axios.isCancel(error)) throw error;
      const { message, status } = parseAxiosError(error);
      logger.error({ error: message, status, kind: payload.kind }, 'Error submitting generation');
      throw new RemoteError(`Luma API error: ${message}`, status);
    }
  }

  async getGeneration(id: string, signal?: AbortSignal): Promise<LumaGeneration> {
    try {
      const response = await this.client.get<LumaGeneration>(`/generations/${encodeURIComponent(id)}`, { signal });
      return response.data;
    } catch (error) {
      if (axios.isCancel(error)) throw error;
      const { message, status } = parseAxiosError(error);
      logger.error({ error: message, status, jobId: id }, 'Error fetching generation');
      throw new RemoteError(`Luma API error: ${message}`, status, undefined, id);
    }
  }

  /**
   * Downloads a result image from the CDN. Uses a bare request so the API key
   * is not sent to the asset host.
   */
  async fetchImage(url: string, signal?: AbortSignal): Promise<DownloadedImage> {
    try {
      const response = await axios.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        timeout: this.timeoutMs,
        signal,
      });
      const contentType = response.headers['content-type'];
      const mimeType =
        typeof contentType === 'string' && contentType.startsWith('image/')
          ? contentType.split(';')[0]?.trim() ?? guessMimeType(url)
          : guessMimeType(url);
      return { data: Buffer.from(response.data).toString('base64'), mimeType };
    } catch (error) {
      if (axios.isCancel(error)) throw error;
      const { message, status } = parseAxiosError(error);
      throw new RemoteError(`Failed to download image: ${message}`, status);
    }
  }
}
