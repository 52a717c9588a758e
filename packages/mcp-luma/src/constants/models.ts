/** Aspect ratios accepted by both image and video generation. */
export const ASPECT_RATIOS = ['1:1', '16:9', '9:16', '4:3', '3:4', '21:9', '9:21'] as const;

export const IMAGE_MODELS = ['photon-1', 'photon-flash-1'] as const;
export const VIDEO_MODELS = ['ray-2', 'ray-flash-2', 'ray-1-6'] as const;

export const VIDEO_RESOLUTIONS = ['540p', '720p', '1080p', '4k'] as const;
export const VIDEO_DURATIONS = ['5s', '9s'] as const;

export type AspectRatio = (typeof ASPECT_RATIOS)[number];
export type ImageModel = (typeof IMAGE_MODELS)[number];
export type VideoModel = (typeof VIDEO_MODELS)[number];
export type VideoResolution = (typeof VIDEO_RESOLUTIONS)[number];
export type VideoDuration = (typeof VIDEO_DURATIONS)[number];

export const DEFAULT_ASPECT_RATIO: AspectRatio = '16:9';
export const DEFAULT_IMAGE_MODEL: ImageModel = 'photon-1';
export const DEFAULT_VIDEO_MODEL: VideoModel = 'ray-2';
export const DEFAULT_VIDEO_RESOLUTION: VideoResolution = '720p';
export const DEFAULT_VIDEO_DURATION: VideoDuration = '5s';

// Reference list bounds enforced by the provider
export const MAX_IMAGE_REFS = 8;
export const MAX_STYLE_REFS = 1;
export const MAX_CHARACTER_REFS = 4;
export const MAX_MODIFY_IMAGE_REFS = 1;

// Known models registry with their characteristics
export const KNOWN_MODELS = {
  'photon-1': {
    id: 'photon-1',
    kind: 'image' as const,
    name: 'Photon 1',
    description: 'Luma\'s highest quality image model. Strong prompt adherence and detailed, natural-looking results.',
    supportsResolution: false,
    supportsDuration: false,
    typicalLatency: '5-15s',
    recommended_for: ['Final renders', 'Character and style references', 'Keyframes for video'],
  },
  'photon-flash-1': {
    id: 'photon-flash-1',
    kind: 'image' as const,
    name: 'Photon Flash 1',
    description: 'Faster, cheaper variant of Photon for iteration.',
    supportsResolution: false,
    supportsDuration: false,
    typicalLatency: '3-10s',
    recommended_for: ['Quick drafts', 'Exploring prompt variations'],
  },
  'ray-2': {
    id: 'ray-2',
    kind: 'video' as const,
    name: 'Ray 2',
    description: 'Standard video model with realistic motion. Supports resolution, duration and keyframes.',
    supportsResolution: true,
    supportsDuration: true,
    typicalLatency: '15-60s',
    recommended_for: ['High quality clips', 'Image-to-video with keyframes'],
  },
  'ray-flash-2': {
    id: 'ray-flash-2',
    kind: 'video' as const,
    name: 'Ray Flash 2',
    description: 'Faster variant of Ray 2 at lower cost.',
    supportsResolution: true,
    supportsDuration: true,
    typicalLatency: '10-40s',
    recommended_for: ['Drafts', 'Motion tests'],
  },
  'ray-1-6': {
    id: 'ray-1-6',
    kind: 'video' as const,
    name: 'Ray 1.6',
    description: 'Legacy video model. Resolution and duration are fixed by the provider.',
    supportsResolution: false,
    supportsDuration: false,
    typicalLatency: '30-90s',
    recommended_for: ['Reproducing older generations'],
  },
} as const satisfies Record<ImageModel | VideoModel, {
  id: string;
  kind: 'image' | 'video';
  name: string;
  description: string;
  supportsResolution: boolean;
  supportsDuration: boolean;
  typicalLatency: string;
  recommended_for: readonly string[];
}>;

export type KnownModel = (typeof KNOWN_MODELS)[keyof typeof KNOWN_MODELS];
