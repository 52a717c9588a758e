import { describe, it, expect } from 'vitest';
import {
  createImage,
  createToolContext,
  createVideo,
  getGeneration,
  listModels,
} from '../src/tools/luma.ts';
import { RemoteError } from '../src/utils/errors.ts';
import { withToolErrorHandler } from '../src/utils/tool-handler.ts';
import {
  FakeClock,
  FakeGenerationApi,
  generationId,
  imageUrlFor,
  processingThenCompleted,
  videoUrlFor,
} from './helpers.ts';

function setup(api = new FakeGenerationApi(processingThenCompleted(2)), embedImages = true) {
  const context = createToolContext(api, { pollIntervalMs: 3000, embedImages, clock: new FakeClock() });
  return { api, context };
}

describe('createImage', () => {
  it('returns the embedded image, its url and the generation id', async () => {
    const { api, context } = setup();
    const id = generationId(1);

    const result = await createImage({ prompt: 'a red fox in snow' }, context);

    expect(result.content).toEqual([
      { type: 'image', data: Buffer.from(imageUrlFor(id)).toString('base64'), mimeType: 'image/jpeg' },
      { type: 'text', text: `Image generated successfully.\nimage_url: ${imageUrlFor(id)}\ngeneration_id: ${id}` },
    ]);
    expect(result.structuredContent).toEqual({ generation_id: id, kind: 'image', image_url: imageUrlFor(id) });
    expect(result.isError).toBeUndefined();
    expect(api.statusQueries).toHaveLength(3);
  });

  it('returns only text when embedding is disabled', async () => {
    const { api, context } = setup(undefined, false);

    const result = await createImage({ prompt: 'a red fox in snow' }, context);

    expect(result.content.map((item) => item.type)).toEqual(['text']);
    expect(api.fetched).toEqual([]);
  });

  it('still returns the url when the image download fails', async () => {
    const { api, context } = setup();
    api.fetchError = new RemoteError('Failed to download image: timeout of 30000ms exceeded');

    const result = await createImage({ prompt: 'a red fox in snow' }, context);

    expect(result.content).toEqual([
      {
        type: 'text',
        text: `Image generated successfully.\nimage_url: ${imageUrlFor(generationId(1))}\ngeneration_id: ${generationId(1)}`,
      },
    ]);
  });

  it('runs concurrent calls independently', async () => {
    const { api, context } = setup(new FakeGenerationApi(processingThenCompleted(3)));

    const [fox, whale] = await Promise.all([
      createImage({ prompt: 'a red fox' }, context),
      createImage({ prompt: 'a blue whale', aspect_ratio: '1:1' }, context),
    ]);

    const idFor = (prompt: string) => api.created.find((entry) => entry.payload.body.prompt === prompt)?.id;
    const foxId = idFor('a red fox');
    const whaleId = idFor('a blue whale');

    expect(foxId).toBeDefined();
    expect(whaleId).toBeDefined();
    expect(foxId).not.toBe(whaleId);
    expect(fox?.structuredContent).toEqual({ generation_id: foxId, kind: 'image', image_url: imageUrlFor(foxId ?? '') });
    expect(whale?.structuredContent).toEqual({
      generation_id: whaleId,
      kind: 'image',
      image_url: imageUrlFor(whaleId ?? ''),
    });
    expect(api.queriesFor(foxId ?? '')).toBe(4);
    expect(api.queriesFor(whaleId ?? '')).toBe(4);
  });
});

describe('createVideo', () => {
  it('returns the thumbnail, video url, image url and generation id', async () => {
    const { context } = setup();
    const id = generationId(1);

    const result = await createVideo({ prompt: 'waves at night', duration: '9s' }, context);

    expect(result.content).toEqual([
      { type: 'image', data: Buffer.from(imageUrlFor(id)).toString('base64'), mimeType: 'image/jpeg' },
      {
        type: 'text',
        text: [
          'Video generated successfully. The image above is its thumbnail.',
          `video_url: ${videoUrlFor(id)}`,
          `image_url: ${imageUrlFor(id)}`,
          `generation_id: ${id}`,
        ].join('\n'),
      },
    ]);
    expect(result.structuredContent).toEqual({
      generation_id: id,
      kind: 'video',
      video_url: videoUrlFor(id),
      image_url: imageUrlFor(id),
    });
  });

  it('omits the thumbnail when the provider returns none', async () => {
    const { context } = setup(
      new FakeGenerationApi((id) => [{ id, state: 'completed', assets: { video: videoUrlFor(id) } }]),
    );
    const id = generationId(1);

    const result = await createVideo({ prompt: 'waves at night' }, context);

    expect(result.content).toEqual([
      { type: 'text', text: `Video generated successfully.\nvideo_url: ${videoUrlFor(id)}\ngeneration_id: ${id}` },
    ]);
  });
});

describe('tool error payloads', () => {
  it('reports a rejected submission without polling', async () => {
    const { api, context } = setup();
    api.createError = new RemoteError('Luma API error: Invalid aspect ratio for model', 422);
    const handler = withToolErrorHandler('create_image', (args: unknown) => createImage(args, context));

    const result = await handler({ prompt: 'a red fox' });

    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error: Luma API error: Invalid aspect ratio for model' }],
      structuredContent: {
        error: { kind: 'REMOTE_ERROR', message: 'Luma API error: Invalid aspect ratio for model', status_code: 422 },
      },
      isError: true,
    });
    expect(api.statusQueries).toEqual([]);
  });

  it('reports validation errors before contacting the provider', async () => {
    const { api, context } = setup();
    const handler = withToolErrorHandler('create_image', (args: unknown) => createImage(args, context));

    const result = await handler({ prompt: 'a red fox', character_ref: Array(5).fill('https://images.example.test/a.jpg') });

    expect(result.isError).toBe(true);
    expect(result.structuredContent).toMatchObject({ error: { kind: 'VALIDATION_ERROR' } });
    expect(api.created).toEqual([]);
  });

  it('reports a timeout with the generation id and last status', async () => {
    const api = new FakeGenerationApi((id) => [{ id, state: 'dreaming' }]);
    const context = createToolContext(api, { pollIntervalMs: 3000, videoTimeoutMs: 6000, clock: new FakeClock() });
    const handler = withToolErrorHandler('create_video', (args: unknown) => createVideo(args, context));
    const id = generationId(1);

    const result = await handler({ prompt: 'waves at night' });

    expect(result.structuredContent).toEqual({
      error: {
        kind: 'TIMEOUT',
        message: `Generation ${id} did not finish within 6000ms (last status: processing). Use get_generation to check on it later.`,
        generation_id: id,
        last_status: 'processing',
        timeout_ms: 6000,
      },
    });
  });

  it('reports a submission cancelled by the caller', async () => {
    const api = new FakeGenerationApi();
    const controller = new AbortController();
    api.createGeneration = async () => {
      controller.abort();
      throw new Error('canceled');
    };
    const context = createToolContext(api, { clock: new FakeClock() });
    const handler = withToolErrorHandler('create_image', (args: unknown) => createImage(args, context, controller.signal));

    const result = await handler({ prompt: 'a red fox' });

    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error: Generation request was cancelled while submitting' }],
      structuredContent: { error: { kind: 'CANCELLED', message: 'Generation request was cancelled while submitting' } },
      isError: true,
    });
    expect(api.statusQueries).toEqual([]);
  });

  it('reports unexpected errors separately', async () => {
    const handler = withToolErrorHandler('create_image', async () => {
      throw new Error('socket hang up');
    });

    const result = await handler();

    expect(result).toEqual({
      content: [{ type: 'text', text: 'Unexpected error: socket hang up' }],
      structuredContent: { error: { kind: 'UNEXPECTED_ERROR', message: 'socket hang up' } },
      isError: true,
    });
  });
});

describe('getGeneration', () => {
  it('reports status and assets of an earlier generation', async () => {
    const { api, context } = setup(new FakeGenerationApi(processingThenCompleted(0)));
    await api.createGeneration({ kind: 'video', body: { prompt: 'p', aspect_ratio: '16:9', model: 'ray-2', loop: false } });
    const id = generationId(1);

    const result = await getGeneration({ generation_id: id.toUpperCase() }, context);

    expect(result.content).toEqual([
      {
        type: 'text',
        text: `generation_id: ${id}\nstatus: completed\nvideo_url: ${videoUrlFor(id)}\nimage_url: ${imageUrlFor(id)}`,
      },
    ]);
    expect(result.structuredContent).toEqual({
      generation_id: id,
      status: 'completed',
      video_url: videoUrlFor(id),
      image_url: imageUrlFor(id),
    });
  });

  it('includes the failure reason of a failed generation', async () => {
    const { api, context } = setup(new FakeGenerationApi((id) => [{ id, state: 'failed', failure_reason: 'Content policy' }]));
    await api.createGeneration({ kind: 'image', body: { prompt: 'p', aspect_ratio: '16:9', model: 'photon-1' } });

    const result = await getGeneration({ generation_id: generationId(1) }, context);

    expect(result.structuredContent).toEqual({
      generation_id: generationId(1),
      status: 'failed',
      failure_reason: 'Content policy',
    });
  });

  it('rejects ids that are not UUIDs', async () => {
    const { context } = setup();

    await expect(getGeneration({ generation_id: '42' }, context)).rejects.toThrow(
      'Invalid get_generation parameters: generation_id must be a UUID',
    );
  });
});

describe('listModels', () => {
  it('lists every image and video model id', () => {
    const [first] = listModels().content;
    const text = first?.type === 'text' ? first.text : '';

    for (const id of ['photon-1', 'photon-flash-1', 'ray-2', 'ray-flash-2', 'ray-1-6']) {
      expect(text).toContain(`**Model ID:** \`${id}\``);
    }
    expect(text).toContain('- Resolution: fixed by provider');
  });
});
