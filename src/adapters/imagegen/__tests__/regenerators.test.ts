import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SimulatedRegenerator } from '../SimulatedRegenerator';
import { GeminiImageRegenerator } from '../GeminiImageRegenerator';
import { PARAMS, batchFor } from '../../../core/gate/__tests__/fixtures';
import type { Delta } from '../../../core/types/Pack';

const signal = new AbortController().signal;

const GLOW: Delta = { target: { kind: 'prompt', category: 'starting' }, action: 'enhance', directive: 'brighter glow' };

function imageReply(data: string, mimeType = 'image/png'): Response {
  return new Response(
    JSON.stringify({ candidates: [{ content: { parts: [{ text: 'here you go' }, { inlineData: { mimeType, data } }] } }] }),
    { status: 200 }
  );
}

describe('SimulatedRegenerator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should produce three virtual variants per category in round 1', async () => {
    const batch = await new SimulatedRegenerator(PARAMS).regenerate({
      packName: 'neon',
      round: 1,
      previous: null,
      deltas: [],
    });

    expect(batch.round).toBe(1);
    expect(batch.parameters).toEqual(PARAMS);
    expect(batch.assets.map((a) => a.id)).toEqual([
      'starting_r01_01',
      'starting_r01_02',
      'starting_r01_03',
      'brb_r01_01',
      'brb_r01_02',
      'brb_r01_03',
    ]);
    expect(batch.assets.every((a) => a.path === null && a.mimeType === 'image/png')).toBe(true);
  });

  it('should apply the previous round deltas to the previous parameters', async () => {
    const batch = await new SimulatedRegenerator(PARAMS).regenerate({
      packName: 'neon',
      round: 2,
      previous: batchFor(1),
      deltas: [GLOW],
    });

    expect(batch.parameters.prompts.starting).toBe('Starting soon screen, {theme}, brighter glow');
    expect(batch.parameters.prompts.brb).toBe(PARAMS.prompts.brb);
    expect(batch.assets).toHaveLength(4);
  });
});

describe('GeminiImageRegenerator', () => {
  let packDir: string;

  beforeEach(async () => {
    packDir = await mkdtemp(join(tmpdir(), 'pack-qa-images-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(packDir, { recursive: true, force: true });
  });

  it('should render each variant and write it under the round directory', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => imageReply(Buffer.from('png-bytes').toString('base64')));
    const regenerator = new GeminiImageRegenerator({
      apiKey: 'test-secret',
      packDir,
      defaults: PARAMS,
      model: 'image-test',
      baseUrl: 'https://example.test',
      fetchImpl,
    });

    const batch = await regenerator.regenerate({ packName: 'neon', round: 2, previous: null, deltas: [GLOW] }, signal);

    expect(fetchImpl).toHaveBeenCalledTimes(4);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://example.test/v1beta/models/image-test:generateContent');
    expect(batch.assets.map((a) => a.id)).toEqual(['starting_01', 'starting_02', 'brb_01', 'brb_02']);

    const first = batch.assets[0];
    expect(first?.path).toBe(join(packDir, '01_raw', 'round02', 'starting_01.png'));
    expect(await readFile(join(packDir, '01_raw', 'round02', 'brb_02.png'), 'utf8')).toBe('png-bytes');
  });

  it('should send the rendered prompt with image output enabled', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => imageReply(Buffer.from('x').toString('base64'), 'image/jpeg'));
    const regenerator = new GeminiImageRegenerator({ apiKey: 'test-secret', packDir, defaults: PARAMS, fetchImpl });

    const batch = await regenerator.regenerate({ packName: 'neon', round: 3, previous: null, deltas: [] }, signal);

    const body: unknown = JSON.parse(String(fetchImpl.mock.calls[0]?.[1]?.body));
    expect(body).toEqual({
      contents: [
        {
          parts: [
            {
              text: [
                'Starting soon screen, neon city',
                'Palette: #FF00FF, #1A1A2E.',
                'Texture: wet glass. Composition: rule of thirds. Lighting: neon glow. Mood: energetic.',
              ].join('\n'),
            },
          ],
        },
      ],
      generationConfig: { responseModalities: ['TEXT', 'IMAGE'] },
    });
    expect(batch.assets.map((a) => a.path)).toEqual([
      join(packDir, '01_raw', 'round03', 'starting_01.jpg'),
      join(packDir, '01_raw', 'round03', 'brb_01.jpg'),
    ]);
  });

  it('should fail when the model returns no image', async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      async () => new Response(JSON.stringify({ candidates: [{ content: { parts: [{ text: 'no can do' }] } }] }))
    );
    const regenerator = new GeminiImageRegenerator({ apiKey: 'test-secret', packDir, defaults: PARAMS, fetchImpl });

    await expect(
      regenerator.regenerate({ packName: 'neon', round: 1, previous: null, deltas: [] }, signal)
    ).rejects.toMatchObject({ name: 'GeminiHttpError', message: 'Gemini image model returned no image', retryable: true });
  });
});
