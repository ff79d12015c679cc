import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadRequestFile, mediaFieldFor } from './request-file.js';

describe('mediaFieldFor', () => {
  it('maps slot keys to upload fields', () => {
    expect(mediaFieldFor('intro', 2)).toBe('media_intro');
    expect(mediaFieldFor('outro', 2)).toBe('media_outro');
    expect(mediaFieldFor('scene_1', 2)).toBe('media_1');
  });

  it('rejects slots the request does not have', () => {
    expect(mediaFieldFor('scene_2', 2)).toBeNull();
    expect(mediaFieldFor('poster', 2)).toBeNull();
  });
});

describe('loadRequestFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'request-file-test-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads fields and loads media relative to the file', async () => {
    await fs.mkdir(path.join(dir, 'media'));
    await fs.writeFile(path.join(dir, 'media', 'heat.mp4'), 'video');
    await fs.writeFile(path.join(dir, 'request.json'), JSON.stringify({
      requestId: 'cli-1',
      topic: 'Heist films',
      category: 'movie',
      type: 'long',
      scenes: [{ name: 'Heat' }],
      media: { scene_0: 'media/heat.mp4', scene_5: 'media/missing.mp4' },
    }));

    const request = await loadRequestFile(path.join(dir, 'request.json'));

    expect(request).toMatchObject({
      requestId: 'cli-1',
      topic: 'Heist films',
      category: 'movie',
      mode: 'long',
      scenes: [{ name: 'Heat', details: '' }],
    });
    expect(Object.keys(request.uploads ?? {})).toEqual(['media_0']);
    expect(request.uploads?.['media_0']?.originalName).toBe('heat.mp4');
    expect(request.uploads?.['media_0']?.data.toString()).toBe('video');
  });

  it('defaults to a short video with no scenes', async () => {
    await fs.writeFile(path.join(dir, 'request.json'), '{"topic":"Empty"}');
    const request = await loadRequestFile(path.join(dir, 'request.json'));
    expect(request).toEqual({
      requestId: undefined,
      topic: 'Empty',
      category: '',
      mode: 'short',
      scenes: [],
      uploads: {},
    });
  });
});
