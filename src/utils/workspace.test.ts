import { existsSync } from 'fs';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { RequestWorkspace } from './workspace.js';

describe('RequestWorkspace', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'workspace-test-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('creates a separate directory per request', async () => {
    const a = await RequestWorkspace.create(root, 'req-1');
    const b = await RequestWorkspace.create(root, 'req-1');

    expect(a.dir).not.toBe(b.dir);
    expect(path.dirname(a.dir)).toBe(root);
    expect(path.basename(a.dir).startsWith('req-1-')).toBe(true);
  });

  it('keeps file names inside the directory', async () => {
    const ws = await RequestWorkspace.create(root, 'req');
    expect(ws.file('../escape.mp3')).toBe(path.join(ws.dir, '.._escape.mp3'));
    expect(ws.file('seg_scene_0.mp4')).toBe(path.join(ws.dir, 'seg_scene_0.mp4'));
  });

  it('removes everything on dispose and tolerates a second call', async () => {
    const ws = await RequestWorkspace.create(root, 'req');
    await fs.writeFile(ws.file('a.txt'), 'x');

    await ws.dispose();
    await ws.dispose();

    expect(existsSync(ws.dir)).toBe(false);
    expect(ws.isDisposed).toBe(true);
    expect(() => ws.file('b.txt')).toThrow('already disposed');
  });
});
