/**
 * Per-request working directory. Every intermediate file of one pipeline run
 * lives under its own directory, so concurrent requests never share paths.
 * dispose() removes the whole tree and is safe to call more than once.
 */
import * as fs from 'fs/promises';
import * as path from 'path';

const SAFE_NAME = /[^a-zA-Z0-9._-]/g;

export class RequestWorkspace {
  private disposed = false;

  private constructor(
    readonly requestId: string,
    readonly dir: string,
  ) {}

  static async create(root: string, requestId: string): Promise<RequestWorkspace> {
    await fs.mkdir(root, { recursive: true });
    const dir = await fs.mkdtemp(path.join(root, `${requestId.replace(SAFE_NAME, '_')}-`));
    return new RequestWorkspace(requestId, dir);
  }

  /** Absolute path for `name` inside the workspace. */
  file(name: string): string {
    if (this.disposed) throw new Error(`Workspace ${this.requestId} already disposed`);
    return path.join(this.dir, name.replace(SAFE_NAME, '_'));
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    await fs.rm(this.dir, { recursive: true, force: true });
  }
}
