/**
 * Pipeline error taxonomy.
 *
 * Fatal errors (ScriptGenerationError, NoSegmentsError, ConcatenationError)
 * abort the request. SegmentRenderError is absorbed by the coordinator and only
 * removes its slot from the final video. MediaResolutionError removes its slot.
 */

export type PipelineErrorCode =
  | 'script_generation_failed'
  | 'media_resolution_failed'
  | 'speech_synthesis_failed'
  | 'segment_render_failed'
  | 'no_segments'
  | 'concatenation_failed'
  | 'ffmpeg_failed'
  | 'http_failed';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Text generation failed or returned something that is not JSON. */
export class ScriptGenerationError extends PipelineError {
  readonly code = 'script_generation_failed';

  constructor(message: string, public readonly rawResponse?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class MediaResolutionError extends PipelineError {
  readonly code = 'media_resolution_failed';

  constructor(message: string, public readonly slot: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Every chunk of a segment's narration failed or there was nothing to say. */
export class SpeechSynthesisError extends PipelineError {
  readonly code = 'speech_synthesis_failed';

  constructor(message: string, public readonly failedChunks: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class SegmentRenderError extends PipelineError {
  readonly code = 'segment_render_failed';

  constructor(message: string, public readonly slot: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class NoSegmentsError extends PipelineError {
  readonly code = 'no_segments';
}

export class ConcatenationError extends PipelineError {
  readonly code = 'concatenation_failed';
}

export class FfmpegError extends PipelineError {
  readonly code = 'ffmpeg_failed';

  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderrTail: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class HttpError extends PipelineError {
  readonly code = 'http_failed';

  constructor(message: string, public readonly status: number, public readonly url: string) {
    super(message);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
