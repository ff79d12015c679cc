/**
 * Placeholder images: a dark card with the slot label centred on it.
 *
 * The remote source asks placehold.co for a PNG; the local source renders the
 * same card with ffmpeg so the last fallback needs no network.
 */
import * as fs from 'fs/promises';
import type { FrameSize } from '../config.js';
import { downloadFile } from '../utils/http.js';
import type { MediaToolkit } from './ffmpeg.js';

export interface PlaceholderJob {
  label: string;
  frame: FrameSize;
  /** Output path without extension; the source appends its own. */
  destBase: string;
}

export interface PlaceholderSource {
  readonly name: string;
  /** Writes the placeholder and returns its path. */
  render(job: PlaceholderJob, signal?: AbortSignal): Promise<string>;
}

export function buildPlaceholderUrl(baseUrl: string, label: string, frame: FrameSize): string {
  return `${baseUrl}/${frame.width}x${frame.height}/111/FFF/png?text=${encodeURIComponent(label)}`;
}

export function createRemotePlaceholder(baseUrl: string): PlaceholderSource {
  return {
    name: 'remote',
    async render(job, signal) {
      const destPath = `${job.destBase}.png`;
      await downloadFile(buildPlaceholderUrl(baseUrl, job.label, job.frame), destPath, signal);
      return destPath;
    },
  };
}

export function createLocalPlaceholder(toolkit: MediaToolkit): PlaceholderSource {
  return {
    name: 'local',
    async render(job, signal) {
      // drawtext reads the label from a file so no filter escaping is needed
      const textFilePath = `${job.destBase}.label.txt`;
      const outputPath = `${job.destBase}.png`;
      await fs.writeFile(textFilePath, job.label, 'utf-8');
      try {
        await toolkit.renderTextCard({ textFilePath, frame: job.frame, outputPath }, signal);
      } finally {
        await fs.rm(textFilePath, { force: true });
      }
      return outputPath;
    },
  };
}
