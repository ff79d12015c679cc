/**
 * Media search backed by TMDB movie search. Returns poster URLs rank-ordered by TMDB;
 * the resolver only ever takes the first one.
 */
import { z } from 'zod';
import { env } from '../config.js';
import { downloadFile, getJson } from '../utils/http.js';
import { logger } from '../utils/logger.js';

export interface MediaSearch {
  findImages(query: string, signal?: AbortSignal): Promise<string[]>;
  download(ref: string, destPath: string, signal?: AbortSignal): Promise<void>;
}

export interface TmdbOptions {
  /** v3 API key (query string) or v4 read token (bearer). */
  apiKey?: string;
  bearerToken?: string;
  baseUrl: string;
  imageBaseUrl: string;
}

const TmdbSearchSchema = z.object({
  results: z.array(z.object({ poster_path: z.string().nullish() }).passthrough()).default([]),
});

export function createTmdbSearch(opts: TmdbOptions): MediaSearch {
  return {
    async findImages(query, signal) {
      const params = new URLSearchParams({ query, include_adult: 'false' });
      if (opts.apiKey) params.set('api_key', opts.apiKey);
      const headers: Record<string, string> = opts.bearerToken
        ? { Authorization: `Bearer ${opts.bearerToken}` }
        : {};

      const body = await getJson(`${opts.baseUrl}/search/movie?${params}`, TmdbSearchSchema, { headers, signal });
      const posters = body.results
        .map((r) => r.poster_path)
        .filter((p): p is string => typeof p === 'string' && p.length > 0)
        .map((p) => `${opts.imageBaseUrl}${p}`);

      logger.debug('TMDB: search complete', { query, hits: posters.length });
      return posters;
    },

    async download(ref, destPath, signal) {
      await downloadFile(ref, destPath, signal);
    },
  };
}

/** TMDB search when a credential is configured, otherwise null (lookup disabled). */
export function createMediaSearch(): MediaSearch | null {
  if (env.TMDB_API_KEY) {
    return createTmdbSearch({ apiKey: env.TMDB_API_KEY, baseUrl: env.TMDB_BASE_URL, imageBaseUrl: env.TMDB_IMAGE_BASE_URL });
  }
  if (env.TMDB_API_TOKEN) {
    return createTmdbSearch({ bearerToken: env.TMDB_API_TOKEN, baseUrl: env.TMDB_BASE_URL, imageBaseUrl: env.TMDB_IMAGE_BASE_URL });
  }
  return null;
}
