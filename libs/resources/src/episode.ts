import { z } from 'zod';
import { ApiResource } from './apiResource';

export const episodeSchema = z
  .object({
    id: z.number().int(),
    title: z.string().nullish(),
    description: z.string().nullish(),
    published_at: z.string().nullish(),
    duration: z.number().nullish(),
    audio_url: z.string().nullish(),
    status: z.string().nullish(),
  })
  .passthrough();

export type EpisodeData = z.infer<typeof episodeSchema>;

export class Episode extends ApiResource<EpisodeData> {
  static readonly resourcePath = '/episodes';
  static readonly schema = episodeSchema;

  get title(): string | undefined {
    return this.data.title ?? undefined;
  }

  /** Parsed `published_at`; undefined for drafts. */
  get publishedAt(): Date | undefined {
    return this.data.published_at ? new Date(this.data.published_at) : undefined;
  }
}
