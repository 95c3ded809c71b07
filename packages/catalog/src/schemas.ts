/**
 * Spotify Web API response schemas
 *
 * Only the fields the adapter reads are declared; everything else passes through.
 */

import { z } from 'zod';

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().positive(),
});

const audiobookSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  authors: z.array(z.object({ name: z.string() })),
  total_chapters: z.number().int().nonnegative().optional(),
  external_urls: z.object({ spotify: z.string().optional() }).partial().optional(),
});

export const searchResponseSchema = z.object({
  audiobooks: z.object({
    // Spotify occasionally returns null placeholders in search pages
    items: z.array(audiobookSchema.nullable()),
  }),
});

const chapterSchema = z.object({
  id: z.string().optional(),
  name: z.string().nullable().optional(),
  duration_ms: z.number().int().nonnegative(),
  chapter_number: z.number().int().nonnegative().optional(),
});

export const chapterPageSchema = z.object({
  items: z.array(chapterSchema.nullable()),
  next: z.string().url().nullable().optional(),
  total: z.number().int().nonnegative().optional(),
});

export type SpotifyAudiobook = z.infer<typeof audiobookSchema>;
export type SpotifyChapter = z.infer<typeof chapterSchema>;
