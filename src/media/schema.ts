import { z } from 'zod';
import { normalizeDate } from '../shared/utils.js';

const IsoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')
  .refine((v) => normalizeDate(v) === v, { message: 'Expected a real calendar date' });
const OptionalText = z.string().nullish();

const HttpUrl = z
  .string()
  .url()
  .refine((u) => /^https?:\/\//i.test(u), { message: 'URL must use http or https' });

// date_published is deliberately a free string: bad values are normalised
// to null on write, not rejected.
export const ArticleInputSchema = z.object({
  url: HttpUrl,
  title: OptionalText,
  date_published: OptionalText,
  date_added: IsoDate.optional(),
  language: OptionalText,
  plain_text: OptionalText,
  markdown_text: OptionalText,
  tl_dr: OptionalText,
  audio_file: OptionalText,
  markdown_file: OptionalText,
  vtt_file: OptionalText,
});

export const TextInputSchema = z.object({
  text: z.string().min(1),
  date_added: IsoDate.optional(),
  language: OptionalText,
  plain_text: OptionalText,
  audio_file: OptionalText,
});

export const PodcastInputSchema = z.object({
  title: z.string().min(1),
  text: OptionalText,
  date_added: IsoDate.optional(),
  language: OptionalText,
  plain_text: OptionalText,
  audio_file: OptionalText,
  markdown_file: OptionalText,
});

// Update schemas are strict: their key sets are the only columns an update
// may touch. The field an id is hashed from is never updatable.
export const ArticleUpdateSchema = ArticleInputSchema.omit({ url: true }).partial().strict();
export const TextUpdateSchema = TextInputSchema.omit({ text: true }).partial().strict();
export const PodcastUpdateSchema = PodcastInputSchema.omit({ title: true }).partial().strict();

export const AuthorSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
});

export type ArticleInput = z.input<typeof ArticleInputSchema>;
export type TextInput = z.input<typeof TextInputSchema>;
export type PodcastInput = z.input<typeof PodcastInputSchema>;
export type ArticleUpdate = z.input<typeof ArticleUpdateSchema>;
export type TextUpdate = z.input<typeof TextUpdateSchema>;
export type PodcastUpdate = z.input<typeof PodcastUpdateSchema>;

export const ARTICLE_UPDATABLE_COLUMNS = ArticleUpdateSchema.keyof().options;
export const TEXT_UPDATABLE_COLUMNS = TextUpdateSchema.keyof().options;
export const PODCAST_UPDATABLE_COLUMNS = PodcastUpdateSchema.keyof().options;
