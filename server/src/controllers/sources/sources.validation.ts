import { z } from 'zod';

const wordSchema = z.string().trim().min(1, 'word is required').max(1000);

export const articleQuerySchema = z.object({
  word: wordSchema,
  alt: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform(alt => (alt === undefined ? [] : Array.isArray(alt) ? alt : [alt]))
    .transform(alts => alts.map(value => value.trim()).filter(value => value.length > 0)),
});

export const prefixQuerySchema = z.object({
  word: wordSchema,
});

export type ArticleQuery = z.infer<typeof articleQuerySchema>;
export type PrefixQuery = z.infer<typeof prefixQuerySchema>;
