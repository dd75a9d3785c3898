// Raw response shapes from the AniList GraphQL API
// Docs: https://docs.anilist.co/guide/graphql/

import { z } from "zod";

export const ANILIST_STATUSES = ["CURRENT", "PLANNING", "COMPLETED", "DROPPED", "PAUSED", "REPEATING"] as const;
export type AniListStatus = (typeof ANILIST_STATUSES)[number];

export const aniListErrorsSchema = z.object({
  errors: z
    .array(
      z.object({
        message: z.string(),
        status: z.number().int().optional(),
      })
    )
    .min(1),
});

export const aniListEntrySchema = z.object({
  id: z.number().int(),
  status: z.enum(ANILIST_STATUSES),
  score: z.number().nullable(),
  progress: z.number().int().nonnegative().nullable(),
  /** Unix seconds; 0 when AniList never recorded a change. */
  updatedAt: z.number().int().nullable(),
  repeat: z.number().int().nonnegative().nullable(),
  notes: z.string().nullable(),
  media: z.object({
    id: z.number().int(),
    idMal: z.number().int().nullable(),
    episodes: z.number().int().nullable(),
    title: z.object({
      romaji: z.string().nullable(),
      english: z.string().nullable(),
      native: z.string().nullable(),
    }),
  }),
});

export const aniListCollectionSchema = z.object({
  data: z.object({
    MediaListCollection: z
      .object({
        lists: z.array(
          z.object({
            isCustomList: z.boolean().nullable(),
            entries: z.array(aniListEntrySchema),
          })
        ),
      })
      .nullable(),
  }),
});

export const aniListMediaLookupSchema = z.object({
  data: z.object({
    Media: z.object({ id: z.number().int(), idMal: z.number().int().nullable() }).nullable(),
  }),
});

export const aniListSaveSchema = z.object({
  data: z.object({
    SaveMediaListEntry: z.object({ id: z.number().int() }),
  }),
});

export type AniListEntryResponse = z.infer<typeof aniListEntrySchema>;
export type AniListErrors = z.infer<typeof aniListErrorsSchema>["errors"];
