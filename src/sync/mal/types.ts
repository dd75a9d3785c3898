// Raw response shapes from the MyAnimeList API v2
// Docs: https://myanimelist.net/apiconfig/references/api/v2

import { z } from "zod";

export const MAL_STATUSES = ["watching", "completed", "on_hold", "dropped", "plan_to_watch"] as const;
export type MalStatus = (typeof MAL_STATUSES)[number];

export const malListStatusSchema = z.object({
  status: z.enum(MAL_STATUSES),
  score: z.number().int().min(0).max(10),
  num_episodes_watched: z.number().int().nonnegative(),
  is_rewatching: z.boolean().optional(),
  updated_at: z.string().optional(),
  num_times_rewatched: z.number().int().nonnegative().optional(),
  comments: z.string().optional(),
});

export const malListItemSchema = z.object({
  node: z.object({
    id: z.number().int(),
    title: z.string(),
    num_episodes: z.number().int().optional(),
  }),
  list_status: malListStatusSchema,
});

export const malListPageSchema = z.object({
  data: z.array(malListItemSchema),
  paging: z
    .object({
      next: z.string().url().optional(),
    })
    .default({}),
});

export type MalListItem = z.infer<typeof malListItemSchema>;
