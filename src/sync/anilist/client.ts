import type { z } from "zod";
import type { ListEntry, ListServiceClient, ListSnapshot, WriteOptions } from "@/sync/types";
import { err, ok, type ServiceFailure, type ServiceResult } from "@/sync/types/result";
import type { RequestPolicy } from "@/sync/policy/retry";
import {
  classifyStatus,
  failureFor,
  parseBody,
  sendRequest,
  type HttpReply,
  type RequestKind,
} from "@/sync/policy/http";
import { toServiceScale } from "@/sync/resolver/score";
import {
  aniListCollectionSchema,
  aniListErrorsSchema,
  aniListMediaLookupSchema,
  aniListSaveSchema,
  type AniListErrors,
} from "./types";
import { mapAniListEntry, toAniListStatus } from "./mappers";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("anilist-client");

export const ANILIST_ENDPOINT = "https://graphql.anilist.co";

const COLLECTION_QUERY = `
query ($userName: String) {
  MediaListCollection(userName: $userName, type: ANIME) {
    lists {
      isCustomList
      entries {
        id
        status
        score(format: POINT_100)
        progress
        repeat
        notes
        updatedAt
        media {
          id
          idMal
          episodes
          title { romaji english native }
        }
      }
    }
  }
}`;

const MEDIA_BY_MAL_ID_QUERY = `
query ($idMal: Int) {
  Media(idMal: $idMal, type: ANIME) {
    id
    idMal
  }
}`;

const SAVE_MUTATION = `
mutation ($mediaId: Int, $status: MediaListStatus, $progress: Int, $repeat: Int, $notes: String, $scoreRaw: Int) {
  SaveMediaListEntry(
    mediaId: $mediaId
    status: $status
    progress: $progress
    repeat: $repeat
    notes: $notes
    scoreRaw: $scoreRaw
  ) {
    id
  }
}`;

export interface AniListClientOptions {
  userName: string;
  policy: RequestPolicy;
  endpoint?: string;
  now?: () => number;
}

export class AniListClient implements ListServiceClient {
  readonly service = "anilist" as const;
  private readonly endpoint: string;
  private readonly now: () => number;

  constructor(private readonly options: AniListClientOptions) {
    this.endpoint = options.endpoint ?? ANILIST_ENDPOINT;
    this.now = options.now ?? Date.now;
  }

  /** Run one GraphQL operation through the request policy. */
  private request<T>(
    accessToken: string,
    kind: RequestKind,
    label: string,
    query: string,
    variables: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<ServiceResult<T>> {
    return this.options.policy.execute(label, async (): Promise<ServiceResult<T>> => {
      log.debug("AniList API request", { label, variables });
      const sent = await sendRequest(this.endpoint, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${accessToken}`,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: JSON.stringify({ query, variables }),
      });
      if (!sent.ok) return sent;

      const reply = sent.value;
      const graphQlErrors = aniListErrorsSchema.safeParse(reply.body);
      if (graphQlErrors.success) {
        return err(graphQlFailure(reply, graphQlErrors.data.errors, kind));
      }
      if (!reply.ok) {
        return err(failureFor(reply, kind));
      }
      return parseBody(schema, reply.body, `AniList ${label}`);
    });
  }

  async fetchSnapshot(accessToken: string): Promise<ServiceResult<ListSnapshot>> {
    const result = await this.request(
      accessToken,
      "read",
      "list fetch",
      COLLECTION_QUERY,
      { userName: this.options.userName },
      aniListCollectionSchema
    );
    if (!result.ok) return result;

    const collection = result.value.data.MediaListCollection;
    if (!collection) {
      return err({ type: "ProtocolFailure", message: `AniList returned no anime list for ${this.options.userName}` });
    }

    // Custom lists repeat entries that already sit in a status list
    const seen = new Set<number>();
    const entries: ListEntry[] = [];
    for (const list of collection.lists) {
      if (list.isCustomList) continue;
      for (const raw of list.entries) {
        if (seen.has(raw.id)) continue;
        seen.add(raw.id);
        entries.push(mapAniListEntry(raw));
      }
    }

    log.info("AniList list fetched", { entries: entries.length });
    return ok({ service: this.service, fetchedAt: this.now(), entries });
  }

  async applyUpdate(accessToken: string, entry: ListEntry, options: WriteOptions): Promise<ServiceResult<void>> {
    const mediaId = await this.resolveMediaId(accessToken, entry);
    if (!mediaId.ok) return mediaId;

    const variables: Record<string, unknown> = {
      mediaId: mediaId.value,
      status: toAniListStatus(entry.status),
      progress: entry.progress,
      repeat: entry.rewatched,
      // An empty string clears the notes on AniList
      notes: entry.notes ?? "",
    };
    if (options.writeScore) {
      // 0 clears the score on AniList
      variables.scoreRaw = toServiceScale(entry.score, "point100") ?? 0;
    }

    const saved = await this.request(accessToken, "write", "list update", SAVE_MUTATION, variables, aniListSaveSchema);
    if (!saved.ok) return saved;
    log.debug("AniList entry saved", { title: entry.title, listEntryId: saved.value.data.SaveMediaListEntry.id });
    return ok(undefined);
  }

  /** Entries that only exist on MyAnimeList carry no AniList id yet; look it up by MAL id. */
  private async resolveMediaId(accessToken: string, entry: ListEntry): Promise<ServiceResult<number>> {
    if (entry.ids.anilist !== undefined) return ok(entry.ids.anilist);

    const malId = entry.ids.mal;
    if (malId === undefined) {
      return err({ type: "RejectedFailure", message: `No AniList or MyAnimeList id known for "${entry.title}"` });
    }

    const lookup = await this.request(
      accessToken,
      "write",
      "media lookup",
      MEDIA_BY_MAL_ID_QUERY,
      { idMal: malId },
      aniListMediaLookupSchema
    );
    if (!lookup.ok) return lookup;

    const media = lookup.value.data.Media;
    if (!media) {
      return err({ type: "RejectedFailure", message: `AniList has no anime with MyAnimeList id ${malId}` });
    }
    return ok(media.id);
  }
}

/**
 * AniList reports most failures as GraphQL errors, usually with an HTTP status
 * on each error. An invalid or expired token comes back as 400 "Invalid token".
 */
export function graphQlFailure(reply: HttpReply, errors: AniListErrors, kind: RequestKind): ServiceFailure {
  const message = `AniList: ${errors.map((e) => e.message).join("; ")}`;
  if (errors.some((e) => /invalid token|unauthorized/i.test(e.message))) {
    return { type: "AuthFailure", status: 401, message };
  }
  const status = errors.find((e) => e.status !== undefined)?.status ?? reply.status;
  if (status < 400) {
    return { type: "ProtocolFailure", message };
  }
  return classifyStatus(status, kind, message, reply.retryAfterMs);
}
