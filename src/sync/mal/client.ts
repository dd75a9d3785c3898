import type { z } from "zod";
import type { ListEntry, ListServiceClient, ListSnapshot, WriteOptions } from "@/sync/types";
import { err, ok, type ServiceResult } from "@/sync/types/result";
import type { RequestPolicy } from "@/sync/policy/retry";
import { failureFor, parseBody, sendRequest, type RequestKind } from "@/sync/policy/http";
import { malListPageSchema, malListStatusSchema, type MalListItem } from "./types";
import { mapMalItem, toMalListStatusForm } from "./mappers";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("mal-client");

export const MAL_API_BASE = "https://api.myanimelist.net/v2";
const PAGE_LIMIT = 1000;
// Rewatch count and comments are only returned when asked for by name
const LIST_FIELDS =
  "list_status{status,score,num_episodes_watched,is_rewatching,updated_at,num_times_rewatched,comments},num_episodes";

interface MalRequest {
  method: "GET" | "PATCH";
  headers?: Record<string, string>;
  body?: URLSearchParams;
}

export interface MalClientOptions {
  policy: RequestPolicy;
  baseUrl?: string;
  now?: () => number;
}

export class MalClient implements ListServiceClient {
  readonly service = "mal" as const;
  private readonly baseUrl: string;
  private readonly now: () => number;

  constructor(private readonly options: MalClientOptions) {
    this.baseUrl = options.baseUrl ?? MAL_API_BASE;
    this.now = options.now ?? Date.now;
  }

  /** Make an authenticated request to the MyAnimeList API through the request policy. */
  private request<T>(
    accessToken: string,
    kind: RequestKind,
    label: string,
    url: string,
    init: MalRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<ServiceResult<T>> {
    return this.options.policy.execute(label, async (): Promise<ServiceResult<T>> => {
      log.debug("MyAnimeList API request", { label, url });
      const sent = await sendRequest(url, {
        ...init,
        headers: {
          ...init.headers,
          Authorization: `Bearer ${accessToken}`,
          Accept: "application/json",
        },
      });
      if (!sent.ok) return sent;
      if (!sent.value.ok) return err(failureFor(sent.value, kind));
      return parseBody(schema, sent.value.body, `MyAnimeList ${label}`);
    });
  }

  /** Follow paging.next until the whole list is in. */
  private async fetchAllPages(accessToken: string): Promise<ServiceResult<MalListItem[]>> {
    const first = new URL(`${this.baseUrl}/users/@me/animelist`);
    first.searchParams.set("fields", LIST_FIELDS);
    first.searchParams.set("limit", String(PAGE_LIMIT));
    first.searchParams.set("nsfw", "true");

    const all: MalListItem[] = [];
    let next: string | undefined = first.toString();
    while (next) {
      const page: ServiceResult<z.infer<typeof malListPageSchema>> = await this.request(accessToken, "read", "list fetch", next, { method: "GET" }, malListPageSchema);
      if (!page.ok) return page;
      all.push(...page.value.data);
      next = page.value.paging.next;
    }
    return ok(all);
  }

  async fetchSnapshot(accessToken: string): Promise<ServiceResult<ListSnapshot>> {
    const items = await this.fetchAllPages(accessToken);
    if (!items.ok) return items;

    const entries = items.value.map(mapMalItem);
    log.info("MyAnimeList list fetched", { entries: entries.length });
    return ok({ service: this.service, fetchedAt: this.now(), entries });
  }

  async applyUpdate(accessToken: string, entry: ListEntry, options: WriteOptions): Promise<ServiceResult<void>> {
    const malId = entry.ids.mal ?? (entry.externalKey ? Number(entry.externalKey) : undefined);
    if (malId === undefined || !Number.isInteger(malId)) {
      return err({ type: "RejectedFailure", message: `No MyAnimeList id known for "${entry.title}"` });
    }

    const result = await this.request(
      accessToken,
      "write",
      "list update",
      `${this.baseUrl}/anime/${malId}/my_list_status`,
      {
        method: "PATCH",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: toMalListStatusForm(entry, options.writeScore),
      },
      malListStatusSchema
    );
    if (!result.ok) return result;
    log.debug("MyAnimeList entry saved", { title: entry.title, status: result.value.status });
    return ok(undefined);
  }
}
