import type { ServiceId } from "@/sync/types";
import { tokenResponseSchema, type TokenResponse } from "@/sync/types/api";
import { TokenExchangeError } from "@/sync/errors";
import type { SyncEnv } from "@/sync/config/env";
import { redirectUri } from "@/sync/config/env";

export interface TokenGrant {
  accessToken: string;
  refreshToken?: string;
  expiresInSeconds?: number;
}

export interface AuthorizationRequest {
  state: string;
  /** PKCE verifier; sent as the challenge with method `plain`. */
  codeVerifier?: string;
}

/**
 * Everything the orchestrator needs to know about one service's OAuth setup.
 * `canRefresh` is the only thing that decides between refreshing an expired
 * token and asking the user to authorize again.
 */
export interface AuthProvider {
  readonly service: ServiceId;
  readonly canRefresh: boolean;
  readonly usesPkce: boolean;
  authorizationUrl(request: AuthorizationRequest): string;
  exchangeCode(code: string, codeVerifier?: string): Promise<TokenGrant>;
  refresh(refreshToken: string): Promise<TokenGrant>;
}

interface ClientCredentials {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export const ANILIST_AUTH_URL = "https://anilist.co/api/v2/oauth/authorize";
export const ANILIST_TOKEN_URL = "https://anilist.co/api/v2/oauth/token";
export const MAL_AUTH_URL = "https://myanimelist.net/v1/oauth2/authorize";
export const MAL_TOKEN_URL = "https://myanimelist.net/v1/oauth2/token";

/** AniList issues long-lived access tokens and no refresh token. */
export class AniListAuthProvider implements AuthProvider {
  readonly service = "anilist";
  readonly canRefresh = false;
  readonly usesPkce = false;

  constructor(private readonly credentials: ClientCredentials) {}

  authorizationUrl({ state }: AuthorizationRequest): string {
    const url = new URL(ANILIST_AUTH_URL);
    url.searchParams.set("client_id", this.credentials.clientId);
    url.searchParams.set("redirect_uri", this.credentials.redirectUri);
    url.searchParams.set("response_type", "code");
    url.searchParams.set("state", state);
    return url.toString();
  }

  async exchangeCode(code: string): Promise<TokenGrant> {
    const response = await fetch(ANILIST_TOKEN_URL, {
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: "application/json" },
      body: JSON.stringify({
        grant_type: "authorization_code",
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
        redirect_uri: this.credentials.redirectUri,
        code,
      }),
    });
    return toGrant(this.service, response);
  }

  async refresh(): Promise<TokenGrant> {
    throw new Error("AniList does not issue refresh tokens");
  }
}

export class MalAuthProvider implements AuthProvider {
  readonly service = "mal";
  readonly canRefresh = true;
  readonly usesPkce = true;

  constructor(private readonly credentials: ClientCredentials) {}

  authorizationUrl({ state, codeVerifier }: AuthorizationRequest): string {
    const url = new URL(MAL_AUTH_URL);
    url.searchParams.set("response_type", "code");
    url.searchParams.set("client_id", this.credentials.clientId);
    url.searchParams.set("redirect_uri", this.credentials.redirectUri);
    url.searchParams.set("state", state);
    if (codeVerifier) {
      // MyAnimeList only supports the plain challenge method
      url.searchParams.set("code_challenge", codeVerifier);
      url.searchParams.set("code_challenge_method", "plain");
    }
    return url.toString();
  }

  async exchangeCode(code: string, codeVerifier?: string): Promise<TokenGrant> {
    const body = new URLSearchParams({
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret,
      grant_type: "authorization_code",
      code,
      redirect_uri: this.credentials.redirectUri,
    });
    if (codeVerifier) body.set("code_verifier", codeVerifier);

    const response = await fetch(MAL_TOKEN_URL, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: body.toString(),
    });
    return toGrant(this.service, response);
  }

  async refresh(refreshToken: string): Promise<TokenGrant> {
    const basic = Buffer.from(`${this.credentials.clientId}:${this.credentials.clientSecret}`).toString("base64");
    const response = await fetch(MAL_TOKEN_URL, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Authorization: `Basic ${basic}`,
      },
      body: new URLSearchParams({ grant_type: "refresh_token", refresh_token: refreshToken }).toString(),
    });
    return toGrant(this.service, response);
  }
}

export function createAuthProviders(env: SyncEnv): Record<ServiceId, AuthProvider> {
  const redirect = redirectUri(env);
  return {
    anilist: new AniListAuthProvider({
      clientId: env.ANILIST_CLIENT_ID,
      clientSecret: env.ANILIST_CLIENT_SECRET,
      redirectUri: redirect,
    }),
    mal: new MalAuthProvider({
      clientId: env.MAL_CLIENT_ID,
      clientSecret: env.MAL_CLIENT_SECRET,
      redirectUri: redirect,
    }),
  };
}

async function toGrant(service: ServiceId, response: Response): Promise<TokenGrant> {
  if (!response.ok) {
    const detail = await response.text().catch(() => response.statusText);
    throw new TokenExchangeError(service, response.status, detail);
  }
  const parsed = tokenResponseSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new TokenExchangeError(service, response.status, "token response is missing access_token");
  }
  return fromTokenResponse(parsed.data);
}

function fromTokenResponse(data: TokenResponse): TokenGrant {
  return {
    accessToken: data.access_token,
    ...(data.refresh_token ? { refreshToken: data.refresh_token } : {}),
    ...(data.expires_in ? { expiresInSeconds: data.expires_in } : {}),
  };
}
