/**
 * tidewatch — src/features/osu/api.ts
 * WHAT: Minimal osu! API v2 client (client-credentials OAuth, users, best scores).
 * WHY: Tracking only needs three endpoints; a full SDK would pull in far more than that.
 * FLOWS:
 *  - accessToken() → POST /oauth/token (cached until 60s before expiry)
 *  - request() → GET /api/v2/... with Bearer → zod parse → value | null on 404
 * DOCS:
 *  - https://osu.ppy.sh/docs/index.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import { logger } from "../../lib/logger.js";
import { HttpError, classifyError, isRecoverable } from "../../lib/errors.js";
import { withRetry } from "../../lib/retry.js";
import { OSU_MODES, type OsuMode } from "./modes.js";

const OSU_BASE_URL = "https://osu.ppy.sh";
const REQUEST_TIMEOUT_MS = 15_000;
const TOKEN_EARLY_REFRESH_MS = 60_000;

const tokenSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
  token_type: z.string(),
});

export const osuUserSchema = z.object({
  id: z.number(),
  username: z.string(),
  avatar_url: z.string(),
});
export type OsuUser = z.infer<typeof osuUserSchema>;

export const apiScoreSchema = z.object({
  accuracy: z.number(),
  created_at: z.string(),
  max_combo: z.number(),
  mode: z.enum(OSU_MODES),
  mods: z.array(z.string()),
  pp: z.number().nullable(),
  rank: z.string(),
  score: z.number(),
  statistics: z.object({
    count_geki: z.number().nullish(),
    count_katu: z.number().nullish(),
    count_300: z.number().nullish(),
    count_100: z.number().nullish(),
    count_50: z.number().nullish(),
    count_miss: z.number().nullish(),
  }),
  beatmap: z.object({
    id: z.number(),
    version: z.string(),
    difficulty_rating: z.number(),
    ar: z.number(),
    cs: z.number(),
    accuracy: z.number(),
    drain: z.number(),
    url: z.string(),
    bpm: z.number().nullable(),
    count_circles: z.number(),
    count_sliders: z.number(),
    count_spinners: z.number(),
  }),
  beatmapset: z.object({
    id: z.number(),
    title: z.string(),
    artist: z.string(),
    covers: z.object({ cover: z.string() }),
    user_id: z.number(),
    creator: z.string(),
    status: z.string(),
  }),
  user: z.object({
    username: z.string(),
    avatar_url: z.string(),
  }),
});
export type ApiScore = z.infer<typeof apiScoreSchema>;

const seasonalSchema = z.object({
  backgrounds: z.array(z.unknown()),
});

/**
 * Any failure talking to osu!. `retryable` is true for 5xx and transport errors.
 */
export class OsuApiError extends Error {
  readonly retryable: boolean;

  constructor(message: string, opts: { retryable: boolean; cause?: unknown }) {
    super(message, { cause: opts.cause });
    this.name = "OsuApiError";
    this.retryable = opts.retryable;
  }
}

export interface OsuApiClientOptions {
  clientId: string;
  clientSecret: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

export class OsuApiClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private token: { value: string; expiresAt: number } | null = null;

  constructor(private readonly opts: OsuApiClientOptions) {
    this.baseUrl = opts.baseUrl ?? OSU_BASE_URL;
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * Look a player up by numeric id or username. null when osu! says 404.
   */
  async user(idOrName: string | number, mode?: OsuMode): Promise<OsuUser | null> {
    const key = typeof idOrName === "number" || /^\d+$/.test(idOrName) ? "id" : "username";
    const segment = encodeURIComponent(String(idOrName));
    const path = mode ? `/users/${segment}/${mode}` : `/users/${segment}`;
    return this.request(path, { key }, osuUserSchema);
  }

  async userBestScores(userId: number, mode: OsuMode, limit = 100): Promise<ApiScore[]> {
    const scores = await this.request(
      `/users/${userId}/scores/best`,
      { mode, limit: String(limit) },
      z.array(apiScoreSchema)
    );
    return scores ?? [];
  }

  /**
   * Cheap unauthenticated-looking call used to check osu! is answering again.
   */
  async seasonalBackgrounds(): Promise<boolean> {
    const result = await this.request("/seasonal-backgrounds", {}, seasonalSchema);
    return result !== null;
  }

  private async accessToken(): Promise<string> {
    if (this.token && Date.now() < this.token.expiresAt) {
      return this.token.value;
    }

    const url = `${this.baseUrl}/oauth/token`;
    const res = await this.fetchImpl(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: "application/json" },
      body: JSON.stringify({
        client_id: this.opts.clientId,
        client_secret: this.opts.clientSecret,
        grant_type: "client_credentials",
        scope: "public",
      }),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (!res.ok) {
      throw new HttpError(res.status, url, `osu! token request failed with HTTP ${res.status}`);
    }

    const parsed = tokenSchema.parse(await res.json());
    this.token = {
      value: parsed.access_token,
      expiresAt: Date.now() + parsed.expires_in * 1000 - TOKEN_EARLY_REFRESH_MS,
    };
    logger.debug({ expiresIn: parsed.expires_in }, "[osu] Access token refreshed");
    return this.token.value;
  }

  private async request<T>(
    path: string,
    params: Record<string, string>,
    schema: z.ZodType<T>
  ): Promise<T | null> {
    const url = new URL(`${this.baseUrl}/api/v2${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    try {
      return await withRetry(
        async () => {
          const token = await this.accessToken();
          const res = await this.fetchImpl(url, {
            headers: { Authorization: `Bearer ${token}`, Accept: "application/json" },
            signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
          });
          if (res.status === 404) return null;
          if (res.status === 401) {
            this.token = null;
          }
          if (!res.ok) {
            throw new HttpError(res.status, url.toString());
          }
          return schema.parse(await res.json());
        },
        { label: `osu ${path}` }
      );
    } catch (err) {
      const classified = classifyError(err);
      throw new OsuApiError(`osu! API request to ${path} failed: ${classified.message}`, {
        retryable: isRecoverable(classified),
        cause: err,
      });
    }
  }
}
