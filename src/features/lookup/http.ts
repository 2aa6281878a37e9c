/**
 * tidewatch — src/features/lookup/http.ts
 * WHAT: fetch wrappers for third-party lookups: timeout, retry on transient failure, zod-checked JSON.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { z } from "zod";
import { HttpError } from "../../lib/errors.js";
import { withRetry } from "../../lib/retry.js";

const REQUEST_TIMEOUT_MS = 10_000;

export interface RequestOptions {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
}

async function send(url: string, init: RequestOptions, label: string): Promise<Response> {
  return withRetry(
    async () => {
      const res = await fetch(url, { ...init, signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
      if (!res.ok) throw new HttpError(res.status, url);
      return res;
    },
    { label }
  );
}

export async function fetchJson<T>(
  url: string,
  schema: z.ZodType<T>,
  label: string,
  init: RequestOptions = {}
): Promise<T> {
  const res = await send(url, { ...init, headers: { Accept: "application/json", ...init.headers } }, label);
  return schema.parse(await res.json());
}

export async function fetchText(url: string, label: string, init: RequestOptions = {}): Promise<string> {
  const res = await send(url, init, label);
  return res.text();
}
