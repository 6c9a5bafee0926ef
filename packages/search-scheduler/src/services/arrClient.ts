import { USER_AGENT } from "arr-rotator-commons";
import z from "zod";

export type QueryParams = Record<string, string | number>;

/** What the search passes need from a media manager. */
export interface ArrApi {
  getJson(path: string, params?: QueryParams): Promise<unknown>;
  putJson(path: string, payload: unknown): Promise<unknown>;
  postJson(path: string, payload: unknown): Promise<unknown>;
  pagedRecords(path: string, pageSize: number, maxRecords: number): Promise<unknown[]>;
}

export class ArrRequestError extends Error {
  constructor(
    readonly method: string,
    readonly path: string,
    readonly status: number,
    readonly body: string
  ) {
    super(`${method} ${path} failed: ${status} ${body}`);
    this.name = "ArrRequestError";
  }
}

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const PagedResponse = z.object({
  records: z.array(z.unknown()).nullish(),
  totalRecords: z.number().nullish(),
});

export function normalizeBaseUrl(url: string): string {
  const trimmed = url.trim();
  return trimmed.endsWith("/") ? trimmed.slice(0, -1) : trimmed;
}

export class ArrClient implements ArrApi {
  private baseUrl: string;

  constructor(
    baseUrl: string,
    private apiKey: string,
    private apiPrefix: string,
    private timeoutSeconds = 30,
    private fetchImpl: FetchLike = fetch
  ) {
    this.baseUrl = normalizeBaseUrl(baseUrl);
  }

  url(path: string, params?: QueryParams): string {
    const p = path.startsWith("/") ? path : `/${path}`;
    const query = params
      ? new URLSearchParams(Object.entries(params).map(([k, v]): [string, string] => [k, String(v)])).toString()
      : "";
    return `${this.baseUrl}${this.apiPrefix}${p}${query ? `?${query}` : ""}`;
  }

  private async request(method: string, path: string, params?: QueryParams, payload?: unknown): Promise<string> {
    const response = await this.fetchImpl(this.url(path, params), {
      method,
      headers: {
        "X-Api-Key": this.apiKey,
        "Content-Type": "application/json",
        Accept: "application/json",
        "User-Agent": USER_AGENT,
      },
      body: payload === undefined ? undefined : JSON.stringify(payload),
      signal: AbortSignal.timeout(this.timeoutSeconds * 1000),
    });

    const text = await response.text();
    if (response.status >= 400) {
      throw new ArrRequestError(method, path, response.status, text.slice(0, 300));
    }
    return text;
  }

  async getJson(path: string, params?: QueryParams): Promise<unknown> {
    return JSON.parse(await this.request("GET", path, params));
  }

  async putJson(path: string, payload: unknown): Promise<unknown> {
    const text = await this.request("PUT", path, undefined, payload);
    return text.trim() ? JSON.parse(text) : {};
  }

  async postJson(path: string, payload: unknown): Promise<unknown> {
    const text = await this.request("POST", path, undefined, payload);
    return text.trim() ? JSON.parse(text) : {};
  }

  /** Wanted endpoints answer `{ page, pageSize, totalRecords, records }`. */
  async pagedRecords(path: string, pageSize: number, maxRecords: number): Promise<unknown[]> {
    const out: unknown[] = [];
    for (let page = 1; ; page++) {
      const data = PagedResponse.parse(await this.getJson(path, { page, pageSize }));
      const records = data.records ?? [];
      const total = data.totalRecords ?? 0;

      out.push(...records);
      if (maxRecords > 0 && out.length >= maxRecords) return out.slice(0, maxRecords);
      if (records.length === 0) return out;
      if (out.length >= total) return out;
    }
  }
}
