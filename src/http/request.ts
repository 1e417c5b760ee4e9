import { DEFAULT_PAGE_ID_PARAM } from "../config/config.js";

export type RequestFields = Readonly<Record<string, string>>;

export type UrlParams = Readonly<Record<string, string | undefined>>;

/** What the session needs to know about one incoming browser request. */
export interface SessionRequest {
  readonly pageId: string | undefined;
  /** Submitted field id -> value. Callback ids appear here. */
  readonly fields: RequestFields;
  isRenderRequest(): boolean;
  /** URL of the current resource carrying exactly the given query parameters. */
  buildUrl(params: UrlParams): string;
}

export type CreateRequestOptions = {
  url: string;
  fields?: Record<string, string>;
  pageIdParam?: string;
};

const URL_BASE = "http://localhost";

/**
 * Request backed by a URL. The page id is read from the query string; every
 * other query parameter counts as a submitted field, alongside `fields`
 * (a decoded form body, for instance).
 */
export function createRequest(options: CreateRequestOptions): SessionRequest {
  const pageIdParam = options.pageIdParam ?? DEFAULT_PAGE_ID_PARAM;
  const url = new URL(options.url, URL_BASE);

  let pageId: string | undefined;
  const fields: Record<string, string> = {};
  for (const [key, value] of url.searchParams) {
    if (key === pageIdParam) {
      pageId = value;
    } else {
      fields[key] = value;
    }
  }
  Object.assign(fields, options.fields);
  Object.freeze(fields);

  return {
    pageId,
    fields,
    isRenderRequest: () => Object.keys(fields).length === 0,
    buildUrl: (params) => {
      const search = new URLSearchParams();
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
          search.set(key, value);
        }
      }
      const query = search.toString();
      return query ? `${url.pathname}?${query}` : url.pathname;
    },
  };
}
