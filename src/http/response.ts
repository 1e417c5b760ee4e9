export type ContentResponse = {
  readonly kind: "content";
  readonly contentType: string;
  readonly body: string;
};

export type RedirectResponse = {
  readonly kind: "redirect";
  readonly location: string;
};

export type SessionResponse = ContentResponse | RedirectResponse;

export function contentResponse(body: string, contentType = "text/html"): ContentResponse {
  return { kind: "content", contentType, body };
}

export function redirectResponse(location: string): RedirectResponse {
  return { kind: "redirect", location };
}
