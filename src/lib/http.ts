// src/lib/http.ts

/** The slice of `fetch` the outbound clients use; lets tests pass a stub. */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);
