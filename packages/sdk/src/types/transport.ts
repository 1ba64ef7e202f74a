/**
 * The slice of `fetch` a provider needs. The global `fetch` satisfies it.
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
