export type RequestInitWithSignal = RequestInit & { signal?: AbortSignal };

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
