const TRELLO_API_URL = "https://api.trello.com/1";

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export type TrelloCredentials = {
  apiKey: string;
  token: string;
};

export type TrelloClientOptions = {
  baseUrl?: string;
  fetchFn?: FetchFn;
};

export interface TrelloClient {
  fetchJson(path: string, params?: Record<string, string>): Promise<unknown>;
}

export class TrelloError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "TrelloError";
  }
}

/**
 * Creates a minimal Trello REST client authenticating with key and token.
 */
export function createTrelloClient(
  credentials: TrelloCredentials,
  options?: TrelloClientOptions,
): TrelloClient {
  const baseUrl = options?.baseUrl ?? TRELLO_API_URL;
  const fetchFn = options?.fetchFn ?? fetch;

  return {
    async fetchJson(path: string, params?: Record<string, string>) {
      const url = new URL(`${baseUrl}${path}`);
      for (const [key, value] of Object.entries(params ?? {})) {
        url.searchParams.set(key, value);
      }
      url.searchParams.set("key", credentials.apiKey);
      url.searchParams.set("token", credentials.token);

      const response = await fetchFn(url.toString(), {
        method: "GET",
        headers: { Accept: "application/json" },
      });

      if (!response.ok) {
        const err = await response.text();
        throw new TrelloError(
          `Trello API error on ${path}: ${response.status} - ${err}`,
          response.status,
        );
      }

      return response.json();
    },
  };
}
