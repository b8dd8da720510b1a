export type HttpMethod = "GET" | "POST";

export interface RawRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  /** urlencoded form body, POST only */
  body?: string;
}

export interface RawResponse {
  status: number;
  headers: Record<string, string | string[] | undefined>;
  body: string;
}

/**
 * A single HTTP exchange. Implementations must not follow redirects or keep
 * cookies; the HttpClient does both.
 */
export interface Transport {
  send(request: RawRequest): Promise<RawResponse>;
}

export interface RequestOptions {
  method: HttpMethod;
  url: string;
  form?: Record<string, string>;
  referer?: string;
}

export interface FetchedResponse {
  status: number;
  /** final URL after redirects */
  url: string;
  body: string;
  redirects: string[];
}
