import axios, { AxiosError, type AxiosRequestConfig } from "axios";
import { TransportFailure } from "../errors";
import type { RawRequest, RawResponse, Transport } from "./types";

export class AxiosTransport implements Transport {
  constructor(private readonly timeoutMs = 15000) {}

  async send(request: RawRequest): Promise<RawResponse> {
    const config: AxiosRequestConfig<string> = {
      method: request.method,
      url: request.url,
      headers: request.headers,
      data: request.method === "POST" ? request.body : undefined,
      timeout: this.timeoutMs,
      responseType: "text",
      // redirects are followed by HttpClient so it can keep the cookie jar in step
      maxRedirects: 0,
      validateStatus: () => true,
    };

    try {
      const response = await axios.request<string>(config);
      const headers: RawResponse["headers"] = {};
      for (const [key, value] of Object.entries(response.headers)) {
        if (typeof value === "string") headers[key.toLowerCase()] = value;
        else if (Array.isArray(value)) headers[key.toLowerCase()] = value.map(String);
      }
      return {
        status: response.status,
        headers,
        body: typeof response.data === "string" ? response.data : String(response.data ?? ""),
      };
    } catch (error) {
      if (error instanceof AxiosError) {
        throw new TransportFailure(
          `${error.code ?? "ERR_NETWORK"}: ${error.message}`,
          request.url,
          error.response?.status
        );
      }
      throw error;
    }
  }
}
