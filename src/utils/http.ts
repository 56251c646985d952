import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse, isAxiosError } from "axios";
import pLimit from "p-limit";
import { Readable } from "stream";
import { NET } from "../config.js";
import { FetchError } from "../errors.js";
import { debug } from "../logger.js";

const concurrencyLimit = pLimit(Math.max(1, NET.CONCURRENCY));

const httpClient: AxiosInstance = axios.create({
  timeout: NET.TIMEOUT,
  maxRedirects: 5,
  headers: {
    "User-Agent": "version-mappings/1.0"
  }
});

/**
 * Response body with lower-cased headers.
 */
export interface HttpResult<T> {
  readonly data: T;
  readonly headers: Record<string, string>;
  readonly status: number;
}

function normaliseHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(", ");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    }
  }
  return out;
}

function toFetchError(rawError: unknown, url: string): FetchError {
  if (isAxiosError(rawError) && rawError.response) {
    const { data, status, statusText } = rawError.response;
    // an unread error body would keep its socket open
    if (data instanceof Readable) {
      data.destroy();
    }
    return new FetchError("status", url, `GET ${url} returned ${status}${statusText ? ` ${statusText}` : ""}`, status);
  }
  const message = rawError instanceof Error ? rawError.message : String(rawError);
  return new FetchError("network", url, `GET ${url} failed: ${message}`);
}

async function get<T>(url: string, config: AxiosRequestConfig): Promise<HttpResult<T>> {
  let response: AxiosResponse<T>;
  try {
    response = await concurrencyLimit(() => httpClient.get<T>(url, config));
  } catch (rawError) {
    throw toFetchError(rawError, url);
  }
  debug(`GET ${url} -> ${response.status}`);
  return {
    data: response.data,
    headers: normaliseHeaders(response.headers),
    status: response.status
  };
}

/**
 * Perform GET request expecting JSON payload.
 *
 * The body is returned undecoded; callers validate its shape.
 *
 * @param url - Target URL.
 * @returns Response data and headers.
 * @throws FetchError on transport failure or non-2xx status.
 */
export async function getJson<T>(url: string): Promise<HttpResult<T>> {
  return get<T>(url, { responseType: "json", headers: { Accept: "application/json" } });
}

/**
 * Perform GET request expecting binary payload.
 *
 * @param url - Target URL.
 * @returns Buffer with binary payload and response headers.
 * @throws FetchError on transport failure or non-2xx status.
 */
export async function getBinary(url: string): Promise<HttpResult<Buffer>> {
  const response = await get<ArrayBuffer>(url, { responseType: "arraybuffer" });
  return { ...response, data: Buffer.from(response.data) };
}

/**
 * Perform GET request and return the body as text.
 *
 * @param url - Target URL.
 * @throws FetchError on transport failure or non-2xx status.
 */
export async function getText(url: string): Promise<HttpResult<string>> {
  return get<string>(url, { responseType: "text", responseEncoding: "utf8" });
}

/**
 * Perform GET request and hand back the body as a readable stream.
 *
 * The concurrency slot is released once headers arrive, not when the body
 * has been consumed.
 *
 * @param url - Target URL.
 * @throws FetchError on transport failure or non-2xx status.
 */
export async function getStream(url: string): Promise<HttpResult<Readable>> {
  return get<Readable>(url, { responseType: "stream" });
}

export { httpClient };
