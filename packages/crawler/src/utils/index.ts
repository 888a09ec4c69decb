export {
  fetchWithRetry,
  defaultHeaders,
  randomBrowserHeaders,
  type FetchOptions,
  type FetchResult,
} from "./fetch.js";
export { NodeHttpClient, type HttpClient, type RequestOptions } from "./http-client.js";
