export { ReleaseHttpClient, DEFAULT_REQUEST_HEADERS, isSuccessStatus, readBody } from './http-client.js';
export type {
  HttpClient,
  HttpResponse,
  HttpRequestOptions,
  ReleaseHttpClientOptions,
} from './http-client.js';
