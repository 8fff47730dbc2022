export {
  type HttpClient,
  type HttpClientOptions,
  type GetResponse,
  type PostResponse,
  createHttpClient,
  isSuccessStatus,
} from './httpClient.js'
