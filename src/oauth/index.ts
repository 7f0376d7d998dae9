/**
 * OAuth2 module exports
 */

export {
  refreshAccessToken,
  buildRefreshRequestBody,
  parseAccessToken,
} from './token-endpoint.js'

export {
  createFetchTransport,
  createCurlTransport,
  selectTransport,
  type HttpTransport,
  type CurlTransportOptions,
} from './transports.js'

export { buildXOAuth2String } from './xoauth2.js'
