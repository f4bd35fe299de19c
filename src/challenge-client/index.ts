// challenge-client: HTTP access to the task challenge API.

export { ChallengeClient, type ChallengeClientOptions } from './client';
export {
  HttpError,
  HttpTransport,
  escapeSubpath,
  resolveApiBase,
  type TransportConfig,
} from './transport';
