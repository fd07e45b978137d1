// Data Commons client exports
export {
  API_KEY_HEADER,
  DataCommonsClient,
  type DataCommonsClientOptions,
  DESCRIPTION_TO_DCID,
  type ObservationQuery,
  type ObservationSelect,
} from './client.js';

export {
  DataCommonsError,
  DataCommonsTransportError,
  DataCommonsAuthenticationError,
  DataCommonsRequestError,
  MalformedResponseError,
  DataCommonsValidationError,
  isDataCommonsError,
  wrapDataCommonsError,
} from './errors.js';
