/**
 * Source module: MISP database access.
 */

export {
  withSourceConnection,
  createMysqlConnector,
  classifyQueryError,
  type SourceConnection,
  type SourceConnector,
  type QueryOptions,
  type QueryParam,
} from './connection.js';

export {
  buildWindowQuery,
  fetchRecentAttributes,
  type WindowQuery,
  type WindowQueryOptions,
} from './reader.js';
