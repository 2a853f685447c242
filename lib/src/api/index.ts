/**
 * Management API Module
 */

export {
  UserIdentitySchema,
  UserRecordSchema,
  type UserIdentity,
  type UserRecordPayload,
  type UserRecord,
  toUserRecord,
  type UserDirectory,
  type HttpMethod,
  type ApiRequest,
} from './types.js';

export {
  ManagementApiClient,
  type ManagementApiClientOptions,
  type ApiResponse,
} from './client.js';

export { HttpUserDirectory } from './user-directory.js';
