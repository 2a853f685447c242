/**
 * Operations Module
 *
 * Concrete per-item operations driven by the batch processor.
 */

export {
  isEmail,
  isUserId,
  validateIdentifier,
  resolveUserIdentifier,
  type IdentifierResolution,
} from './identifiers.js';

export { UserActionOperation, type UserActionType, type UserActionOptions } from './user-action.js';

export { CsvReportWriter, escapeCsvValue } from './csv.js';

export {
  ExportLastLoginOperation,
  EXPORT_FIELDS,
  type ExportField,
  type ExportLastLoginOptions,
} from './export-last-login.js';

export {
  CheckUnblockedOperation,
  UNBLOCKED_REPORT_COLUMNS,
  type CheckUnblockedOptions,
} from './check-unblocked.js';

export {
  CheckDomainsOperation,
  DOMAIN_REPORT_COLUMNS,
  classifyDomain,
  extractDomain,
  normalizeDomains,
  type CheckDomainsOptions,
  type DomainVerdict,
} from './check-domains.js';

export {
  SocialUnlinkOperation,
  planSocialUserAction,
  type SocialUnlinkOptions,
  type SocialUserAction,
  type SocialUserPlan,
} from './social-unlink.js';

export {
  createItemOperation,
  createUserDirectory,
  type UserDirectoryOptions,
} from './factory.js';

export { parseIdentifierList, readIdentifierFile } from './input.js';
