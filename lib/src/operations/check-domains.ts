/**
 * Check Domains Operation
 *
 * Classifies the email domain of each item against allow and block lists
 * and writes one CSV row per checked address. Email items are classified
 * directly; user ids are looked up for their email address first.
 */

import type { UserDirectory } from '../api/index.js';
import type { ItemOperation, ItemOutcome, ItemValidation } from '../batch/index.js';
import { ConfigurationError } from '../errors/index.js';
import { type Logger, getComponentLogger } from '../logging/index.js';
import { CsvReportWriter } from './csv.js';
import { isEmail, validateIdentifier } from './identifiers.js';

export const DOMAIN_REPORT_COLUMNS = ['identifier', 'email', 'domain', 'verdict', 'reason'] as const;

export type DomainVerdict = { verdict: 'allowed' } | { verdict: 'blocked'; reason: string };

export interface CheckDomainsOptions {
  directory: UserDirectory;
  outputFile: string;
  allowedDomains?: readonly string[];
  blockedDomains?: readonly string[];
  logger?: Logger;
}

/**
 * Lower-cased domain after the last `@`, or null when there is none
 */
export function extractDomain(email: string): string | null {
  const at = email.lastIndexOf('@');
  if (at < 0) {
    return null;
  }
  const domain = email.slice(at + 1).trim().toLowerCase();
  return domain === '' ? null : domain;
}

/**
 * Trim, lower-case, drop a leading `@` and duplicates
 */
export function normalizeDomains(domains: readonly string[]): string[] {
  const normalized = domains
    .map((domain) => domain.trim().toLowerCase().replace(/^@/, ''))
    .filter((domain) => domain !== '');
  return [...new Set(normalized)];
}

/**
 * The block list wins; a non-empty allow list blocks everything it does not name
 */
export function classifyDomain(
  domain: string,
  allowedDomains: readonly string[],
  blockedDomains: readonly string[]
): DomainVerdict {
  if (blockedDomains.includes(domain)) {
    return { verdict: 'blocked', reason: 'domain in blocked list' };
  }
  if (allowedDomains.length > 0 && !allowedDomains.includes(domain)) {
    return { verdict: 'blocked', reason: 'domain not in allowed list' };
  }
  return { verdict: 'allowed' };
}

export class CheckDomainsOperation implements ItemOperation {
  readonly name = 'Check email domains';
  readonly operationType = 'check_domains';
  readonly allowedDomains: readonly string[];
  readonly blockedDomains: readonly string[];
  private readonly directory: UserDirectory;
  private readonly report: CsvReportWriter;
  private readonly logger: Logger;

  /**
   * @throws {ConfigurationError} when neither list names a domain
   */
  constructor(options: CheckDomainsOptions) {
    this.allowedDomains = normalizeDomains(options.allowedDomains ?? []);
    this.blockedDomains = normalizeDomains(options.blockedDomains ?? []);
    if (this.allowedDomains.length === 0 && this.blockedDomains.length === 0) {
      throw new ConfigurationError('check_domains needs allowed or blocked domains');
    }

    this.directory = options.directory;
    this.report = new CsvReportWriter(options.outputFile, DOMAIN_REPORT_COLUMNS);
    this.logger = options.logger ?? getComponentLogger('check-domains');
  }

  validate(item: string): ItemValidation {
    return validateIdentifier(item);
  }

  async execute(item: string): Promise<ItemOutcome> {
    let email = item;
    if (!isEmail(item)) {
      const user = await this.directory.getUser(item);
      if (!user) {
        return { status: 'not_found', reason: `user ${item} does not exist` };
      }
      if (!user.email) {
        return { status: 'skipped', reason: `user ${item} has no email address` };
      }
      email = user.email;
    }

    const domain = extractDomain(email);
    if (domain === null) {
      return { status: 'skipped', reason: `cannot read a domain from ${email}` };
    }

    const result = classifyDomain(domain, this.allowedDomains, this.blockedDomains);
    if (result.verdict === 'blocked') {
      this.logger.info('Blocked email domain', { item, domain, reason: result.reason });
    }
    await this.report.appendRow([
      item,
      email,
      domain,
      result.verdict,
      result.verdict === 'blocked' ? result.reason : '',
    ]);
    return { status: 'success' };
  }
}
