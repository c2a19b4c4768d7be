/**
 * Resolution types.
 */
import type { DomainRequirement } from '@/domains/types.js';

import type { CredentialMatcher } from './matchers.js';

export interface ListOptions {
  /** Only domains covering these requirements are searched. Default: none. */
  requirements?: readonly DomainRequirement[];
  /** Default: every credential. */
  matcher?: CredentialMatcher;
  /** For user principals, consult their personal store first. */
  includeUserContext?: boolean;
  signal?: AbortSignal;
}
