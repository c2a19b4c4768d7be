/**
 * Domains — construction, identity, matching and (de)serialization.
 */
import { ValidationError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import { parseSpecification } from './specifications.js';
import type {
  Domain,
  DomainData,
  DomainRequirement,
  DomainSpecification,
} from './types.js';

export const GLOBAL_DOMAIN: Domain = Object.freeze({
  name: null,
  description: null,
  specifications: Object.freeze([]),
});

function blankToNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? null : trimmed;
}

/**
 * Create a domain. A domain with no name, no description and no
 * specifications is the global domain.
 */
export function createDomain(
  name: string | null,
  description: string | null = null,
  specifications: readonly DomainSpecification[] = [],
): Domain {
  const normalizedName = blankToNull(name);
  const normalizedDescription = blankToNull(description);
  if (normalizedName === null && normalizedDescription === null && specifications.length === 0) {
    return GLOBAL_DOMAIN;
  }
  return Object.freeze({
    name: normalizedName,
    description: normalizedDescription,
    specifications: Object.freeze([...specifications]),
  });
}

export function isGlobalDomain(domain: Domain): boolean {
  return domain.name === null;
}

/** Domains are identified by name alone. */
export function sameDomain(a: Domain, b: Domain): boolean {
  return a.name === b.name;
}

/**
 * Whether `domain` covers every requirement.
 *
 * The global domain and an empty requirement list always match. Otherwise
 * each requirement needs at least one specification answering positive or
 * partial. Specifications answering unknown are skipped; a requirement that
 * none of the domain's specifications understands does not constrain it.
 * A named domain without specifications matches no requirements.
 */
export function matchesDomain(domain: Domain, requirements: readonly DomainRequirement[]): boolean {
  if (isGlobalDomain(domain) || requirements.length === 0) {
    return true;
  }
  if (domain.specifications.length === 0) {
    return false;
  }
  return requirements.every((requirement) => {
    const results = domain.specifications.map((spec) => spec.test(requirement));
    if (results.every((r) => r === 'unknown')) return true;
    return results.some((r) => r === 'positive' || r === 'partial');
  });
}

// ─── Serialization ──────────────────────────────────────────────

export function domainToData(domain: Domain): DomainData {
  return {
    name: domain.name,
    description: domain.description,
    specifications: domain.specifications.map((s) => s.toData()),
  };
}

export function domainFromData(data: DomainData): Result<Domain, ValidationError> {
  const specifications: DomainSpecification[] = [];
  for (const specData of data.specifications) {
    const parsed = parseSpecification(specData);
    if (!parsed.ok) {
      return err(
        new ValidationError(`Domain "${data.name ?? '(global)'}": ${parsed.error.message}`, {
          ...parsed.error.context,
          domain: data.name,
        }),
      );
    }
    specifications.push(parsed.value);
  }
  return ok(createDomain(data.name, data.description, specifications));
}
