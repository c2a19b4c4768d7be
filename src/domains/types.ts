/**
 * Domain types.
 *
 * A domain groups credentials by what they may be used for. Callers describe
 * what they need as requirements; a domain's specifications answer whether
 * the domain covers each requirement.
 */

// ─── Requirements ───────────────────────────────────────────────

/** Any requirement. `kind` names its category; plugins may add kinds. */
export interface DomainRequirement {
  readonly kind: string;
}

export interface SchemeRequirement extends DomainRequirement {
  readonly kind: 'scheme';
  readonly scheme: string;
}

/** Also carried by hostname-port requirements, which refine it. */
export interface HostnameRequirement extends DomainRequirement {
  readonly kind: 'hostname' | 'hostname-port';
  readonly hostname: string;
}

export interface HostnamePortRequirement extends HostnameRequirement {
  readonly kind: 'hostname-port';
  readonly port: number;
}

export interface PathRequirement extends DomainRequirement {
  readonly kind: 'path';
  readonly path: string;
}

export interface OAuthScopeRequirement extends DomainRequirement {
  readonly kind: 'oauth-scope';
  readonly scopes: readonly string[];
}

// ─── Specifications ─────────────────────────────────────────────

/**
 * `positive` and `partial` both count as a match; `unknown` means the
 * specification does not understand the requirement's category.
 */
export type SpecificationResult = 'positive' | 'partial' | 'negative' | 'unknown';

/** Serialized form of a specification. */
export interface SpecificationData {
  readonly type: string;
  readonly [key: string]: unknown;
}

export interface DomainSpecification {
  readonly type: string;
  test(requirement: DomainRequirement): SpecificationResult;
  toData(): SpecificationData;
}

// ─── Domain ─────────────────────────────────────────────────────

/** `name === null` is the global domain. Domains are equal iff names are equal. */
export interface Domain {
  readonly name: string | null;
  readonly description: string | null;
  readonly specifications: readonly DomainSpecification[];
}

export interface DomainData {
  name: string | null;
  description: string | null;
  specifications: SpecificationData[];
}
