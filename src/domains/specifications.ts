/**
 * Built-in domain specifications and the data → specification table.
 *
 * Unknown specification types are kept verbatim as opaque specifications
 * so that persisted data written by a plugin survives a round trip.
 */
import { z } from 'zod';

import { ValidationError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import {
  isHostnamePortRequirement,
  isHostnameRequirement,
  isOAuthScopeRequirement,
  isPathRequirement,
  isSchemeRequirement,
} from './requirements.js';
import type {
  DomainRequirement,
  DomainSpecification,
  SpecificationData,
  SpecificationResult,
} from './types.js';
import { antPathMatch, isAntPattern, wildcardMatch } from './wildcard.js';

// ─── Pattern Lists ──────────────────────────────────────────────

/** Split on commas, spaces and newlines; drop blanks. */
function splitPatterns(value: string | null, separator: RegExp = /[,\n ]/): string[] {
  if (value === null) return [];
  return value
    .split(separator)
    .map((p) => p.trim())
    .filter((p) => p !== '');
}

/**
 * Include/exclude evaluation shared by the hostname-like specifications.
 * `includes === null` means "include everything".
 */
function includeExclude(
  includes: string | null,
  excludes: string | null,
  matches: (pattern: string) => boolean,
  separator?: RegExp,
): SpecificationResult {
  if (includes !== null && !splitPatterns(includes, separator).some(matches)) {
    return 'negative';
  }
  if (excludes !== null && splitPatterns(excludes, separator).some(matches)) {
    return 'negative';
  }
  return 'partial';
}

function nullIfBlank(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? null : trimmed;
}

// ─── Hostname ───────────────────────────────────────────────────

/** Wildcard host includes/excludes, case-insensitive. */
export function hostnameSpecification(
  includes: string | null,
  excludes: string | null = null,
): DomainSpecification {
  const inc = nullIfBlank(includes);
  const exc = nullIfBlank(excludes);
  return {
    type: 'hostname',
    test(requirement: DomainRequirement): SpecificationResult {
      if (!isHostnameRequirement(requirement)) return 'unknown';
      const { hostname } = requirement;
      return includeExclude(inc, exc, (pattern) => wildcardMatch(hostname, pattern));
    },
    toData: () => ({ type: 'hostname', includes: inc, excludes: exc }),
  };
}

// ─── Hostname + Port ────────────────────────────────────────────

/**
 * `host:port` wildcard patterns; a bare `host` means any port. Hostname-only
 * requirements are checked against the host part of each pattern.
 */
export function hostnamePortSpecification(
  includes: string | null,
  excludes: string | null = null,
): DomainSpecification {
  const inc = nullIfBlank(includes);
  const exc = nullIfBlank(excludes);
  return {
    type: 'hostname-port',
    test(requirement: DomainRequirement): SpecificationResult {
      if (isHostnamePortRequirement(requirement)) {
        const hostPort = `${requirement.hostname}:${requirement.port.toString()}`;
        return includeExclude(inc, exc, (pattern) =>
          wildcardMatch(hostPort, pattern.includes(':') ? pattern : `${pattern}:*`),
        );
      }
      if (isHostnameRequirement(requirement)) {
        const { hostname } = requirement;
        return includeExclude(inc, exc, (pattern) => {
          const colon = pattern.indexOf(':');
          return wildcardMatch(hostname, colon === -1 ? pattern : pattern.slice(0, colon));
        });
      }
      return 'unknown';
    },
    toData: () => ({ type: 'hostname-port', includes: inc, excludes: exc }),
  };
}

// ─── Scheme ─────────────────────────────────────────────────────

/** Schemes compare lower-cased and without the trailing `:`. */
function wellFormedScheme(scheme: string): string {
  const lower = scheme.trim().toLowerCase();
  const colon = lower.indexOf(':');
  return colon === -1 ? lower : lower.slice(0, colon);
}

export function schemeSpecification(schemes: string): DomainSpecification {
  const set = new Set(splitPatterns(schemes).map(wellFormedScheme));
  return {
    type: 'scheme',
    test(requirement: DomainRequirement): SpecificationResult {
      if (!isSchemeRequirement(requirement)) return 'unknown';
      return set.has(wellFormedScheme(requirement.scheme)) ? 'positive' : 'negative';
    },
    toData: () => ({ type: 'scheme', schemes: [...set].join(', ') }),
  };
}

// ─── Path ───────────────────────────────────────────────────────

/** Comma-separated Ant patterns; literal entries must equal the path. */
export function pathSpecification(
  includes: string | null,
  excludes: string | null = null,
  caseSensitive = false,
): DomainSpecification {
  const inc = nullIfBlank(includes);
  const exc = nullIfBlank(excludes);
  const fold = (value: string): string => (caseSensitive ? value : value.toLowerCase());
  return {
    type: 'path',
    test(requirement: DomainRequirement): SpecificationResult {
      if (!isPathRequirement(requirement)) return 'unknown';
      const path = fold(requirement.path);
      return includeExclude(
        inc,
        exc,
        (raw) => {
          const pattern = fold(raw);
          return isAntPattern(pattern) ? antPathMatch(pattern, path) : pattern === path;
        },
        /,/,
      );
    },
    toData: () => ({ type: 'path', includes: inc, excludes: exc, caseSensitive }),
  };
}

// ─── OAuth Scopes ───────────────────────────────────────────────

/** Every requested scope must be among the specified ones. */
export function oauthScopeSpecification(specifiedScopes: readonly string[]): DomainSpecification {
  const scopes = new Set(specifiedScopes);
  return {
    type: 'oauth-scope',
    test(requirement: DomainRequirement): SpecificationResult {
      if (!isOAuthScopeRequirement(requirement)) return 'unknown';
      return requirement.scopes.every((s) => scopes.has(s)) ? 'positive' : 'negative';
    },
    toData: () => ({ type: 'oauth-scope', scopes: [...scopes] }),
  };
}

// ─── Opaque ─────────────────────────────────────────────────────

/** A specification of a type this process cannot evaluate. */
export function opaqueSpecification(data: SpecificationData): DomainSpecification {
  const copy: SpecificationData = { ...data };
  return {
    type: copy.type,
    test: () => 'unknown',
    toData: () => ({ ...copy }),
  };
}

// ─── Data Table ─────────────────────────────────────────────────

const optionalText = z.string().nullable().optional();

const HostnameDataSchema = z.object({
  type: z.literal('hostname'),
  includes: optionalText,
  excludes: optionalText,
});

const HostnamePortDataSchema = z.object({
  type: z.literal('hostname-port'),
  includes: optionalText,
  excludes: optionalText,
});

const SchemeDataSchema = z.object({
  type: z.literal('scheme'),
  schemes: z.string(),
});

const PathDataSchema = z.object({
  type: z.literal('path'),
  includes: optionalText,
  excludes: optionalText,
  caseSensitive: z.boolean().optional(),
});

const OAuthScopeDataSchema = z.object({
  type: z.literal('oauth-scope'),
  scopes: z.array(z.string()),
});

export const SpecificationDataSchema = z
  .object({ type: z.string().min(1) })
  .passthrough();

type Evaluator = (data: SpecificationData) => Result<DomainSpecification, ValidationError>;

function fromSchema<T>(
  schema: z.ZodType<T>,
  build: (parsed: T) => DomainSpecification,
): Evaluator {
  return (data) => {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      return err(
        new ValidationError(`Invalid "${data.type}" specification`, {
          issues: parsed.error.issues,
        }),
      );
    }
    return ok(build(parsed.data));
  };
}

const EVALUATORS: ReadonlyMap<string, Evaluator> = new Map<string, Evaluator>([
  [
    'hostname',
    fromSchema(HostnameDataSchema, (d) =>
      hostnameSpecification(d.includes ?? null, d.excludes ?? null),
    ),
  ],
  [
    'hostname-port',
    fromSchema(HostnamePortDataSchema, (d) =>
      hostnamePortSpecification(d.includes ?? null, d.excludes ?? null),
    ),
  ],
  ['scheme', fromSchema(SchemeDataSchema, (d) => schemeSpecification(d.schemes))],
  [
    'path',
    fromSchema(PathDataSchema, (d) =>
      pathSpecification(d.includes ?? null, d.excludes ?? null, d.caseSensitive ?? false),
    ),
  ],
  ['oauth-scope', fromSchema(OAuthScopeDataSchema, (d) => oauthScopeSpecification(d.scopes))],
]);

/**
 * Build a specification from its data. Unknown types become opaque
 * specifications; known types with malformed fields are rejected.
 */
export function parseSpecification(
  data: SpecificationData,
): Result<DomainSpecification, ValidationError> {
  const evaluator = EVALUATORS.get(data.type);
  return evaluator ? evaluator(data) : ok(opaqueSpecification(data));
}
