/**
 * Requirement constructors, guards and the URI requirement builder.
 */
import type {
  DomainRequirement,
  HostnamePortRequirement,
  HostnameRequirement,
  OAuthScopeRequirement,
  PathRequirement,
  SchemeRequirement,
} from './types.js';

// ─── Constructors ───────────────────────────────────────────────

export function schemeRequirement(scheme: string): SchemeRequirement {
  return { kind: 'scheme', scheme };
}

export function hostnameRequirement(hostname: string): HostnameRequirement {
  return { kind: 'hostname', hostname };
}

export function hostnamePortRequirement(hostname: string, port: number): HostnamePortRequirement {
  return { kind: 'hostname-port', hostname, port };
}

export function pathRequirement(path: string): PathRequirement {
  return { kind: 'path', path };
}

export function oauthScopeRequirement(scopes: readonly string[]): OAuthScopeRequirement {
  return { kind: 'oauth-scope', scopes: [...scopes] };
}

// ─── Guards ─────────────────────────────────────────────────────

export function isSchemeRequirement(req: DomainRequirement): req is SchemeRequirement {
  return req.kind === 'scheme' && 'scheme' in req && typeof req.scheme === 'string';
}

/** True for hostname and hostname-port requirements alike. */
export function isHostnameRequirement(req: DomainRequirement): req is HostnameRequirement {
  return (
    (req.kind === 'hostname' || req.kind === 'hostname-port') &&
    'hostname' in req &&
    typeof req.hostname === 'string'
  );
}

export function isHostnamePortRequirement(req: DomainRequirement): req is HostnamePortRequirement {
  return (
    isHostnameRequirement(req) &&
    req.kind === 'hostname-port' &&
    'port' in req &&
    typeof req.port === 'number'
  );
}

export function isPathRequirement(req: DomainRequirement): req is PathRequirement {
  return req.kind === 'path' && 'path' in req && typeof req.path === 'string';
}

export function isOAuthScopeRequirement(req: DomainRequirement): req is OAuthScopeRequirement {
  return req.kind === 'oauth-scope' && 'scopes' in req && Array.isArray(req.scopes);
}

// ─── URI Builder ────────────────────────────────────────────────

/**
 * Derive requirements from a URI: scheme, hostname, hostname-port when the
 * port is explicit, and the raw path. An unparsable URI yields none.
 */
export function buildUriRequirements(uri: string): DomainRequirement[] {
  let parsed: URL;
  try {
    parsed = new URL(uri.trim());
  } catch {
    return [];
  }

  const requirements: DomainRequirement[] = [
    schemeRequirement(parsed.protocol.replace(/:$/, '')),
  ];

  // URL keeps IPv6 literals bracketed.
  const hostname = parsed.hostname.replace(/^\[(.*)\]$/, '$1');
  if (hostname !== '') {
    requirements.push(hostnameRequirement(hostname));
    if (parsed.port !== '') {
      requirements.push(hostnamePortRequirement(hostname, Number(parsed.port)));
    }
  }

  if (parsed.pathname !== '') {
    requirements.push(pathRequirement(parsed.pathname));
  }
  return requirements;
}
