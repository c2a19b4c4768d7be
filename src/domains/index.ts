// Domains — requirement matching
export type {
  Domain,
  DomainData,
  DomainRequirement,
  DomainSpecification,
  HostnamePortRequirement,
  HostnameRequirement,
  OAuthScopeRequirement,
  PathRequirement,
  SchemeRequirement,
  SpecificationData,
  SpecificationResult,
} from './types.js';
export {
  GLOBAL_DOMAIN,
  createDomain,
  domainFromData,
  domainToData,
  isGlobalDomain,
  matchesDomain,
  sameDomain,
} from './domain.js';
export {
  buildUriRequirements,
  hostnamePortRequirement,
  hostnameRequirement,
  oauthScopeRequirement,
  pathRequirement,
  schemeRequirement,
} from './requirements.js';
export {
  SpecificationDataSchema,
  hostnamePortSpecification,
  hostnameSpecification,
  oauthScopeSpecification,
  opaqueSpecification,
  parseSpecification,
  pathSpecification,
  schemeSpecification,
} from './specifications.js';
