import { ContractViolationError } from '../errors.js';

/**
 * Names of associations to load, possibly nested:
 * `'hobbies'`, `['car', 'hobbies']`, `{ car: ['passenger_people'] }`
 */
export type AssociationRequest = string | readonly AssociationRequest[] | { readonly [name: string]: AssociationRequest };

export type RequestTree = Map<string, RequestTree>;

export function normalizeRequest(request: AssociationRequest, into: RequestTree = new Map()): RequestTree {
  if (typeof request === 'string') {
    if (!into.has(request)) {
      into.set(request, new Map());
    }
    return into;
  }

  if (isRequestList(request)) {
    for (const item of request) {
      normalizeRequest(item, into);
    }
    return into;
  }

  for (const [name, nested] of Object.entries(request)) {
    const subtree = into.get(name) ?? new Map<string, RequestTree>();
    into.set(name, normalizeRequest(nested, subtree));
  }
  return into;
}

function isRequestList(request: AssociationRequest): request is readonly AssociationRequest[] {
  return Array.isArray(request);
}

export function unknownAssociation(type: string, name: string): ContractViolationError {
  return new ContractViolationError(`${type} has no association "${name}"`, { type, association: name });
}
