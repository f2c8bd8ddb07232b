import { AuthorizationContext, Role, SearchPredicate } from '../types';
import { InputError, UnknownRoleError } from '../utils/errors';

const KNOWN_ROLES: ReadonlySet<string> = new Set(Object.values(Role));

function isRole(value: string): value is Role {
  return KNOWN_ROLES.has(value);
}

/**
 * Maps a role string issued by the identity service onto the closed Role set.
 * Only the exact issued strings match; anything else fails closed.
 */
export function parseRole(value: string | undefined): Role {
  const role = value ?? '';
  if (!isRole(role)) {
    throw new UnknownRoleError(role);
  }
  return role;
}

function predicateFor(role: Role, subjectId: string): SearchPredicate {
  switch (role) {
    case Role.Standard:
      return { kind: 'owner', ownerId: subjectId };
    case Role.Privileged:
      return { kind: 'all' };
    default: {
      const unreachable: never = role;
      throw new UnknownRoleError(String(unreachable));
    }
  }
}

/**
 * Builds the per-request authorization context. Pure: no I/O, no caching.
 * The returned object is frozen and must be discarded after the request.
 */
export function resolveAuthorizationContext(role: Role, subjectId: string): AuthorizationContext {
  const subject = subjectId.trim();
  if (subject.length === 0) {
    throw new InputError('Authorization context requires a subject id');
  }

  return Object.freeze({
    role,
    subjectId: subject,
    predicate: Object.freeze(predicateFor(role, subject))
  });
}
