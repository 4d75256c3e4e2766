import type { GroupCharsPolicy } from '../types/config.types.js';

// Leading digit or non-word character, or any non-word character.
const INVALID_GROUP_CHARS = /^[\d\W]|[^\w]/g;

export function hasInvalidGroupChars(name: string): boolean {
  return new RegExp(INVALID_GROUP_CHARS.source).test(name);
}

/**
 * Replace the characters that are not valid in a variable-style group name
 * with `_` when the policy is `always`; with `never` the name is returned
 * as is.
 */
export function toSafeGroupName(name: string, policy: GroupCharsPolicy = 'never'): string {
  if (policy === 'always') {
    return name.replace(INVALID_GROUP_CHARS, '_');
  }
  return name;
}
