/**
 * Method pattern matching.
 *
 * Patterns and method names are split into segments on runs of `/` and `.`.
 * `*` consumes exactly one segment, `**` consumes every remaining segment
 * (including none) and may only appear last.
 */

import { PatternConfigError } from './errors.js';

const SEGMENT_DELIMITER = /[/.]+/;

export const SINGLE_WILDCARD = '*';
export const MULTI_WILDCARD = '**';

export function splitSegments(value: string): string[] {
  return value.split(SEGMENT_DELIMITER).filter((segment) => segment.length > 0);
}

/**
 * Throws PatternConfigError when the pattern cannot be used in a capability.
 */
export function validatePattern(pattern: string): void {
  const segments = splitSegments(pattern);
  if (segments.length === 0) {
    throw new PatternConfigError(pattern, 'pattern has no segments');
  }
  const multiIndex = segments.indexOf(MULTI_WILDCARD);
  if (multiIndex !== -1 && multiIndex !== segments.length - 1) {
    throw new PatternConfigError(pattern, `"${MULTI_WILDCARD}" must be the last segment`);
  }
}

export function matchesPattern(pattern: string, candidate: string): boolean {
  const patternSegments = splitSegments(pattern);
  const candidateSegments = splitSegments(candidate);

  for (let i = 0; i < patternSegments.length; i++) {
    const segment = patternSegments[i];
    if (segment === MULTI_WILDCARD) {
      return true;
    }
    if (i >= candidateSegments.length) {
      return false;
    }
    if (segment !== SINGLE_WILDCARD && segment !== candidateSegments[i]) {
      return false;
    }
  }

  return patternSegments.length === candidateSegments.length;
}

/**
 * True when every method matched by `child` is also matched by `parent`.
 * Used to check that a narrowed capability never widens its parent.
 */
export function patternIsSubset(child: string, parent: string): boolean {
  const childSegments = splitSegments(child);
  const parentSegments = splitSegments(parent);

  for (let i = 0; i < parentSegments.length; i++) {
    const parentSegment = parentSegments[i];
    if (parentSegment === MULTI_WILDCARD) {
      return true;
    }
    if (i >= childSegments.length) {
      return false;
    }
    const childSegment = childSegments[i];
    if (childSegment === MULTI_WILDCARD) {
      return false;
    }
    if (parentSegment === SINGLE_WILDCARD) {
      continue;
    }
    if (childSegment === SINGLE_WILDCARD || childSegment !== parentSegment) {
      return false;
    }
  }

  return childSegments.length === parentSegments.length;
}
