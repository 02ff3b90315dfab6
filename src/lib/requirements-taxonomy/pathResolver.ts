/**
 * Requirements Taxonomy - Path Resolver
 *
 * Resolves dotted field paths such as `requirement.story.asA` against a
 * requirement record. Traversal stops at the first non-mapping value.
 */

import { ABSENT, isMapping } from './semanticValue';
import type { Resolved, SemanticMapping } from './semanticValue';

const ROOT_SEGMENT = 'requirement';
const ROOT_PREFIX = `${ROOT_SEGMENT}.`;

/**
 * Resolve a dotted path relative to the record root.
 *
 * Returns ABSENT when the path is empty, not a string, or leads through a
 * missing key or a non-mapping value. An explicit `null` stored at the path is
 * returned as `null`.
 */
export function resolvePath(record: SemanticMapping, path: unknown): Resolved {
  if (typeof path !== 'string') return ABSENT;

  let dotted = path.trim();
  if (dotted.length === 0) return ABSENT;

  if (dotted === ROOT_SEGMENT) return record;
  if (dotted.startsWith(ROOT_PREFIX)) {
    dotted = dotted.slice(ROOT_PREFIX.length);
  }

  let current: Resolved = record;
  for (const key of dotted.split('.')) {
    if (!isMapping(current)) return ABSENT;
    if (!Object.prototype.hasOwnProperty.call(current, key)) return ABSENT;
    current = current[key];
  }
  return current;
}
