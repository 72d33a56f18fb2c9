/**
 * Glob name matching for client-side list filters.
 *
 * Supports `*` (any run of characters, including none) and `?` (exactly one
 * character). Every other character matches itself; there are no character
 * classes or escapes.
 */

export interface NameFilter {
	readonly pattern: string;
	/** Defaults to false */
	readonly caseSensitive?: boolean;
}

const REGEX_SPECIALS = /[.+^${}()|[\]\\/]/g;

/**
 * Compile a glob pattern to an anchored regular expression.
 */
export function globToRegExp(pattern: string, caseSensitive = false): RegExp {
	let source = '';
	for (const char of pattern) {
		if (char === '*') {
			source += '.*';
		} else if (char === '?') {
			source += '.';
		} else {
			source += char.replace(REGEX_SPECIALS, '\\$&');
		}
	}
	return new RegExp(`^${source}$`, caseSensitive ? 'su' : 'isu');
}

export function matchesGlob(value: string, filter: NameFilter): boolean {
	return globToRegExp(filter.pattern, filter.caseSensitive ?? false).test(value);
}

/**
 * Keep the items whose selected field matches the filter, preserving order.
 * Without a filter every item is kept.
 */
export function filterByName<T>(items: readonly T[], select: (item: T) => string, filter?: NameFilter): T[] {
	if (!filter) {
		return [...items];
	}
	const regex = globToRegExp(filter.pattern, filter.caseSensitive ?? false);
	return items.filter((item) => regex.test(select(item)));
}
