import type { NameRule } from '../types';

export const identity: NameRule = (name) => name;

/**
 * snake_case → camelCase. Leading underscores are kept and names that are
 * already camelCase come back unchanged.
 */
export const camelCase: NameRule = (name) => {
	const lead = /^_*/.exec(name)?.[0] ?? '';
	const parts = name.slice(lead.length).split('_').filter((p) => p.length > 0);
	if (parts.length === 0) return name;
	const [head = '', ...rest] = parts;
	return lead + head + rest.map((p) => p.charAt(0).toUpperCase() + p.slice(1)).join('');
};
