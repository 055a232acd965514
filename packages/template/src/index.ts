/**
 * Route template compiler
 *
 * Supports:
 * - Literal paths: "/users"
 * - Required parameters: "/users/{id}"
 * - Optional parameters: "/posts/{slug?}" (the slash is optional with the value)
 * - Literal reserved characters: "\{", "\}", "\?"
 * - Aliases: named sub-patterns that replace the default parameter matcher
 *
 * Templates compile to an anchored RegExp plus the parameter names in
 * capture order, so no named-group support is needed from the engine.
 */

import {getLogger} from "@logtape/logtape";
import {TemplateError} from "./errors.js";

export {
	AliasError,
	RoutingError,
	TemplateError,
	isRoutingError,
	type RoutingErrorOptions,
	type TemplateErrorOptions,
} from "./errors.js";

const logger = getLogger(["pathwork", "template"]);

/** Valid parameter (and alias) names */
export const PARAM_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Matcher used for parameters without an alias */
export const DEFAULT_PARAM_PATTERN = "[^\\/]+";

/** Alias name -> raw sub-pattern */
export type AliasTable = ReadonlyMap<string, string>;

// Characters with a meaning in RegExp syntax, plus the path separator
const REGEXP_SPECIAL = /[.*+?^${}()|[\]\\/]/g;

// Tokens of an escaped template. Every backslash starts a two character
// token, so the alternatives below never start in the middle of one:
// 1. "\\" "\{" - the template escaped a reserved character
// 2. "\{" name "\?"? "\}" - a parameter
// 3. any other escaped character, kept as is
const ESCAPED_TOKEN = /\\\\\\([{}?])|\\\{([A-Za-z0-9_-]+)(\\\?)?\\\}|\\[^]/g;

const OPTIONAL_PARAM = /(\\\/)?\{([A-Za-z0-9_-]+)\?\}/g;

const PARAM = /\{([A-Za-z0-9_-]+)\}/g;

/**
 * Canonicalize a path: surrounding whitespace trimmed, a single leading
 * slash, no trailing slash. Empty input becomes "/".
 */
export function normalizePath(path: string | null | undefined): string {
	const trimmed = path?.trim();
	if (!trimmed) {
		return "/";
	}

	let start = 0;
	let end = trimmed.length;
	while (start < end && trimmed[start] === "/") start++;
	while (end > start && trimmed[end - 1] === "/") end--;
	return "/" + trimmed.slice(start, end);
}

/**
 * Escape every RegExp metacharacter in literal text
 */
export function escapeRegExp(text: string): string {
	return text.replace(REGEXP_SPECIAL, "\\$&");
}

/**
 * An executable matcher for one route template
 */
export class CompiledPattern {
	/** Template as written by the caller */
	readonly template: string;
	/** Template after path normalization */
	readonly pathname: string;
	/** Anchored matcher over normalized paths */
	readonly regex: RegExp;
	/** Parameter names, one per capture group, in capture order */
	readonly paramNames: readonly string[];

	constructor(
		template: string,
		pathname: string,
		regex: RegExp,
		paramNames: readonly string[],
	) {
		this.template = template;
		this.pathname = pathname;
		this.regex = regex;
		this.paramNames = paramNames;
	}

	/**
	 * Test whether a path matches, after normalizing it
	 */
	test(path: string): boolean {
		return this.regex.test(normalizePath(path));
	}

	/**
	 * Match a path and extract its parameters
	 * Returns null if the path does not match
	 */
	exec(path: string): Record<string, string> | null {
		const match = this.regex.exec(normalizePath(path));
		if (!match) {
			return null;
		}

		const params: Record<string, string> = {};
		for (let i = 0; i < this.paramNames.length; i++) {
			// Captures inside an unmatched optional group are undefined
			const value = match[i + 1];
			if (value !== undefined) {
				params[this.paramNames[i]] = value;
			}
		}
		return params;
	}
}

/**
 * Compile a route template against the aliases defined so far
 *
 * @throws TemplateError when the template does not form a valid matcher
 */
export function compileTemplate(
	template: string,
	aliases: AliasTable = new Map(),
): CompiledPattern {
	const pathname = normalizePath(template);

	// Everything is literal text to begin with
	let source = escapeRegExp(pathname);

	// Bring parameter syntax back, keep escaped reserved characters literal
	source = source.replace(
		ESCAPED_TOKEN,
		(token, literal?: string, name?: string, optional?: string) => {
			if (literal !== undefined) return "\\" + literal;
			if (name !== undefined) return optional ? `{${name}?}` : `{${name}}`;
			return token;
		},
	);

	// "/{name?}" becomes an optional group holding both slash and parameter.
	// The leading slash of the path itself stays required, so "/{page?}"
	// still matches "/".
	source = source.replace(
		OPTIONAL_PARAM,
		(_, slash: string | undefined, name: string, offset: number) =>
			slash && offset > 0 ? `(?:${slash}{${name}})?` : `${slash ?? ""}(?:{${name}})?`,
	);

	// Capture order is fixed here, before substitution adds any groups
	const paramNames: string[] = [];
	for (const match of source.matchAll(PARAM)) {
		const name = match[1];
		if (paramNames.includes(name)) {
			throw new TemplateError(template, `duplicate parameter name '${name}'`);
		}
		paramNames.push(name);
	}

	// Aliased parameters take the alias pattern, the rest the default.
	// One pass, so alias text (e.g. a "{4}" quantifier) is never rescanned.
	source = source.replace(PARAM, (_, name: string) => {
		const alias = aliases.get(name);
		return `(${alias ?? DEFAULT_PARAM_PATTERN})`;
	});

	source = `^${source}$`;

	let regex: RegExp;
	try {
		regex = new RegExp(source);
	} catch (error) {
		throw new TemplateError(template, "not a valid regular expression", {
			cause: error,
			source,
		});
	}

	const captures = countCaptures(source);
	if (captures !== paramNames.length) {
		throw new TemplateError(
			template,
			`expected ${paramNames.length} capture group(s) but found ${captures}; ` +
				"use (?:...) for grouping inside alias patterns",
			{source},
		);
	}

	logger.debug`Compiled ${template} to ${source} with parameters ${paramNames}`;
	return new CompiledPattern(template, pathname, regex, paramNames);
}

/**
 * Count the capture groups of a valid RegExp source
 */
function countCaptures(source: string): number {
	// The empty alternative always matches, reporting every group
	const match = new RegExp(`|${source}`).exec("");
	return match ? match.length - 1 : 0;
}
