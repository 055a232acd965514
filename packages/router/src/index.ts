/** @pathwork/router - First-match URL router over compiled path templates */

import {
	AliasError,
	PARAM_NAME_PATTERN,
	compileTemplate,
	normalizePath,
	type CompiledPattern,
} from "@pathwork/template";
import {getLogger} from "@logtape/logtape";
import {parseRouterOptions, type RouterOptions} from "./options.js";

export {
	DEFAULT_BASE_URL,
	RouterOptionsError,
	RouterOptionsSchema,
	parseRouterOptions,
	type ResolvedRouterOptions,
	type RouterOptions,
} from "./options.js";

const logger = getLogger(["pathwork", "router"]);

// ============================================================================
// TYPES
// ============================================================================

/**
 * Outcome of dispatching a URL
 */
export type RouteResult = "succeeded" | "failed";

/**
 * Handler bound to one or more templates
 * Returning nothing counts as success
 */
export type RouteHandler = (
	url: URL,
	route: Route,
	params: Record<string, string>,
) => RouteResult | void;

/**
 * Result of matching a URL against registered routes
 */
export interface RouteMatch {
	/** Route whose template matched */
	route: Route;
	/** Parameters extracted from the percent-decoded path */
	params: Record<string, string>;
	/** URL that was routed */
	url: URL;
}

/**
 * Routing table entry
 */
export interface RouteEntry {
	readonly pattern: CompiledPattern;
	readonly route: Route;
}

// ============================================================================
// IMPLEMENTATION
// ============================================================================

/**
 * Identity of a registered template. Every template passed to
 * Router.register gets its own Route; they share the handler.
 */
export class Route {
	readonly router: Router;
	readonly template: string;
	readonly handler: RouteHandler;

	constructor(router: Router, template: string, handler: RouteHandler) {
		this.router = router;
		this.template = template;
		this.handler = handler;
	}
}

/**
 * Router resolves URLs to the first registered template that matches
 *
 * Example:
 *   const router = new Router();
 *   router.addAlias("id", "[0-9]+");
 *   router.register("/users/{id}", (url, route, params) => {
 *     showUser(params.id);
 *   });
 *   router.dispatch("/users/42"); // "succeeded"
 */
export class Router {
	#routes: RouteEntry[];
	#aliases: Map<string, string>;
	#baseURL: string;

	constructor(options?: RouterOptions) {
		const {aliases, baseURL} = parseRouterOptions(options);
		this.#routes = [];
		this.#aliases = new Map(Object.entries(aliases));
		this.#baseURL = baseURL;
	}

	/**
	 * Registered routes in match order
	 */
	get routes(): readonly RouteEntry[] {
		return this.#routes;
	}

	/**
	 * Aliases that templates registered from now on will use
	 */
	get aliases(): ReadonlyMap<string, string> {
		return this.#aliases;
	}

	/**
	 * Define or replace a parameter alias
	 * Only routes registered afterwards see the new pattern
	 */
	addAlias(name: string, pattern: string): this {
		if (!PARAM_NAME_PATTERN.test(name)) {
			throw new AliasError(
				name,
				"alias names may only contain A-Z, a-z, 0-9, _ and -",
			);
		}

		const previous = this.#aliases.get(name);
		if (previous !== undefined && previous !== pattern && this.#routes.length) {
			logger.warn`Alias ${name} redefined after routes were registered; existing routes keep ${previous}`;
		}

		this.#aliases.set(name, pattern);
		logger.debug`Alias ${name} defined as ${pattern}`;
		return this;
	}

	/**
	 * Register one or more templates for a handler
	 * Templates compile immediately; none is added unless all compile.
	 * Returns the route of the first template.
	 *
	 * @throws RangeError when no template is given
	 * @throws TemplateError when a template cannot be compiled
	 */
	register(templates: string | readonly string[], handler: RouteHandler): Route {
		const list = typeof templates === "string" ? [templates] : templates;
		if (list.length === 0) {
			throw new RangeError("Route templates must contain at least one template");
		}

		const entries = list.map((template) => ({
			pattern: compileTemplate(template, this.#aliases),
			route: new Route(this, template, handler),
		}));

		for (const entry of entries) {
			this.#routes.push(entry);
			logger.debug`Registered route ${entry.pattern.pathname}`;
		}

		return entries[0].route;
	}

	/**
	 * Match a URL against registered routes in registration order
	 * Returns null if no route matches, the string is not a URL, or the
	 * path holds a malformed percent escape
	 */
	resolve(url: string | URL): RouteMatch | null {
		const target = typeof url === "string" ? this.#parseURL(url) : url;
		if (!target) {
			return null;
		}

		const pathname = this.#decodePathname(target.pathname);
		if (pathname === null) {
			return null;
		}

		const path = normalizePath(pathname);
		for (const {pattern, route} of this.#routes) {
			const params = pattern.exec(path);
			if (params) {
				return {route, params, url: target};
			}
		}

		logger.debug`No route matches ${path}`;
		return null;
	}

	/**
	 * Resolve a URL and call the matched route's handler
	 * Errors thrown by the handler propagate to the caller.
	 */
	dispatch(url: string | URL): RouteResult {
		const match = this.resolve(url);
		if (!match) {
			return "failed";
		}

		const result = match.route.handler(match.url, match.route, match.params);
		return typeof result === "string" ? result : "succeeded";
	}

	/**
	 * Parse a string URL relative to the base URL
	 */
	#parseURL(url: string): URL | null {
		try {
			return new URL(url, this.#baseURL);
		} catch (error) {
			logger.debug`Cannot route ${url}: ${error}`;
			return null;
		}
	}

	/**
	 * Undo the percent-encoding the URL parser applied to the path
	 */
	#decodePathname(pathname: string): string | null {
		try {
			return decodeURIComponent(pathname);
		} catch (error) {
			logger.debug`Cannot decode ${pathname}: ${error}`;
			return null;
		}
	}
}
