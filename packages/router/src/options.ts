/**
 * Router configuration
 *
 * Options may come from code or from a JSON file, so they are validated
 * at construction time:
 *
 *   {
 *     "baseURL": "myapp://host",
 *     "aliases": {"id": "[0-9]+", "year": "[0-9]{4}"}
 *   }
 */

import {z} from "zod";
import {PARAM_NAME_PATTERN, RoutingError} from "@pathwork/template";

/** Base for string URLs that are not absolute */
export const DEFAULT_BASE_URL = "http://localhost";

export const RouterOptionsSchema = z
	.object({
		/** Aliases defined before any route is registered, in key order */
		aliases: z
			.record(
				z
					.string()
					.regex(PARAM_NAME_PATTERN, "Alias names may only contain A-Z, a-z, 0-9, _ and -"),
				z.string(),
			)
			.default({}),
		/** Absolute URL used to resolve relative string input */
		baseURL: z.string().url().default(DEFAULT_BASE_URL),
	})
	.strict();

/** Options accepted by the Router constructor */
export type RouterOptions = z.input<typeof RouterOptionsSchema>;

/** Options with defaults applied */
export type ResolvedRouterOptions = z.output<typeof RouterOptionsSchema>;

/** Router options that fail validation */
export class RouterOptionsError extends RoutingError {
	readonly issues: z.ZodIssue[];

	constructor(error: z.ZodError) {
		const details = error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		super(`Invalid router options: ${details}`, {cause: error});
		this.issues = error.issues;
	}
}

/**
 * Validate router options and apply defaults
 *
 * @throws RouterOptionsError
 */
export function parseRouterOptions(options: unknown = {}): ResolvedRouterOptions {
	const result = RouterOptionsSchema.safeParse(options);
	if (!result.success) {
		throw new RouterOptionsError(result.error);
	}
	return result.data;
}
