/**
 * Configuration errors raised while defining aliases and compiling route
 * templates. They always point at a bug in caller-supplied input, so they
 * are thrown synchronously and never deferred to resolution time.
 */

const ROUTING_ERROR = Symbol.for("pathwork.routing-error");

/** Options for creating routing errors */
export interface RoutingErrorOptions {
	/** Original error that caused this routing error */
	cause?: unknown;
}

/** Base class of every error thrown by pathwork */
export class RoutingError extends Error {
	constructor(message: string, options: RoutingErrorOptions = {}) {
		super(message, {cause: options.cause});
		this.name = this.constructor.name;
	}

	/**
	 * Convert error to a plain object for serialization
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
		};
	}
}

Object.defineProperty(RoutingError.prototype, ROUTING_ERROR, {value: true});

/**
 * Check if a value is a routing error, including ones created by another
 * copy of this package
 */
export function isRoutingError(value: unknown): value is RoutingError {
	return typeof value === "object" && value !== null && ROUTING_ERROR in value;
}

export interface TemplateErrorOptions extends RoutingErrorOptions {
	/** Regular expression source the template compiled to, when one was built */
	source?: string;
}

/** A route template that cannot be compiled into a matcher */
export class TemplateError extends RoutingError {
	readonly template: string;
	readonly source?: string;

	constructor(
		template: string,
		reason: string,
		options: TemplateErrorOptions = {},
	) {
		super(`Invalid route template ${JSON.stringify(template)}: ${reason}`, options);
		this.template = template;
		this.source = options.source;
	}

	toJSON(): Record<string, unknown> {
		return {...super.toJSON(), template: this.template, source: this.source};
	}
}

/** An alias definition the router refuses */
export class AliasError extends RoutingError {
	readonly alias: string;

	constructor(alias: string, reason: string, options?: RoutingErrorOptions) {
		super(`Invalid alias ${JSON.stringify(alias)}: ${reason}`, options);
		this.alias = alias;
	}

	toJSON(): Record<string, unknown> {
		return {...super.toJSON(), alias: this.alias};
	}
}
