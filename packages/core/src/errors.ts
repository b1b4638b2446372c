/** Error codes carried by {@link RoutingError}. */
export const RoutingErrorCode = {
	InvalidPattern: "INVALID_PATTERN",
	InvalidHandler: "INVALID_HANDLER",
	ContinuationReused: "CONTINUATION_REUSED",
} as const;

/** Union of all possible values from {@link RoutingErrorCode}. */
export type RoutingErrorCode = (typeof RoutingErrorCode)[keyof typeof RoutingErrorCode];

/** Base class for errors raised by the router itself. */
export class RoutingError extends Error {
	readonly code: RoutingErrorCode;

	constructor(code: RoutingErrorCode, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "RoutingError";
		this.code = code;
	}
}

/** A route specification that cannot be compiled. Raised at registration. */
export class PatternError extends RoutingError {
	readonly spec: string;

	constructor(spec: string, reason: string, options?: ErrorOptions) {
		super(RoutingErrorCode.InvalidPattern, `Invalid route pattern "${spec}": ${reason}`, options);
		this.name = "PatternError";
		this.spec = spec;
	}
}

/** A handler list containing something that cannot be called. Raised at registration. */
export class HandlerError extends RoutingError {
	constructor(message: string) {
		super(RoutingErrorCode.InvalidHandler, message);
		this.name = "HandlerError";
	}
}

/** `next()` or `nextRoute()` called more than once by the same handler invocation. */
export class ContinuationError extends RoutingError {
	constructor() {
		super(RoutingErrorCode.ContinuationReused, "next() or nextRoute() called multiple times");
		this.name = "ContinuationError";
	}
}

/**
 * Error carrying the HTTP status the Node adapter and error responders answer with.
 *
 * @example
 * ```typescript
 * router.get("/users/<id>", (ctx) => {
 *   throw new HttpError(404, `No user ${ctx.param("id")}`);
 * });
 * ```
 */
export class HttpError extends Error {
	readonly status: number;

	constructor(status: number, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "HttpError";
		this.status = status;
	}
}

/**
 * Normalizes a thrown value into an `Error`. Non-errors are wrapped and kept as `cause`.
 */
export function toError(value: unknown): Error {
	if (value instanceof Error) return value;
	return new Error(typeof value === "string" ? value : `Non-error value thrown: ${String(value)}`, { cause: value });
}

/**
 * HTTP status for an error: the status of an {@link HttpError} in the 4xx/5xx range, otherwise 500.
 */
export function statusOf(error: Error): number {
	if (error instanceof HttpError && error.status >= 400 && error.status <= 599) {
		return error.status;
	}
	return 500;
}
