import { Matchable } from "./matchable";
import { EMPTY_PARAMS } from "./pattern";
import type { Handler, MatchResult, State } from "./types";

/**
 * Options for a single route.
 */
export interface RouteOptions {
	/** Only run while an error is pending. Default: false */
	error?: boolean;
	/** Only accept when the pattern consumes the whole remaining path. Default: false */
	strict?: boolean;
}

/**
 * Leaf node: a method/path pattern bound to an ordered list of handlers.
 *
 * @template T - The type of the context state object
 *
 * @example
 * ```typescript
 * const route = new Route("GET /users/<id:\\d+>", [(ctx) => `user ${ctx.param("id")}`]);
 * router.addRoute(route);
 * ```
 */
export class Route<T extends State = State> extends Matchable<T> {
	readonly kind = "route";
	/** Error routes run only while the context carries a pending error */
	readonly isErrorRoute: boolean;
	readonly strict: boolean;

	constructor(spec: string, handlers: readonly Handler<T>[], options: RouteOptions = {}) {
		super(spec, handlers);
		this.isErrorRoute = options.error ?? false;
		this.strict = options.strict ?? false;
	}

	override matchPath(path: string): MatchResult {
		const result = super.matchPath(path);
		if (this.strict && result.matched && result.rest !== "") {
			return { matched: false, rest: path, params: EMPTY_PARAMS };
		}
		return result;
	}
}
