import { HandlerError } from "./errors";
import { EMPTY_PARAMS, parseRouteSpec, PathPattern } from "./pattern";
import type { Handler, MatchResult, State } from "./types";

/**
 * Throws if any entry of a handler list cannot be called.
 * @internal
 */
export function validateHandlers<T extends State>(handlers: readonly Handler<T>[]): void {
	for (const [index, handler] of handlers.entries()) {
		if (typeof handler !== "function") {
			throw new HandlerError(`Handler at position ${index} must be a function, got ${handler === null ? "null" : typeof handler}`);
		}
	}
}

/**
 * Matching contract shared by routers and routes: an optional method set and a
 * path pattern compiled from a route specification, plus the node's own handlers.
 *
 * @template T - The type of the context state object
 */
export abstract class Matchable<T extends State = State> {
	/** Discriminates the two node kinds the dispatch engine walks */
	abstract readonly kind: "router" | "route";
	/** Accepted methods; empty means any */
	readonly methods: ReadonlySet<string>;
	/** Compiled path pattern */
	readonly pattern: PathPattern;
	/** Handlers owned by this node, in registration order */
	readonly handlers: readonly Handler<T>[];

	/**
	 * @param spec - Route specification, e.g. `"GET,POST /users/<id:\\d+>"`
	 * @param handlers - Handlers owned by this node
	 * @throws {PatternError} If the specification cannot be compiled
	 * @throws {HandlerError} If a handler is not a function
	 */
	constructor(spec: string, handlers: readonly Handler<T>[]) {
		const { methods, pattern } = parseRouteSpec(spec);
		validateHandlers(handlers);
		this.methods = methods;
		this.pattern = PathPattern.compile(pattern);
		this.handlers = [...handlers];
	}

	/**
	 * Checks the method, then the path. A method outside a non-empty method set
	 * rejects without looking at the path.
	 */
	match(method: string, path: string): MatchResult {
		if (this.methods.size > 0 && !this.methods.has(method)) {
			return { matched: false, rest: path, params: EMPTY_PARAMS };
		}
		return this.matchPath(path);
	}

	/**
	 * Matches the start of `path` against the pattern and returns the unconsumed rest.
	 */
	matchPath(path: string): MatchResult {
		return this.pattern.match(path);
	}
}
