import { createServer } from "node:http";
import type { AddressInfo } from "node:net";
import { Levels } from "@rabbit-company/logger";
import { createContext } from "./context";
import { Dispatcher } from "./dispatch";
import { HandlerError, statusOf, toError } from "./errors";
import { Matchable } from "./matchable";
import { NodeSink, requestPath } from "./node";
import { writeOutput } from "./output";
import { Route } from "./route";
import type {
	Context,
	DispatchInit,
	Handler,
	Invoker,
	ListenOptions,
	LogWriter,
	NodeHandlerOptions,
	NodeRequest,
	NodeResponse,
	RouterOptions,
	Server,
	State,
} from "./types";

/** Default invoker: calls the handler with the context */
const callHandler = <T extends State>(ctx: Context<T>, handler: Handler<T>) => handler(ctx);

/**
 * Router options after defaults are applied.
 * @internal
 */
interface ResolvedOptions<T extends State> {
	invoke: Invoker<T>;
	logger?: LogWriter;
	strict: boolean;
}

/**
 * Composite node of the routing tree: a path prefix with its own handlers and an
 * ordered list of child routers and routes.
 *
 * Features:
 * - Route specifications with method lists and `<name:regex>` parameters
 * - Nested groups that consume their prefix and hand the rest to their children
 * - Middleware through `use()` and centralized failure handling through `error()`
 * - `next()` / `nextRoute()` control transfer inside handlers
 * - A Node.js `http` adapter and server
 *
 * Registration order is match priority: children are tried in the order they were added.
 *
 * @template T - The type of the context state object that will be shared across handlers
 *
 * @example
 * ```typescript
 * const router = new Router<{ user: string }>();
 *
 * router.use(async (ctx) => {
 *   ctx.set("user", "alice");
 * });
 *
 * router.group("/admin", (admin) => {
 *   admin.get("/users/<id:\\d+>", (ctx) => `user ${ctx.param("id")}`);
 * }, requireAdmin);
 *
 * router.error((ctx) => {
 *   const message = ctx.error?.message;
 *   ctx.error = undefined;
 *   return `failed: ${message}`;
 * });
 *
 * await router.listen({ port: 3000 });
 * ```
 */
export class Router<T extends State = State> extends Matchable<T> {
	readonly kind = "router";
	/** Enclosing router; undefined for the root */
	parent?: Router<T>;
	/** Child routers and routes in match-priority order */
	readonly children: Array<Router<T> | Route<T>> = [];
	/** Options shared with every router grouped under this one */
	readonly config: ResolvedOptions<T>;

	/** 404 handler used by the Node adapter */
	private notFoundHandler?: Handler<T>;

	/**
	 * Creates a root router.
	 *
	 * @param options - Invoker, logger and matching options, inherited by groups
	 * @param spec - Route specification this router matches (used for groups)
	 * @param handlers - Handlers that run before any child is tried
	 */
	constructor(options: RouterOptions<T> = {}, spec = "", handlers: readonly Handler<T>[] = []) {
		super(spec, handlers);
		this.config = {
			invoke: options.invoke ?? callHandler,
			logger: options.logger,
			strict: options.strict ?? false,
		};
	}

	/**
	 * Adds a group of routes sharing a common path prefix. The child router is
	 * created, attached and handed to `configure` immediately.
	 *
	 * @param prefix - Route specification of the group, e.g. `"/admin"` or `"GET /v<version:\\d+>"`
	 * @param configure - Registers the group's routes on the child router
	 * @param handlers - Handlers that run for every request entering the group
	 * @returns The child router
	 *
	 * @example
	 * ```typescript
	 * router.group("/admin", (admin) => {
	 *   admin.get("/users", listUsers);
	 *   admin.post("/users", createUser);
	 * }, requireAdmin);
	 * ```
	 */
	group(prefix: string, configure: (router: Router<T>) => void, ...handlers: Handler<T>[]): Router<T> {
		if (typeof configure !== "function") {
			throw new HandlerError(`Group "${prefix}" needs a configuration function`);
		}
		const child = new Router<T>(this.config, prefix, handlers);
		child.parent = this;
		this.children.push(child);
		configure(child);
		return child;
	}

	/**
	 * Creates a route from a specification and adds it to the router.
	 *
	 * The specification is `"GET,POST /users/<id:\\d+>"`: an optional comma-separated
	 * method list and a space, then the path pattern. Without methods the route
	 * matches any method. `<name:regex>` tokens capture parameters; `<name>`
	 * captures one or more characters other than "/".
	 *
	 * @param spec - Route specification
	 * @param handlers - Handlers called in order when the route matches
	 * @returns The created route
	 * @throws {PatternError} If the specification is malformed
	 *
	 * @example
	 * ```typescript
	 * router.to("GET,HEAD /files/<name:[\\w.]+>", (ctx) => readFile(ctx.param("name")));
	 * ```
	 */
	to(spec: string, ...handlers: Handler<T>[]): Route<T> {
		return this.addRoute(new Route<T>(spec, handlers, { strict: this.config.strict }));
	}

	/**
	 * Adds handlers that run for every request reaching this point of the router,
	 * whatever its method and path.
	 *
	 * @example
	 * ```typescript
	 * router.use(async (ctx) => {
	 *   const started = Date.now();
	 *   await ctx.next();
	 *   console.log(`${ctx.method} ${ctx.path} ${Date.now() - started}ms`);
	 * });
	 * ```
	 */
	use(...handlers: Handler<T>[]): Route<T> {
		return this.addRoute(new Route<T>("", handlers));
	}

	/**
	 * Adds error handlers. They run only while the context carries a pending error,
	 * which happens once a handler throws or rejects. Assigning `ctx.error = undefined`
	 * recovers; normal routes registered afterwards become eligible again.
	 *
	 * @example
	 * ```typescript
	 * router.error((ctx) => {
	 *   const error = ctx.error;
	 *   ctx.error = undefined;
	 *   return `Something went wrong: ${error?.message}`;
	 * });
	 * ```
	 */
	error(...handlers: Handler<T>[]): Route<T> {
		return this.addRoute(new Route<T>("", handlers, { error: true }));
	}

	/**
	 * Registers a GET route.
	 *
	 * @example
	 * ```typescript
	 * router.get("/users/<id:\\d+>", (ctx) => findUser(ctx.param("id")));
	 * ```
	 */
	get(path: string, ...handlers: Handler<T>[]): Route<T> {
		return this.to(`GET ${path}`, ...handlers);
	}

	/** Registers a POST route. */
	post(path: string, ...handlers: Handler<T>[]): Route<T> {
		return this.to(`POST ${path}`, ...handlers);
	}

	/** Registers a PUT route. */
	put(path: string, ...handlers: Handler<T>[]): Route<T> {
		return this.to(`PUT ${path}`, ...handlers);
	}

	/** Registers a PATCH route. */
	patch(path: string, ...handlers: Handler<T>[]): Route<T> {
		return this.to(`PATCH ${path}`, ...handlers);
	}

	/** Registers a DELETE route. */
	delete(path: string, ...handlers: Handler<T>[]): Route<T> {
		return this.to(`DELETE ${path}`, ...handlers);
	}

	/** Registers a HEAD route. */
	head(path: string, ...handlers: Handler<T>[]): Route<T> {
		return this.to(`HEAD ${path}`, ...handlers);
	}

	/** Registers an OPTIONS route. */
	options(path: string, ...handlers: Handler<T>[]): Route<T> {
		return this.to(`OPTIONS ${path}`, ...handlers);
	}

	/**
	 * Appends a prebuilt route. The same route is returned for chaining.
	 */
	addRoute(route: Route<T>): Route<T> {
		this.children.push(route);
		return route;
	}

	/**
	 * Sets the handler the Node adapter runs when a request produced no output and no error.
	 * Without one, the adapter answers `404 Not Found`.
	 *
	 * @example
	 * ```typescript
	 * router.onNotFound((ctx) => `Nothing at ${ctx.path}`);
	 * ```
	 */
	onNotFound(handler: Handler<T>): this {
		this.notFoundHandler = handler;
		return this;
	}

	/**
	 * Runs the handlers of every router and route matching `method` and `path`.
	 *
	 * Dispatch ends when no continuation is pending: after a handler answers
	 * without resuming, after the whole tree was walked, or after `abort()`.
	 * A request matching nothing invokes no handler and writes nothing.
	 *
	 * @param method - Request method
	 * @param path - Request path
	 * @param init - Response sink, transport objects, initial state and cancellation signal
	 * @returns The context, with `error` still set if no error handler recovered
	 *
	 * @example
	 * ```typescript
	 * const ctx = await router.dispatch("GET", "/users/42");
	 * if (ctx.error) console.error(ctx.error);
	 * ```
	 */
	async dispatch(method: string, path: string, init: DispatchInit<T> = {}): Promise<Context<T>> {
		const ctx = createContext<T>(method, path, init);
		await new Dispatcher<T>(ctx, this.config).run(this);
		return ctx;
	}

	/**
	 * Request handler for Node.js `http` servers.
	 *
	 * Dispatches the request with the response as output sink, then completes the
	 * response: a pending error becomes its HTTP status (500 unless it is an
	 * `HttpError`), an unanswered request goes to the not-found handler or gets a 404.
	 *
	 * @param req - Node.js IncomingMessage object
	 * @param res - Node.js ServerResponse object
	 *
	 * @example
	 * ```typescript
	 * import { createServer } from "node:http";
	 *
	 * createServer((req, res) => router.handleNode(req, res)).listen(3000);
	 * ```
	 */
	async handleNode(req: NodeRequest, res: NodeResponse, options: NodeHandlerOptions = {}): Promise<void> {
		const method = (req.method ?? "GET").toUpperCase();
		const path = requestPath(req.url ?? "/");
		const sink = new NodeSink(res, { json: options.json });

		const ctx = await this.dispatch(method, path, { response: sink, req, res, signal: options.signal });
		// A handler may also answer by writing to `res` directly
		const unanswered = !sink.written && !res.headersSent && !ctx.aborted;

		if (unanswered && ctx.error === undefined && this.notFoundHandler) {
			await this.runNotFound(ctx, sink);
		}

		if (ctx.error !== undefined) {
			this.respondError(ctx.error, ctx, res, sink.written);
			return;
		}

		if (unanswered && !sink.written && !res.headersSent && res.statusCode === 200) {
			res.statusCode = 404;
			res.setHeader("Content-Type", "text/plain");
			res.end("Not Found");
			return;
		}

		res.end();
	}

	/**
	 * Starts a Node.js HTTP server dispatching every request through this router.
	 * Client disconnects abort the dispatch of their request.
	 *
	 * @returns Promise that resolves to a Server instance once it accepts connections
	 *
	 * @example
	 * ```typescript
	 * const server = await router.listen({
	 *   port: 8080,
	 *   hostname: "0.0.0.0",
	 *   onListen: ({ port, hostname }) => console.log(`listening on http://${hostname}:${port}`)
	 * });
	 *
	 * // Stop accepting connections
	 * await server.stop();
	 * ```
	 */
	async listen(options: ListenOptions = {}): Promise<Server> {
		const { port = 3000, hostname = "localhost", json = false, onListen } = options;
		const logger = this.config.logger;

		const nodeServer = createServer((req, res) => {
			const controller = new AbortController();
			res.once("close", () => {
				if (!res.writableFinished) controller.abort();
			});

			this.handleNode(req, res, { json, signal: controller.signal }).catch((err: unknown) => {
				logger?.log(Levels.ERROR, "Request handling failed", { error: String(err) });
				if (!res.headersSent) {
					res.writeHead(500, { "Content-Type": "text/plain" });
				}
				res.end("Internal Server Error");
			});
		});

		await new Promise<void>((resolve, reject) => {
			const errorHandler = (err: Error): void => {
				reject(err);
			};

			nodeServer.once("error", errorHandler);
			nodeServer.listen(port, hostname, () => {
				nodeServer.off("error", errorHandler);
				resolve();
			});
		});

		const address = nodeServer.address();
		const boundPort = isAddressInfo(address) ? address.port : port;

		const server: Server = {
			port: boundPort,
			hostname,
			instance: nodeServer,
			stop: () =>
				new Promise<void>((resolve, reject) => {
					nodeServer.close((err) => (err ? reject(err) : resolve()));
				}),
		};

		logger?.log(Levels.INFO, `Listening on http://${hostname}:${boundPort}`);
		onListen?.({ port: server.port, hostname: server.hostname });

		return server;
	}

	/**
	 * Runs the not-found handler through the invoker. A failure becomes the context's error.
	 */
	private async runNotFound(ctx: Context<T>, sink: NodeSink): Promise<void> {
		const handler = this.notFoundHandler;
		if (!handler) return;
		try {
			if (ctx.res && !ctx.res.headersSent) {
				ctx.res.statusCode = 404;
			}
			const output = await this.config.invoke(ctx, handler);
			await writeOutput(sink, output);
		} catch (err) {
			ctx.error = toError(err);
		}
	}

	/**
	 * Answers a request whose dispatch ended with an error and nothing written.
	 */
	private respondError(error: Error, ctx: Context<T>, res: NodeResponse, started: boolean): void {
		const status = statusOf(error);
		this.config.logger?.log(Levels.ERROR, `Unhandled error: ${ctx.method} ${ctx.path} - ${status}`, {
			error: { name: error.name, message: error.message, stack: error.stack },
		});

		if (started || res.headersSent) {
			res.end();
			return;
		}
		res.statusCode = status;
		res.setHeader("Content-Type", "text/plain");
		res.end(status >= 500 ? "Internal Server Error" : error.message);
	}
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
	return typeof address === "object" && address !== null;
}

export { Route, type RouteOptions } from "./route";
export { Matchable } from "./matchable";
export { PathPattern, parseRouteSpec, escapeRegExp, EMPTY_PARAMS, DEFAULT_TOKEN_PATTERN, type RouteSpec } from "./pattern";
export { classifyOutput, formatValue, writeOutput, discardSink, type Output } from "./output";
export { NodeSink, requestPath } from "./node";
export { RoutingError, RoutingErrorCode, PatternError, HandlerError, ContinuationError, HttpError, toError, statusOf } from "./errors";
export type * from "./types";
