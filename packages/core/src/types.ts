import type { Server as HttpServer } from "node:http";
import type { Logger } from "@rabbit-company/logger";

/**
 * Per-request state shared between handlers.
 */
export type State = Record<string, unknown>;

/**
 * Parameters captured from the request path, keyed by token name.
 */
export type Params = Readonly<Record<string, string>>;

/**
 * HTTP methods with registration shortcuts on the router.
 * Route specifications accept any upper-case method name.
 */
export type Method = "GET" | "POST" | "PUT" | "DELETE" | "PATCH" | "OPTIONS" | "HEAD";

/**
 * Anything a handler may return. `undefined` and `null` mean "no output".
 */
export type HandlerOutput = Uint8Array | string | number | boolean | bigint | object | null | undefined | void;

/**
 * Handler function invoked for a matching router or route.
 *
 * @template T - The type of the context state object
 *
 * @example
 * ```typescript
 * const auth: Handler<{ user: string }> = async (ctx) => {
 *   ctx.set("user", "alice");
 *   await ctx.next();
 *   // runs after everything downstream has finished
 * };
 * ```
 */
export type Handler<T extends State = State> = (ctx: Context<T>) => HandlerOutput | Promise<HandlerOutput>;

/**
 * Resumes dispatch. Resolves once everything it started has finished.
 */
export type Continuation = () => Promise<void>;

/**
 * Calls a handler on behalf of the dispatch engine and returns its output.
 * Replace it to change how handler arguments are resolved.
 */
export type Invoker<T extends State = State> = (ctx: Context<T>, handler: Handler<T>) => HandlerOutput | Promise<HandlerOutput>;

/**
 * Minimal logging capability. A `Logger` from `@rabbit-company/logger` satisfies it.
 */
export type LogWriter = Pick<Logger, "log">;

/**
 * Destination for handler output.
 */
export interface ResponseSink {
	/** Writes raw bytes. */
	write(chunk: Uint8Array): void | Promise<void>;
	/** When present, receives every handler output as-is instead of `write`. */
	writeData?(data: unknown): void | Promise<void>;
}

/**
 * Result of matching a router or route against a method and path.
 *
 * @example
 * ```typescript
 * const result: MatchResult = {
 *   matched: true,
 *   rest: "/posts",
 *   params: { id: "42" }
 * };
 * ```
 */
export type MatchResult = {
	matched: boolean;
	/** Unconsumed part of the path. On rejection, the path that was tested. */
	rest: string;
	params: Params;
};

/**
 * The subset of `IncomingMessage` the router reads.
 */
export interface NodeRequest {
	method?: string;
	url?: string;
	headers: Record<string, string | string[] | undefined>;
	socket?: { remoteAddress?: string };
}

/**
 * The subset of `ServerResponse` the router writes to.
 */
export interface NodeResponse {
	statusCode: number;
	readonly headersSent: boolean;
	setHeader(name: string, value: string): unknown;
	write(chunk: Uint8Array | string): unknown;
	end(chunk?: string): unknown;
}

/**
 * Context object passed to every handler of a dispatch.
 *
 * @template T - The type of the context state object
 */
export interface Context<T extends State = State> {
	/** Request method, as received */
	readonly method: string;
	/** Full request path, as received */
	readonly path: string;
	/** Parameters captured by the routers and route currently being dispatched */
	params: Params;
	/**
	 * The pending error. Set when a handler fails; while set, only error routes run.
	 * Error handlers assign `undefined` to recover.
	 */
	error: Error | undefined;
	/** Where handler output is written */
	readonly response: ResponseSink;
	/** Raw Node.js request, when dispatched through `handleNode` */
	readonly req?: NodeRequest;
	/** Raw Node.js response, when dispatched through `handleNode` */
	readonly res?: NodeResponse;
	/** Application state object for sharing data between handlers */
	state: T;
	/** True once `abort()` was called or the dispatch signal fired */
	readonly aborted: boolean;
	/**
	 * Runs the next handler of the current router or route, or the next matching
	 * route once the handlers are exhausted.
	 */
	next: Continuation;
	/**
	 * Skips the remaining handlers and children of the current router or route
	 * and continues with the next matching sibling of the enclosing router.
	 */
	nextRoute: Continuation;
	/** Ends the dispatch. Continuations called afterwards do nothing. */
	abort(): void;
	/** Returns a captured path parameter. */
	param(name: string): string | undefined;
	/** Sets a value in the context state. */
	set<K extends keyof T>(key: K, value: T[K]): void;
	/** Gets a value from the context state. */
	get<K extends keyof T>(key: K): T[K];
}

/**
 * Options shared by a router and every router grouped under it.
 */
export interface RouterOptions<T extends State = State> {
	/** Calls handlers. Default: `handler(ctx)` */
	invoke?: Invoker<T>;
	/** Receives engine and adapter diagnostics. Default: none */
	logger?: LogWriter;
	/** Routes only accept when they consume the whole remaining path. Default: false */
	strict?: boolean;
}

/**
 * Per-dispatch inputs.
 */
export interface DispatchInit<T extends State = State> {
	/** Default: a sink that discards output */
	response?: ResponseSink;
	req?: NodeRequest;
	res?: NodeResponse;
	/** Initial state. Default: an empty object */
	state?: T;
	/** Checked before each handler invocation; once aborted, dispatch stops */
	signal?: AbortSignal;
}

/**
 * Options for `Router.handleNode`.
 */
export interface NodeHandlerOptions {
	/** Serialize every handler output as JSON. Default: false */
	json?: boolean;
	signal?: AbortSignal;
}

/**
 * Server configuration options for `Router.listen`.
 */
export interface ListenOptions {
	/** Port to listen on. Default: 3000 */
	port?: number;
	/** Hostname to bind to. Default: "localhost" */
	hostname?: string;
	/** Serialize every handler output as JSON. Default: false */
	json?: boolean;
	/** Called once the server is accepting connections */
	onListen?: (info: { port: number; hostname: string }) => void;
}

/**
 * A running HTTP server.
 */
export interface Server {
	port: number;
	hostname: string;
	/** The underlying `node:http` server */
	instance: HttpServer;
	stop(): Promise<void>;
}
