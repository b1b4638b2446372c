import { randomUUID } from "node:crypto";
import type { Context, Handler, LogWriter, NodeRequest, State } from "@waymark/core";
import { statusOf } from "@waymark/core";
import { ConsoleTransport, Levels, Logger } from "@rabbit-company/logger";

/**
 * Options for configuring the logger middleware.
 */
export interface LoggerOptions<T extends State> {
	/**
	 * Logger instance to use. If not provided, a console logger will be created.
	 */
	logger?: LogWriter;

	/**
	 * Log level for HTTP requests.
	 * Default: Levels.HTTP
	 */
	level?: Levels;

	/**
	 * Preset configuration for common use cases.
	 * Explicit options take precedence over the preset.
	 * - "minimal": Just method, path, status, and duration
	 * - "standard": Adds request ID
	 * - "detailed": Adds headers, user agent and remote address
	 * - "debug": Everything, logged at debug level
	 */
	preset?: "minimal" | "standard" | "detailed" | "debug";

	/**
	 * Whether to log incoming requests.
	 * Default: true
	 */
	logRequests?: boolean;

	/**
	 * Whether to log completed requests.
	 * Default: true
	 */
	logResponses?: boolean;

	/**
	 * Whether to include the duration in response metadata.
	 * Default: true
	 */
	logDuration?: boolean;

	/**
	 * Whether to generate and log a request ID.
	 * Default: false
	 */
	includeRequestId?: boolean;

	/**
	 * Whether to include request headers.
	 * Default: false
	 */
	includeHeaders?: boolean;

	/**
	 * Whether to include the user agent.
	 * Default: false
	 */
	includeUserAgent?: boolean;

	/**
	 * Whether to include the remote address.
	 * Default: false
	 */
	includeRemoteAddress?: boolean;

	/**
	 * Headers to exclude from logging (case-insensitive).
	 * Default: ["authorization", "cookie", "set-cookie"]
	 */
	excludeHeaders?: string[];

	/**
	 * Paths to exclude from logging (exact match or regex).
	 * Default: ["/health", "/ping"]
	 */
	excludePaths?: (string | RegExp)[];

	/**
	 * HTTP status codes to exclude from response logs.
	 * Default: []
	 */
	excludeStatusCodes?: number[];

	/**
	 * Function to generate the request ID. Default: the `x-request-id` or
	 * `x-correlation-id` header, else a random UUID.
	 */
	generateRequestId?: (ctx: Context<T>) => string;

	/**
	 * State key the request ID is stored under.
	 * Default: "requestId"
	 */
	requestIdKey?: string;

	/**
	 * Function to extract a user identifier for logging.
	 */
	getUserId?: (ctx: Context<T>) => string | undefined;

	/**
	 * Function to determine if a request should be skipped.
	 */
	skip?: (ctx: Context<T>) => boolean;

	/**
	 * Custom message formatter for request logs.
	 */
	formatRequestMessage?: (ctx: Context<T>, requestId: string) => string;

	/**
	 * Custom message formatter for response logs.
	 */
	formatResponseMessage?: (ctx: Context<T>, requestId: string, duration: number, statusCode: number) => string;

	/**
	 * Additional metadata to include in all logs.
	 */
	metadata?: Record<string, unknown> | ((ctx: Context<T>) => Record<string, unknown>);
}

/**
 * Request logging middleware using @rabbit-company/logger.
 *
 * Logs the request when it enters, hands control downstream with `ctx.next()`,
 * then logs the outcome. A request that ends with a pending error is logged at
 * `Levels.ERROR` with the error's status.
 *
 * @example
 * ```typescript
 * // Minimal logging
 * router.use(logger({ preset: "minimal" }));
 * // Output: GET - 127.0.0.1 - /api/users - 200 - 45ms
 *
 * // Custom logger with specific transports
 * const customLogger = new Logger({
 *   level: Levels.INFO,
 *   transports: [new ConsoleTransport()]
 * });
 *
 * router.use(logger({
 *   logger: customLogger,
 *   excludePaths: ["/health", /^\/static/],
 *   getUserId: (ctx) => ctx.req?.headers["x-user-id"]?.toString(),
 *   metadata: { service: "api" }
 * }));
 * ```
 */
export function logger<T extends State = State>(options: LoggerOptions<T> = {}): Handler<T> {
	// Apply preset configurations
	const presetConfig = getPresetConfiguration<T>(options.preset);
	const mergedOptions = { ...presetConfig, ...options };

	const {
		logger: providedLogger,
		level = Levels.HTTP,
		logRequests = true,
		logResponses = true,
		logDuration = true,
		includeRequestId = false,
		includeHeaders = false,
		includeUserAgent = false,
		includeRemoteAddress = false,
		excludeHeaders = ["authorization", "cookie", "set-cookie"],
		excludePaths = ["/health", "/ping"],
		excludeStatusCodes = [],
		generateRequestId = defaultRequestIdGenerator,
		requestIdKey = "requestId",
		getUserId,
		skip,
		formatRequestMessage = defaultRequestFormatter,
		formatResponseMessage = defaultResponseFormatter,
		metadata,
	}: LoggerOptions<T> = mergedOptions;

	const loggerInstance =
		providedLogger ??
		new Logger({
			level,
			transports: [new ConsoleTransport()],
		});

	const normalizedExcludeHeaders = excludeHeaders.map((h) => h.toLowerCase());

	return async (ctx) => {
		if (skip?.(ctx)) {
			return ctx.next();
		}

		const shouldExcludePath = excludePaths.some((path) => (typeof path === "string" ? ctx.path === path : path.test(ctx.path)));
		if (shouldExcludePath) {
			return ctx.next();
		}

		const requestId = includeRequestId ? generateRequestId(ctx) : undefined;
		if (requestId !== undefined) {
			const state: State = ctx.state;
			state[requestIdKey] = requestId;
		}

		const startTime = Date.now();
		const baseMetadata = getMetadata(metadata, ctx);
		const userId = getUserId?.(ctx);

		if (logRequests) {
			const requestMetadata = buildRequestMetadata(ctx, requestId, userId, baseMetadata, {
				includeHeaders,
				includeUserAgent,
				includeRemoteAddress,
				normalizedExcludeHeaders,
			});
			loggerInstance.log(level, formatRequestMessage(ctx, requestId ?? ""), requestMetadata);
		}

		await ctx.next();

		const duration = Date.now() - startTime;
		const error = ctx.error;
		const statusCode = error ? statusOf(error) : (ctx.res?.statusCode ?? 200);

		if (!logResponses || excludeStatusCodes.includes(statusCode)) {
			return;
		}

		const responseMetadata: Record<string, unknown> = {
			...baseMetadata,
			...(requestId !== undefined ? { requestId } : {}),
			...(userId ? { userId } : {}),
			...(logDuration ? { duration } : {}),
			response: { statusCode },
		};

		if (error) {
			responseMetadata.error = { name: error.name, message: error.message, stack: error.stack };
			loggerInstance.log(Levels.ERROR, formatResponseMessage(ctx, requestId ?? "", duration, statusCode), responseMetadata);
			return;
		}

		loggerInstance.log(level, formatResponseMessage(ctx, requestId ?? "", duration, statusCode), responseMetadata);
	};
}

/**
 * Get preset configuration for common logging scenarios.
 */
function getPresetConfiguration<T extends State>(preset?: LoggerOptions<T>["preset"]): LoggerOptions<T> {
	switch (preset) {
		case "standard":
			return {
				includeRequestId: true,
			};

		case "detailed":
			return {
				includeRequestId: true,
				includeHeaders: true,
				includeUserAgent: true,
				includeRemoteAddress: true,
			};

		case "debug":
			return {
				level: Levels.DEBUG,
				includeRequestId: true,
				includeHeaders: true,
				includeUserAgent: true,
				includeRemoteAddress: true,
			};

		case "minimal":
		default:
			return {
				includeRequestId: false,
				includeHeaders: false,
				includeUserAgent: false,
				includeRemoteAddress: false,
			};
	}
}

function headerValue(req: NodeRequest | undefined, name: string): string | undefined {
	const value = req?.headers[name];
	return Array.isArray(value) ? value.join(", ") : value;
}

function defaultRequestIdGenerator<T extends State>(ctx: Context<T>): string {
	return headerValue(ctx.req, "x-request-id") || headerValue(ctx.req, "x-correlation-id") || randomUUID();
}

function defaultRequestFormatter<T extends State>(ctx: Context<T>, _requestId: string): string {
	return `${ctx.method} - ${ctx.req?.socket?.remoteAddress ?? "-"} - ${ctx.path}`;
}

function defaultResponseFormatter<T extends State>(ctx: Context<T>, _requestId: string, duration: number, statusCode: number): string {
	return `${ctx.method} - ${ctx.req?.socket?.remoteAddress ?? "-"} - ${ctx.path} - ${statusCode} - ${duration}ms`;
}

/**
 * Build request metadata object.
 */
function buildRequestMetadata<T extends State>(
	ctx: Context<T>,
	requestId: string | undefined,
	userId: string | undefined,
	baseMetadata: Record<string, unknown>,
	options: {
		includeHeaders: boolean;
		includeUserAgent: boolean;
		includeRemoteAddress: boolean;
		normalizedExcludeHeaders: string[];
	}
): Record<string, unknown> {
	const metadata: Record<string, unknown> = {
		...baseMetadata,
		...(requestId !== undefined ? { requestId } : {}),
		...(userId ? { userId } : {}),
	};

	if (!options.includeHeaders && !options.includeUserAgent && !options.includeRemoteAddress) {
		return metadata;
	}

	const requestData: Record<string, unknown> = {
		method: ctx.method,
		path: ctx.path,
	};

	if (options.includeHeaders && ctx.req) {
		const headers: Record<string, string> = {};
		for (const [key, value] of Object.entries(ctx.req.headers)) {
			if (value === undefined || options.normalizedExcludeHeaders.includes(key.toLowerCase())) continue;
			headers[key] = Array.isArray(value) ? value.join(", ") : value;
		}
		requestData.headers = headers;
	}

	if (options.includeUserAgent) {
		requestData.userAgent = headerValue(ctx.req, "user-agent");
	}

	if (options.includeRemoteAddress) {
		requestData.remoteAddress = ctx.req?.socket?.remoteAddress;
	}

	metadata.request = requestData;
	return metadata;
}

/**
 * Get metadata from options.
 */
function getMetadata<T extends State>(
	metadata: Record<string, unknown> | ((ctx: Context<T>) => Record<string, unknown>) | undefined,
	ctx: Context<T>
): Record<string, unknown> {
	if (!metadata) return {};
	if (typeof metadata === "function") return metadata(ctx);
	return metadata;
}

export { ConsoleTransport, Levels, Logger } from "@rabbit-company/logger";
