import type { Context, Handler, LogWriter, State } from "@waymark/core";
import { statusOf } from "@waymark/core";
import { ConsoleTransport, Levels, Logger } from "@rabbit-company/logger";

/**
 * Options for the error responder.
 */
export interface ErrorResponderOptions<T extends State> {
	/**
	 * Logger instance to use. If not provided, a console logger will be created.
	 */
	logger?: LogWriter;

	/**
	 * Log level for handled errors.
	 * Default: Levels.ERROR
	 */
	level?: Levels;

	/**
	 * Send the messages of 5xx errors to the client. Messages of 4xx errors are always sent.
	 * Default: false
	 */
	expose?: boolean;

	/**
	 * Response body format.
	 * Default: "text"
	 */
	format?: "text" | "json";

	/**
	 * Function to determine whether an error is left for later error handlers.
	 */
	skip?: (error: Error, ctx: Context<T>) => boolean;
}

/** Body of a JSON error response */
export interface ErrorBody {
	error: string;
	status: number;
}

/**
 * Error handler that turns the pending error into a response.
 *
 * Logs the error, clears it so dispatch continues normally, sets the HTTP status
 * from the error (`HttpError` status, otherwise 500) and returns the body.
 *
 * @example
 * ```typescript
 * router.error(errorResponder({ format: "json" }));
 * // {"error":"Not allowed","status":403}
 * ```
 */
export function errorResponder<T extends State = State>(options: ErrorResponderOptions<T> = {}): Handler<T> {
	const { logger: providedLogger, level = Levels.ERROR, expose = false, format = "text", skip } = options;

	const loggerInstance =
		providedLogger ??
		new Logger({
			level,
			transports: [new ConsoleTransport()],
		});

	return (ctx) => {
		const error = ctx.error;
		if (!error || skip?.(error, ctx)) {
			return;
		}

		const status = statusOf(error);
		loggerInstance.log(level, `${ctx.method} ${ctx.path} - ${status} - ${error.message}`, {
			error: { name: error.name, message: error.message, stack: error.stack },
			status,
		});
		ctx.error = undefined;

		const message = status >= 500 && !expose ? "Internal Server Error" : error.message;
		const res = ctx.res;
		if (res && !res.headersSent) {
			res.statusCode = status;
			res.setHeader("Content-Type", format === "json" ? "application/json" : "text/plain");
		}

		if (format === "json") {
			const body: ErrorBody = { error: message, status };
			return body;
		}
		return message;
	};
}
