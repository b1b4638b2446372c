import { discardSink } from "./output";
import { EMPTY_PARAMS } from "./pattern";
import type { Context, DispatchInit, State } from "./types";

/** Continuation installed before the engine takes over and restored after it finishes */
const idle = async (): Promise<void> => {};

/**
 * Creates the context for one dispatch.
 *
 * @param method - Request method
 * @param path - Request path, without query string
 * @param init - Transport objects, initial state and cancellation signal
 * @internal
 */
export function createContext<T extends State = State>(method: string, path: string, init: DispatchInit<T> = {}): Context<T> {
	// Pre-allocate state object
	const state = init.state ?? ({} as T);
	let aborted = false;

	const ctx: Context<T> = {
		method,
		path,
		params: EMPTY_PARAMS,
		error: undefined,
		response: init.response ?? discardSink,
		req: init.req,
		res: init.res,
		state,
		get aborted() {
			return aborted || (init.signal?.aborted ?? false);
		},
		next: idle,
		nextRoute: idle,
		abort: () => {
			aborted = true;
		},
		param: (name) => ctx.params[name],
		set: (key, value) => {
			ctx.state[key] = value;
		},
		get: (key) => ctx.state[key],
	};

	return ctx;
}
