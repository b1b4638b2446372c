import { Levels } from "@rabbit-company/logger";
import { ContinuationError, toError } from "./errors";
import { writeOutput } from "./output";
import type { Route } from "./route";
import type { Router } from "./index";
import type { Context, Continuation, Handler, HandlerOutput, Invoker, LogWriter, Params, State } from "./types";

/**
 * Dispatch state of one router or route on the path from the root to the node
 * currently running.
 */
interface Frame<T extends State> {
	node: Router<T> | Route<T>;
	/** Path left for this node's children after its own pattern consumed a prefix */
	path: string;
	/** Parameters visible while this node dispatches */
	params: Params;
	/** Next handler of `node` to invoke */
	handlerIndex: number;
	/** Next child of `node` to try */
	childIndex: number;
}

/** Result of one handler invocation, success and failure made explicit */
type Outcome = { ok: true; output: HandlerOutput } | { ok: false; error: Error };

/**
 * Engine settings resolved from the root router's options.
 * @internal
 */
export interface DispatcherOptions<T extends State> {
	invoke: Invoker<T>;
	logger?: LogWriter;
}

/**
 * Whether a node's own handlers may run in the current error state. Routers and
 * normal routes run while no error is pending, error routes only while one is.
 */
function runsHandlers<T extends State>(node: Router<T> | Route<T>, failing: boolean): boolean {
	return node.kind === "route" && node.isErrorRoute ? failing : !failing;
}

/**
 * Whether a child may be tried at all. Routers are always descended into so the
 * error routes they hold stay reachable.
 */
function eligible<T extends State>(node: Router<T> | Route<T>, failing: boolean): boolean {
	return node.kind === "router" || node.isErrorRoute === failing;
}

/**
 * Walks a router tree for one request.
 *
 * The continuation state lives in an explicit stack of frames, one per router or
 * route between the root and the node being dispatched. `next` resumes the frame
 * of the running handler; `nextRoute` pops that frame and resumes its parent.
 * Descending into a matching child pushes a frame; exhausting a frame pops it
 * and resumes the parent, restoring the parent's parameters.
 *
 * @template T - The type of the context state object
 * @internal
 */
export class Dispatcher<T extends State = State> {
	private readonly frames: Frame<T>[] = [];

	constructor(
		private readonly ctx: Context<T>,
		private readonly options: DispatcherOptions<T>
	) {}

	/**
	 * Dispatches the context through `root` and resolves once no continuation is pending.
	 */
	async run(root: Router<T>): Promise<void> {
		const ctx = this.ctx;
		const caller = { next: ctx.next, nextRoute: ctx.nextRoute };

		this.frames.push({ node: root, path: ctx.path, params: ctx.params, handlerIndex: 0, childIndex: 0 });
		const resume: Continuation = () => this.resume(0);
		ctx.next = resume;
		ctx.nextRoute = resume;

		try {
			await resume();
		} finally {
			ctx.next = caller.next;
			ctx.nextRoute = caller.nextRoute;
		}
	}

	/**
	 * Drops every frame above `index` and advances the frame at `index`.
	 * A negative index means the root itself was exhausted.
	 */
	private resume(index: number): Promise<void> {
		if (index < 0 || index >= this.frames.length) {
			return Promise.resolve();
		}
		this.frames.length = index + 1;
		this.ctx.params = this.frames[index].params;
		return this.advance(index);
	}

	private async advance(index: number): Promise<void> {
		const ctx = this.ctx;
		if (ctx.aborted) return;

		const frame = this.frames[index];
		const { node } = frame;

		// 1. the node's own handlers
		if (frame.handlerIndex < node.handlers.length && runsHandlers(node, ctx.error !== undefined)) {
			const handler = node.handlers[frame.handlerIndex++];
			return this.invoke(index, handler);
		}

		// 2. the first remaining child that accepts the request
		if (node.kind === "router") {
			while (frame.childIndex < node.children.length) {
				const child = node.children[frame.childIndex++];
				if (!eligible(child, ctx.error !== undefined)) continue;

				const result = child.match(ctx.method, frame.path);
				if (!result.matched) continue;

				const params = Object.keys(result.params).length > 0 ? { ...frame.params, ...result.params } : frame.params;
				this.frames.push({ node: child, path: result.rest, params, handlerIndex: 0, childIndex: 0 });
				ctx.params = params;
				return this.advance(index + 1);
			}
		}

		// 3. exhausted: hand control back to the parent
		return this.resume(index - 1);
	}

	/**
	 * Invokes one handler of the frame at `index` with that frame's continuations
	 * installed, then decides how dispatch continues.
	 */
	private async invoke(index: number, handler: Handler<T>): Promise<void> {
		const ctx = this.ctx;
		const caller = { next: ctx.next, nextRoute: ctx.nextRoute };
		const ancestors = this.frames.slice(0, index);
		let resumed = false;

		const continueAt =
			(target: number): Continuation =>
			() => {
				if (resumed) return Promise.reject(new ContinuationError());
				resumed = true;
				return this.resume(target);
			};

		ctx.next = continueAt(index);
		ctx.nextRoute = continueAt(index - 1);
		const outcome = await this.attempt(handler);
		ctx.next = caller.next;
		ctx.nextRoute = caller.nextRoute;

		if (!outcome.ok) {
			ctx.error = outcome.error;
			this.options.logger?.log(Levels.DEBUG, `Handler failed: ${ctx.method} ${ctx.path}`, {
				error: { name: outcome.error.name, message: outcome.error.message },
			});
			// A failure always continues with the parent, even after the handler resumed.
			resumed = true;
			await this.resumeAncestor(ancestors);
			return;
		}

		if (resumed) return;

		// A handler that produced output has answered the request; one that did not falls through.
		if (outcome.output === undefined || outcome.output === null) {
			resumed = true;
			await this.resume(index);
		}
	}

	/**
	 * Resumes the deepest of `ancestors` still on the stack. An ancestor that was
	 * popped while the handler ran has already handed control to its own parent.
	 */
	private resumeAncestor(ancestors: readonly Frame<T>[]): Promise<void> {
		for (let i = ancestors.length - 1; i >= 0; i--) {
			if (this.frames[i] === ancestors[i]) {
				return this.resume(i);
			}
		}
		return Promise.resolve();
	}

	/**
	 * Calls the handler through the invoker and writes its output. Any failure,
	 * including one raised while writing, comes back as a failed outcome.
	 */
	private async attempt(handler: Handler<T>): Promise<Outcome> {
		try {
			const output = await this.options.invoke(this.ctx, handler);
			await writeOutput(this.ctx.response, output);
			return { ok: true, output };
		} catch (err) {
			return { ok: false, error: toError(err) };
		}
	}
}
