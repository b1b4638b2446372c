import { describe, expect, it, vi } from "vitest";
import { Levels } from "@rabbit-company/logger";
import { ContinuationError, HttpError, Router } from "../packages/core/src";
import type { Context, Handler } from "../packages/core/src";
import { collectSink } from "./helpers";

describe("Dispatch", () => {
	describe("next()", () => {
		it("should resume downstream handlers and return afterwards", async () => {
			const router = new Router();
			const order: string[] = [];
			router.use(async (ctx) => {
				order.push("before");
				await ctx.next();
				order.push("after");
			});
			router.get("/x", () => {
				order.push("handler");
				return "done";
			});

			await router.dispatch("GET", "/x");

			expect(order).toEqual(["before", "handler", "after"]);
		});

		it("should run the next handler of the same route", async () => {
			const router = new Router();
			const order: string[] = [];
			router.get(
				"/x",
				async (ctx) => {
					order.push("first");
					await ctx.next();
				},
				() => {
					order.push("second");
					return "ok";
				}
			);

			await router.dispatch("GET", "/x");

			expect(order).toEqual(["first", "second"]);
		});

		it("should nest middleware like an onion", async () => {
			const router = new Router();
			const order: string[] = [];
			const wrap =
				(name: string): Handler =>
				async (ctx) => {
					order.push(`${name}:in`);
					await ctx.next();
					order.push(`${name}:out`);
				};
			router.use(wrap("outer"));
			router.group("/api", (api) => {
				api.get("/ping", () => {
					order.push("ping");
					return "pong";
				});
			}, wrap("group"));

			await router.dispatch("GET", "/api/ping");

			expect(order).toEqual(["outer:in", "group:in", "ping", "group:out", "outer:out"]);
		});

		it("should stop when a handler answers without resuming", async () => {
			const router = new Router();
			const later = vi.fn();
			router.use(() => "blocked");
			router.get("/x", later);

			const sink = collectSink();
			await router.dispatch("GET", "/x", { response: sink });

			expect(sink.body).toBe("blocked");
			expect(later).not.toHaveBeenCalled();
		});

		it("should let a handler continue after producing output", async () => {
			const router = new Router();
			const later = vi.fn(() => "second");
			router.use(async (ctx) => {
				await ctx.next();
				return "first";
			});
			router.get("/x", later);

			const sink = collectSink();
			await router.dispatch("GET", "/x", { response: sink });

			expect(later).toHaveBeenCalledTimes(1);
			expect(sink.chunks).toEqual(["second", "first"]);
		});
	});

	describe("nextRoute()", () => {
		it("should skip the remaining handlers of the route", async () => {
			const router = new Router();
			const skipped = vi.fn();
			const fallback = vi.fn(() => "fallback");
			router.get(
				"/x",
				async (ctx) => {
					await ctx.nextRoute();
				},
				skipped
			);
			router.get("/x", fallback);

			await router.dispatch("GET", "/x");

			expect(skipped).not.toHaveBeenCalled();
			expect(fallback).toHaveBeenCalledTimes(1);
		});

		it("should skip the children of a group", async () => {
			const router = new Router();
			const inner = vi.fn(() => "inner");
			const outer = vi.fn(() => "outer");
			router.group(
				"/g",
				(group) => {
					group.get("/x", inner);
				},
				async (ctx) => {
					await ctx.nextRoute();
				}
			);
			router.get("/g/x", outer);

			await router.dispatch("GET", "/g/x");

			expect(inner).not.toHaveBeenCalled();
			expect(outer).toHaveBeenCalledTimes(1);
		});
	});

	describe("Continuation reuse", () => {
		it("should reject a second next() from the same invocation", async () => {
			const router = new Router();
			const downstream = vi.fn();
			let second: unknown;
			router.use(async (ctx) => {
				await ctx.next();
				try {
					await ctx.next();
				} catch (err) {
					second = err;
				}
			});
			router.get("/x", downstream);

			const ctx = await router.dispatch("GET", "/x");

			expect(second).toBeInstanceOf(ContinuationError);
			expect(downstream).toHaveBeenCalledTimes(1);
			expect(ctx.error).toBeUndefined();
		});

		it("should record an unhandled reuse as the pending error", async () => {
			const router = new Router();
			router.use(async (ctx) => {
				await ctx.next();
				await ctx.nextRoute();
			});

			const ctx = await router.dispatch("GET", "/x");

			expect(ctx.error).toBeInstanceOf(ContinuationError);
			expect(ctx.error?.message).toBe("next() or nextRoute() called multiple times");
		});
	});

	describe("Error Handling", () => {
		it("should skip normal routes once middleware fails", async () => {
			const router = new Router();
			const failure = new Error("middleware failed");
			const handler = vi.fn();
			router.use(() => {
				throw failure;
			});
			router.to("/x", handler);

			const ctx = await router.dispatch("GET", "/x");

			expect(handler).not.toHaveBeenCalled();
			expect(ctx.error).toBe(failure);
		});

		it("should run no normal handler anywhere after a failure", async () => {
			const router = new Router();
			const after = vi.fn();
			const afterRoot = vi.fn();
			const onError = vi.fn();
			router.group("/g", (group) => {
				group.get("/x", () => {
					throw new Error("boom");
				});
				group.get("/x", after);
			});
			router.use(afterRoot);
			router.error(onError);

			const ctx = await router.dispatch("GET", "/g/x");

			expect(after).not.toHaveBeenCalled();
			expect(afterRoot).not.toHaveBeenCalled();
			expect(onError).toHaveBeenCalledTimes(1);
			expect(ctx.error?.message).toBe("boom");
		});

		it("should capture rejected promises", async () => {
			const router = new Router();
			router.get("/x", async () => {
				throw new HttpError(404, "No such thing");
			});

			const ctx = await router.dispatch("GET", "/x");

			expect(ctx.error).toBeInstanceOf(HttpError);
			expect(ctx.error).toHaveProperty("status", 404);
			expect(ctx.error?.message).toBe("No such thing");
		});

		it("should wrap thrown values that are not errors", async () => {
			const router = new Router();
			router.get("/str", () => {
				throw "plain failure";
			});
			router.get("/num", () => {
				throw 42;
			});

			const str = await router.dispatch("GET", "/str");
			const num = await router.dispatch("GET", "/num");

			expect(str.error?.message).toBe("plain failure");
			expect(num.error?.message).toBe("Non-error value thrown: 42");
			expect(num.error?.cause).toBe(42);
		});

		it("should not run error routes without a pending error", async () => {
			const router = new Router();
			const onError = vi.fn();
			router.error(onError);
			router.get("/x", () => "ok");

			await router.dispatch("GET", "/x");

			expect(onError).not.toHaveBeenCalled();
		});

		it("should let an error handler answer the request", async () => {
			const router = new Router();
			router.get("/x", () => {
				throw new Error("db down");
			});
			router.error((ctx) => {
				const message = ctx.error?.message;
				ctx.error = undefined;
				return `failed: ${message}`;
			});

			const sink = collectSink();
			const ctx = await router.dispatch("GET", "/x", { response: sink });

			expect(sink.body).toBe("failed: db down");
			expect(ctx.error).toBeUndefined();
		});

		it("should make normal routes eligible again after recovery", async () => {
			const router = new Router();
			const recovered = vi.fn(() => "recovered");
			router.get("/x", () => {
				throw new Error("boom");
			});
			router.error((ctx) => {
				ctx.error = undefined;
			});
			router.use(recovered);

			const sink = collectSink();
			await router.dispatch("GET", "/x", { response: sink });

			expect(recovered).toHaveBeenCalledTimes(1);
			expect(sink.body).toBe("recovered");
		});

		it("should reach error routes inside groups but skip group handlers", async () => {
			const router = new Router();
			const groupMiddleware = vi.fn();
			const groupError = vi.fn();
			router.use(() => {
				throw new Error("early");
			});
			router.group(
				"/g",
				(group) => {
					group.error(groupError);
				},
				groupMiddleware
			);

			await router.dispatch("GET", "/g");

			expect(groupMiddleware).not.toHaveBeenCalled();
			expect(groupError).toHaveBeenCalledTimes(1);
		});

		it("should replace the pending error when an error handler fails", async () => {
			const router = new Router();
			const last = vi.fn();
			router.use(() => {
				throw new Error("first");
			});
			router.error(() => {
				throw new Error("second");
			});
			router.error(last);

			const ctx = await router.dispatch("GET", "/x");

			expect(ctx.error?.message).toBe("second");
			expect(last).toHaveBeenCalledTimes(1);
		});

		it("should let upstream middleware observe a downstream failure", async () => {
			const router = new Router();
			let observed: string | undefined;
			router.use(async (ctx) => {
				await ctx.next();
				observed = ctx.error?.message;
			});
			router.get("/x", () => {
				throw new Error("boom");
			});

			await router.dispatch("GET", "/x");

			expect(observed).toBe("boom");
		});

		it("should route a failure after next() to the error routes", async () => {
			const router = new Router();
			const onError = vi.fn();
			router.use(async (ctx) => {
				await ctx.next();
				throw new Error("after");
			});
			router.get("/x", () => "ok");
			router.error(onError);

			const sink = collectSink();
			const ctx = await router.dispatch("GET", "/x", { response: sink });

			expect(sink.body).toBe("ok");
			expect(onError).toHaveBeenCalledTimes(1);
			expect(ctx.error?.message).toBe("after");
		});

		it("should continue with the enclosing group after a late failure", async () => {
			const router = new Router();
			const groupError = vi.fn();
			const rootError = vi.fn();
			router.group("/g", (group) => {
				group.use(async (ctx) => {
					await ctx.next();
					throw new Error("after");
				});
				group.get("/x", () => "ok");
				group.error(groupError);
			});
			router.error(rootError);

			const ctx = await router.dispatch("GET", "/g/x");

			expect(groupError).toHaveBeenCalledTimes(1);
			expect(rootError).toHaveBeenCalledTimes(1);
			expect(ctx.error?.message).toBe("after");
		});

		it("should record a failing response write as a handler failure", async () => {
			const router = new Router();
			const failure = new Error("socket closed");
			router.get("/x", () => "hello");

			const ctx = await router.dispatch("GET", "/x", {
				response: {
					write: () => {
						throw failure;
					},
				},
			});

			expect(ctx.error).toBe(failure);
		});

		it("should log handler failures at debug level", async () => {
			const log = vi.fn();
			const router = new Router({ logger: { log } });
			router.get("/x", () => {
				throw new Error("boom");
			});

			await router.dispatch("GET", "/x");

			expect(log).toHaveBeenCalledWith(Levels.DEBUG, "Handler failed: GET /x", {
				error: { name: "Error", message: "boom" },
			});
		});
	});

	describe("Cancellation", () => {
		it("should stop dispatching after abort()", async () => {
			const router = new Router();
			const handler = vi.fn();
			router.use((ctx) => {
				ctx.abort();
			});
			router.get("/x", handler);

			const ctx = await router.dispatch("GET", "/x");

			expect(handler).not.toHaveBeenCalled();
			expect(ctx.aborted).toBe(true);
		});

		it("should turn continuations into no-ops after abort()", async () => {
			const router = new Router();
			const handler = vi.fn();
			let resolved = false;
			router.use(async (ctx) => {
				ctx.abort();
				await ctx.next();
				resolved = true;
			});
			router.get("/x", handler);

			await router.dispatch("GET", "/x");

			expect(resolved).toBe(true);
			expect(handler).not.toHaveBeenCalled();
		});

		it("should not start when the signal is already aborted", async () => {
			const router = new Router();
			const handler = vi.fn();
			router.use(handler);
			const controller = new AbortController();
			controller.abort();

			const ctx = await router.dispatch("GET", "/x", { signal: controller.signal });

			expect(handler).not.toHaveBeenCalled();
			expect(ctx.aborted).toBe(true);
		});

		it("should stop when the signal fires mid-dispatch", async () => {
			const router = new Router();
			const controller = new AbortController();
			const handler = vi.fn();
			router.use(() => {
				controller.abort();
			});
			router.get("/x", handler);

			await router.dispatch("GET", "/x", { signal: controller.signal });

			expect(handler).not.toHaveBeenCalled();
		});
	});

	describe("Invoker", () => {
		it("should call every handler through the configured invoker", async () => {
			const calls: string[] = [];
			const invoke = async (ctx: Context, handler: Handler) => {
				calls.push(ctx.path);
				const output = await handler(ctx);
				return typeof output === "string" ? output.toUpperCase() : output;
			};
			const router = new Router({ invoke });
			router.use(() => undefined);
			router.get("/hello", () => "hello");

			const sink = collectSink();
			await router.dispatch("GET", "/hello", { response: sink });

			expect(calls).toEqual(["/hello", "/hello"]);
			expect(sink.body).toBe("HELLO");
		});

		it("should treat invoker failures like handler failures", async () => {
			const router = new Router({
				invoke: () => {
					throw new Error("cannot resolve arguments");
				},
			});
			router.get("/x", () => "never");

			const ctx = await router.dispatch("GET", "/x");

			expect(ctx.error?.message).toBe("cannot resolve arguments");
		});
	});

	describe("Caller continuations", () => {
		it("should restore the context continuations when dispatch ends", async () => {
			const router = new Router();
			let inner: Context["next"] | undefined;
			router.get("/x", (ctx) => {
				inner = ctx.next;
			});

			const ctx = await router.dispatch("GET", "/x");

			expect(inner).toBeTypeOf("function");
			expect(ctx.next).not.toBe(inner);
			await expect(ctx.next()).resolves.toBeUndefined();
		});
	});
});
