import { HttpError, Router } from "@waymark/core";
import { ConsoleTransport, Levels, Logger, logger } from "@waymark/middleware/logger";
import { errorResponder } from "@waymark/middleware/error-responder";

/**
 * Router usage on Node.js: middleware, groups with parameters, explicit
 * control transfer and centralized error handling.
 */

type AppState = {
	requestId?: string;
	user?: { id: string; role: "admin" | "user" };
};

const log = new Logger({
	level: Levels.DEBUG,
	transports: [new ConsoleTransport()],
});

const users = new Map([
	["1", { id: "1", name: "Ada" }],
	["2", { id: "2", name: "Grace" }],
]);

// Strict routes only accept the whole remaining path: "/users" but not "/users/abc"
const router = new Router<AppState>({ logger: log, strict: true });

// Logs every request and stores the request ID in ctx.state.requestId
router.use(logger({ logger: log, preset: "standard" }));

// Identifies the caller; anonymous requests continue without a user
router.use((ctx) => {
	const token = ctx.req?.headers.authorization;
	if (token === "Bearer test-admin-token") {
		ctx.set("user", { id: "admin", role: "admin" });
	}
});

router.get("/", () => ({ service: "example", status: "ok" }));

router.group("/users", (group) => {
	group.get("/<id:\\d+>", (ctx) => {
		const user = users.get(ctx.param("id") ?? "");
		if (!user) throw new HttpError(404, `No user ${ctx.param("id")}`);
		return user;
	});

	group.get("", () => [...users.values()]);
});

router.group(
	"/admin",
	(admin) => {
		admin.get("/stats", () => ({ users: users.size }));
	},
	// Requests without an admin skip the whole group and end as 404
	async (ctx) => {
		if (ctx.get("user")?.role !== "admin") {
			await ctx.nextRoute();
		}
	}
);

router.error(errorResponder({ logger: log, format: "json" }));

router.onNotFound((ctx) => ({ error: `Nothing at ${ctx.path}` }));

const server = await router.listen({
	port: 3000,
	json: true,
	onListen: ({ port, hostname }) => log.info(`Example running on http://${hostname}:${port}`),
});

process.once("SIGINT", () => {
	server.stop().then(
		() => process.exit(0),
		(err: unknown) => {
			log.error("Failed to stop server", { error: String(err) });
			process.exit(1);
		}
	);
});
