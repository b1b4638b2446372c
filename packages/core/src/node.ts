import type { NodeResponse, ResponseSink } from "./types";

/**
 * Response sink over a Node.js `ServerResponse`. Tracks whether anything was
 * written so the adapter can tell an answered request from an unanswered one.
 */
export class NodeSink implements ResponseSink {
	private wrote = false;
	/** Present when the sink serializes outputs as JSON */
	readonly writeData?: (data: unknown) => void;

	constructor(
		private readonly res: NodeResponse,
		options: { json?: boolean } = {}
	) {
		if (options.json) {
			this.writeData = (data) => this.writeJson(data);
		}
	}

	/** True once any output reached the response */
	get written(): boolean {
		return this.wrote;
	}

	write(chunk: Uint8Array): void {
		this.wrote = true;
		this.res.write(chunk);
	}

	private writeJson(data: unknown): void {
		const body = JSON.stringify(data);
		if (body === undefined) {
			throw new TypeError(`Cannot serialize handler output of type ${typeof data} as JSON`);
		}
		if (!this.res.headersSent) {
			this.res.setHeader("Content-Type", "application/json");
		}
		this.write(Buffer.from(body, "utf8"));
	}
}

/**
 * Extracts the pathname from a request target, dropping query string and fragment.
 *
 * @example
 * ```typescript
 * requestPath("/users/42?fields=name#top"); // "/users/42"
 * requestPath("http://localhost:3000/users"); // "/users"
 * requestPath(""); // "/"
 * ```
 */
export function requestPath(url: string): string {
	let end = url.length;
	const queryStart = url.indexOf("?");
	const hashStart = url.indexOf("#");
	if (queryStart !== -1) end = Math.min(end, queryStart);
	if (hashStart !== -1) end = Math.min(end, hashStart);

	const protocolEnd = url.indexOf("://");
	if (protocolEnd !== -1 && protocolEnd < end) {
		// Absolute URL: path starts at the first "/" after the host
		const pathStart = url.indexOf("/", protocolEnd + 3);
		return pathStart !== -1 && pathStart < end ? url.slice(pathStart, end) : "/";
	}

	return url.slice(0, end) || "/";
}
