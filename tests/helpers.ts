import type { NodeRequest, NodeResponse, ResponseSink } from "../packages/core/src";

/**
 * Response sink that keeps every chunk as UTF-8 text.
 */
export function collectSink(): ResponseSink & { chunks: string[]; readonly body: string } {
	const chunks: string[] = [];
	return {
		chunks,
		get body() {
			return chunks.join("");
		},
		write(chunk: Uint8Array) {
			chunks.push(Buffer.from(chunk).toString("utf8"));
		},
	};
}

/**
 * In-memory stand-in for `http.ServerResponse`.
 */
export class FakeResponse implements NodeResponse {
	statusCode = 200;
	headersSent = false;
	finished = false;
	readonly headers = new Map<string, string>();
	private readonly chunks: string[] = [];

	setHeader(name: string, value: string): void {
		this.headers.set(name.toLowerCase(), value);
	}

	write(chunk: Uint8Array | string): void {
		this.headersSent = true;
		this.chunks.push(typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8"));
	}

	end(chunk?: string): void {
		if (chunk !== undefined) this.chunks.push(chunk);
		this.headersSent = true;
		this.finished = true;
	}

	get body(): string {
		return this.chunks.join("");
	}
}

export function mockRequest(url: string, method = "GET", headers: Record<string, string> = {}): NodeRequest {
	return {
		method,
		url,
		headers: { host: "localhost", ...headers },
		socket: { remoteAddress: "127.0.0.1" },
	};
}
