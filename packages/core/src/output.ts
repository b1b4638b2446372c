import type { HandlerOutput, ResponseSink } from "./types";

/**
 * Handler output sorted into the kinds the response writer distinguishes.
 */
export type Output =
	| { kind: "bytes"; bytes: Uint8Array }
	| { kind: "text"; text: string }
	| { kind: "value"; value: number | boolean | bigint | object };

/**
 * Classifies a handler's return value. Returns undefined for "no output".
 */
export function classifyOutput(output: HandlerOutput): Output | undefined {
	switch (typeof output) {
		case "string":
			return { kind: "text", text: output };
		case "number":
		case "boolean":
		case "bigint":
		case "function":
			return { kind: "value", value: output };
		case "object":
			if (output === null) return undefined;
			if (output instanceof Uint8Array) return { kind: "bytes", bytes: output };
			return { kind: "value", value: output };
		default:
			return undefined;
	}
}

/**
 * Formats a structured value as text: JSON for objects, `String()` for everything else.
 */
export function formatValue(value: number | boolean | bigint | object): string {
	if (typeof value === "object") {
		return JSON.stringify(value) ?? String(value);
	}
	return String(value);
}

/**
 * Writes handler output to a sink.
 *
 * Precedence is fixed: a sink with `writeData` receives the output untouched;
 * otherwise bytes are written verbatim, strings as UTF-8 and any other value as
 * formatted text. No output writes nothing.
 *
 * @throws Whatever `writeData` or `write` throws; the dispatch engine records it as a handler failure
 */
export async function writeOutput(sink: ResponseSink, output: HandlerOutput): Promise<void> {
	const classified = classifyOutput(output);
	if (!classified) return;

	if (sink.writeData) {
		await sink.writeData(output);
		return;
	}

	switch (classified.kind) {
		case "bytes":
			await sink.write(classified.bytes);
			break;
		case "text":
			await sink.write(Buffer.from(classified.text, "utf8"));
			break;
		case "value":
			await sink.write(Buffer.from(formatValue(classified.value), "utf8"));
			break;
	}
}

/**
 * Sink that discards everything, used when a dispatch has no transport.
 */
export const discardSink: ResponseSink = {
	write: () => {},
};
