import { PatternError } from "./errors";
import type { MatchResult, Params } from "./types";

/** Frozen empty object shared by every match that captures nothing */
export const EMPTY_PARAMS: Params = Object.freeze({});

/** Leading method list: upper-case names separated by commas, then a single space */
const METHODS_PREFIX = /^([A-Z]+(?:,[A-Z]+)*) /;

/** Token names must be valid named-group identifiers */
const TOKEN_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Regex used for `<name>` tokens: one or more characters other than "/" */
export const DEFAULT_TOKEN_PATTERN = "[^/]+";

/**
 * A route specification split into its method set and path pattern.
 */
export interface RouteSpec {
	/** Accepted methods. Empty means any method. */
	methods: ReadonlySet<string>;
	pattern: string;
}

type Segment = { type: "text"; value: string } | { type: "token"; name: string; regex: string };

/**
 * Splits `"GET,POST /users/<id:\\d+>"` into its methods and path pattern.
 *
 * @throws {PatternError} If the path pattern contains whitespace
 *
 * @example
 * ```typescript
 * parseRouteSpec("GET,POST /users"); // { methods: Set { "GET", "POST" }, pattern: "/users" }
 * parseRouteSpec("/posts"); // { methods: Set {}, pattern: "/posts" }
 * ```
 */
export function parseRouteSpec(spec: string): RouteSpec {
	const methods = new Set<string>();
	let pattern = spec;

	const prefix = METHODS_PREFIX.exec(spec);
	if (prefix) {
		for (const method of prefix[1].split(",")) {
			methods.add(method);
		}
		pattern = spec.slice(prefix[0].length);
	}

	if (/\s/.test(pattern)) {
		throw new PatternError(spec, "expected an optional method list followed by a single space and a path without whitespace");
	}

	return { methods, pattern };
}

/**
 * Escapes every regular expression metacharacter in `text`.
 */
export function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Finds the `>` closing the token opened at `open`. A `>` that is escaped,
 * inside a character class or inside parentheses belongs to the token regex.
 */
function findTokenEnd(pattern: string, open: number): number {
	let depth = 0;
	let inClass = false;

	for (let i = open + 1; i < pattern.length; i++) {
		const ch = pattern[i];
		if (ch === "\\") {
			i++;
		} else if (inClass) {
			if (ch === "]") inClass = false;
		} else if (ch === "[") {
			inClass = true;
		} else if (ch === "(") {
			depth++;
		} else if (ch === ")") {
			if (depth > 0) depth--;
		} else if (ch === ">" && depth === 0) {
			return i;
		}
	}

	return -1;
}

/**
 * Splits a path pattern into literal text and `<name:regex>` tokens.
 */
function tokenize(pattern: string): Segment[] {
	const segments: Segment[] = [];
	const names = new Set<string>();
	let cursor = 0;

	while (cursor < pattern.length) {
		const open = pattern.indexOf("<", cursor);
		if (open === -1) {
			segments.push({ type: "text", value: pattern.slice(cursor) });
			break;
		}
		if (open > cursor) {
			segments.push({ type: "text", value: pattern.slice(cursor, open) });
		}

		const close = findTokenEnd(pattern, open);
		if (close === -1) {
			throw new PatternError(pattern, `unclosed token at offset ${open}`);
		}

		const body = pattern.slice(open + 1, close);
		const colon = body.indexOf(":");
		const name = colon === -1 ? body : body.slice(0, colon);
		const regex = colon === -1 ? DEFAULT_TOKEN_PATTERN : body.slice(colon + 1);

		if (!TOKEN_NAME.test(name)) {
			throw new PatternError(pattern, `invalid parameter name "${name}"`);
		}
		if (names.has(name)) {
			throw new PatternError(pattern, `duplicate parameter name "${name}"`);
		}
		if (regex.length === 0) {
			throw new PatternError(pattern, `empty expression for parameter "${name}"`);
		}

		names.add(name);
		segments.push({ type: "token", name, regex });
		cursor = close + 1;
	}

	return segments;
}

/**
 * Compiled path pattern. Token-free patterns are matched as literal prefixes;
 * everything else through one expression anchored at the start of the path.
 *
 * @example
 * ```typescript
 * const pattern = PathPattern.compile("/users/<id:\\d+>");
 * pattern.match("/users/42/posts");
 * // { matched: true, rest: "/posts", params: { id: "42" } }
 * ```
 */
export class PathPattern {
	/** Compiled expression, present for patterns with tokens */
	private readonly regex?: RegExp;
	/** Lazily built expression for literal patterns */
	private literalExpression?: RegExp;

	private constructor(
		/** The path pattern as written */
		readonly source: string,
		/** Parameter names in order of appearance */
		readonly names: readonly string[],
		regex?: RegExp
	) {
		this.regex = regex;
	}

	/**
	 * Compiles a path pattern.
	 *
	 * @throws {PatternError} On a malformed token or an expression the regex engine rejects
	 */
	static compile(pattern: string): PathPattern {
		const segments = tokenize(pattern);
		const names: string[] = [];
		let source = "^";

		for (const segment of segments) {
			if (segment.type === "text") {
				source += escapeRegExp(segment.value);
			} else {
				names.push(segment.name);
				source += `(?<${segment.name}>${segment.regex})`;
			}
		}

		if (names.length === 0) {
			return new PathPattern(pattern, names);
		}

		try {
			return new PathPattern(pattern, names, new RegExp(source));
		} catch (err) {
			throw new PatternError(pattern, err instanceof Error ? err.message : String(err), { cause: err });
		}
	}

	/** True when the pattern has no tokens and is matched by prefix comparison */
	get literal(): boolean {
		return this.regex === undefined;
	}

	/**
	 * The anchored expression equivalent to this pattern. For literal patterns this
	 * is the escaped literal; `match` never uses it for them.
	 */
	get expression(): RegExp {
		if (this.regex) return this.regex;
		this.literalExpression ??= new RegExp("^" + escapeRegExp(this.source));
		return this.literalExpression;
	}

	/**
	 * Matches the start of `path`. Rejection returns `path` unchanged and no parameters.
	 */
	match(path: string): MatchResult {
		if (!this.regex) {
			if (path.startsWith(this.source)) {
				return { matched: true, rest: path.slice(this.source.length), params: EMPTY_PARAMS };
			}
			return { matched: false, rest: path, params: EMPTY_PARAMS };
		}

		const found = this.regex.exec(path);
		if (!found) {
			return { matched: false, rest: path, params: EMPTY_PARAMS };
		}

		const params: Record<string, string> = {};
		if (found.groups) {
			for (const [name, value] of Object.entries(found.groups)) {
				params[name] = value ?? "";
			}
		}

		return { matched: true, rest: path.slice(found[0].length), params };
	}
}
