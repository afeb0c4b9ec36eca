import type { ASTNode } from "./ast";
import { ParserError } from "./errors";
import { lex } from "./lexer";
import { parse, ParserOptions } from "./parser";

export type ParseResult =
	| { ok: true; nodes: ASTNode[] }
	| { ok: false; error: ParserError };

/** Word lists are joined with single spaces, the way shell arguments arrive. */
function joinSource(source: string | readonly string[]): string {
	return typeof source === "string" ? source : source.join(" ");
}

export function parseSource(source: string | readonly string[], options?: ParserOptions): ASTNode[] {
	return parse(lex(joinSource(source)), options);
}

/**
 * Like {@link parseSource}, but hands syntax errors back as a value.
 * Lexer failures are internal faults and still throw.
 */
export function tryParseSource(source: string | readonly string[], options?: ParserOptions): ParseResult {
	try {
		return { ok: true, nodes: parseSource(source, options) };
	} catch (e) {
		if (e instanceof ParserError) return { ok: false, error: e };
		throw e;
	}
}
