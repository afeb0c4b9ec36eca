import { Token } from "./ast";
import { LexError } from "./errors";

const isSpace = (c: string) => /\p{White_Space}/u.test(c);
const isDigit = (c: string) => /[0-9]/.test(c);
const isIdentStart = (c: string) => /\p{Alphabetic}/u.test(c);
const isIdentPart = (c: string) => /[\p{Alphabetic}\p{M}\p{Nd}\p{Pc}\p{Join_Control}]/u.test(c);

const keywords = new Map<string, Token>([
	["def", { type: "DEF" }],
	["extern", { type: "EXTERN" }],
]);

/** Drops everything from `#` to the end of its line, keeping the line break. */
export function stripComments(input: string): string {
	return input.replace(/#.*$/gm, "");
}

export function lex(input: string): Token[] {
	const src = stripComments(input);
	const tokens: Token[] = [];
	let i = 0;

	// Code point at i; astral letters must not be split into surrogate halves.
	const charAt = (at: number) => String.fromCodePoint(src.codePointAt(at) ?? 0);

	while (i < src.length) {
		const ch = charAt(i);

		if (isSpace(ch)) {
			i += ch.length;
			continue;
		}

		if (isIdentStart(ch)) {
			const start = i;
			i += ch.length;
			while (i < src.length) {
				const next = charAt(i);
				if (!isIdentPart(next)) break;
				i += next.length;
			}
			const word = src.slice(start, i);
			tokens.push(keywords.get(word) ?? { type: "IDENT", value: word });
			continue;
		}

		if (isDigit(ch)) {
			const start = i;
			while (i < src.length && isDigit(src[i])) i++;
			if (src[i] === ".") {
				i++;
				while (i < src.length && isDigit(src[i])) i++;
			}
			const text = src.slice(start, i);
			const value = Number(text);
			if (Number.isNaN(value)) throw new LexError(`unparsable number: ${text}`);
			tokens.push({ type: "NUMBER", value });
			continue;
		}

		switch (ch) {
			case ";": tokens.push({ type: "DELIMITER" }); break;
			case "(": tokens.push({ type: "LPAREN" }); break;
			case ")": tokens.push({ type: "RPAREN" }); break;
			case ",": tokens.push({ type: "COMMA" }); break;
			default: tokens.push({ type: "OPERATOR", value: ch });
		}
		i += ch.length;
	}

	return tokens;
}
