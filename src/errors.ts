import { Token, tokenText } from "./ast";

/**
 * Raised by the lexer when its own character rules disagree, e.g. a digit run
 * that does not convert to a number. Ordinary input never triggers it.
 */
export class LexError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "LexError";
	}
}

export type ParserErrorKind = "InvalidToken" | "InvalidOperator" | "UnexpectedEOF";

export abstract class ParserError extends Error {
	abstract readonly kind: ParserErrorKind;

	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

export class InvalidTokenError extends ParserError {
	readonly kind = "InvalidToken";
	readonly token: Token;

	constructor(token: Token) {
		super(`invalid token ${tokenText(token)}`);
		this.token = token;
	}
}

export class InvalidOperatorError extends ParserError {
	readonly kind = "InvalidOperator";
	readonly operator: string;

	constructor(operator: string) {
		super(`invalid operator ${operator}`);
		this.operator = operator;
	}
}

export class UnexpectedEOFError extends ParserError {
	readonly kind = "UnexpectedEOF";

	constructor() {
		super("unexpected end of file");
	}
}
