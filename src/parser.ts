import {
	ASTNode,
	Expression,
	Prototype,
	Token,
	TokenType,
	binary,
	call,
	externNode,
	functionNode,
	literal,
	variable,
} from "./ast";
import { InvalidOperatorError, InvalidTokenError, UnexpectedEOFError } from "./errors";

export type PrecedenceTable = Readonly<Record<string, number>>;

export interface ParserOptions {
	/** Binding power per single-character operator; higher binds tighter. */
	precedence?: PrecedenceTable;
}

export const defaultPrecedence: PrecedenceTable = Object.freeze({
	"*": 40,
	"/": 40,
	"+": 20,
	"-": 20,
});

function resolvePrecedence(options: ParserOptions): ReadonlyMap<string, number> {
	const table = options.precedence ?? defaultPrecedence;
	const out = new Map<string, number>();
	for (const [op, power] of Object.entries(table)) {
		if ([...op].length !== 1) {
			throw new RangeError(`operator must be a single character: ${JSON.stringify(op)}`);
		}
		if (!Number.isFinite(power) || power < 0) {
			throw new RangeError(`invalid precedence for ${op}: ${power}`);
		}
		out.set(op, power);
	}
	return out;
}

/** Parser state for one call: the precedence table and a forward cursor. */
function createReader(tokens: readonly Token[], precedence: ReadonlyMap<string, number>) {
	let pos = 0;

	const peek = (): Token | undefined => tokens[pos];
	const atEnd = () => pos >= tokens.length;

	const next = (): Token => {
		const t = tokens[pos];
		if (!t) throw new UnexpectedEOFError();
		pos++;
		return t;
	};

	const expect = (type: TokenType): Token => {
		const t = peek();
		if (!t) throw new UnexpectedEOFError();
		if (t.type !== type) throw new InvalidTokenError(t);
		pos++;
		return t;
	};

	const expectIdent = (): string => {
		const t = next();
		if (t.type !== "IDENT") throw new InvalidTokenError(t);
		return t.value;
	};

	// After a list item: a comma continues the list, `)` ends it.
	const continuesList = (): boolean => {
		const t = peek();
		if (!t) throw new UnexpectedEOFError();
		if (t.type === "COMMA") {
			pos++;
			return true;
		}
		if (t.type === "RPAREN") return false;
		throw new InvalidTokenError(t);
	};

	// Binding power of the upcoming operator, or undefined when no operator follows.
	const peekPrecedence = (): { op: string; power: number } | undefined => {
		const t = peek();
		if (!t || t.type !== "OPERATOR") return undefined;
		const power = precedence.get(t.value);
		if (power === undefined) throw new InvalidOperatorError(t.value);
		return { op: t.value, power };
	};

	function parseCall(callee: string): Expression {
		expect("LPAREN");
		const args: Expression[] = [];
		if (peek()?.type !== "RPAREN") {
			do {
				args.push(parseExpr());
			} while (continuesList());
		}
		expect("RPAREN");
		return call(callee, args);
	}

	function parsePrimary(): Expression {
		const t = peek();
		if (!t) throw new UnexpectedEOFError();

		if (t.type === "NUMBER") {
			pos++;
			return literal(t.value);
		}

		if (t.type === "IDENT") {
			pos++;
			if (peek()?.type === "LPAREN") return parseCall(t.value);
			return variable(t.value);
		}

		if (t.type === "LPAREN") {
			pos++;
			const inner = parseExpr();
			expect("RPAREN");
			return inner;
		}

		throw new InvalidTokenError(t);
	}

	function parseRhs(minPrecedence: number, lhs: Expression): Expression {
		let result = lhs;

		while (true) {
			const current = peekPrecedence();
			if (!current || current.power < minPrecedence) return result;
			pos++;

			let rhs = parsePrimary();
			const following = peekPrecedence();
			if (following && following.power > current.power) {
				rhs = parseRhs(current.power + 1, rhs);
			}

			result = binary(current.op, result, rhs);
		}
	}

	function parseExpr(): Expression {
		return parseRhs(0, parsePrimary());
	}

	function parsePrototype(): Prototype {
		const name = expectIdent();
		expect("LPAREN");
		const params: string[] = [];
		if (peek()?.type !== "RPAREN") {
			do {
				params.push(expectIdent());
			} while (continuesList());
		}
		expect("RPAREN");
		return { name, params };
	}

	function parseItem(): ASTNode | undefined {
		const t = peek();
		if (!t) throw new UnexpectedEOFError();

		switch (t.type) {
			case "DEF": {
				pos++;
				const prototype = parsePrototype();
				return functionNode(prototype, parseExpr());
			}
			case "EXTERN":
				pos++;
				return externNode(parsePrototype());
			case "DELIMITER":
				pos++;
				return undefined;
			default:
				// bare expression: implicit anonymous function
				return functionNode({ name: "", params: [] }, parseExpr());
		}
	}

	return { atEnd, peek, parseExpr, parseItem };
}

export function parse(tokens: readonly Token[], options: ParserOptions = {}): ASTNode[] {
	const reader = createReader(tokens, resolvePrecedence(options));
	const nodes: ASTNode[] = [];

	while (!reader.atEnd()) {
		const node = reader.parseItem();
		if (node) nodes.push(node);
	}

	return nodes;
}

/** Parses a single expression; every token must belong to it. */
export function parseExpression(tokens: readonly Token[], options: ParserOptions = {}): Expression {
	const reader = createReader(tokens, resolvePrecedence(options));
	const expr = reader.parseExpr();
	const leftover = reader.peek();
	if (leftover) throw new InvalidTokenError(leftover);
	return expr;
}
