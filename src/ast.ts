export type Token =
	| { type: "DEF" }
	| { type: "EXTERN" }
	| { type: "DELIMITER" }
	| { type: "LPAREN" }
	| { type: "RPAREN" }
	| { type: "COMMA" }
	| { type: "IDENT"; value: string }
	| { type: "OPERATOR"; value: string }
	| { type: "NUMBER"; value: number };

export type TokenType = Token["type"];

export type Prototype = { name: string; params: string[] };

export type Expression =
	| { type: "Literal"; value: number }
	| { type: "Variable"; name: string }
	| { type: "Binary"; operator: string; left: Expression; right: Expression }
	| { type: "Call"; callee: string; args: Expression[] };

export type FunctionNode = { prototype: Prototype; body: Expression };

export type ASTNode =
	| { type: "Extern"; prototype: Prototype }
	| ({ type: "Function" } & FunctionNode);

export const literal = (value: number): Expression => ({ type: "Literal", value });

export const variable = (name: string): Expression => ({ type: "Variable", name });

export const binary = (operator: string, left: Expression, right: Expression): Expression =>
	({ type: "Binary", operator, left, right });

export const call = (callee: string, args: Expression[]): Expression =>
	({ type: "Call", callee, args });

export function functionNode(prototype: Prototype, body: Expression): ASTNode {
	return { type: "Function", prototype, body };
}

export function externNode(prototype: Prototype): ASTNode {
	return { type: "Extern", prototype };
}

/** Anonymous functions carry an empty name; consumers run them right after compiling. */
export function isAnonymous(node: ASTNode): boolean {
	return node.type === "Function" && node.prototype.name === "";
}

export function tokenText(token: Token): string {
	switch (token.type) {
		case "DEF": return "def";
		case "EXTERN": return "extern";
		case "DELIMITER": return ";";
		case "LPAREN": return "(";
		case "RPAREN": return ")";
		case "COMMA": return ",";
		case "NUMBER": return String(token.value);
		case "IDENT":
		case "OPERATOR":
			return token.value;
	}
}
