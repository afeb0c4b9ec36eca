import { ASTNode, Expression, Prototype } from "./ast";

// The lexer has no exponent syntax, so numbers are written out positionally.
function printNumber(value: number): string {
	// an over-long digit run is the only way the lexer produces Infinity
	if (value === Infinity) return "1" + "0".repeat(309);

	const text = String(value);
	if (!/e/i.test(text)) return text;

	const [mantissa, exponent] = value.toExponential().split("e");
	const digits = mantissa.replace(".", "");
	const shift = Number(exponent);
	if (shift < 0) return "0." + "0".repeat(-shift - 1) + digits;
	if (digits.length <= shift + 1) return digits + "0".repeat(shift + 1 - digits.length);
	return `${digits.slice(0, shift + 1)}.${digits.slice(shift + 1)}`;
}

export function printExpression(expr: Expression): string {
	switch (expr.type) {
		case "Literal":
			return printNumber(expr.value);
		case "Variable":
			return expr.name;
		case "Call":
			return `${expr.callee}(${expr.args.map(printExpression).join(", ")})`;
		case "Binary":
			return `(${printExpression(expr.left)} ${expr.operator} ${printExpression(expr.right)})`;
	}
}

export function printPrototype(proto: Prototype): string {
	return `${proto.name}(${proto.params.join(", ")})`;
}

export function printNode(node: ASTNode): string {
	if (node.type === "Extern") return `extern ${printPrototype(node.prototype)};`;
	if (node.prototype.name === "") return `${printExpression(node.body)};`;
	return `def ${printPrototype(node.prototype)} ${printExpression(node.body)};`;
}

export function printProgram(nodes: readonly ASTNode[]): string {
	return nodes.map(printNode).join("\n");
}
