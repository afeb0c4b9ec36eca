import { lex } from "../src/lexer";
import { parseExpression } from "../src/parser";
import { parseSource } from "../src/kaleidoscope";
import { literal } from "../src/ast";
import { printExpression, printNode, printProgram } from "../src/printer";

// mulberry32: small seeded generator so failures reproduce.
function seeded(seed: number) {
	let a = seed;
	return () => {
		a = (a + 0x6d2b79f5) | 0;
		let t = Math.imul(a ^ (a >>> 15), a | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

const names = ["x", "y", "alpha", "b2", "größe"];
const ops = ["+", "-", "*", "/"];

function genExpr(rand: () => number, depth: number): string {
	const pick = <T>(xs: T[]): T => xs[Math.floor(rand() * xs.length)];
	const roll = depth <= 0 ? rand() * 0.4 : rand();

	if (roll < 0.2) return String(Math.floor(rand() * 1000));
	if (roll < 0.3) return `${Math.floor(rand() * 100)}.${Math.floor(rand() * 100)}`;
	if (roll < 0.4) return pick(names);
	if (roll < 0.55) {
		const argc = Math.floor(rand() * 3);
		const args = Array.from({ length: argc }, () => genExpr(rand, depth - 1));
		return `${pick(names)}(${args.join(", ")})`;
	}
	if (roll < 0.65) return `(${genExpr(rand, depth - 1)})`;
	return `${genExpr(rand, depth - 1)} ${pick(ops)} ${genExpr(rand, depth - 1)}`;
}

function genProgram(rand: () => number): string {
	const items: string[] = [];
	const count = 1 + Math.floor(rand() * 4);
	for (let i = 0; i < count; i++) {
		const kind = rand();
		if (kind < 0.2) items.push(`extern ${names[i]}(a, b);`);
		else if (kind < 0.5) items.push(`def f${i}(x, y) ${genExpr(rand, 4)};`);
		else items.push(`${genExpr(rand, 4)};`);
	}
	return items.join("\n");
}

describe("1. Printing", () => {

	test("binaries are fully parenthesised", () => {
		expect(printExpression(parseExpression(lex("x + 1 * (2 - 3)"))))
			.toBe("(x + (1 * (2 - 3)))");
	});

	test("left-nested chains keep their grouping", () => {
		expect(printExpression(parseExpression(lex("1 - 2 - 3")))).toBe("((1 - 2) - 3)");
	});

	test("calls", () => {
		expect(printExpression(parseExpression(lex("f(a, g(), 2.5)")))).toBe("f(a, g(), 2.5)");
	});

	test("each kind of top-level item", () => {
		const [ext, def, anon] = parseSource("extern sin(x); def add(x, y) x + y; add(1, 2)");
		expect(printNode(ext)).toBe("extern sin(x);");
		expect(printNode(def)).toBe("def add(x, y) (x + y);");
		expect(printNode(anon)).toBe("add(1, 2);");
	});

	test("programs print one item per line", () => {
		expect(printProgram(parseSource("extern f(); f()"))).toBe("extern f();\nf();");
	});

	test("large integers avoid exponent notation", () => {
		expect(printExpression(literal(1e21))).toBe("1000000000000000000000");
	});

	test("tiny fractions avoid exponent notation", () => {
		expect(printExpression(literal(1.5e-7))).toBe("0.00000015");
		expect(printExpression(literal(1e-150))).toBe(`0.${"0".repeat(149)}1`);
		expect(printExpression(literal(Number.MIN_VALUE))).toBe(`0.${"0".repeat(323)}5`);
	});

	test("overflowing literals print as a digit run", () => {
		expect(printExpression(literal(Infinity))).toBe(`1${"0".repeat(309)}`);
	});
});

describe("2. Parse-print-parse", () => {

	test("fixed examples survive a round trip", () => {
		const sources = [
			"def add(x, y) x + y;",
			"x + 1 * (2 - 3)",
			"1 - 2 - 3",
			"a / (b / c)",
			"extern atan2(y, x); atan2(1, 2) * 4",
			"one()",
		];
		for (const src of sources) {
			const first = parseSource(src);
			expect(parseSource(printProgram(first))).toEqual(first);
		}
	});

	test("extreme literals survive a round trip", () => {
		const sources = [
			`1${"0".repeat(400)};`,
			`0.${"0".repeat(149)}1;`,
			`0.${"0".repeat(323)}5;`,
			"123456789012345678901234567890;",
		];
		for (const src of sources) {
			const first = parseSource(src);
			expect(first[0].type === "Function" && first[0].body.type).toBe("Literal");
			expect(parseSource(printProgram(first))).toEqual(first);
		}
		expect(parseSource(`1${"0".repeat(400)}`)).toEqual([
			{ type: "Function", prototype: { name: "", params: [] }, body: literal(Infinity) },
		]);
		expect(parseSource(`0.${"0".repeat(149)}1`)).toEqual([
			{ type: "Function", prototype: { name: "", params: [] }, body: literal(1e-150) },
		]);
	});

	test("generated programs survive a round trip", () => {
		const rand = seeded(0x5eed);
		for (let i = 0; i < 200; i++) {
			const src = genProgram(rand);
			const first = parseSource(src);
			const printed = printProgram(first);
			const second = parseSource(printed);
			expect(second).toEqual(first);
			expect(printProgram(second)).toBe(printed);
		}
	});
});
