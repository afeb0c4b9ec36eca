import { performance } from "node:perf_hooks";
import { lex } from "../src/lexer";
import { parse } from "../src/parser";

type Scenario = { label: string; src: string };
type BenchRow = {
	label: string;
	tokens: number;
	lexMs: number;
	parseMs: number;
	nodes: number;
};

const scenarios: Scenario[] = [
	{ label: "literal", src: "1;" },
	{ label: "arith-flat", src: "1 + 2 - 3 * 4 / 5 + 6 - 7 * 8 / 9;" },
	{ label: "arith-nested", src: "((1 + 2) * (3 - (4 / (5 + 6)))) * ((7 - 8) + 9);" },
	{ label: "calls", src: "extern sin(x); extern cos(x); sin(1) * sin(1) + cos(2) * cos(2);" },
	{ label: "defs", src: "def f(a, b) a * a + b * b; def g(x) f(x, x + 1) / 2; g(3); # done" },
];

function benchScenario(scenario: Scenario, iterations: number): BenchRow {
	const tokens = lex(scenario.src);
	let nodes = parse(tokens).length;

	let start = performance.now();
	for (let i = 0; i < iterations; i++) lex(scenario.src);
	const lexMs = performance.now() - start;

	start = performance.now();
	for (let i = 0; i < iterations; i++) nodes = parse(tokens).length;
	const parseMs = performance.now() - start;

	return { label: scenario.label, tokens: tokens.length, lexMs, parseMs, nodes };
}

async function main() {
	const iterations = Number(process.env.BENCH_ITERS ?? 20000);
	const rows = scenarios.map(s => benchScenario(s, iterations));

	console.log(`kaleidoscope front end benchmark (${iterations} iterations per scenario)`);
	for (const row of rows) {
		console.log(
			`${row.label.padEnd(12)} tokens=${String(row.tokens).padStart(3)} lex ${row.lexMs.toFixed(2).padStart(8)} ms  parse ${row.parseMs.toFixed(2).padStart(8)} ms  nodes=${row.nodes}`
		);
	}
}

main().catch(err => {
	console.error(err);
	process.exit(1);
});
