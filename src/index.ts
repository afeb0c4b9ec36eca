export * from "./ast";
export * from "./errors";
export { lex, stripComments } from "./lexer";
export { parse, parseExpression, defaultPrecedence } from "./parser";
export type { ParserOptions, PrecedenceTable } from "./parser";
export { printExpression, printNode, printProgram, printPrototype } from "./printer";
export { parseSource, tryParseSource } from "./kaleidoscope";
export type { ParseResult } from "./kaleidoscope";
