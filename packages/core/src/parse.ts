import { buildDocument } from "./builder.js";
import { ParseContext } from "./context.js";
import { splitLines } from "./normalize.js";
import { scanBlocks } from "./scanner.js";
import type { ParseOptions, ParseResult } from "./types.js";

/**
 * Parses stagemark source into a document tree.
 *
 * Lenient mode (the default) always returns a best-effort tree with every
 * diagnostic. Strict mode throws a `ParseError` for the first error-severity
 * diagnostic.
 */
export function parse(text: string, options: ParseOptions = {}): ParseResult {
  const ctx = new ParseContext(options);
  const document = buildDocument(scanBlocks(splitLines(text), ctx), ctx);
  return { document, diagnostics: ctx.diagnostics.list() };
}
