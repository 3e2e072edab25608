import fs from "node:fs";

import {
  ParseError,
  countCharacterReferences,
  parse,
  serializeDocument,
  walkElements,
} from "@stagemark/core";
import type { ParseResult } from "@stagemark/core";

import { resolveParseOptions } from "./config.js";
import type { CliFlags, ResolvedParseOptions } from "./config.js";
import { CliError } from "./errors.js";
import { formatCharacter, formatDiagnostic, formatOutline, formatSummary } from "./format.js";

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const processIo: CliIo = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

interface ParsedArgs {
  command: string;
  args: string[];
  json: boolean;
  verbose: boolean;
  flags: CliFlags;
}

const COMMANDS = ["parse", "check", "outline", "characters", "help"];

function isHelpToken(value: string | undefined): boolean {
  return value === "--help" || value === "-h" || value === "help";
}

function takeValue(argv: string[], i: number, flag: string): string {
  const value = argv[i + 1];
  if (value === undefined || value.startsWith("--")) throw new CliError("MISSING_VALUE", `${flag} needs a value`);
  return value;
}

function parseArgs(argv: string[]): ParsedArgs {
  const filtered: string[] = [];
  const flags: CliFlags = {};
  let json = false;
  let verbose = false;

  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i] ?? "";
    const eq = a.startsWith("--") ? a.indexOf("=") : -1;
    const name = eq > 0 ? a.slice(0, eq) : a;
    const inline: string | undefined = eq > 0 ? a.slice(eq + 1) : undefined;
    const value = (): string => {
      if (inline !== undefined) return inline;
      const v = takeValue(argv, i, name);
      i += 1;
      return v;
    };

    switch (name) {
      case "--json":
        json = true;
        break;
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      case "--strict":
        flags.mode = "strict";
        break;
      case "--mode":
        flags.mode = value();
        break;
      case "--act-elements":
        flags.actElements = value();
        break;
      case "--cast":
        flags.cast = value();
        break;
      default:
        if (name.startsWith("--") && !isHelpToken(name)) throw new CliError("UNKNOWN_FLAG", `Unknown flag: ${name}`);
        filtered.push(a);
    }
  }

  const command = filtered[0] ?? "help";
  return { command, args: filtered.slice(1), json, verbose, flags };
}

function printJson(io: CliIo, obj: unknown): void {
  io.out(JSON.stringify(obj));
}

function logHuman(io: CliIo, line: string, json: boolean): void {
  if (!json) io.out(line);
}

function printMainHelp(io: CliIo, json: boolean): void {
  const usage = "stagemark <parse|check|outline|characters> <file> [--json] [--strict] [--mode strict|lenient] [--act-elements allow|reject] [--cast auto|declared] [--verbose]";
  if (json) {
    printJson(io, { ok: true, command: "help", usage, commands: COMMANDS });
    return;
  }
  io.out("Usage:");
  io.out(`  ${usage}`);
  io.out("");
  io.out("Commands:");
  io.out("  parse       print the document tree as JSON");
  io.out("  check       list diagnostics; exits 1 when any error is found");
  io.out("  outline     print acts and scenes");
  io.out("  characters  print the cast in order of first use");
  io.out("");
  io.out("Environment: STAGEMARK_MODE, STAGEMARK_ACT_ELEMENTS, STAGEMARK_CAST set defaults for the matching flags.");
}

function requireFile(command: string, args: string[]): string {
  const file = args[0];
  if (!file) throw new CliError("USAGE", `Usage: stagemark ${command} <file>`);
  return file;
}

function readSource(file: string): string {
  try {
    return fs.readFileSync(file, "utf8");
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new CliError("FILE_NOT_READABLE", `Cannot read ${file}: ${msg}`);
  }
}

interface CommandContext {
  io: CliIo;
  json: boolean;
  verbose: boolean;
  options: ResolvedParseOptions;
}

function parseFile(file: string, ctx: CommandContext): ParseResult {
  const source = readSource(file);
  if (ctx.verbose) {
    ctx.io.err(`[stagemark] parsing ${file} (mode=${ctx.options.mode}, act-elements=${ctx.options.actLevelElements}, cast=${ctx.options.cast})`);
  }
  const result = parse(source, ctx.options);
  if (ctx.verbose) {
    let elements = 0;
    for (const _ of walkElements(result.document)) elements += 1;
    ctx.io.err(`[stagemark] ${file}: ${elements} elements, ${result.diagnostics.length} diagnostics`);
  }
  return result;
}

function cmdParse(file: string, ctx: CommandContext): number {
  const { document, diagnostics } = parseFile(file, ctx);
  if (ctx.json) {
    printJson(ctx.io, { ok: true, command: "parse", file, document, diagnostics });
    return 0;
  }
  ctx.io.out(serializeDocument(document, { pretty: true }));
  for (const d of diagnostics) ctx.io.err(formatDiagnostic(d, file));
  return 0;
}

function cmdCheck(file: string, ctx: CommandContext): number {
  const { diagnostics } = parseFile(file, ctx);
  const errors = diagnostics.filter((d) => d.severity === "error").length;
  if (ctx.json) {
    printJson(ctx.io, {
      ok: errors === 0,
      command: "check",
      file,
      diagnostics,
      summary: {
        errors,
        warnings: diagnostics.filter((d) => d.severity === "warning").length,
        info: diagnostics.filter((d) => d.severity === "info").length,
      },
    });
  } else {
    for (const d of diagnostics) ctx.io.out(formatDiagnostic(d, file));
    ctx.io.out(formatSummary(diagnostics));
  }
  return errors > 0 ? 1 : 0;
}

function cmdOutline(file: string, ctx: CommandContext): number {
  const { document } = parseFile(file, ctx);
  const lines = formatOutline(document);
  if (ctx.json) {
    printJson(ctx.io, { ok: true, command: "outline", file, outline: lines });
    return 0;
  }
  for (const line of lines) logHuman(ctx.io, line, ctx.json);
  return 0;
}

function cmdCharacters(file: string, ctx: CommandContext): number {
  const { document } = parseFile(file, ctx);
  const counts = countCharacterReferences(document);
  if (ctx.json) {
    printJson(ctx.io, {
      ok: true,
      command: "characters",
      file,
      characters: document.characters.map((c) => ({ ...c, references: counts.get(c.name) ?? 0 })),
    });
    return 0;
  }
  if (document.characters.length === 0) logHuman(ctx.io, "No characters.", ctx.json);
  for (const c of document.characters) logHuman(ctx.io, formatCharacter(c, counts.get(c.name) ?? 0), ctx.json);
  return 0;
}

export function runCli(argv: string[], io: CliIo = processIo, env: NodeJS.ProcessEnv = process.env): number {
  let command = argv.find((a) => !a.startsWith("-")) ?? "help";
  let json = argv.includes("--json");
  let file = "";

  try {
    const parsed = parseArgs(argv);
    command = parsed.command;
    json = parsed.json;

    if (isHelpToken(command) || isHelpToken(parsed.args[0])) {
      printMainHelp(io, json);
      return 0;
    }
    if (!COMMANDS.includes(command)) {
      throw new CliError("UNKNOWN_COMMAND", `Unknown command: ${command}\nUsage: stagemark [${COMMANDS.join("|")}]`);
    }

    file = requireFile(command, parsed.args);
    const ctx: CommandContext = { io, json, verbose: parsed.verbose, options: resolveParseOptions(parsed.flags, env) };

    switch (command) {
      case "parse":
        return cmdParse(file, ctx);
      case "check":
        return cmdCheck(file, ctx);
      case "outline":
        return cmdOutline(file, ctx);
      default:
        return cmdCharacters(file, ctx);
    }
  } catch (err) {
    if (err instanceof ParseError) {
      if (json) {
        printJson(io, { ok: false, command, error_code: err.code, kind: err.kind, line: err.line, error: err.diagnostic.message });
      } else {
        io.err(formatDiagnostic(err.diagnostic, file));
      }
      return 1;
    }
    const message = err instanceof Error ? err.message : String(err);
    if (json) {
      if (err instanceof CliError) {
        printJson(io, { ok: false, command, error_code: err.code, error: message });
      } else {
        printJson(io, { ok: false, command, error: message });
      }
      return 1;
    }
    io.err(message);
    return 1;
  }
}
