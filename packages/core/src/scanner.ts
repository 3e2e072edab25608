import { classifyLine } from "./classify.js";
import type { ParseContext } from "./context.js";
import type { SourceLine } from "./normalize.js";

export interface BlockPart {
  line: number;
  text: string;
}

export interface StageDirectionBlock {
  kind: "stage_direction";
  parts: BlockPart[];
  text: string;
  line: number;
  end_line: number;
  implicit: boolean;
}

export interface DialogueBlock {
  kind: "dialogue";
  speakers: string[];
  parts: BlockPart[];
  text: string;
  line: number;
  end_line: number;
}

export type Block =
  | { kind: "comment"; text: string; line: number }
  | { kind: "document_title"; title: string; line: number }
  | { kind: "act"; title: string; line: number }
  | { kind: "scene"; title: string; line: number }
  | { kind: "cue"; name: string; argument?: string; line: number }
  | { kind: "metadata"; key: string; value: string; line: number }
  | StageDirectionBlock
  | DialogueBlock;

type OpenBlock =
  | { kind: "none" }
  | { kind: "stage_direction"; line: number; parts: BlockPart[]; implicit: boolean }
  | { kind: "dialogue"; line: number; speakers: string[]; parts: BlockPart[] };

export function joinParts(parts: BlockPart[]): string {
  return parts
    .map((p) => p.text)
    .filter(Boolean)
    .join(" ");
}

/**
 * Maps an offset in `joinParts(parts)` back to the source line it came from.
 */
export function lineLocator(parts: BlockPart[]): (offset: number) => number {
  const starts: Array<{ offset: number; line: number }> = [];
  let offset = 0;
  for (const p of parts) {
    if (!p.text) continue;
    starts.push({ offset, line: p.line });
    offset += p.text.length + 1;
  }
  const fallback = parts[0]?.line ?? 0;
  return (at: number): number => {
    let line = starts[0]?.line ?? fallback;
    for (const s of starts) {
      if (s.offset > at) break;
      line = s.line;
    }
    return line;
  };
}

function closeBlock(open: OpenBlock): StageDirectionBlock | DialogueBlock | null {
  if (open.kind === "none") return null;
  const end = open.parts[open.parts.length - 1]?.line ?? open.line;
  if (open.kind === "dialogue") {
    return {
      kind: "dialogue",
      speakers: open.speakers,
      parts: open.parts,
      text: joinParts(open.parts),
      line: open.line,
      end_line: end,
    };
  }
  return {
    kind: "stage_direction",
    parts: open.parts,
    text: joinParts(open.parts),
    line: open.line,
    end_line: end,
    implicit: open.implicit,
  };
}

function describeOpen(open: OpenBlock): string {
  return open.kind === "dialogue" ? "Dialogue" : "Stage direction";
}

/**
 * Walks the lines once. An open stage direction or dialogue ends when the next
 * structural line is classified, so no lookahead buffer is kept.
 */
export function* scanBlocks(lines: Iterable<SourceLine>, ctx: ParseContext): Generator<Block, void, undefined> {
  let open: OpenBlock = { kind: "none" };

  for (const { line, text } of lines) {
    const cls = classifyLine(text, { preStructural: ctx.preStructural });

    if (cls.type === "blank") continue;

    if (cls.type === "continuation") {
      if (cls.demotedMetadata) {
        ctx.diagnostics.report(
          "MetadataAfterStructuralContent",
          line,
          `Metadata-like line after structural content is treated as text: ${cls.text}`,
        );
      }
      if (open.kind === "none") {
        if (!cls.demotedMetadata) {
          ctx.diagnostics.report("OrphanTextLine", line, "Text line outside of any dialogue or stage direction");
        }
        ctx.leavePreStructural();
        open = { kind: "stage_direction", line, parts: [], implicit: true };
      }
      open.parts.push({ line, text: cls.text });
      continue;
    }

    const closed = closeBlock(open);
    open = { kind: "none" };
    if (closed) yield closed;

    switch (cls.type) {
      case "stage_direction_open":
        ctx.leavePreStructural();
        open = { kind: "stage_direction", line, parts: [{ line, text: cls.text }], implicit: false };
        break;
      case "dialogue_open":
        ctx.leavePreStructural();
        open = { kind: "dialogue", line, speakers: cls.speakers, parts: [{ line, text: cls.text }] };
        break;
      case "metadata":
        yield { kind: "metadata", key: cls.key, value: cls.value, line };
        break;
      case "comment":
        ctx.leavePreStructural();
        yield { kind: "comment", text: cls.text, line };
        break;
      case "document_title":
        ctx.leavePreStructural();
        yield { kind: "document_title", title: cls.title, line };
        break;
      case "act":
        ctx.leavePreStructural();
        yield { kind: "act", title: cls.title, line };
        break;
      case "scene":
        ctx.leavePreStructural();
        yield { kind: "scene", title: cls.title, line };
        break;
      case "cue":
        ctx.leavePreStructural();
        yield cls.argument === undefined
          ? { kind: "cue", name: cls.name, line }
          : { kind: "cue", name: cls.name, argument: cls.argument, line };
        break;
    }
  }

  if (open.kind !== "none") {
    ctx.diagnostics.report(
      "UnterminatedBlockAtEOF",
      open.line,
      `${describeOpen(open)} opened at line ${open.line} closes at end of input`,
    );
    const closed = closeBlock(open);
    if (closed) yield closed;
  }
}
