import type { ParseContext } from "./context.js";
import type { MentionSegment, Segment, TextSegment } from "./types.js";

const MENTION_RE = /^(?:\(([^)]+)\))?([A-Za-z0-9]+)/;

export interface SegmentInlineOptions {
  ctx: ParseContext;
  element: "dialogue" | "stage_direction";
  // Source line for an offset into `text`; defaults to line 0.
  lineAt?: (offset: number) => number;
}

function pushText(into: Segment[], text: string): void {
  if (!text) return;
  const last = into[into.length - 1];
  if (last && last.type === "text") {
    last.text += text;
    return;
  }
  into.push({ type: "text", text });
}

/**
 * Splits dialogue or stage-direction text into text, inline-direction and
 * mention segments. Braces nest one level; stray braces stay literal text.
 */
export function segmentInline(text: string, options: SegmentInlineOptions): Segment[] {
  const { ctx, element } = options;
  const lineAt = options.lineAt ?? ((): number => 0);

  const out: Segment[] = [];
  let inline: Array<TextSegment | MentionSegment> | null = null;
  let inlineStart = 0;
  let buf = "";

  const flush = (): void => {
    pushText(inline ?? out, buf);
    buf = "";
  };

  let i = 0;
  while (i < text.length) {
    const ch = text.charAt(i);

    if (ch === "{") {
      if (inline) {
        ctx.diagnostics.report("NestedInlineDirection", lineAt(i), "Nested inline direction is not supported; '{' kept as text");
        buf += ch;
      } else {
        flush();
        inline = [];
        inlineStart = i;
      }
      i += 1;
      continue;
    }

    if (ch === "}") {
      if (inline) {
        flush();
        out.push({ type: "inline_direction", segments: inline });
        inline = null;
      } else {
        ctx.diagnostics.report("UnmatchedClosingBrace", lineAt(i), "Unmatched '}' kept as text");
        buf += ch;
      }
      i += 1;
      continue;
    }

    if (ch === "@") {
      const m = text.slice(i + 1).match(MENTION_RE);
      if (m && m[2]) {
        flush();
        const mention: MentionSegment = {
          type: "mention",
          character: ctx.referenceCharacter(m[2], lineAt(i), element),
        };
        if (m[1] !== undefined) mention.declension = m[1];
        if (inline) inline.push(mention);
        else out.push(mention);
        i += 1 + m[0].length;
        continue;
      }
    }

    buf += ch;
    i += 1;
  }

  flush();
  if (inline) {
    ctx.diagnostics.report("UnterminatedInlineDirection", lineAt(inlineStart), "Inline direction is missing its closing '}'");
    out.push({ type: "inline_direction", segments: inline });
  }
  return out;
}
