import { CHARACTER_NAME_RE } from "./characters.js";
import type { ParseContext, ParsePhase } from "./context.js";
import { segmentInline } from "./inline.js";
import { lineLocator } from "./scanner.js";
import type { Block, DialogueBlock, StageDirectionBlock } from "./scanner.js";
import type {
  Act,
  CueElement,
  DialogueElement,
  DocumentNode,
  Element,
  MetadataEntry,
  PlayDocument,
  Scene,
  StageDirectionElement,
} from "./types.js";

/**
 * Metadata only counts as metadata before any structural content. The scanner
 * already demotes late metadata lines by phase when it runs ahead of the
 * builder; this check is the builder's own final say for block streams that
 * do not come from `scanBlocks`.
 */
export function isMetadataEligible(phase: ParsePhase): boolean {
  return phase === "pre_structural";
}

function toStageDirection(block: StageDirectionBlock, ctx: ParseContext): StageDirectionElement {
  const el: StageDirectionElement = {
    type: "stage_direction",
    segments: segmentInline(block.text, { ctx, element: "stage_direction", lineAt: lineLocator(block.parts) }),
    line: block.line,
    end_line: block.end_line,
  };
  if (block.implicit) el.implicit = true;
  return el;
}

function toDialogue(block: DialogueBlock, ctx: ParseContext): DialogueElement {
  const speakers: string[] = [];
  for (const name of block.speakers) {
    if (speakers.includes(name)) {
      ctx.diagnostics.report("DuplicateSpeakerInCue", block.line, `Speaker '@${name}' is listed more than once`);
      continue;
    }
    speakers.push(ctx.referenceCharacter(name, block.line, "dialogue"));
  }
  return {
    type: "dialogue",
    speakers,
    segments: segmentInline(block.text, { ctx, element: "dialogue", lineAt: lineLocator(block.parts) }),
    line: block.line,
    end_line: block.end_line,
  };
}

// "/introduce @handle; Display Name; description" annotates the cast. The cue itself stays plain data.
function recordIntroduction(cue: CueElement, ctx: ParseContext): void {
  const [handleRaw = "", displayName = "", ...rest] = (cue.argument ?? "").split(";").map((s) => s.trim());
  const handle = handleRaw.replace(/^@/, "");
  if (!CHARACTER_NAME_RE.test(handle)) {
    ctx.diagnostics.report("InvalidIntroduction", cue.line, `Introduction needs a character handle, got '${handleRaw}'`);
    return;
  }
  const previous = ctx.characters.get(handle);
  if (previous?.introduced_at !== undefined) {
    ctx.diagnostics.report(
      "DuplicateIntroduction",
      cue.line,
      `Character '@${handle}' was already introduced at line ${previous.introduced_at}`,
    );
  }
  const description = rest.filter(Boolean).join("; ");
  ctx.characters.introduce(handle, {
    displayName: displayName || undefined,
    description: description || undefined,
    line: cue.line,
  });
}

function toElement(block: Block, ctx: ParseContext): Element | null {
  switch (block.kind) {
    case "comment":
      return { type: "comment", text: block.text, line: block.line };
    case "cue": {
      const cue: CueElement = { type: "cue", name: block.name, line: block.line };
      if (block.argument !== undefined) cue.argument = block.argument;
      if (cue.name === "introduce") recordIntroduction(cue, ctx);
      return cue;
    }
    case "stage_direction":
      return toStageDirection(block, ctx);
    case "dialogue":
      return toDialogue(block, ctx);
    default:
      return null;
  }
}

/**
 * Nests scanner blocks into document → acts → scenes → elements. Accepts any
 * block iterable, so it can consume the scanner lazily.
 */
export function buildDocument(blocks: Iterable<Block>, ctx: ParseContext): PlayDocument {
  const body: DocumentNode[] = [];
  const metadata: MetadataEntry[] = [];
  let title: { text: string; line: number } | null = null;
  let act: Act | null = null;
  let scene: Scene | null = null;

  // Placement is checked before the element is segmented, so its diagnostic precedes any from later lines.
  const checkPlacement = (line: number): void => {
    if (!scene && act && ctx.actLevelElements === "reject") {
      ctx.diagnostics.report("ElementOutsideScene", line, `Element appears in act '${act.title}' outside of any scene`);
    }
  };

  const append = (el: Element): void => {
    if (scene) scene.elements.push(el);
    else if (act) act.body.push(el);
    else body.push(el);
  };

  for (const block of blocks) {
    if (block.kind === "metadata") {
      if (isMetadataEligible(ctx.phase)) {
        const existing = metadata.find((m) => m.key === block.key);
        if (existing) {
          ctx.diagnostics.report(
            "DuplicateMetadataKey",
            block.line,
            `Metadata key '${block.key}' was previously set at line ${existing.line}`,
          );
          existing.value = block.value;
          existing.line = block.line;
        } else {
          metadata.push({ key: block.key, value: block.value, line: block.line });
        }
        continue;
      }
      ctx.diagnostics.report(
        "MetadataAfterStructuralContent",
        block.line,
        `Metadata key '${block.key}' after structural content is treated as text`,
      );
      const text = `${block.key}: ${block.value}`.trimEnd();
      checkPlacement(block.line);
      append(
        toStageDirection(
          { kind: "stage_direction", parts: [{ line: block.line, text }], text, line: block.line, end_line: block.line, implicit: true },
          ctx,
        ),
      );
      continue;
    }

    ctx.leavePreStructural();

    switch (block.kind) {
      case "document_title":
        if (title) {
          ctx.diagnostics.report(
            "DuplicateDocumentTitle",
            block.line,
            `Document title '${block.title}' replaces '${title.text}' from line ${title.line}`,
          );
        }
        title = { text: block.title, line: block.line };
        break;
      case "act":
        scene = null;
        act = { type: "act", title: block.title, line: block.line, body: [] };
        body.push(act);
        ctx.phase = "act";
        break;
      case "scene":
        scene = { type: "scene", title: block.title, line: block.line, elements: [] };
        if (act) {
          act.body.push(scene);
        } else {
          ctx.diagnostics.report("OrphanScene", block.line, `Scene '${block.title}' is not inside an act`);
          body.push(scene);
        }
        ctx.phase = "scene";
        break;
      default: {
        checkPlacement(block.line);
        const el = toElement(block, ctx);
        if (el) append(el);
      }
    }
  }

  const doc: PlayDocument = { version: 1, metadata, characters: ctx.characters.list(), body };
  if (title) doc.title = title.text;
  return doc;
}
