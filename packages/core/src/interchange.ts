import { z } from "zod";

import type { PlayDocument } from "./types.js";

const LineSchema = z.number().int().nonnegative();
const CharacterNameSchema = z.string().regex(/^[A-Za-z0-9]+$/);

const TextSegmentSchema = z.object({ type: z.literal("text"), text: z.string() });
const MentionSegmentSchema = z.object({
  type: z.literal("mention"),
  character: CharacterNameSchema,
  declension: z.string().min(1).optional(),
});

// Inline directions hold only text and mentions: one nesting level.
const InlineDirectionSegmentSchema = z.object({
  type: z.literal("inline_direction"),
  segments: z.array(z.discriminatedUnion("type", [TextSegmentSchema, MentionSegmentSchema])),
});

export const SegmentSchema = z.discriminatedUnion("type", [
  TextSegmentSchema,
  MentionSegmentSchema,
  InlineDirectionSegmentSchema,
]);

const CommentElementSchema = z.object({ type: z.literal("comment"), text: z.string(), line: LineSchema });

const StageDirectionElementSchema = z.object({
  type: z.literal("stage_direction"),
  segments: z.array(SegmentSchema),
  line: LineSchema,
  end_line: LineSchema,
  implicit: z.literal(true).optional(),
});

const DialogueElementSchema = z.object({
  type: z.literal("dialogue"),
  speakers: z.array(CharacterNameSchema),
  segments: z.array(SegmentSchema),
  line: LineSchema,
  end_line: LineSchema,
});

const CueElementSchema = z.object({
  type: z.literal("cue"),
  name: z.string().min(1),
  argument: z.string().optional(),
  line: LineSchema,
});

export const ElementSchema = z.discriminatedUnion("type", [
  CommentElementSchema,
  StageDirectionElementSchema,
  DialogueElementSchema,
  CueElementSchema,
]);

const SceneSchema = z.object({
  type: z.literal("scene"),
  title: z.string(),
  line: LineSchema,
  elements: z.array(ElementSchema),
});

const ActSchema = z.object({
  type: z.literal("act"),
  title: z.string(),
  line: LineSchema,
  body: z.array(
    z.discriminatedUnion("type", [
      SceneSchema,
      CommentElementSchema,
      StageDirectionElementSchema,
      DialogueElementSchema,
      CueElementSchema,
    ]),
  ),
});

const CharacterSchema = z.object({
  name: CharacterNameSchema,
  first_use: z.object({
    line: LineSchema,
    element: z.enum(["comment", "stage_direction", "dialogue", "cue"]),
  }),
  display_name: z.string().optional(),
  description: z.string().optional(),
  introduced_at: LineSchema.optional(),
});

export const PlayDocumentSchema = z.object({
  version: z.literal(1),
  title: z.string().optional(),
  metadata: z.array(z.object({ key: z.string().min(1), value: z.string(), line: LineSchema })),
  characters: z.array(CharacterSchema),
  body: z.array(
    z.discriminatedUnion("type", [
      ActSchema,
      SceneSchema,
      CommentElementSchema,
      StageDirectionElementSchema,
      DialogueElementSchema,
      CueElementSchema,
    ]),
  ),
});

export class InterchangeError extends Error {
  public readonly code = "INVALID_DOCUMENT";

  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "InterchangeError";
  }
}

export interface SerializeOptions {
  pretty?: boolean;
}

export function serializeDocument(doc: PlayDocument, options: SerializeOptions = {}): string {
  return JSON.stringify(doc, null, options.pretty ? 2 : undefined);
}

export function deserializeDocument(json: string): PlayDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new InterchangeError(`Invalid JSON: ${msg}`);
  }
  const result = PlayDocumentSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new InterchangeError(`Invalid document: ${issues[0] ?? "unknown issue"}`, issues);
  }
  return result.data;
}
