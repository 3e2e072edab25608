// Line patterns, in priority order. Editor grammars mirror these; keep them in sync.
export const LINE_PATTERNS = {
  comment: /^%(.*)$/,
  scene: /^###\s+(.*)$/,
  act: /^##\s+(.*)$/,
  documentTitle: /^#\s+(.*)$/,
  cue: /^\/([A-Za-z_][A-Za-z0-9_-]*)(?:\s+(.*))?$/,
  metadata: /^([A-Za-z0-9_-]+):\s?(.*)$/,
  stageDirection: /^>(?:\s+(.*))?$/,
  dialogue: /^(@[A-Za-z0-9]+(?:\s*,\s*@[A-Za-z0-9]+)*):\s?(.*)$/,
} as const;

export type LineClass =
  | { type: "blank" }
  | { type: "comment"; text: string }
  | { type: "scene"; title: string }
  | { type: "act"; title: string }
  | { type: "document_title"; title: string }
  | { type: "cue"; name: string; argument?: string }
  | { type: "metadata"; key: string; value: string }
  | { type: "stage_direction_open"; text: string }
  | { type: "dialogue_open"; speakers: string[]; text: string }
  | { type: "continuation"; text: string; demotedMetadata: boolean };

export interface ClassifyOptions {
  preStructural: boolean;
}

/** Lexical metadata shape only; whether it counts as metadata depends on the parse phase. */
export function matchMetadataShape(text: string): { key: string; value: string } | null {
  const m = text.match(LINE_PATTERNS.metadata);
  if (!m || !m[1]) return null;
  return { key: m[1], value: (m[2] ?? "").trim() };
}

function parseSpeakers(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim().replace(/^@/, ""))
    .filter(Boolean);
}

export function classifyLine(text: string, options: ClassifyOptions): LineClass {
  if (!text.trim()) return { type: "blank" };

  let m = text.match(LINE_PATTERNS.comment);
  if (m) return { type: "comment", text: (m[1] ?? "").trim() };

  m = text.match(LINE_PATTERNS.scene);
  if (m) return { type: "scene", title: (m[1] ?? "").trim() };

  m = text.match(LINE_PATTERNS.act);
  if (m) return { type: "act", title: (m[1] ?? "").trim() };

  m = text.match(LINE_PATTERNS.documentTitle);
  if (m) return { type: "document_title", title: (m[1] ?? "").trim() };

  m = text.match(LINE_PATTERNS.cue);
  if (m && m[1]) {
    const argument = (m[2] ?? "").trim();
    return argument ? { type: "cue", name: m[1], argument } : { type: "cue", name: m[1] };
  }

  const meta = matchMetadataShape(text);
  if (meta) {
    if (options.preStructural) return { type: "metadata", ...meta };
    return { type: "continuation", text: text.trim(), demotedMetadata: true };
  }

  m = text.match(LINE_PATTERNS.stageDirection);
  if (m) return { type: "stage_direction_open", text: (m[1] ?? "").trim() };

  m = text.match(LINE_PATTERNS.dialogue);
  if (m && m[1]) return { type: "dialogue_open", speakers: parseSpeakers(m[1]), text: (m[2] ?? "").trim() };

  return { type: "continuation", text: text.trim(), demotedMetadata: false };
}
