export type ElementType = "comment" | "stage_direction" | "dialogue" | "cue";

export interface TextSegment {
  type: "text";
  text: string;
}

export interface MentionSegment {
  type: "mention";
  character: string; // CharacterRef: the name without "@"
  // Inflected form from "@(Gertrudu)gertrude"; the character is still "gertrude".
  declension?: string;
}

// Inline directions nest exactly one level deep.
export interface InlineDirectionSegment {
  type: "inline_direction";
  segments: Array<TextSegment | MentionSegment>;
}

export type Segment = TextSegment | MentionSegment | InlineDirectionSegment;

export interface CommentElement {
  type: "comment";
  text: string;
  line: number;
}

export interface StageDirectionElement {
  type: "stage_direction";
  segments: Segment[];
  line: number;
  end_line: number;
  // Opened by an orphan line or a demoted metadata line rather than by "> ".
  implicit?: true;
}

export interface DialogueElement {
  type: "dialogue";
  speakers: string[];
  segments: Segment[];
  line: number;
  end_line: number;
}

export interface CueElement {
  type: "cue";
  name: string;
  argument?: string;
  line: number;
}

export type Element = CommentElement | StageDirectionElement | DialogueElement | CueElement;

export interface Scene {
  type: "scene";
  title: string;
  line: number;
  elements: Element[];
}

export interface Act {
  type: "act";
  title: string;
  line: number;
  // Act-level elements can only precede the act's first scene.
  body: Array<Scene | Element>;
}

export type DocumentNode = Act | Scene | Element;

export interface MetadataEntry {
  key: string;
  value: string;
  line: number;
}

export interface CharacterFirstUse {
  line: number;
  element: ElementType;
}

export interface Character {
  name: string;
  first_use: CharacterFirstUse;
  display_name?: string;
  description?: string;
  introduced_at?: number;
}

export interface PlayDocument {
  version: 1;
  title?: string;
  metadata: MetadataEntry[];
  characters: Character[];
  body: DocumentNode[];
}

export type ParseMode = "strict" | "lenient";

export type ActLevelElementsPolicy = "allow" | "reject";

export type CastPolicy = "auto" | "declared";

export interface ParseOptions {
  mode?: ParseMode;
  actLevelElements?: ActLevelElementsPolicy;
  cast?: CastPolicy;
}

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticKind =
  | "DuplicateMetadataKey"
  | "MetadataAfterStructuralContent"
  | "DuplicateDocumentTitle"
  | "OrphanTextLine"
  | "OrphanScene"
  | "DuplicateSpeakerInCue"
  | "NestedInlineDirection"
  | "UnmatchedClosingBrace"
  | "UnterminatedInlineDirection"
  | "UnterminatedBlockAtEOF"
  | "ElementOutsideScene"
  | "UndeclaredCharacter"
  | "DuplicateIntroduction"
  | "InvalidIntroduction";

export interface Diagnostic {
  kind: DiagnosticKind;
  severity: DiagnosticSeverity;
  line: number;
  message: string;
}

export interface ParseResult {
  document: PlayDocument;
  diagnostics: Diagnostic[];
}
