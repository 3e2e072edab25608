export * from "./types.js";
export { parse } from "./parse.js";
export { DIAGNOSTIC_SEVERITY, DiagnosticsCollector, ParseError } from "./diagnostics.js";
export { CharacterRegistry } from "./characters.js";
export { ParseContext } from "./context.js";
export type { ParsePhase } from "./context.js";
export { LINE_PATTERNS, classifyLine, matchMetadataShape } from "./classify.js";
export type { ClassifyOptions, LineClass } from "./classify.js";
export { joinParts, lineLocator, scanBlocks } from "./scanner.js";
export type { Block, BlockPart, DialogueBlock, StageDirectionBlock } from "./scanner.js";
export { segmentInline } from "./inline.js";
export type { SegmentInlineOptions } from "./inline.js";
export { buildDocument, isMetadataEligible } from "./builder.js";
export { normalizeSource, splitLines } from "./normalize.js";
export type { SourceLine } from "./normalize.js";
export {
  ElementSchema,
  InterchangeError,
  PlayDocumentSchema,
  SegmentSchema,
  deserializeDocument,
  serializeDocument,
} from "./interchange.js";
export type { SerializeOptions } from "./interchange.js";
export { countCharacterReferences, listScenes, segmentsToText, walkElements } from "./walk.js";
export type { ElementLocation } from "./walk.js";
