import type { Act, DocumentNode, Element, PlayDocument, Scene, Segment } from "./types.js";

export interface ElementLocation {
  element: Element;
  act: Act | null;
  scene: Scene | null;
}

function isElement(node: DocumentNode): node is Element {
  return node.type !== "act" && node.type !== "scene";
}

/** Yields every element in performance order with its enclosing act and scene. */
export function* walkElements(doc: PlayDocument): Generator<ElementLocation, void, undefined> {
  for (const node of doc.body) {
    if (isElement(node)) {
      yield { element: node, act: null, scene: null };
    } else if (node.type === "scene") {
      for (const element of node.elements) yield { element, act: null, scene: node };
    } else {
      for (const child of node.body) {
        if (child.type === "scene") {
          for (const element of child.elements) yield { element, act: node, scene: child };
        } else {
          yield { element: child, act: node, scene: null };
        }
      }
    }
  }
}

export function listScenes(doc: PlayDocument): Scene[] {
  const scenes: Scene[] = [];
  for (const node of doc.body) {
    if (node.type === "scene") scenes.push(node);
    if (node.type === "act") {
      for (const child of node.body) if (child.type === "scene") scenes.push(child);
    }
  }
  return scenes;
}

/** Source-like text of segments: mentions as "@name" or "@(declension)name", inline directions in braces. */
export function segmentsToText(segments: Segment[]): string {
  return segments
    .map((s) => {
      if (s.type === "text") return s.text;
      if (s.type === "mention") return s.declension === undefined ? `@${s.character}` : `@(${s.declension})${s.character}`;
      return `{${segmentsToText(s.segments)}}`;
    })
    .join("");
}

/** Number of mentions and spoken cues per character. */
export function countCharacterReferences(doc: PlayDocument): Map<string, number> {
  const counts = new Map<string, number>();
  const bump = (name: string): void => {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  };
  const visit = (segments: Segment[]): void => {
    for (const s of segments) {
      if (s.type === "mention") bump(s.character);
      if (s.type === "inline_direction") visit(s.segments);
    }
  };
  for (const { element } of walkElements(doc)) {
    if (element.type === "dialogue") {
      element.speakers.forEach(bump);
      visit(element.segments);
    } else if (element.type === "stage_direction") {
      visit(element.segments);
    }
  }
  return counts;
}
