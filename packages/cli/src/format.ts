import type { Character, Diagnostic, Element, PlayDocument, Scene } from "@stagemark/core";

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

export function formatDiagnostic(d: Diagnostic, file: string): string {
  return `File "${file}", line ${d.line} - ${d.severity} [${d.kind}]: ${d.message}`;
}

export function formatSummary(diagnostics: Diagnostic[]): string {
  const errors = diagnostics.filter((d) => d.severity === "error").length;
  const warnings = diagnostics.filter((d) => d.severity === "warning").length;
  return `${plural(errors, "error")}, ${plural(warnings, "warning")}`;
}

function sceneLine(scene: Scene, indent: string): string {
  return `${indent}### ${scene.title} (${plural(scene.elements.length, "element")})`;
}

export function formatOutline(doc: PlayDocument): string[] {
  const out: string[] = [];
  if (doc.title !== undefined) out.push(`# ${doc.title}`);

  const loose: Element[] = [];
  for (const node of doc.body) {
    if (node.type === "act") {
      out.push(`## ${node.title}`);
      const actLevel = node.body.filter((child) => child.type !== "scene").length;
      if (actLevel > 0) out.push(`  (${plural(actLevel, "element")} before the first scene)`);
      for (const child of node.body) {
        if (child.type === "scene") out.push(sceneLine(child, "  "));
      }
    } else if (node.type === "scene") {
      out.push(sceneLine(node, ""));
    } else {
      loose.push(node);
    }
  }

  if (loose.length > 0) {
    out.splice(doc.title !== undefined ? 1 : 0, 0, `(${plural(loose.length, "element")} outside any act or scene)`);
  }
  return out;
}

export function formatCharacter(c: Character, references: number): string {
  const name = c.display_name ? ` ${c.display_name}` : "";
  const description = c.description ? ` - ${c.description}` : "";
  return `@${c.name}${name}${description} (first use line ${c.first_use.line}, ${c.first_use.element}; ${plural(references, "reference")})`;
}
