export interface SourceLine {
  line: number; // 1-based
  text: string;
}

function stripBom(input: string): string {
  return input.charCodeAt(0) === 0xfeff ? input.slice(1) : input;
}

export function normalizeSource(raw: string): string {
  return stripBom(raw).replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

export function splitLines(raw: string): SourceLine[] {
  return normalizeSource(raw)
    .split("\n")
    .map((text, i) => ({ line: i + 1, text: text.replace(/\s+$/g, "") }));
}
