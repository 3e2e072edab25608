import { expect, test } from "vitest";

import { buildDocument } from "../src/builder.js";
import { ParseContext } from "../src/context.js";
import { ParseError } from "../src/diagnostics.js";
import { parse } from "../src/parse.js";

const BASIC = [
  "title: A Play",
  "% A note",
  "# The Title",
  "## Act One",
  "### Scene One",
  "@alice: Hello, {waving} world!",
  "> Alice exits.",
  "/lights off",
].join("\n");

test("parse builds the full tree for a basic play", () => {
  const { document, diagnostics } = parse(BASIC);

  expect(diagnostics).toEqual([]);
  expect(document).toEqual({
    version: 1,
    title: "The Title",
    metadata: [{ key: "title", value: "A Play", line: 1 }],
    characters: [{ name: "alice", first_use: { line: 6, element: "dialogue" } }],
    body: [
      { type: "comment", text: "A note", line: 2 },
      {
        type: "act",
        title: "Act One",
        line: 4,
        body: [
          {
            type: "scene",
            title: "Scene One",
            line: 5,
            elements: [
              {
                type: "dialogue",
                speakers: ["alice"],
                segments: [
                  { type: "text", text: "Hello, " },
                  { type: "inline_direction", segments: [{ type: "text", text: "waving" }] },
                  { type: "text", text: " world!" },
                ],
                line: 6,
                end_line: 6,
              },
              { type: "stage_direction", segments: [{ type: "text", text: "Alice exits." }], line: 7, end_line: 7 },
              { type: "cue", name: "lights", argument: "off", line: 8 },
            ],
          },
        ],
      },
    ],
  });
});

test("a multi-speaker cue lists every speaker once", () => {
  const { document, diagnostics } = parse("@alice, @bob: We agree.\n/blackout");

  expect(document.body[0]).toEqual({
    type: "dialogue",
    speakers: ["alice", "bob"],
    segments: [{ type: "text", text: "We agree." }],
    line: 1,
    end_line: 1,
  });
  expect(document.characters.map((c) => c.name)).toEqual(["alice", "bob"]);
  expect(diagnostics).toEqual([]);
});

test("a repeated speaker is dropped with a warning", () => {
  const { document, diagnostics } = parse("@alice, @alice: Hi\n/blackout");

  expect(document.body[0]).toMatchObject({ type: "dialogue", speakers: ["alice"] });
  expect(diagnostics).toEqual([
    { kind: "DuplicateSpeakerInCue", severity: "warning", line: 1, message: "Speaker '@alice' is listed more than once" },
  ]);
});

test("an unterminated brace yields a partial inline direction", () => {
  const { document, diagnostics } = parse("@alice: Wait, {something\n/blackout");

  expect(document.body[0]).toMatchObject({
    segments: [
      { type: "text", text: "Wait, " },
      { type: "inline_direction", segments: [{ type: "text", text: "something" }] },
    ],
  });
  expect(diagnostics.map((d) => [d.kind, d.severity, d.line])).toEqual([
    ["UnterminatedInlineDirection", "warning", 1],
  ]);
});

test("a scene without an act attaches to the document", () => {
  const { document, diagnostics } = parse("### Prologue\n> Dark.\n/blackout");

  expect(document.body).toEqual([
    {
      type: "scene",
      title: "Prologue",
      line: 1,
      elements: [
        { type: "stage_direction", segments: [{ type: "text", text: "Dark." }], line: 2, end_line: 2 },
        { type: "cue", name: "blackout", line: 3 },
      ],
    },
  ]);
  expect(diagnostics).toEqual([
    { kind: "OrphanScene", severity: "info", line: 1, message: "Scene 'Prologue' is not inside an act" },
  ]);
});

test("metadata after a cue becomes stage direction text", () => {
  const { document, diagnostics } = parse("/cue\nheading: value");

  expect(document.metadata).toEqual([]);
  expect(document.body).toEqual([
    { type: "cue", name: "cue", line: 1 },
    {
      type: "stage_direction",
      segments: [{ type: "text", text: "heading: value" }],
      line: 2,
      end_line: 2,
      implicit: true,
    },
  ]);
  expect(diagnostics.map((d) => [d.kind, d.line])).toEqual([
    ["MetadataAfterStructuralContent", 2],
    ["UnterminatedBlockAtEOF", 2],
  ]);
});

test("a metadata-shaped line inside dialogue continues it", () => {
  const { document } = parse("@alice: Hi\nnote: later\n/blackout");

  expect(document.body[0]).toMatchObject({ segments: [{ type: "text", text: "Hi note: later" }], end_line: 2 });
});

test("duplicate metadata keys keep their position and take the last value", () => {
  const { document, diagnostics } = parse("title: One\nauthor: Me\ntitle: Two\n# T");

  expect(document.metadata).toEqual([
    { key: "title", value: "Two", line: 3 },
    { key: "author", value: "Me", line: 2 },
  ]);
  expect(diagnostics).toEqual([
    {
      kind: "DuplicateMetadataKey",
      severity: "warning",
      line: 3,
      message: "Metadata key 'title' was previously set at line 1",
    },
  ]);
});

test("the last document title wins", () => {
  const { document, diagnostics } = parse("# One\n# Two");

  expect(document.title).toBe("Two");
  expect(diagnostics.map((d) => d.kind)).toEqual(["DuplicateDocumentTitle"]);
});

test("document order is preserved across acts and scenes", () => {
  const { document } = parse(
    ["## I", "> Before.", "### a", "/one", "### b", "/two", "## II", "### c", "/three"].join("\n"),
  );

  expect(document.body).toMatchObject([
    {
      type: "act",
      title: "I",
      body: [
        { type: "stage_direction", line: 2 },
        { type: "scene", title: "a", elements: [{ name: "one" }] },
        { type: "scene", title: "b", elements: [{ name: "two" }] },
      ],
    },
    { type: "act", title: "II", body: [{ type: "scene", title: "c", elements: [{ name: "three" }] }] },
  ]);
});

test("act-level elements can be rejected by policy", () => {
  const src = "## I\n> Before.\n### a\n/one";

  expect(parse(src, { actLevelElements: "reject" }).diagnostics).toEqual([
    {
      kind: "ElementOutsideScene",
      severity: "error",
      line: 2,
      message: "Element appears in act 'I' outside of any scene",
    },
  ]);
  expect(() => parse(src, { mode: "strict", actLevelElements: "reject" })).toThrow(ParseError);
  expect(parse(src, { mode: "strict" }).diagnostics).toEqual([]);
});

test("strict mode throws the first error while lenient mode collects all", () => {
  const src = "stray words\n@bob: a } b }\n/blackout";

  const lenient = parse(src);
  expect(lenient.diagnostics.map((d) => [d.kind, d.line])).toEqual([
    ["OrphanTextLine", 1],
    ["UnmatchedClosingBrace", 2],
    ["UnmatchedClosingBrace", 2],
  ]);
  expect(lenient.document.body[0]).toMatchObject({ type: "stage_direction", implicit: true });

  try {
    parse(src, { mode: "strict" });
    expect.unreachable();
  } catch (err) {
    expect(err).toBeInstanceOf(ParseError);
    if (err instanceof ParseError) expect([err.kind, err.line]).toEqual(["OrphanTextLine", 1]);
  }
});

test("strict mode still returns warnings and info", () => {
  const { diagnostics } = parse("### Prologue\n@alice, @alice: Hi", { mode: "strict" });

  expect(diagnostics.map((d) => d.kind)).toEqual(["OrphanScene", "UnterminatedBlockAtEOF", "DuplicateSpeakerInCue"]);
});

test("characters are listed in order of first use", () => {
  const { document } = parse("> @carol enters.\n@bob: Hi @alice and @carol\n/blackout");

  expect(document.characters).toEqual([
    { name: "carol", first_use: { line: 1, element: "stage_direction" } },
    { name: "bob", first_use: { line: 2, element: "dialogue" } },
    { name: "alice", first_use: { line: 2, element: "dialogue" } },
  ]);
});

test("introduce cues annotate the cast", () => {
  const { document, diagnostics } = parse(
    "@alice: Hi\n/introduce @alice; Alice Liddell; a curious girl; age seven\n/introduce bob\n/introduce ; Nobody\n/introduce @alice; Alice",
  );

  expect(document.characters).toEqual([
    {
      name: "alice",
      first_use: { line: 1, element: "dialogue" },
      display_name: "Alice",
      introduced_at: 5,
    },
    { name: "bob", first_use: { line: 3, element: "cue" }, introduced_at: 3 },
  ]);
  expect(diagnostics.map((d) => [d.kind, d.line])).toEqual([
    ["InvalidIntroduction", 4],
    ["DuplicateIntroduction", 5],
  ]);
  expect(document.body[1]).toEqual({
    type: "cue",
    name: "introduce",
    argument: "@alice; Alice Liddell; a curious girl; age seven",
    line: 2,
  });
});

test("a declared cast warns once per unintroduced character", () => {
  const { document, diagnostics } = parse(
    "/introduce @alice; Alice; the lead\n@alice: Hi\n@bob: Hey\n@bob: Again @bob\n/blackout",
    { cast: "declared" },
  );

  expect(diagnostics).toEqual([
    {
      kind: "UndeclaredCharacter",
      severity: "warning",
      line: 3,
      message: "Character '@bob' is referenced before being introduced",
    },
  ]);
  expect(document.characters[0]).toEqual({
    name: "alice",
    first_use: { line: 1, element: "cue" },
    display_name: "Alice",
    description: "the lead",
    introduced_at: 1,
  });
});

test("separate parses do not share state", () => {
  parse("@alice: Hi\n/blackout");
  const { document } = parse("@bob: Hi\n/blackout");

  expect(document.characters.map((c) => c.name)).toEqual(["bob"]);
});

test("a byte order mark and CRLF line endings are accepted", () => {
  const { document } = parse("\uFEFFtitle: X\r\n# T\r\n");

  expect(document.metadata).toEqual([{ key: "title", value: "X", line: 1 }]);
  expect(document.title).toBe("T");
});

test("buildDocument demotes metadata blocks that arrive after content", () => {
  const ctx = new ParseContext();
  const doc = buildDocument(
    [
      { kind: "cue", name: "go", line: 1 },
      { kind: "metadata", key: "status", value: "", line: 2 },
    ],
    ctx,
  );

  expect(doc.body[1]).toEqual({
    type: "stage_direction",
    segments: [{ type: "text", text: "status:" }],
    line: 2,
    end_line: 2,
    implicit: true,
  });
  expect(ctx.diagnostics.list().map((d) => d.kind)).toEqual(["MetadataAfterStructuralContent"]);
});

test("dialogue still open at end of input is reported as info", () => {
  expect(parse("@alice, @bob: We agree.").diagnostics).toEqual([
    {
      kind: "UnterminatedBlockAtEOF",
      severity: "info",
      line: 1,
      message: "Dialogue opened at line 1 closes at end of input",
    },
  ]);

  const { document, diagnostics } = parse("@alice: Wait, {something");
  expect(document.body).toEqual([
    {
      type: "dialogue",
      speakers: ["alice"],
      segments: [
        { type: "text", text: "Wait, " },
        { type: "inline_direction", segments: [{ type: "text", text: "something" }] },
      ],
      line: 1,
      end_line: 1,
    },
  ]);
  expect(diagnostics).toEqual([
    {
      kind: "UnterminatedBlockAtEOF",
      severity: "info",
      line: 1,
      message: "Dialogue opened at line 1 closes at end of input",
    },
    {
      kind: "UnterminatedInlineDirection",
      severity: "warning",
      line: 1,
      message: "Inline direction is missing its closing '}'",
    },
  ]);
});

test("empty input gives an empty document", () => {
  expect(parse("")).toEqual({
    document: { version: 1, metadata: [], characters: [], body: [] },
    diagnostics: [],
  });
});

test("strict and lenient build the same tree for well-formed plays", () => {
  const plays = [
    BASIC,
    "@alice, @bob: We agree.",
    ["## I", "> Before.", "### a", "@ann: Hi {to @ben}", "### b", "/two"].join("\n"),
    "/introduce @ann; Ann\n### Prologue\n> @(Annu)ann waits.",
  ];

  for (const src of plays) {
    const lenient = parse(src);
    const strict = parse(src, { mode: "strict" });
    expect(strict.document).toEqual(lenient.document);
    expect(strict.diagnostics).toEqual(lenient.diagnostics);
  }
});

test("strict mode surfaces the earliest error lenient mode finds", () => {
  const src = "## I\n> Before\nstill } here\n### a\n/one";

  const lenient = parse(src, { actLevelElements: "reject" });
  expect(lenient.diagnostics.map((d) => [d.kind, d.line])).toEqual([
    ["ElementOutsideScene", 2],
    ["UnmatchedClosingBrace", 3],
  ]);
  const firstError = lenient.diagnostics.find((d) => d.severity === "error");

  try {
    parse(src, { mode: "strict", actLevelElements: "reject" });
    expect.unreachable();
  } catch (err) {
    expect(err).toBeInstanceOf(ParseError);
    if (err instanceof ParseError) expect(err.diagnostic).toEqual(firstError);
  }
});

test("a declined mention registers the base character", () => {
  const { document } = parse("> She looks at @(Gertrudu)gertrude angrily.\n/x");

  expect(document.body[0]).toMatchObject({
    segments: [
      { type: "text", text: "She looks at " },
      { type: "mention", character: "gertrude", declension: "Gertrudu" },
      { type: "text", text: " angrily." },
    ],
  });
  expect(document.characters).toEqual([{ name: "gertrude", first_use: { line: 1, element: "stage_direction" } }]);
});
