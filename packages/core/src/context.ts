import { CharacterRegistry } from "./characters.js";
import { DiagnosticsCollector } from "./diagnostics.js";
import type { ActLevelElementsPolicy, CastPolicy, ElementType, ParseMode, ParseOptions } from "./types.js";

export type ParsePhase = "pre_structural" | "document" | "act" | "scene";

/**
 * All mutable state of a single parse. Scanner and builder share one instance;
 * nothing is kept at module level.
 */
export class ParseContext {
  public phase: ParsePhase = "pre_structural";
  public readonly mode: ParseMode;
  public readonly actLevelElements: ActLevelElementsPolicy;
  public readonly cast: CastPolicy;
  public readonly characters = new CharacterRegistry();
  public readonly diagnostics: DiagnosticsCollector;

  private readonly undeclaredReported = new Set<string>();

  constructor(options: ParseOptions = {}) {
    this.mode = options.mode ?? "lenient";
    this.actLevelElements = options.actLevelElements ?? "allow";
    this.cast = options.cast ?? "auto";
    this.diagnostics = new DiagnosticsCollector(this.mode);
  }

  get preStructural(): boolean {
    return this.phase === "pre_structural";
  }

  leavePreStructural(): void {
    if (this.phase === "pre_structural") this.phase = "document";
  }

  /** Registers a speaker or mention, applying the cast policy. */
  referenceCharacter(name: string, line: number, element: ElementType): string {
    if (this.cast === "declared" && !this.characters.isIntroduced(name) && !this.undeclaredReported.has(name)) {
      this.undeclaredReported.add(name);
      this.diagnostics.report("UndeclaredCharacter", line, `Character '@${name}' is referenced before being introduced`);
    }
    return this.characters.lookupOrCreate(name, line, element);
  }
}
