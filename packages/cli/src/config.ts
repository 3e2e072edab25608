import { z } from "zod";

import type { ActLevelElementsPolicy, CastPolicy, ParseMode } from "@stagemark/core";

import { CliError } from "./errors.js";

export const ParseModeSchema = z.enum(["strict", "lenient"]);
export const ActElementsSchema = z.enum(["allow", "reject"]);
export const CastSchema = z.enum(["auto", "declared"]);

export interface CliFlags {
  mode?: string;
  actElements?: string;
  cast?: string;
}

export interface ResolvedParseOptions {
  mode: ParseMode;
  actLevelElements: ActLevelElementsPolicy;
  cast: CastPolicy;
}

function envOverride(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw && raw.length > 0 ? raw : undefined;
}

function pick<T extends string>(schema: z.ZodEnum<[T, ...T[]]>, label: string, raw: string | undefined): T | undefined {
  if (raw === undefined) return undefined;
  const parsed = schema.safeParse(raw.trim());
  if (!parsed.success) {
    throw new CliError("INVALID_OPTION", `Invalid ${label}: ${raw}. Expected one of: ${schema.options.join(", ")}`);
  }
  return parsed.data;
}

// Flags win over STAGEMARK_* environment defaults.
export function resolveParseOptions(flags: CliFlags, env: NodeJS.ProcessEnv = process.env): ResolvedParseOptions {
  return {
    mode: pick(ParseModeSchema, "mode", flags.mode ?? envOverride(env, "STAGEMARK_MODE")) ?? "lenient",
    actLevelElements:
      pick(ActElementsSchema, "act elements policy", flags.actElements ?? envOverride(env, "STAGEMARK_ACT_ELEMENTS")) ??
      "allow",
    cast: pick(CastSchema, "cast policy", flags.cast ?? envOverride(env, "STAGEMARK_CAST")) ?? "auto",
  };
}
