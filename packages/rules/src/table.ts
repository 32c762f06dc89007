// packages/rules/src/table.ts
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { z } from "zod";
import type { Severity } from "@mltriage/core";

export type RuleTarget = "pickle" | "source";
export type CallShape = "dynamic-callee" | "extension-registry";

/** `module.name`, where name `*` stands for every attribute of the module. */
export interface SymbolPattern {
  module: string;
  name: string;
}

export type RuleMatch =
  | { type: "symbols"; symbols: readonly SymbolPattern[] }
  | { type: "unexpected-module" }
  | { type: "call-shape"; shape: CallShape }
  | { type: "source-regex"; pattern: RegExp; unless?: RegExp };

export interface Rule {
  id: string;
  title: string;
  severity: Severity;
  category: string;
  rationale: string;
  remediation: string;
  targets: readonly RuleTarget[];
  match: RuleMatch;
}

export interface RuleTable {
  version: string;
  /** File the table was loaded from, or `<bundled>`. */
  source: string;
  rules: readonly Rule[];
  allowlist: {
    modules: readonly string[];
    symbols: readonly SymbolPattern[];
  };
}

export class RuleTableError extends Error {
  readonly source: string;
  readonly issues: readonly string[];

  constructor(source: string, issues: readonly string[]) {
    super(`invalid rule table ${source}: ${issues.join("; ")}`);
    this.name = "RuleTableError";
    this.source = source;
    this.issues = issues;
  }
}

const DOTTED = /^[A-Za-z_][\w]*(?:\.[A-Za-z_][\w]*)*$/;
const SYMBOL = /^[A-Za-z_][\w]*(?:\.[A-Za-z_][\w]*)*\.(?:[A-Za-z_][\w]*|\*)$/;

const SymbolsMatch = z.object({
  type: z.literal("symbols"),
  symbols: z.array(z.string().regex(SYMBOL, "expected module.name or module.*")).min(1),
});

const UnexpectedModuleMatch = z.object({ type: z.literal("unexpected-module") });

const CallShapeMatch = z.object({
  type: z.literal("call-shape"),
  shape: z.enum(["dynamic-callee", "extension-registry"]),
});

const SourceRegexMatch = z.object({
  type: z.literal("source-regex"),
  pattern: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/, "only i, m, s and u flags are allowed").optional(),
  unless: z.string().min(1).optional(),
});

const RuleSchema = z.object({
  id: z.string().regex(/^[A-Z][A-Z0-9_-]*$/, "rule ids are upper-case"),
  title: z.string().min(1),
  severity: z.enum(["critical", "warn", "info"]),
  category: z.string().min(1),
  rationale: z.string().min(1),
  remediation: z.string().min(1),
  targets: z.array(z.enum(["pickle", "source"])).min(1),
  match: z.discriminatedUnion("type", [SymbolsMatch, UnexpectedModuleMatch, CallShapeMatch, SourceRegexMatch]),
});

const RuleTableSchema = z.object({
  version: z.union([z.string().min(1), z.number()]).transform(String),
  allowlist: z
    .object({
      modules: z.array(z.string().regex(DOTTED, "expected a dotted module name")).default([]),
      symbols: z.array(z.string().regex(SYMBOL, "expected module.name")).default([]),
    })
    .default({}),
  rules: z.array(RuleSchema).min(1),
});

type RuleInput = z.infer<typeof RuleSchema>;

// Ids the engines use for their own findings.
const RESERVED_IDS = new Set(["PARSE_ERROR", "CONTAINER_CORRUPT", "NO_PICKLE_STREAM", "SCAN_TIMEOUT", "INTERNAL_ERROR", "NOTEBOOK_INVALID"]);

export function parseSymbol(symbol: string): SymbolPattern {
  const dot = symbol.lastIndexOf(".");
  return { module: symbol.slice(0, dot), name: symbol.slice(dot + 1) };
}

function compile(pattern: string, flags: string | undefined, where: string, issues: string[]): RegExp | undefined {
  try {
    return new RegExp(pattern, flags ?? "");
  } catch (err) {
    issues.push(`${where}: ${err instanceof Error ? err.message : String(err)}`);
    return undefined;
  }
}

function toMatch(input: RuleInput, index: number, issues: string[]): RuleMatch | undefined {
  const m = input.match;
  switch (m.type) {
    case "symbols":
      return { type: "symbols", symbols: m.symbols.map(parseSymbol) };
    case "unexpected-module":
      return { type: "unexpected-module" };
    case "call-shape":
      return { type: "call-shape", shape: m.shape };
    case "source-regex": {
      const pattern = compile(m.pattern, m.flags, `rules.${index}.match.pattern`, issues);
      const unless = m.unless !== undefined ? compile(m.unless, m.flags, `rules.${index}.match.unless`, issues) : undefined;
      if (!pattern) return undefined;
      return { type: "source-regex", pattern, ...(unless ? { unless } : {}) };
    }
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !(value instanceof RegExp) && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Validates a parsed YAML document and returns the frozen table. Every problem
 * found is listed on the thrown RuleTableError.
 */
export function parseRuleTable(doc: unknown, source = "<inline>"): RuleTable {
  const parsed = RuleTableSchema.safeParse(doc);
  if (!parsed.success) {
    throw new RuleTableError(
      source,
      parsed.error.issues.map((i) => `${i.path.length ? i.path.join(".") : "<root>"}: ${i.message}`)
    );
  }

  const issues: string[] = [];
  const seen = new Set<string>();
  const rules: Rule[] = [];

  parsed.data.rules.forEach((input, index) => {
    if (RESERVED_IDS.has(input.id)) issues.push(`rules.${index}.id: ${input.id} is reserved`);
    if (seen.has(input.id)) issues.push(`rules.${index}.id: duplicate rule id ${input.id}`);
    seen.add(input.id);

    if (input.match.type === "source-regex" && input.targets.includes("pickle")) {
      issues.push(`rules.${index}.targets: source-regex rules cannot target pickle`);
    }
    if ((input.match.type === "call-shape" || input.match.type === "unexpected-module") && input.targets.includes("source")) {
      issues.push(`rules.${index}.targets: ${input.match.type} rules only target pickle`);
    }

    const match = toMatch(input, index, issues);
    if (!match) return;
    rules.push({
      id: input.id,
      title: input.title,
      severity: input.severity,
      category: input.category,
      rationale: input.rationale,
      remediation: input.remediation,
      targets: [...new Set(input.targets)],
      match,
    });
  });

  if (issues.length) throw new RuleTableError(source, issues);

  return deepFreeze({
    version: parsed.data.version,
    source,
    rules,
    allowlist: {
      modules: parsed.data.allowlist.modules,
      symbols: parsed.data.allowlist.symbols.map(parseSymbol),
    },
  });
}

// Beside the package sources, or copied next to a bundled CLI build.
const BUNDLED_CANDIDATES = ["../rules/default.yml", "./rules/default.yml"];

export function bundledRulesPath(): string {
  const paths = BUNDLED_CANDIDATES.map((rel) => fileURLToPath(new URL(rel, import.meta.url)));
  return paths.find((p) => fs.existsSync(p)) ?? paths[0] ?? "default.yml";
}

/**
 * Loads a rule table from YAML. Without a path, the table shipped with this
 * package is used.
 */
export function loadRuleTable(filePath?: string): RuleTable {
  const source = filePath ?? "<bundled>";
  let text: string;
  try {
    text = fs.readFileSync(filePath ?? bundledRulesPath(), "utf8");
  } catch (err) {
    throw new RuleTableError(source, [`cannot read file: ${err instanceof Error ? err.message : String(err)}`]);
  }

  let doc: unknown;
  try {
    doc = YAML.parse(text);
  } catch (err) {
    throw new RuleTableError(source, [`invalid YAML: ${err instanceof Error ? err.message : String(err)}`]);
  }
  return parseRuleTable(doc, source);
}

export function rulesFor(table: RuleTable, target: RuleTarget): Rule[] {
  return table.rules.filter((r) => r.targets.includes(target));
}

/** Exact name, a `*` wildcard, or a dotted attribute path below the name. */
export function symbolMatches(pattern: SymbolPattern, module: string, name: string): boolean {
  if (pattern.module !== module) return false;
  return pattern.name === "*" || pattern.name === name || name.startsWith(`${pattern.name}.`);
}

export function isAllowlisted(table: RuleTable, module: string, name: string): boolean {
  if (table.allowlist.modules.some((m) => module === m || module.startsWith(`${m}.`))) return true;
  return table.allowlist.symbols.some((p) => symbolMatches(p, module, name));
}
