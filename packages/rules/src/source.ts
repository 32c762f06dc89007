// packages/rules/src/source.ts
import type { RawFinding } from "@mltriage/core";
import { rulesFor, symbolMatches, type Rule, type RuleTable } from "./table.js";

export type SourceTokenKind = "call" | "pattern";

/** One rule hit in a source file, before it becomes a finding. */
export interface SourceToken {
  filePath: string;
  line: number;
  column: number;
  kind: SourceTokenKind;
  /** Resolved dotted name, or the matched text for pattern rules. */
  symbol: string;
  /** The original source line, trimmed. */
  text: string;
  ruleId: string;
}

export interface SourceScanOptions {
  engineId?: string;
  /** Maps a line of `text` back to where it came from (a notebook cell). */
  locate?: (line: number) => { line: number; cell?: number };
}

interface LogicalLine {
  text: string;
  /** Offset in `text` where each physical line starts. */
  starts: number[];
  firstLine: number;
}

const MAX_EVIDENCE = 200;
const MAX_JOINED_LINES = 50;

const KEYWORDS = new Set([
  "and", "as", "assert", "async", "await", "break", "class", "continue", "def", "del", "elif", "else",
  "except", "finally", "for", "from", "global", "if", "import", "in", "is", "lambda", "nonlocal", "not",
  "or", "pass", "raise", "return", "try", "while", "with", "yield", "print",
]);

type LexState = { kind: "code" } | { kind: "string"; quote: string; raw: boolean; triple: boolean };

/**
 * Masks `lines[from..]` into `out`. Returns the index of the line that opened
 * a triple-quoted string still open at the end, if any.
 */
function maskLines(lines: readonly string[], from: number, out: string[]): number | undefined {
  let state: LexState = { kind: "code" };
  let openedAt: number | undefined;

  for (let n = from; n < lines.length; n++) {
    const line = lines[n] ?? "";
    const chars = line.split("");
    let i = 0;
    while (i < chars.length) {
      const c = chars[i] ?? "";
      if (state.kind === "string") {
        if (c === "\\" && !state.raw) {
          chars[i] = " ";
          if (i + 1 < chars.length) chars[i + 1] = " ";
          i += 2;
          continue;
        }
        const close = state.triple ? state.quote.repeat(3) : state.quote;
        if (chars.slice(i, i + close.length).join("") === close) {
          i += close.length;
          state = { kind: "code" };
          continue;
        }
        chars[i] = " ";
        i++;
        continue;
      }

      if (c === "#") {
        for (let j = i; j < chars.length; j++) chars[j] = " ";
        break;
      }
      if (c === '"' || c === "'") {
        const triple = chars[i + 1] === c && chars[i + 2] === c;
        let p = i - 1;
        while (p >= 0 && /[rRbBuUfF]/.test(chars[p] ?? "")) p--;
        const prefix = chars.slice(p + 1, i).join("");
        const isPrefix = prefix.length <= 2 && !/[\w]/.test(chars[p] ?? "");
        state = { kind: "string", quote: c, raw: isPrefix && /r/i.test(prefix), triple };
        if (triple) openedAt = n;
        i += triple ? 3 : 1;
        continue;
      }
      i++;
    }

    if (state.kind === "string" && !state.triple && !line.endsWith("\\")) state = { kind: "code" };
    out.push(chars.join(""));
  }
  return state.kind === "string" && state.triple ? openedAt : undefined;
}

/**
 * Blanks out comments and string contents, keeping quotes, prefixes and column
 * positions. Triple-quoted strings carry over lines; a single-quoted string
 * ends at the line unless the line ends in a backslash. A triple-quoted string
 * that is never closed ends with its opening line, and the lines after it are
 * read as code again.
 */
export function maskSource(lines: readonly string[]): string[] {
  const out: string[] = [];
  let from = 0;
  for (;;) {
    const open = maskLines(lines, from, out);
    if (open === undefined) return out;
    out.length = open + 1;
    from = open + 1;
  }
}

function bracketDelta(line: string): number {
  let d = 0;
  for (const c of line) {
    if (c === "(" || c === "[" || c === "{") d++;
    else if (c === ")" || c === "]" || c === "}") d--;
  }
  return d;
}

/** Joins bracketed and backslash-continued physical lines. */
function logicalLines(masked: readonly string[]): LogicalLine[] {
  const out: LogicalLine[] = [];
  let cur: LogicalLine | undefined;
  let depth = 0;

  masked.forEach((line, index) => {
    if (!cur) {
      cur = { text: line, starts: [0], firstLine: index + 1 };
    } else {
      cur.starts.push(cur.text.length + 1);
      cur.text += `\n${line}`;
    }
    depth = Math.max(0, depth + bracketDelta(line));
    const continued = (depth > 0 || /\\\s*$/.test(line)) && cur.starts.length < MAX_JOINED_LINES;
    if (!continued) {
      out.push(cur);
      cur = undefined;
      depth = 0;
    }
  });
  if (cur) out.push(cur);
  return out;
}

function position(l: LogicalLine, offset: number): { line: number; column: number } {
  let k = 0;
  while (k + 1 < l.starts.length && (l.starts[k + 1] ?? Infinity) <= offset) k++;
  return { line: l.firstLine + k, column: offset - (l.starts[k] ?? 0) + 1 };
}

/**
 * Name bindings made by `import` statements: local name to dotted target.
 * `import a.b` binds `a`; `from a import b as c` binds `c` to `a.b`.
 */
export function importBindings(statement: string): [string, string][] | undefined {
  const flat = statement.replace(/\\\n/g, " ").replace(/\s+/g, " ").trim();

  const plain = /^import ([\w., ]+)$/.exec(flat);
  if (plain?.[1]) {
    const bindings: [string, string][] = [];
    for (const part of plain[1].split(",")) {
      const m = /^\s*([\w.]+)(?:\s+as\s+(\w+))?\s*$/.exec(part);
      if (!m?.[1]) continue;
      const head = m[1].split(".")[0] ?? m[1];
      bindings.push(m[2] ? [m[2], m[1]] : [head, head]);
    }
    return bindings;
  }

  const from = /^from ([\w.]+) import \(?([\w, *]+?)\)?$/.exec(flat.replace(/,\s*\)$/, ")").replace(/,$/, ""));
  if (from?.[1] && from[2]) {
    const module = from[1];
    const bindings: [string, string][] = [];
    for (const part of from[2].split(",")) {
      const m = /^\s*(\w+)(?:\s+as\s+(\w+))?\s*$/.exec(part);
      if (!m?.[1]) continue;
      bindings.push([m[2] ?? m[1], `${module}.${m[1]}`]);
    }
    return bindings;
  }
  return undefined;
}

/** Dotted call target after alias substitution; bare names are builtins. */
function resolveCall(name: string, aliases: ReadonlyMap<string, string>): string {
  const parts = name.split(".");
  const head = parts[0] ?? name;
  const target = aliases.get(head);
  if (target !== undefined) return [target, ...parts.slice(1)].join(".");
  return parts.length === 1 ? `builtins.${name}` : name;
}

function splitSymbol(symbol: string): { module: string; name: string } {
  const dot = symbol.lastIndexOf(".");
  return { module: symbol.slice(0, dot), name: symbol.slice(dot + 1) };
}

const CALL_RE = /(?<![\w.])([A-Za-z_]\w*(?:\s*\.\s*[A-Za-z_]\w*)*)\s*\(/g;
const IMPORT_START = /^\s*(?:import|from)\s/;

/**
 * Finds rule hits in Python source. Never throws: unbalanced brackets,
 * unterminated strings and stray bytes only make the match less precise.
 */
export function matchSource(text: string, filePath: string, table: RuleTable): SourceToken[] {
  const rules = rulesFor(table, "source");
  const symbolRules = rules.filter((r) => r.match.type === "symbols");
  const regexRules = rules.filter((r) => r.match.type === "source-regex");

  const original = text.split(/\r?\n/);
  const masked = maskSource(original);
  const aliases = new Map<string, string>();
  const tokens: SourceToken[] = [];

  const push = (rule: Rule, kind: SourceTokenKind, symbol: string, line: number, column: number) => {
    tokens.push({
      filePath,
      line,
      column,
      kind,
      symbol,
      text: (original[line - 1] ?? "").trim().slice(0, MAX_EVIDENCE),
      ruleId: rule.id,
    });
  };

  for (const logical of logicalLines(masked)) {
    // `;` separates simple statements; imports are only recognized at a statement start.
    for (const statement of logical.text.split(";")) {
      if (!IMPORT_START.test(statement)) continue;
      for (const [local, target] of importBindings(statement) ?? []) aliases.set(local, target);
    }

    for (const m of logical.text.matchAll(CALL_RE)) {
      const raw = m[1];
      if (!raw || m.index === undefined) continue;
      const name = raw.replace(/\s+/g, "");
      const head = name.split(".")[0] ?? name;
      if (KEYWORDS.has(head)) continue;
      const before = logical.text.slice(0, m.index);
      if (/\b(?:def|class)\s+$/.test(before)) continue;

      const symbol = resolveCall(name, aliases);
      const { module, name: attr } = splitSymbol(symbol);
      const { line, column } = position(logical, m.index);
      for (const rule of symbolRules) {
        if (rule.match.type === "symbols" && rule.match.symbols.some((p) => symbolMatches(p, module, attr))) {
          push(rule, "call", symbol, line, column);
        }
      }
    }

    for (const rule of regexRules) {
      if (rule.match.type !== "source-regex") continue;
      const m = rule.match.pattern.exec(logical.text);
      if (!m) continue;
      if (rule.match.unless?.test(logical.text)) continue;
      const { line, column } = position(logical, m.index);
      push(rule, "pattern", m[0].trim(), line, column);
    }
  }

  return tokens;
}

/**
 * Scans one Python file (or extracted notebook code) and returns its findings,
 * one per rule and position.
 */
export function scanSource(text: string, filePath: string, table: RuleTable, options: SourceScanOptions = {}): RawFinding[] {
  const byId = new Map(table.rules.map((r) => [r.id, r]));
  const seen = new Set<string>();
  const out: RawFinding[] = [];

  for (const token of matchSource(text, filePath, table)) {
    const rule = byId.get(token.ruleId);
    if (!rule) continue;
    const at = options.locate ? options.locate(token.line) : { line: token.line };
    const key = `${token.ruleId}:${at.cell ?? ""}:${at.line}:${token.column}`;
    if (seen.has(key)) continue;
    seen.add(key);

    out.push({
      ruleId: rule.id,
      title: rule.title,
      severity: rule.severity,
      category: rule.category,
      engineId: options.engineId ?? "source",
      artifactPath: filePath,
      locator: {
        kind: "line",
        line: at.line,
        column: token.column,
        ...(at.cell !== undefined ? { cell: at.cell } : {}),
      },
      rationale: rule.rationale,
      remediation: rule.remediation,
      evidence: token.text,
      note: token.kind === "call" ? `Call resolves to ${token.symbol}` : "Pattern match",
    });
  }
  return out;
}
