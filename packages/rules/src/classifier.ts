// packages/rules/src/classifier.ts
import type { RawFinding } from "@mltriage/core";
import {
  EXTENSION_OPCODES,
  isCall,
  qualifiedName,
  renderValue,
  stringValue,
  type CapabilityGraph,
  type CapabilityNode,
  type ConstructedValue,
  type GlobalValue,
  type Value,
} from "@mltriage/pickle";
import { isAllowlisted, rulesFor, symbolMatches, type Rule, type RuleTable } from "./table.js";

export interface ClassifyContext {
  artifactPath: string;
  engineId: string;
  /** Archive entry the stream came from. */
  entry?: string;
}

/** A callable named through a reflective chain instead of a GLOBAL opcode. */
export interface ResolvedSymbol {
  module: string;
  name: string;
  /** Reflective steps taken, outermost first. */
  via: string[];
}

const MAX_RESOLVE_DEPTH = 8;

const GETATTR = new Set(["builtins.getattr", "__builtin__.getattr"]);
const ATTRGETTER = new Set(["operator.attrgetter", "_operator.attrgetter"]);
const IMPORTERS = new Set(["importlib.import_module", "builtins.__import__", "__builtin__.__import__", "importlib.__import__"]);

function calleeName(v: ConstructedValue): string | undefined {
  return v.callee.kind === "global" ? qualifiedName(v.callee) : undefined;
}

/**
 * Module name a value stands for: the result of an import call, a global used
 * as a module object, or a resolved attribute of one.
 */
export function resolveModule(v: Value | undefined, depth = 0): string | undefined {
  if (!v || depth > MAX_RESOLVE_DEPTH) return undefined;
  if (v.kind === "global") return qualifiedName(v);
  if (!isCall(v)) return undefined;

  const callee = calleeName(v);
  if (callee && IMPORTERS.has(callee)) return stringValue(v.args[0]);

  const sym = resolveSymbol(v, depth + 1);
  return sym ? `${sym.module}.${sym.name}` : undefined;
}

/**
 * Follows `getattr(module, "name")` and `attrgetter("name")(module)` chains,
 * with `module` itself possibly coming from an import call.
 */
export function resolveSymbol(v: Value | undefined, depth = 0): ResolvedSymbol | undefined {
  if (!v || depth > MAX_RESOLVE_DEPTH) return undefined;
  if (v.kind === "global") return { module: v.module, name: v.name, via: [] };
  if (!isCall(v)) return undefined;

  const callee = calleeName(v);
  if (callee && GETATTR.has(callee)) {
    const name = stringValue(v.args[1]);
    const module = resolveModule(v.args[0], depth + 1);
    return name && module ? { module, name, via: [callee] } : undefined;
  }

  if (v.callee.kind === "constructed" && isCall(v.callee)) {
    const getter = calleeName(v.callee);
    if (getter && ATTRGETTER.has(getter)) {
      const name = stringValue(v.callee.args[0]);
      const module = resolveModule(v.args[0], depth + 1);
      return name && module ? { module, name, via: [getter] } : undefined;
    }
  }
  return undefined;
}

interface Hit {
  rule: Rule;
  node: CapabilityNode;
  evidence: string;
  note: string;
}

function matchSymbolRules(rules: readonly Rule[], module: string, name: string): Rule[] {
  return rules.filter((r) => r.match.type === "symbols" && r.match.symbols.some((p) => symbolMatches(p, module, name)));
}

function noteFor(graph: CapabilityGraph, node: CapabilityNode, prefix: string): string {
  const where = graph.reachable.has(node) ? "reachable from the loaded object" : "run for its side effect";
  return `${prefix}; ${where}`;
}

/**
 * Maps a capability graph onto rule findings. Every recorded node is checked,
 * so calls whose result is discarded still count. A denylisted global is never
 * also reported as merely unexpected.
 */
export function classifyGraph(graph: CapabilityGraph, table: RuleTable, ctx: ClassifyContext): RawFinding[] {
  const rules = rulesFor(table, "pickle");
  const unexpected = rules.find((r) => r.match.type === "unexpected-module");
  const dynamicCallee = rules.find((r) => r.match.type === "call-shape" && r.match.shape === "dynamic-callee");
  const extension = rules.find((r) => r.match.type === "call-shape" && r.match.shape === "extension-registry");

  // First call made through each global, for evidence.
  const firstCall = new Map<GlobalValue, ConstructedValue>();
  for (const node of graph.nodes) {
    if (isCall(node) && node.callee.kind === "global" && !firstCall.has(node.callee)) firstCall.set(node.callee, node);
  }

  const hits: Hit[] = [];

  for (const node of graph.nodes) {
    if (node.kind === "global") {
      const call = firstCall.get(node);
      const evidence = renderValue(call ?? node);
      const matched = matchSymbolRules(rules, node.module, node.name);
      for (const rule of matched) {
        hits.push({ rule, node, evidence, note: noteFor(graph, node, call ? "Global reference and call" : "Global reference") });
      }
      if (!matched.length && unexpected && !isAllowlisted(table, node.module, node.name)) {
        hits.push({ rule: unexpected, node, evidence, note: noteFor(graph, node, `Import of ${qualifiedName(node)}`) });
      }
      continue;
    }

    if (EXTENSION_OPCODES.has(node.via)) {
      if (extension) hits.push({ rule: extension, node, evidence: renderValue(node), note: noteFor(graph, node, `${node.via} lookup`) });
      continue;
    }

    if (!isCall(node) || node.callee.kind === "global") continue;

    const evidence = renderValue(node);
    if (dynamicCallee) hits.push({ rule: dynamicCallee, node, evidence, note: noteFor(graph, node, `Computed callee via ${node.via}`) });

    const resolved = resolveSymbol(node.callee);
    if (!resolved || resolved.via.length === 0) continue;
    const chain = `${resolved.via.join(" -> ")} -> ${resolved.module}.${resolved.name}`;
    for (const rule of matchSymbolRules(rules, resolved.module, resolved.name)) {
      hits.push({ rule, node, evidence, note: noteFor(graph, node, `Resolved call chain ${chain}`) });
    }
  }

  const seen = new Set<string>();
  const out: RawFinding[] = [];
  for (const hit of hits) {
    const key = `${hit.rule.id}@${hit.node.offset}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push({
      ruleId: hit.rule.id,
      title: hit.rule.title,
      severity: hit.rule.severity,
      category: hit.rule.category,
      engineId: ctx.engineId,
      artifactPath: ctx.artifactPath,
      locator: { kind: "byte", offset: hit.node.offset, ...(ctx.entry ? { entry: ctx.entry } : {}) },
      rationale: hit.rule.rationale,
      remediation: hit.rule.remediation,
      evidence: hit.evidence,
      note: hit.note,
    });
  }
  return out;
}
