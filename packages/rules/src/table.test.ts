// packages/rules/src/table.test.ts
import { describe, it, expect } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { isAllowlisted, loadRuleTable, parseRuleTable, rulesFor, RuleTableError } from "./table.js";

function tableError(fn: () => unknown): RuleTableError {
  try {
    fn();
  } catch (err) {
    if (err instanceof RuleTableError) return err;
    throw err;
  }
  throw new Error("expected a RuleTableError");
}

const rule = (id: string, extra: Record<string, unknown> = {}) => ({
  id,
  title: "t",
  severity: "warn",
  category: "c",
  rationale: "r",
  remediation: "m",
  targets: ["pickle"],
  match: { type: "symbols", symbols: ["os.system"] },
  ...extra,
});

describe("@mltriage/rules - rule table", () => {
  it("loads the bundled table frozen", () => {
    const table = loadRuleTable();
    expect(table.source).toBe("<bundled>");
    expect(table.version).toBe("2026.10.1");
    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.rules)).toBe(true);
    expect(Object.isFrozen(table.rules[0])).toBe(true);
    expect(rulesFor(table, "pickle").map((r) => r.id)).toEqual([
      "ML001", "ML002", "ML003", "ML004", "ML005", "ML006", "ML007", "ML010", "ML011", "ML012",
    ]);
    expect(rulesFor(table, "source").map((r) => r.id)).toEqual([
      "ML001", "ML002", "SRC001", "SRC002", "SRC003", "SRC004", "SRC005", "SRC006",
    ]);
  });

  it("splits symbols into module and name", () => {
    const table = parseRuleTable({
      version: 3,
      rules: [rule("X1", { match: { type: "symbols", symbols: ["urllib.request.*", "os.system"] } })],
    });
    expect(table.version).toBe("3");
    const match = table.rules[0]?.match;
    expect(match).toEqual({
      type: "symbols",
      symbols: [
        { module: "urllib.request", name: "*" },
        { module: "os", name: "system" },
      ],
    });
  });

  it("checks allowlisted modules by prefix and symbols exactly", () => {
    const table = loadRuleTable();
    expect(isAllowlisted(table, "torch._utils", "_rebuild_tensor_v2")).toBe(true);
    expect(isAllowlisted(table, "collections", "OrderedDict")).toBe(true);
    expect(isAllowlisted(table, "builtins", "set")).toBe(true);
    expect(isAllowlisted(table, "builtins", "eval")).toBe(false);
    expect(isAllowlisted(table, "torchvision.models", "resnet18")).toBe(false);
  });

  it("reports every problem in a malformed table", () => {
    const err = tableError(() =>
      parseRuleTable(
        {
          version: "1",
          rules: [
            rule("X1"),
            rule("X1"),
            rule("PARSE_ERROR"),
            rule("X2", { targets: ["pickle"], match: { type: "source-regex", pattern: "a" } }),
          ],
        },
        "custom.yml"
      )
    );
    expect(err.source).toBe("custom.yml");
    expect(err.issues).toEqual([
      "rules.1.id: duplicate rule id X1",
      "rules.2.id: PARSE_ERROR is reserved",
      "rules.3.targets: source-regex rules cannot target pickle",
    ]);
  });

  it("rejects schema violations with their paths", () => {
    const err = tableError(() => parseRuleTable({ version: "1", rules: [rule("X1", { severity: "high" })] }));
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0]?.startsWith("rules.0.severity: ")).toBe(true);

    const empty = tableError(() => parseRuleTable({ version: "1", rules: [] }));
    expect(empty.issues[0]?.startsWith("rules: ")).toBe(true);

    const notAnObject = tableError(() => parseRuleTable("rules"));
    expect(notAnObject.issues[0]?.startsWith("<root>: ")).toBe(true);
  });

  it("rejects regular expressions that do not compile", () => {
    const bad = rule("X1", { targets: ["source"], match: { type: "source-regex", pattern: "(unclosed" } });
    const err = tableError(() => parseRuleTable({ version: "1", rules: [bad] }));
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0]?.startsWith("rules.0.match.pattern: ")).toBe(true);
  });

  it("loads tables from YAML files and reports unreadable ones", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "mltriage-rules-"));
    try {
      const file = path.join(dir, "rules.yml");
      fs.writeFileSync(
        file,
        [
          "version: test-1",
          "rules:",
          "  - id: LOCAL1",
          "    title: Local rule",
          "    severity: critical",
          "    category: exec",
          "    rationale: r",
          "    remediation: m",
          "    targets: [pickle]",
          "    match: { type: symbols, symbols: [mylib.run] }",
          "",
        ].join("\n")
      );
      const table = loadRuleTable(file);
      expect(table.source).toBe(file);
      expect(table.rules.map((r) => r.id)).toEqual(["LOCAL1"]);
      expect(table.allowlist).toEqual({ modules: [], symbols: [] });

      fs.writeFileSync(file, "rules: [\n");
      expect(tableError(() => loadRuleTable(file)).issues[0]?.startsWith("invalid YAML: ")).toBe(true);

      const missing = tableError(() => loadRuleTable(path.join(dir, "missing.yml")));
      expect(missing.issues[0]?.startsWith("cannot read file: ")).toBe(true);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
