// packages/rules/src/source.test.ts
import { describe, it, expect } from "vitest";
import { importBindings, maskSource, scanSource } from "./source.js";
import { loadRuleTable } from "./table.js";

const table = loadRuleTable();

function hits(text: string): string[] {
  return scanSource(text, "train.py", table).map((f) =>
    f.locator.kind === "line" ? `${f.ruleId}:${f.locator.line}:${f.locator.column}` : f.ruleId
  );
}

describe("@mltriage/rules - source scanner", () => {
  it("flags a process call with its line, column and source text", () => {
    const findings = scanSource('import os\nos.system("rm -rf /")\n', "train.py", table);
    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      ruleId: "ML001",
      severity: "critical",
      engineId: "source",
      artifactPath: "train.py",
      locator: { kind: "line", line: 2, column: 1 },
      evidence: 'os.system("rm -rf /")',
      note: "Call resolves to os.system",
    });
  });

  it("resolves import aliases", () => {
    expect(hits('from subprocess import run as sh\nsh(["ls"])\n')).toEqual(["SRC001:1:1", "ML001:2:1"]);
    expect(hits("import os.path as osp, os as o\no.popen(cmd)\n")).toEqual(["ML001:2:1"]);
  });

  it("treats bare calls as builtins", () => {
    expect(hits("result = eval(user_input)\n")).toEqual(["ML002:1:10"]);
  });

  it("ignores comments, strings and docstrings", () => {
    const text = ['# os.system("x")', "print(\"os.system('x')\")", 'x = """', "eval(1)", '"""', ""].join("\n");
    expect(hits(text)).toEqual([]);
  });

  it("ignores definitions and method calls that share a dangerous name", () => {
    expect(hits("def eval(x):\n    return x\nmodel.eval()\nself.exec(1)\n")).toEqual([]);
  });

  it("follows calls across bracketed continuation lines", () => {
    const text = ["import subprocess", "out = subprocess.check_output(", "    cmd,", "    shell=True,", ")", ""].join("\n");
    const findings = scanSource(text, "run.py", table);
    expect(findings.map((f) => [f.ruleId, f.locator, f.evidence])).toEqual([
      ["SRC001", { kind: "line", line: 1, column: 1 }, "import subprocess"],
      ["ML001", { kind: "line", line: 2, column: 7 }, "out = subprocess.check_output("],
      ["SRC003", { kind: "line", line: 4, column: 5 }, "shell=True,"],
    ]);
  });

  it("flags torch.load unless weights_only=True is passed", () => {
    const text = ["import torch", 'model = torch.load("ckpt.pt")', "safe = torch.load(path, weights_only=True)", ""].join("\n");
    expect(hits(text)).toEqual(["SRC006:2:9"]);
  });

  it("flags shell escapes, remote code and unsafe loaders", () => {
    expect(hits("!pip install foo\n%system ls\n")).toEqual(["SRC002:1:1", "SRC002:2:1"]);
    expect(hits('m = AutoModel.from_pretrained("x", trust_remote_code=True)\n')).toEqual(["SRC004:1:36"]);
    expect(hits("import pickle\nobj = pickle.loads(blob)\n")).toEqual(["SRC005:2:7"]);
  });

  it("never throws on broken input", () => {
    expect(hits('foo("unterminated\neval(x)\n')).toEqual(["ML002:2:1"]);
    expect(hits(")))\n\u0000�(((\n'''")).toEqual([]);
    expect(hits('x = """broken\ndef f(:\n\neval(user_input)')).toEqual(["ML002:4:1"]);
  });

  it("maps lines through the locate callback", () => {
    const findings = scanSource("x = 1\neval(y)\n", "nb.ipynb", table, {
      engineId: "notebooks",
      locate: (line) => ({ cell: 3, line: line - 1 }),
    });
    expect(findings.map((f) => [f.engineId, f.locator])).toEqual([["notebooks", { kind: "line", line: 1, column: 1, cell: 3 }]]);
  });
});

describe("@mltriage/rules - source lexer", () => {
  it("masks string contents and comments but keeps columns", () => {
    expect(maskSource(['x = "a#b" # note', "y = r'\\d' + b'\\x00'"])).toEqual([
      'x = "   "       ',
      "y = r'  ' + b'    '",
    ]);
  });

  it("carries triple-quoted strings across lines", () => {
    expect(maskSource(["s = '''one", "two", "three''' + z"])).toEqual(["s = '''   ", "   ", "     ''' + z"]);
    expect(maskSource(['s = """open', "eval(x)  # c"])).toEqual(['s = """    ', "eval(x)     "]);
  });

  it("reads import bindings", () => {
    expect(importBindings("import os.path, numpy as np")).toEqual([
      ["os", "os"],
      ["np", "numpy"],
    ]);
    expect(importBindings("from os import (\n  system as run,\n  popen,\n)")).toEqual([
      ["run", "os.system"],
      ["popen", "os.popen"],
    ]);
    expect(importBindings("x = 1")).toBeUndefined();
  });
});
