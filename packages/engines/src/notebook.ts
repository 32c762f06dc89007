// packages/engines/src/notebook.ts
import { z } from 'zod';

/** Where a line of the extracted code came from. */
export interface CellLine {
  /** 1-based index of the cell among all cells of the notebook. */
  cell: number;
  /** 1-based line inside that cell. */
  line: number;
}

export interface ExtractedNotebook {
  code: string;
  /** `lineMap[n - 1]` locates line `n` of `code`. */
  lineMap: CellLine[];
  codeCells: number;
}

export class NotebookError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotebookError';
  }
}

const CellSource = z.union([z.string(), z.array(z.string())]);

const Cell = z
  .object({
    cell_type: z.string(),
    source: CellSource.optional(),
  })
  .passthrough();

const Notebook = z
  .object({
    cells: z.array(Cell),
  })
  .passthrough();

function isExecutable(lines: readonly string[]): boolean {
  return lines.some((l) => {
    const t = l.trim();
    return t.length > 0 && !t.startsWith('#');
  });
}

/**
 * Concatenates the code cells of a notebook. Empty and comment-only cells are
 * dropped. Throws NotebookError when the document is not a notebook.
 */
export function extractNotebook(text: string): ExtractedNotebook {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    throw new NotebookError(`invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = Notebook.safeParse(doc);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new NotebookError(`not a notebook: ${issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'unknown shape'}`);
  }

  const code: string[] = [];
  const lineMap: CellLine[] = [];
  let codeCells = 0;

  parsed.data.cells.forEach((cell, index) => {
    if (cell.cell_type !== 'code' || cell.source === undefined) return;
    const joined = typeof cell.source === 'string' ? cell.source : cell.source.join('');
    const lines = joined.split(/\r?\n/);
    if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();
    if (!isExecutable(lines)) return;

    codeCells += 1;
    lines.forEach((l, i) => {
      code.push(l);
      lineMap.push({ cell: index + 1, line: i + 1 });
    });
  });

  return { code: code.join('\n'), lineMap, codeCells };
}
