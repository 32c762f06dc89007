// packages/engines/src/requirements.ts

export interface Requirement {
  /** Normalized project name (lower case, runs of `-_.` folded to `-`). */
  name: string;
  rawName: string;
  extras: string[];
  /** Version specifier as written, e.g. `==1.2.0` or `>=2,<3`. */
  specifier: string;
  /** Exact version when the specifier is a single `==` or `===` pin. */
  version?: string;
  marker?: string;
  /** 1-based line of the requirement's first physical line. */
  line: number;
  text: string;
}

export function normalizeProjectName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-');
}

const REQUIREMENT_RE = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*(?:\[([^\]]*)\])?\s*([^;@]*?)\s*(?:;\s*(.*))?$/;

function pinnedVersion(specifier: string): string | undefined {
  const m = /^===?\s*([A-Za-z0-9][A-Za-z0-9.+!_-]*)$/.exec(specifier.trim());
  return m?.[1];
}

function stripComment(line: string): string {
  if (line.trimStart().startsWith('#')) return '';
  const idx = line.search(/\s#/);
  return idx >= 0 ? line.slice(0, idx) : line;
}

/**
 * Parses a pip requirements file. Options (`-r`, `-c`, `--index-url`, ...),
 * per-requirement `--hash` flags, editable installs, URLs, local paths and `name @ url` references are skipped.
 */
export function parseRequirements(text: string): Requirement[] {
  const out: Requirement[] = [];
  const physical = text.split(/\r?\n/);

  for (let i = 0; i < physical.length; i++) {
    const start = i;
    let logical = stripComment(physical[i] ?? '');
    while (logical.endsWith('\\') && i + 1 < physical.length) {
      i++;
      logical = `${logical.slice(0, -1)} ${stripComment(physical[i] ?? '')}`;
    }
    let line = logical.trim();
    if (!line || line.startsWith('-')) continue;
    // Per-requirement options such as --hash.
    const opts = line.search(/\s--/);
    if (opts >= 0) line = line.slice(0, opts).trim();
    if (/^[./~]/.test(line) || line.includes('://')) continue;
    if (/^[A-Za-z0-9._-]+(?:\[[^\]]*\])?\s*@/.test(line)) continue;

    const m = REQUIREMENT_RE.exec(line);
    if (!m?.[1]) continue;
    const specifier = (m[3] ?? '').replace(/\s+/g, '');
    const version = pinnedVersion(specifier);

    out.push({
      name: normalizeProjectName(m[1]),
      rawName: m[1],
      extras: (m[2] ?? '')
        .split(',')
        .map((e) => e.trim())
        .filter(Boolean),
      specifier,
      ...(version ? { version } : {}),
      ...(m[4] ? { marker: m[4].trim() } : {}),
      line: start + 1,
      text: line,
    });
  }
  return out;
}
