// packages/report/src/index.ts
import { formatLocator, type EngineExecutionMeta, type Finding, type ScanResult } from '@mltriage/core';

/**
 * Display-layer determinism:
 * - always render POSIX separators in MD/HTML
 * - keep machine-specific absolute paths out of engine notes and evidence
 */
function toPosixPath(p: string): string {
  return String(p ?? '').replaceAll('\\', '/');
}

export function scrubMachinePaths(text: string): string {
  let s = String(text ?? '');

  // Normalize separators first (so patterns are simpler)
  s = s.replaceAll('\\', '/');

  // Windows absolute paths like C:/Users/...
  s = s.replace(/\b[A-Za-z]:\/[^\s"')]+/g, '<path>');

  // Common Unix absolute paths like /home/runner/... /Users/... /tmp/...
  s = s.replace(/(^|[\s"'(])\/(home|Users|private|var|tmp|opt|etc)\/[^\s"')]+/g, '$1<path>');

  return s;
}

export function escapeHtml(value: string): string {
  return String(value ?? '')
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&#39;');
}

function escapeMarkdownCell(value: string): string {
  return value.replaceAll('|', '\\|').replace(/\r?\n/g, ' ');
}

/**
 * Findings arrive in canonical order from the engine runner; the report layer
 * never re-sorts them.
 */
function topFindings(result: ScanResult, n = 10): Finding[] {
  return result.findings.slice(0, n);
}

export function displayLocation(f: Finding): string {
  return `${toPosixPath(f.artifactPath)}${formatLocator(f.locator)}`;
}

function compactEvidence(f: Finding): string {
  const text = f.evidence.excerpt ?? (f.evidence.excerptHash ? `sha256:${f.evidence.excerptHash}` : '');
  return scrubMachinePaths(text).slice(0, 160) || '-';
}

function engineNote(entry: EngineExecutionMeta): string {
  return scrubMachinePaths(entry.errorMessage ?? '-');
}

function formatScanStatus(status: ScanResult['summary']['scanStatus']): string {
  if (status === 'PARTIAL') return 'Partial';
  if (status === 'FAILED') return 'Failed';
  return 'Completed';
}

/**
 * Convert PASS/FAIL + failOn into non-confusing text:
 * - failOn=none => DISABLED
 * - otherwise PASS => ALLOWED, FAIL => BLOCKED
 */
function formatPolicyGate(result: ScanResult): { label: string; detail: string } {
  const { gate } = result.summary;
  const detail = [`failOn=${gate.failOn}`, scrubMachinePaths(gate.reason)].filter(Boolean).join('; ');
  if (gate.failOn === 'none') return { label: 'DISABLED', detail };
  return { label: gate.status === 'FAIL' ? 'BLOCKED' : 'ALLOWED', detail };
}

function markdownStatusBlock(result: ScanResult): string {
  const { summary } = result;
  const gate = formatPolicyGate(result);
  const warning = summary.scanStatus !== 'COMPLETED' ? '\n> Partial scan: some engines failed.' : '';

  return [
    `Scan status: **${formatScanStatus(summary.scanStatus)}**`,
    `Gate status: **${summary.gate.status}**`,
    `Policy gate: **${gate.label}** (${gate.detail})`,
    `Risk grade: **${summary.grade}** (score ${summary.score})`,
  ].join('\n') + warning;
}

function htmlHeaderBadges(result: ScanResult): string {
  const { summary } = result;
  const gate = formatPolicyGate(result);
  const warning =
    summary.scanStatus !== 'COMPLETED' ? '<div class="warn">Partial scan: some engines failed.</div>' : '';

  return `
    <div class="meta">
      <div class="pill"><span class="k">Scan status</span> <span class="v">${escapeHtml(formatScanStatus(summary.scanStatus))}</span></div>
      <div class="pill"><span class="k">Gate status</span> <span class="v">${escapeHtml(summary.gate.status)}</span></div>
      <div class="pill">
        <span class="k">Policy gate</span>
        <span class="v">${escapeHtml(gate.label)}</span>
        <div class="sub">${escapeHtml(gate.detail)}</div>
      </div>
      <div class="pill"><span class="k">Risk grade</span> <span class="v">${escapeHtml(summary.grade)} / ${summary.score}</span></div>
      <div class="pill"><span class="k">Rule table</span> <span class="v">${escapeHtml(result.meta.ruleTableVersion)}</span></div>
    </div>
    ${warning}
  `;
}

export function generateSummaryMarkdown(result: ScanResult): string {
  const { summary } = result;

  const engineRows = result.meta.engines
    .map(
      (entry) =>
        `| ${entry.displayName} (${entry.engineId}) | ${entry.status} | ${entry.artifacts} | ${entry.durationMs} | ${escapeMarkdownCell(
          engineNote(entry)
        )} |`
    )
    .join('\n');

  const top = topFindings(result)
    .map(
      (f) =>
        `- **${f.severity.toUpperCase()}** ${f.ruleId} ${f.title} (\`${displayLocation(f)}\`)\n  - Evidence: \`${compactEvidence(f).replaceAll('`', "'")}\`\n  - ${f.evidence.note}`
    )
    .join('\n');

  return `# mltriage summary

${markdownStatusBlock(result)}

## Totals
- Artifacts scanned: ${summary.artifactsScanned}
- Total findings: ${summary.totalFindings}
- Critical: ${summary.bySeverity.critical}
- Warn: ${summary.bySeverity.warn}
- Info: ${summary.bySeverity.info}

## Engines
| Engine | Status | Artifacts | Duration (ms) | Notes |
|---|---|---:|---:|---|
${engineRows || '| - | - | 0 | 0 | - |'}

## Top Findings
${top || '- None'}
`;
}

export function generateHtmlReport(result: ScanResult): string {
  const engineRows = result.meta.engines
    .map(
      (entry) => `<tr>
        <td>${escapeHtml(entry.displayName)}<br><code>${escapeHtml(entry.engineId)}</code></td>
        <td>${escapeHtml(entry.status)}</td>
        <td>${entry.artifacts}</td>
        <td>${entry.durationMs}</td>
        <td>${escapeHtml(engineNote(entry))}</td>
      </tr>`
    )
    .join('');

  const rows = result.findings
    .map(
      (f, i) => `<tr>
        <td>${i + 1}</td>
        <td><span class="sev sev-${escapeHtml(f.severity)}">${escapeHtml(f.severity)}</span></td>
        <td>
          ${escapeHtml(f.title)}
          <div class="rule"><code>${escapeHtml(f.ruleId)}</code> <span class="engine-badge">${escapeHtml(f.engineId)}</span></div>
        </td>
        <td><code>${escapeHtml(displayLocation(f))}</code></td>
        <td>
          <details>
            <summary>Details</summary>
            <p>${escapeHtml(f.rationale)}</p>
            <pre>${escapeHtml(compactEvidence(f))}</pre>
            <p><strong>Note:</strong> ${escapeHtml(f.evidence.note)}</p>
            <p><strong>Remediation:</strong> ${escapeHtml(f.remediation)}</p>
          </details>
        </td>
      </tr>`
    )
    .join('');

  return `<!doctype html>
<html>
<head>
  <meta charset="utf-8">
  <title>mltriage report</title>
  <style>
    body{font-family:Arial,sans-serif;margin:20px}
    table{border-collapse:collapse;width:100%}
    td,th{border:1px solid #ccc;padding:8px;text-align:left;vertical-align:top}
    .engine-badge{display:inline-block;padding:2px 6px;margin:2px;border-radius:10px;background:#eef;color:#113;font-size:12px}
    .rule{margin-top:4px;font-size:12px}
    .sev{font-weight:700}
    .sev-critical{color:#a00}
    .sev-warn{color:#a60}
    .sev-info{color:#336}
    code{background:#f4f4f4;padding:2px 4px;border-radius:4px}
    pre{white-space:pre-wrap;word-break:break-word;background:#f7f7f7;padding:8px;border-radius:6px;border:1px solid #ddd}

    /* Header pills */
    .meta{display:flex;gap:10px;flex-wrap:wrap;margin:10px 0 14px}
    .pill{border:1px solid #ddd;border-radius:12px;padding:10px 12px;background:#fafafa;min-width:220px}
    .pill .k{display:block;font-size:12px;color:#555;font-weight:700;margin-bottom:4px}
    .pill .v{display:block;font-size:16px;font-weight:800}
    .pill .sub{margin-top:6px;font-size:12px;color:#333}
    .warn{margin:8px 0 12px;padding:10px 12px;border:1px solid #f0c36d;background:#fff8e6;border-radius:8px;color:#7a4b00;font-weight:700}
  </style>
</head>
<body>
  <h1>mltriage report</h1>

  ${htmlHeaderBadges(result)}

  <h2>Engines</h2>
  <table>
    <thead>
      <tr>
        <th>Engine</th>
        <th>Status</th>
        <th>Artifacts</th>
        <th>Duration (ms)</th>
        <th>Notes</th>
      </tr>
    </thead>
    <tbody>${engineRows}</tbody>
  </table>

  <h2>Findings</h2>
  <table>
    <thead>
      <tr>
        <th>#</th>
        <th>Severity</th>
        <th>Title</th>
        <th>Location</th>
        <th>Details</th>
      </tr>
    </thead>
    <tbody>${rows}</tbody>
  </table>
</body>
</html>`;
}
