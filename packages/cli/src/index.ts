#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import YAML from 'yaml';
import { z } from 'zod';
import {
  AVAILABLE_ENGINES,
  DEFAULT_ENGINES,
  createDebugLogger,
  isEngineId,
  resolveLimits,
  summarize,
  type EngineId,
  type FailOn,
  type ScanConfig,
  type ScanResult,
} from '@mltriage/core';
import {
  defaultAdapters,
  discoverTargets,
  listEngines,
  runEngines,
  type AdvisorySource,
  type EngineAdapter,
  type TargetKind,
} from '@mltriage/engines';
import { generateHtmlReport, generateSummaryMarkdown } from '@mltriage/report';
import { loadRuleTable } from '@mltriage/rules';
import { writeSarif } from '@mltriage/sarif';

const dbg = createDebugLogger('cli');

const DEFAULT_FORMATS = ['json', 'html', 'sarif', 'md'] as const;
type OutputFormat = (typeof DEFAULT_FORMATS)[number];

export const CONFIG_FILE_NAME = 'mltriage.yml';

type OptValue = string | boolean;
type ParsedArgs = {
  scanPath?: string;
  opts: Record<string, OptValue>;
  command: 'scan' | 'list-engines';
  showHelp?: boolean;
  helpTarget?: 'general' | 'scan' | 'list-engines';
};

const BOOLEAN_FLAGS = new Set([
  'list-engines',
  'redact',
  'help',
  'models',
  'source',
  'notebooks',
  'deps',
  'strict-protocol',
  'no-strict-protocol',
]);

function hasHelpFlag(argv: string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

export function getHelpText(target: ParsedArgs['helpTarget'] = 'general'): string {
  const general = [
    'mltriage: pre-execution risk triage for ML projects',
    '',
    'Usage:',
    '  mltriage scan <path> [options]',
    '  mltriage --list-engines',
    '  mltriage --help',
    '',
    'Commands:',
    '  scan             Scan a project directory (or one file) and write outputs',
    '  --list-engines   List available engines',
    '',
    'Run `mltriage scan --help` for scan options.',
  ].join('\n');

  const scan = [
    'mltriage scan',
    '',
    'Usage:',
    '  mltriage scan <path> [options]',
    '',
    'Options:',
    '  --out-dir <dir>                  Output directory (default: mltriage)',
    '  --format <csv>                   Output formats (default: json,html,sarif,md)',
    '  --timeout <seconds>              Per-artifact timeout seconds (default: 30)',
    '  --concurrency <n>                Artifacts scanned in parallel (default: 4)',
    '  --fail-on <critical|warn|none>   Fail threshold (default: critical)',
    '  --config <path>                  YAML config path (default: ./mltriage.yml when present)',
    '  --engines <list>                 Comma/space-separated engines list',
    '  --models --source --notebooks --deps',
    '                                   Run only the flagged engines',
    '  --rules <path>                   Rule table YAML (default: bundled table)',
    '  --redact                         Replace evidence excerpts with hashes',
    '  --path-mode <relative|absolute>  Output path mode (default: relative)',
    '  --no-strict-protocol             Accept opcodes newer than the declared protocol',
    '  --advisory-url <url>             OSV-compatible advisory API base URL',
  ].join('\n');

  const listEnginesText = [
    'mltriage list engines',
    '',
    'Usage:',
    '  mltriage --list-engines',
    '',
    'Prints one line per engine as:',
    '  <engineId>\t<displayName>',
  ].join('\n');

  if (target === 'scan') return scan;
  if (target === 'list-engines') return listEnginesText;
  return general;
}

function parseOptions(tokens: string[]): Record<string, OptValue> {
  const opts: Record<string, OptValue> = {};
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined || !token.startsWith('--')) continue;

    // support --key=value
    const eqIdx = token.indexOf('=');
    const key = (eqIdx >= 0 ? token.slice(2, eqIdx) : token.slice(2)).trim();
    const valueInline = eqIdx >= 0 ? token.slice(eqIdx + 1) : undefined;

    if (BOOLEAN_FLAGS.has(key)) {
      // if user wrote --flag=false, treat it as a value
      opts[key] = valueInline ?? true;
      continue;
    }

    const val = valueInline ?? tokens[i + 1];
    if (val === undefined) throw new Error(`Missing value for --${key}`);
    opts[key] = val;
    if (valueInline === undefined) i += 1;
  }
  return opts;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const normalized = argv[0] === '--' ? argv.slice(1) : argv;

  if (normalized.includes('--list-engines')) {
    const showHelp = hasHelpFlag(normalized);
    return {
      command: 'list-engines',
      opts: parseOptions(normalized),
      showHelp,
      ...(showHelp ? { helpTarget: 'list-engines' as const } : {}),
    };
  }

  const showHelp = hasHelpFlag(normalized);
  const [command, scanPath, ...rest] = normalized;

  if (showHelp) {
    if (command === 'scan') {
      return { command: 'scan', opts: {}, showHelp: true, helpTarget: 'scan' };
    }
    return { command: 'scan', opts: {}, showHelp: true, helpTarget: 'general' };
  }

  if (command !== 'scan' || !scanPath || scanPath.startsWith('--')) throw new Error('Usage: mltriage scan <path> [options]');

  return { command: 'scan', scanPath, opts: parseOptions(rest) };
}

const ListValue = z.union([z.string(), z.array(z.string())]);
const PositiveInt = z.number().int().positive();

const ConfigFileSchema = z
  .object({
    outDir: z.string().optional(),
    format: ListValue.optional(),
    timeout: z.number().positive().optional(),
    concurrency: PositiveInt.optional(),
    failOn: z.enum(['critical', 'warn', 'none']).optional(),
    redact: z.boolean().optional(),
    pathMode: z.enum(['relative', 'absolute']).optional(),
    engines: ListValue.optional(),
    rules: z.string().optional(),
    limits: z
      .object({
        maxStreamBytes: PositiveInt.optional(),
        maxArtifactBytes: PositiveInt.optional(),
        maxStringPreview: PositiveInt.optional(),
        maxMemoEntries: PositiveInt.optional(),
        maxGraphNodes: PositiveInt.optional(),
        maxArchiveEntries: PositiveInt.optional(),
        maxStreamsPerArtifact: PositiveInt.optional(),
        maxTraversalNodes: PositiveInt.optional(),
      })
      .strict()
      .optional(),
    strictProtocol: z.boolean().optional(),
    advisoryUrl: z.string().url().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Reads the YAML config: an explicit path must exist; otherwise `mltriage.yml`
 * in `cwd` is used when present. A relative `rules` path is resolved against
 * the config file's directory.
 */
export function loadConfig(configPath: string | undefined, cwd = process.cwd()): ConfigFile {
  const fallback = path.join(cwd, CONFIG_FILE_NAME);
  const candidate = configPath ? path.resolve(cwd, configPath) : fs.existsSync(fallback) ? fallback : undefined;
  if (!candidate) return {};
  if (!fs.existsSync(candidate)) throw new Error(`Config file not found: ${candidate}`);

  let data: unknown;
  try {
    data = YAML.parse(fs.readFileSync(candidate, 'utf8'));
  } catch (err) {
    throw new Error(`Invalid YAML in ${candidate}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = ConfigFileSchema.safeParse(data ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new Error(`Invalid config ${candidate}: ${issues.join('; ')}`);
  }

  const cfg = parsed.data;
  return cfg.rules ? { ...cfg, rules: path.resolve(path.dirname(candidate), cfg.rules) } : cfg;
}

export function normalizeOutDir(
  outDir: string | undefined,
  cwd = process.cwd(),
  pathLib: Pick<typeof path, 'isAbsolute' | 'normalize' | 'resolve'> = path
): string {
  const value = outDir?.trim() || 'mltriage';
  if (pathLib.isAbsolute(value)) return pathLib.normalize(value);
  return pathLib.resolve(cwd, value);
}

export function parseListOpt(value: string | readonly string[] | undefined, defaults: readonly string[]): string[] {
  let raw = '';
  if (typeof value === 'string') raw = value;
  else if (Array.isArray(value)) raw = value.join(',');

  const parsed = raw
    .split(/[\s,]+/)
    .map((entry: string) => entry.trim().toLowerCase())
    .filter(Boolean);
  const deduped = [...new Set(parsed)];
  return deduped.length ? deduped : [...defaults];
}

function parseBooleanOpt(value: OptValue | undefined, defaultValue: boolean): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value !== 'string') return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return defaultValue;
}

function optString(opts: Record<string, OptValue>, key: string): string | undefined {
  const v = opts[key];
  return typeof v === 'string' ? v : undefined;
}

function parsePositive(raw: string | number | undefined, flag: string, fallback: number, integer: boolean): number {
  if (raw === undefined) return fallback;
  const n = typeof raw === 'number' ? raw : Number(raw.trim());
  if (!Number.isFinite(n) || n <= 0 || (integer && !Number.isInteger(n))) {
    throw new Error(`Invalid --${flag} value: ${String(raw)}`);
  }
  return n;
}

function isFailOn(v: string): v is FailOn {
  return v === 'critical' || v === 'warn' || v === 'none';
}

function isOutputFormat(v: string): v is OutputFormat {
  return (DEFAULT_FORMATS as readonly string[]).includes(v);
}

function resolveEngines(opts: Record<string, OptValue>, cfg: ConfigFile): EngineId[] {
  const flagged = AVAILABLE_ENGINES.filter((id) => parseBooleanOpt(opts[id], false));
  if (flagged.length) return [...flagged];

  const requested = parseListOpt(optString(opts, 'engines') ?? cfg.engines, [...DEFAULT_ENGINES]);
  const engines: EngineId[] = [];
  for (const id of requested) {
    if (!isEngineId(id)) throw new Error(`Unknown engine: ${id} (available: ${AVAILABLE_ENGINES.join(', ')})`);
    engines.push(id);
  }
  return engines;
}

/**
 * Flags win over the config file, which wins over defaults.
 */
export function resolveConfig(opts: Record<string, OptValue>, cwd = process.cwd()): ScanConfig {
  const cfg = loadConfig(optString(opts, 'config'), cwd);

  const format = parseListOpt(optString(opts, 'format') ?? cfg.format, [...DEFAULT_FORMATS]).filter(isOutputFormat);

  const failOnRaw = (optString(opts, 'fail-on') ?? cfg.failOn ?? 'critical').toLowerCase();
  if (!isFailOn(failOnRaw)) throw new Error(`Invalid --fail-on value: ${failOnRaw}`);

  const pathModeRaw = String(optString(opts, 'path-mode') ?? cfg.pathMode ?? 'relative').toLowerCase();
  const rules = optString(opts, 'rules');
  const advisoryUrl = optString(opts, 'advisory-url') ?? cfg.advisoryUrl;

  const strictFlag = opts['no-strict-protocol'] !== undefined ? !parseBooleanOpt(opts['no-strict-protocol'], true) : undefined;

  return {
    outDir: normalizeOutDir(optString(opts, 'out-dir') ?? cfg.outDir, cwd),
    format: format.length ? format : [...DEFAULT_FORMATS],
    timeout: parsePositive(optString(opts, 'timeout') ?? cfg.timeout, 'timeout', 30, false),
    concurrency: parsePositive(optString(opts, 'concurrency') ?? cfg.concurrency, 'concurrency', 4, true),
    failOn: failOnRaw,
    redact: parseBooleanOpt(opts.redact, cfg.redact ?? false),
    pathMode: pathModeRaw === 'absolute' ? 'absolute' : 'relative',
    engines: resolveEngines(opts, cfg),
    ...(rules ? { rules: path.resolve(cwd, rules) } : cfg.rules ? { rules: cfg.rules } : {}),
    limits: resolveLimits(cfg.limits),
    strictProtocol: strictFlag ?? parseBooleanOpt(opts['strict-protocol'], cfg.strictProtocol ?? true),
    ...(advisoryUrl ? { advisoryUrl } : {}),
  };
}

function toPosix(p: string): string {
  return p.replaceAll('\\', '/');
}

const ENGINE_TARGETS: Record<EngineId, TargetKind> = {
  models: 'model',
  source: 'source',
  notebooks: 'notebook',
  deps: 'requirements',
};

export interface RunScanOptions {
  adapters?: EngineAdapter[];
  advisories?: AdvisorySource;
}

export async function runScan(scanPath: string, config: ScanConfig, options: RunScanOptions = {}): Promise<ScanResult> {
  const abs = path.resolve(scanPath);
  if (!fs.existsSync(abs)) throw new Error(`Scan path does not exist: ${abs}`);

  // Fatal before any artifact is touched.
  const table = loadRuleTable(config.rules);

  const kinds = new Set(config.engines.map((id) => ENGINE_TARGETS[id]));
  const { files, stats } = discoverTargets(abs, { maxArtifactBytes: config.limits.maxArtifactBytes, kinds });
  dbg('discovery', { ...stats });

  const { findings, meta, artifactsScanned } = await runEngines(
    {
      scanPath: abs,
      config,
      table,
      targets: files,
      ...(options.advisories ? { advisories: options.advisories } : {}),
    },
    config.engines,
    options.adapters ?? defaultAdapters()
  );

  return {
    meta: {
      scannedPath: config.pathMode === 'relative' ? '.' : toPosix(abs),
      generatedAt: new Date().toISOString(),
      timeout: config.timeout,
      concurrency: config.concurrency,
      redacted: config.redact,
      ruleTableVersion: table.version,
      engines: meta,
    },
    summary: summarize(findings, config.failOn, { engines: meta, artifactsScanned }),
    findings,
  };
}

export function writeOutputs(result: ScanResult, config: ScanConfig): string {
  const outDirAbs = normalizeOutDir(config.outDir);
  fs.mkdirSync(outDirAbs, { recursive: true });

  const wants = new Set(parseListOpt(config.format, [...DEFAULT_FORMATS]).filter(isOutputFormat));
  if (!wants.size) {
    for (const format of DEFAULT_FORMATS) wants.add(format);
  }

  if (wants.has('json')) fs.writeFileSync(path.join(outDirAbs, 'report.json'), JSON.stringify(result, null, 2));
  if (wants.has('md')) fs.writeFileSync(path.join(outDirAbs, 'summary.md'), generateSummaryMarkdown(result));
  if (wants.has('html')) fs.writeFileSync(path.join(outDirAbs, 'report.html'), generateHtmlReport(result));
  if (wants.has('sarif')) writeSarif(outDirAbs, result);

  return outDirAbs;
}

/**
 * Exit codes: 0 gate passed, 2 gate failed, 1 usage/config/rule-table error.
 */
export async function main(argv: string[], options: RunScanOptions & { cwd?: string } = {}): Promise<number> {
  try {
    const parsed = parseArgs(argv);

    if (parsed.showHelp) {
      console.log(getHelpText(parsed.helpTarget));
      return 0;
    }

    if (parsed.command === 'list-engines') {
      for (const entry of listEngines(options.adapters)) console.log(`${entry.engineId}\t${entry.displayName}`);
      return 0;
    }

    const cwd = options.cwd ?? process.cwd();
    const config = resolveConfig(parsed.opts, cwd);
    const result = await runScan(path.resolve(cwd, parsed.scanPath ?? '.'), config, options);
    const outputPath = writeOutputs(result, config);

    console.log(`mltriage: wrote outputs to ${outputPath}`);
    console.log(`Engines: ${result.meta.engines.map((entry) => `${entry.engineId}=${entry.status}`).join(' ') || 'none'}`);
    console.log(
      `mltriage ${result.summary.gate.status} grade ${result.summary.grade} findings=${result.summary.totalFindings} ` +
        `(critical=${result.summary.bySeverity.critical} warn=${result.summary.bySeverity.warn} info=${result.summary.bySeverity.info})`
    );
    return result.summary.gate.status === 'FAIL' ? 2 : 0;
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    dbg('fatal', { stack: err instanceof Error ? err.stack : undefined });
    return 1;
  }
}

/**
 * `import.meta.url === file://${argv[1]}` breaks on Windows; compare through
 * pathToFileURL instead.
 */
const isDirectRun = (() => {
  const arg1 = process.argv[1];
  if (!arg1) return false;
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(arg1)).href;
  } catch {
    return false;
  }
})();

if (isDirectRun) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err instanceof Error ? err.stack ?? err.message : String(err));
      process.exit(1);
    }
  );
}
