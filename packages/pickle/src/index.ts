// packages/pickle/src/index.ts
import { DEFAULT_LIMITS, type ScanError, type ScanLimits } from '@mltriage/core';
import { buildCapabilityGraph, type CapabilityGraph } from './builder.js';
import type { EmbeddedStream } from './container.js';
import { PROTO_CODE } from './opcodes.js';
import { readOperations } from './reader.js';

export * from './opcodes.js';
export * from './reader.js';
export * from './values.js';
export * from './builder.js';
export * from './container.js';

export interface StreamAnalysis {
  /** Archive entry the stream came from. */
  entry?: string;
  /** Start of the stream inside the entry (or file), past any container header. */
  offset: number;
  graph: CapabilityGraph;
  error?: ScanError;
}

export interface AnalyzeOptions {
  limits?: ScanLimits;
  strictProtocol?: boolean;
  deadline?: number;
  now?: () => number;
}

/**
 * Reads and interprets every pickle stream in one embedded buffer. A buffer
 * flagged `multiStream` keeps going while a PROTO opcode directly follows the
 * previous STOP; the first failure ends the buffer.
 */
export function analyzeStream(stream: EmbeddedStream, options: AnalyzeOptions = {}): StreamAnalysis[] {
  const limits = options.limits ?? DEFAULT_LIMITS;
  const out: StreamAnalysis[] = [];
  let offset = stream.start ?? 0;

  for (;;) {
    const { graph, error, end } = buildCapabilityGraph(
      readOperations(stream.bytes, {
        offset,
        limits,
        ...(options.strictProtocol !== undefined ? { strictProtocol: options.strictProtocol } : {}),
        ...(options.deadline !== undefined ? { deadline: options.deadline } : {}),
        ...(options.now ? { now: options.now } : {}),
      }),
      { limits }
    );
    out.push({ ...(stream.name ? { entry: stream.name } : {}), offset, graph, ...(error ? { error } : {}) });

    if (error || end === undefined || !stream.multiStream) break;
    if (end >= stream.bytes.byteLength || stream.bytes[end] !== PROTO_CODE) break;
    if (out.length >= limits.maxStreamsPerArtifact) break;
    offset = end;
  }

  return out;
}
