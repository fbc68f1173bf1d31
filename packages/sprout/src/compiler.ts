import { SpanStatusCode, metrics, trace, type Span as OtelSpan } from "@opentelemetry/api";
import { LRUCache } from "lru-cache";
import { type GenerateOptions, generate } from "./codegen.js";
import {
  type SproutDiagnostic,
  formatDiagnostic,
  hasErrors,
  sortDiagnostics,
} from "./diagnostics.js";
import { parseSprout } from "./parser/index.js";
import { type ResolveOptions, type ResolvedProgram, resolveProgram } from "./resolver.js";
import type { SpawnProgram } from "./types.js";

const otelTracer = trace.getTracer("sprout-dsl");

const otelMeter = metrics.getMeter("sprout-dsl");
const compileCounter = otelMeter.createCounter("sprout.compile.count", {
  description: "Total number of compilations (cache hits excluded)",
});
const diagnosticCounter = otelMeter.createCounter("sprout.compile.diagnostics", {
  description: "Diagnostics reported by compilations, by category",
});
const compileDurationHistogram = otelMeter.createHistogram("sprout.compile.duration", {
  description: "Compilation duration in milliseconds",
  unit: "ms",
});

/** Round milliseconds to 2 decimal places */
function roundMs(ms: number): number {
  return Math.round(ms * 100) / 100;
}

/**
 * Sink for compile timings and diagnostic counts, called printf-style.
 * `console` fits, as does any logger with these four methods. Without one,
 * the compiler stays quiet.
 */
export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export type CompileOptions = ResolveOptions &
  GenerateOptions & {
    /** Receives compile timings and diagnostics. Default: silent */
    logger?: Logger;
  };

export type CompileResult = {
  /** False when any error-severity diagnostic was reported */
  success: boolean;
  /** The statement block; only present on success */
  code?: string;
  program?: SpawnProgram;
  resolved?: ResolvedProgram;
  /** Sorted by source position */
  diagnostics: SproutDiagnostic[];
};

export type PartialCompileResult = Omit<CompileResult, "code"> & {
  /** Code for every construct that compiled, even when others failed */
  code: string;
};

// ═══════════════════════════════════════════════════════════════════════════
//  Pipeline
// ═══════════════════════════════════════════════════════════════════════════

function phase<T>(name: string, body: () => T): T {
  return otelTracer.startActiveSpan(name, (span) => {
    try {
      return body();
    } finally {
      span.end();
    }
  });
}

function failSpan(span: OtelSpan, err: unknown): void {
  const error = err instanceof Error ? err : new Error(String(err));
  span.recordException(error);
  span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
}

function runPipeline(source: string, options: CompileOptions): PartialCompileResult {
  const logger = options.logger;
  return otelTracer.startActiveSpan("sprout.compile", (span) => {
    const wallStart = performance.now();
    try {
      const parsed = phase("sprout.parse", () => parseSprout(source));
      const diagnostics = [...parsed.diagnostics];
      let resolved: ResolvedProgram | undefined;
      let code = "";

      if (parsed.program) {
        const program = parsed.program;
        resolved = phase("sprout.resolve", () => resolveProgram(program, options));
        diagnostics.push(...resolved.diagnostics);
        const input = resolved;
        code = phase("sprout.generate", () => generate(input, options));
      }

      const sorted = sortDiagnostics(diagnostics);
      const success = parsed.program !== undefined && !hasErrors(sorted);
      const durationMs = roundMs(performance.now() - wallStart);

      const attrs = { "sprout.compile.success": success };
      compileCounter.add(1, attrs);
      compileDurationHistogram.record(durationMs, attrs);
      for (const d of sorted) {
        diagnosticCounter.add(1, { "sprout.diagnostic.category": d.category, "sprout.diagnostic.severity": d.severity });
      }
      span.setAttribute("sprout.compile.diagnostics", sorted.length);
      span.setAttribute("sprout.compile.success", success);

      for (const d of sorted) {
        if (d.severity === "warning") logger?.warn("[sprout] %s", formatDiagnostic(d));
        else logger?.error("[sprout] %s", formatDiagnostic(d));
      }
      logger?.debug(
        "[sprout] compiled %d item(s) in %dms with %d diagnostic(s)",
        parsed.program?.items.length ?? 0,
        durationMs,
        sorted.length,
      );

      return { success, code, program: parsed.program, resolved, diagnostics: sorted };
    } catch (err) {
      failSpan(span, err);
      logger?.error("[sprout] compiler failure: %s", err instanceof Error ? err.message : String(err));
      throw err;
    } finally {
      span.end();
    }
  });
}

function complete(result: PartialCompileResult): CompileResult {
  const { code, ...rest } = result;
  return result.success ? { ...rest, code } : rest;
}

// ═══════════════════════════════════════════════════════════════════════════
//  Public API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Compile a Sprout source to a JavaScript statement block.
 *
 * Problems in the source are returned as diagnostics, never thrown. `code`
 * is only set when no error was reported; use `compilePartial` to get the
 * code for the constructs that did compile.
 */
export function compile(source: string, options: CompileOptions = {}): CompileResult {
  return complete(runPipeline(source, options));
}

/** Like `compile`, but always returns the code of every error-free construct. */
export function compilePartial(source: string, options: CompileOptions = {}): PartialCompileResult {
  return runPipeline(source, options);
}

export type CompilerOptions = CompileOptions & {
  /**
   * Number of distinct sources whose results are kept. 0 disables caching.
   * Default: 128
   */
  cacheSize?: number;
};

export interface SproutCompiler {
  compile(source: string): CompileResult;
  compilePartial(source: string): PartialCompileResult;
  /** Drop every cached result */
  clear(): void;
}

/**
 * A compiler with fixed options that memoises results per source text.
 *
 * Cached results are shared between calls and must not be mutated.
 */
export function createCompiler(options: CompilerOptions = {}): SproutCompiler {
  const { cacheSize = 128, ...compileOptions } = options;
  const logger = compileOptions.logger;
  const cache = cacheSize > 0 ? new LRUCache<string, PartialCompileResult>({ max: cacheSize }) : undefined;

  const lookup = (source: string): PartialCompileResult => {
    const hit = cache?.get(source);
    if (hit) {
      logger?.debug("[sprout] cache hit (%d chars)", source.length);
      return hit;
    }
    const result = runPipeline(source, compileOptions);
    cache?.set(source, result);
    return result;
  };

  return {
    compile: (source) => complete(lookup(source)),
    compilePartial: (source) => lookup(source),
    clear: () => cache?.clear(),
  };
}
