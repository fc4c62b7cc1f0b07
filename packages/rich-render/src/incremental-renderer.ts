import type {
  CachedArtifacts,
  IncrementalRenderer,
  RenderCapabilities,
  RenderUpdateOptions,
  RichTextView,
  StructuredBlock,
} from './contracts';
import { buildChartSetup, parseChartSpec } from './chart-config';
import { sanitizeDiagramSource } from './sanitize-diagram';

export const MIN_DIAGRAM_SOURCE_LENGTH = 20;

interface PassRequest {
  text: string;
  final: boolean;
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

interface DiagramFailure {
  source: string;
  reason: string;
}

/** Counts how many times each source has been seen in the current pass. */
function claimOccurrence(seen: Map<string, number>, source: string): number {
  const occurrence = seen.get(source) ?? 0;
  seen.set(source, occurrence + 1);
  return occurrence;
}

function copyCache<TArtifact>(cache: Map<string, TArtifact[]>): Map<string, readonly TArtifact[]> {
  const copy = new Map<string, readonly TArtifact[]>();
  for (const [source, artifacts] of cache) {
    copy.set(source, [...artifacts]);
  }
  return copy;
}

/**
 * Re-renders the whole answer on every update while keeping diagram and chart artifacts
 * materialized at most once per distinct source and occurrence. An artifact is placed in one
 * slot only, so a source repeated within an answer gets one artifact per repetition. Passes run
 * one at a time; updates that arrive during a pass collapse into a single follow-up pass over the
 * newest text.
 */
export function createIncrementalRenderer<TArtifact>(
  capabilities: RenderCapabilities<TArtifact>,
): IncrementalRenderer<TArtifact> {
  let diagrams = new Map<string, TArtifact[]>();
  // Last failure per block position; a growing fence overwrites its own entry.
  let failedDiagrams = new Map<number, DiagramFailure>();
  let charts = new Map<string, TArtifact[]>();
  let queued: PassRequest | null = null;
  let running: Promise<void> | null = null;

  function remember(cache: Map<string, TArtifact[]>, source: string, artifact: TArtifact): void {
    const artifacts = cache.get(source);
    if (artifacts) {
      artifacts.push(artifact);
    } else {
      cache.set(source, [artifact]);
    }
  }

  async function renderDiagram(
    view: RichTextView<TArtifact>,
    block: StructuredBlock,
    seen: Map<string, number>,
  ): Promise<void> {
    if (block.source.length < MIN_DIAGRAM_SOURCE_LENGTH) {
      return;
    }
    const source = sanitizeDiagramSource(block.source);
    const occurrence = claimOccurrence(seen, source);
    const cached = diagrams.get(source)?.[occurrence];
    if (cached !== undefined) {
      view.place(block, cached);
      return;
    }
    const failure = failedDiagrams.get(block.index);
    if (failure !== undefined && failure.source === source) {
      view.fail(block, failure.reason);
      return;
    }

    view.markPending(block);
    try {
      const artifact = await capabilities.materializeDiagram(source);
      remember(diagrams, source, artifact);
      failedDiagrams.delete(block.index);
      view.place(block, artifact);
    } catch (error) {
      const reason = `Diagram rendering failed: ${reasonOf(error)}`;
      console.error('[datachat][render] diagram failed', { index: block.index, reason });
      failedDiagrams.set(block.index, { source, reason });
      view.fail(block, reason);
    }
  }

  async function renderChart(
    view: RichTextView<TArtifact>,
    block: StructuredBlock,
    seen: Map<string, number>,
    final: boolean,
  ): Promise<void> {
    const occurrence = claimOccurrence(seen, block.source);
    const cached = charts.get(block.source)?.[occurrence];
    if (cached !== undefined) {
      view.place(block, cached);
      return;
    }
    if (!final) {
      return;
    }

    const parsed = parseChartSpec(block.source);
    if (!parsed.ok) {
      console.warn('[datachat][render] chart block left as text', { index: block.index, diagnostics: parsed.diagnostics });
      return;
    }

    view.markPending(block);
    try {
      const artifact = await capabilities.materializeChart(buildChartSetup(parsed.spec));
      remember(charts, block.source, artifact);
      view.place(block, artifact);
    } catch (error) {
      const reason = `Chart construction failed: ${reasonOf(error)}`;
      console.error('[datachat][render] chart failed', { index: block.index, reason });
      view.fail(block, reason);
    }
  }

  async function runPass({ text, final }: PassRequest): Promise<void> {
    const view = capabilities.renderRichText(text);
    const seenDiagrams = new Map<string, number>();
    const seenCharts = new Map<string, number>();
    for (const block of view.blocks) {
      if (block.kind === 'diagram') {
        await renderDiagram(view, block, seenDiagrams);
      } else {
        await renderChart(view, block, seenCharts, final);
      }
    }
    capabilities.revealLatest();
  }

  async function drain(): Promise<void> {
    try {
      while (queued) {
        const next = queued;
        queued = null;
        await runPass(next);
      }
    } finally {
      running = null;
    }
  }

  return {
    update(text: string, options: RenderUpdateOptions = {}) {
      queued = { text, final: Boolean(options.final) || (queued?.final ?? false) };
      if (!running) {
        running = drain();
      }
      return running;
    },
    reset() {
      queued = null;
      diagrams = new Map();
      failedDiagrams = new Map();
      charts = new Map();
    },
    cachedArtifacts(): CachedArtifacts<TArtifact> {
      const diagramFailures = new Map<number, string>();
      for (const [index, failure] of failedDiagrams) {
        diagramFailures.set(index, failure.reason);
      }
      return { diagrams: copyCache(diagrams), charts: copyCache(charts), diagramFailures };
    },
  };
}
