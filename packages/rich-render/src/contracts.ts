import type { ChartSetup } from './chart-config';

export type StructuredBlockKind = 'diagram' | 'chart';

export interface StructuredBlock {
  kind: StructuredBlockKind;
  /** Trimmed content of the fenced block. */
  source: string;
  /** Position among the structured blocks of one parse, in document order. */
  index: number;
}

/**
 * One fresh parse of the answer buffer, as laid out on the surface.
 * Blocks start out as raw code until the renderer places, marks or fails them.
 */
export interface RichTextView<TArtifact> {
  readonly blocks: readonly StructuredBlock[];
  place(block: StructuredBlock, artifact: TArtifact): void;
  markPending(block: StructuredBlock): void;
  fail(block: StructuredBlock, reason: string): void;
}

export interface RenderCapabilities<TArtifact> {
  renderRichText(source: string): RichTextView<TArtifact>;
  materializeDiagram(source: string): Promise<TArtifact>;
  materializeChart(setup: ChartSetup): Promise<TArtifact>;
  revealLatest(): void;
}

export interface RenderUpdateOptions {
  final?: boolean;
}

/** Artifacts per source, one per occurrence of that source in the answer. */
export interface CachedArtifacts<TArtifact> {
  diagrams: ReadonlyMap<string, readonly TArtifact[]>;
  charts: ReadonlyMap<string, readonly TArtifact[]>;
  /** Last diagram failure reason per block index. */
  diagramFailures: ReadonlyMap<number, string>;
}

export interface IncrementalRenderer<TArtifact> {
  update(text: string, options?: RenderUpdateOptions): Promise<void>;
  reset(): void;
  cachedArtifacts(): CachedArtifacts<TArtifact>;
}
