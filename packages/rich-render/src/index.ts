export { blockKindForLanguage, extractStructuredBlocks } from './blocks';
export {
  BAR_HEIGHT_PER_LABEL,
  buildChartSetup,
  CHART_BORDER_PALETTE,
  CHART_MIN_HEIGHT,
  CHART_PALETTE,
  CHART_TYPES,
  CHART_WIDTH,
  chartHeight,
  parseChartSpec,
  type ChartKind,
  type ChartSetup,
  type ChartSpec,
  type ChartSpecResult,
} from './chart-config';
export type {
  CachedArtifacts,
  IncrementalRenderer,
  RenderCapabilities,
  RenderUpdateOptions,
  RichTextView,
  StructuredBlock,
  StructuredBlockKind,
} from './contracts';
export { createIncrementalRenderer, MIN_DIAGRAM_SOURCE_LENGTH } from './incremental-renderer';
export { sanitizeDiagramSource } from './sanitize-diagram';
