import type { StructuredBlock, StructuredBlockKind } from './contracts';

const FENCE_LANGUAGES: Record<string, StructuredBlockKind> = {
  mermaid: 'diagram',
  chartjs: 'chart',
};

export function blockKindForLanguage(language: string): StructuredBlockKind | null {
  return FENCE_LANGUAGES[language.trim().toLowerCase()] ?? null;
}

export function extractStructuredBlocks(text: string): StructuredBlock[] {
  const blocks: StructuredBlock[] = [];
  const fence = /```([a-zA-Z0-9_-]+)?[^\S\n]*\n([\s\S]*?)```/g;
  let match: RegExpExecArray | null;

  while ((match = fence.exec(text)) !== null) {
    const kind = blockKindForLanguage(match[1] || '');
    if (kind) {
      blocks.push({ kind, source: (match[2] || '').trim(), index: blocks.length });
    }
  }
  return blocks;
}
