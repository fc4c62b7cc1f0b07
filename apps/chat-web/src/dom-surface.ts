import { Chart, registerables } from 'chart.js';
import { Marked } from 'marked';
import mermaid from 'mermaid';
import {
  blockKindForLanguage,
  type ChartSetup,
  type RenderCapabilities,
  type RichTextView,
  type StructuredBlock,
} from '@datachat/rich-render';
import { createBlockError, createBlockPlaceholder, escapeHtml } from './ui-helpers';

Chart.register(...registerables);

// Answers are model output: raw HTML in them is shown as text.
const markdown = new Marked({
  gfm: true,
  breaks: true,
  renderer: {
    html: (html: string) => escapeHtml(html),
  },
});

let mermaidInitialized = false;
let diagramSequence = 0;

function ensureMermaid(): void {
  if (mermaidInitialized) {
    return;
  }
  mermaid.initialize({ startOnLoad: false, securityLevel: 'strict', theme: 'default' });
  mermaidInitialized = true;
}

function languageOf(code: Element): string {
  for (const name of Array.from(code.classList)) {
    if (name.startsWith('language-')) {
      return name.slice('language-'.length);
    }
  }
  return '';
}

export function renderMarkdown(source: string): string {
  const html = markdown.parse(source, { async: false });
  return typeof html === 'string' ? html : '';
}

export interface DomSurfaceOptions {
  body: HTMLElement;
  scroller?: HTMLElement;
}

export interface DomRenderCapabilities extends RenderCapabilities<HTMLElement> {
  dispose(): void;
}

export function createDomRenderCapabilities({ body, scroller }: DomSurfaceOptions): DomRenderCapabilities {
  const charts: Chart[] = [];

  return {
    renderRichText(source: string): RichTextView<HTMLElement> {
      body.innerHTML = renderMarkdown(source);

      const blocks: StructuredBlock[] = [];
      const slots = new Map<number, Element>();
      for (const code of Array.from(body.querySelectorAll('pre > code'))) {
        const kind = blockKindForLanguage(languageOf(code));
        const pre = code.parentElement;
        if (!kind || !pre) {
          continue;
        }
        const block: StructuredBlock = { kind, source: (code.textContent ?? '').trim(), index: blocks.length };
        blocks.push(block);
        slots.set(block.index, pre);
      }

      const swap = (block: StructuredBlock, node: HTMLElement): void => {
        const current = slots.get(block.index);
        if (!current) {
          return;
        }
        current.replaceWith(node);
        slots.set(block.index, node);
      };

      return {
        blocks,
        place: (block, artifact) => swap(block, artifact),
        markPending: (block) => swap(block, createBlockPlaceholder(block.kind)),
        fail: (block, reason) => swap(block, createBlockError(reason)),
      };
    },

    async materializeDiagram(source: string): Promise<HTMLElement> {
      ensureMermaid();
      diagramSequence += 1;
      const id = `datachat-diagram-${diagramSequence}`;
      try {
        const { svg } = await mermaid.render(id, source);
        const wrapper = document.createElement('div');
        wrapper.className = 'datachat-diagram';
        wrapper.innerHTML = svg;
        return wrapper;
      } finally {
        // mermaid leaves its scratch element behind when parsing fails
        document.getElementById(`d${id}`)?.remove();
      }
    },

    async materializeChart(setup: ChartSetup): Promise<HTMLElement> {
      const container = document.createElement('div');
      container.className = 'datachat-chart';
      container.style.position = 'relative';
      container.style.height = `${setup.height}px`;
      container.style.maxWidth = `${setup.width}px`;

      const canvas = document.createElement('canvas');
      canvas.width = setup.width;
      canvas.height = setup.height;
      container.append(canvas);

      charts.push(new Chart(canvas, setup.configuration));
      return container;
    },

    revealLatest(): void {
      if (scroller) {
        scroller.scrollTop = scroller.scrollHeight;
      }
    },

    dispose(): void {
      for (const chart of charts.splice(0)) {
        chart.destroy();
      }
    },
  };
}
