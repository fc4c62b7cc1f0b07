import type { ChartConfiguration } from 'chart.js';
import { z } from 'zod';

export const CHART_TYPES = ['bar', 'pie', 'doughnut', 'line', 'polarArea', 'radar'] as const;
export type ChartKind = (typeof CHART_TYPES)[number];

export const CHART_PALETTE = [
  'rgba(255, 107, 0, 0.8)',
  'rgba(0, 170, 91, 0.8)',
  'rgba(0, 102, 204, 0.8)',
  'rgba(255, 193, 7, 0.8)',
  'rgba(220, 53, 69, 0.8)',
  'rgba(108, 117, 125, 0.8)',
  'rgba(111, 66, 193, 0.8)',
  'rgba(23, 162, 184, 0.8)',
  'rgba(40, 167, 69, 0.8)',
  'rgba(253, 126, 20, 0.8)',
] as const;

export const CHART_BORDER_PALETTE = CHART_PALETTE.map((color) => color.replace(/0\.8\)$/, '1)'));

export const CHART_WIDTH = 600;
export const CHART_MIN_HEIGHT = 400;
export const BAR_HEIGHT_PER_LABEL = 30;

const PIE_LIKE_TYPES: ReadonlySet<ChartKind> = new Set<ChartKind>(['pie', 'doughnut', 'polarArea']);
const FONT_FAMILY = "'Inter', sans-serif";

const chartSpecSchema = z
  .object({
    type: z.enum(CHART_TYPES),
    title: z.string().default(''),
    labels: z.array(z.union([z.string(), z.number()]).transform((label) => String(label))),
    data: z.array(z.number()),
  })
  .refine((spec) => spec.data.length === spec.labels.length, {
    message: 'data must have one value per label',
    path: ['data'],
  });

export type ChartSpec = z.infer<typeof chartSpecSchema>;

export type ChartSpecResult = { ok: true; spec: ChartSpec } | { ok: false; diagnostics: string[] };

export interface ChartSetup {
  width: number;
  height: number;
  configuration: ChartConfiguration;
}

export function parseChartSpec(source: string): ChartSpecResult {
  let raw: unknown;
  try {
    raw = JSON.parse(source);
  } catch (error) {
    return { ok: false, diagnostics: [`Invalid chart JSON: ${error instanceof Error ? error.message : String(error)}`] };
  }

  const parsed = chartSpecSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      diagnostics: parsed.error.issues.map((issue) =>
        issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    };
  }
  return { ok: true, spec: parsed.data };
}

function paletteColor(palette: readonly string[], index: number): string {
  return palette[index % palette.length] ?? CHART_PALETTE[0];
}

export function chartHeight(spec: ChartSpec): number {
  if (spec.type === 'bar') {
    return Math.max(CHART_MIN_HEIGHT, BAR_HEIGHT_PER_LABEL * spec.labels.length);
  }
  return CHART_MIN_HEIGHT;
}

export function buildChartSetup(spec: ChartSpec): ChartSetup {
  const isBar = spec.type === 'bar';
  const backgroundColor = isBar
    ? CHART_PALETTE[0]
    : spec.labels.map((_label, index) => paletteColor(CHART_PALETTE, index));
  const borderColor = isBar
    ? paletteColor(CHART_BORDER_PALETTE, 0)
    : spec.labels.map((_label, index) => paletteColor(CHART_BORDER_PALETTE, index));

  const configuration: ChartConfiguration = {
    type: spec.type,
    data: {
      labels: spec.labels,
      datasets: [
        {
          label: spec.title,
          data: spec.data,
          backgroundColor,
          borderColor,
          borderWidth: 2,
        },
      ],
    },
    options: {
      responsive: true,
      maintainAspectRatio: false,
      plugins: {
        legend: {
          display: PIE_LIKE_TYPES.has(spec.type),
          position: 'bottom',
          labels: { font: { size: 13, family: FONT_FAMILY }, padding: 20, boxWidth: 15 },
        },
        title: {
          display: true,
          text: spec.title,
          font: { size: 18, weight: 'bold', family: FONT_FAMILY },
          padding: 25,
        },
      },
      scales: isBar
        ? {
            y: { beginAtZero: true, ticks: { font: { size: 12, family: FONT_FAMILY } } },
            x: { ticks: { font: { size: 12, family: FONT_FAMILY }, maxRotation: 45, minRotation: 0 } },
          }
        : {},
    },
  };

  return { width: CHART_WIDTH, height: chartHeight(spec), configuration };
}
