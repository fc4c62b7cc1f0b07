const LABEL_DISALLOWED = /[^가-힣a-zA-Z0-9\s]/g;

function cleanLabel(label: string): string {
  return label.replace(LABEL_DISALLOWED, '').trim();
}

function diagramType(source: string): string {
  for (const line of source.split('\n')) {
    const trimmed = line.trim();
    if (trimmed && !trimmed.startsWith('%%')) {
      return trimmed.split(/\s+/)[0] ?? '';
    }
  }
  return '';
}

function sanitizeAxisLabels(source: string): string {
  return source.replace(/x-axis\s+\[([\s\S]*?)\]/g, (_match, labels: string) => {
    const cleaned = labels
      .split(',')
      .map((label) => cleanLabel(label.trim().replace(/['"]/g, '')))
      .filter((label) => label.length > 0)
      .join(', ');
    return `x-axis [${cleaned}]`;
  });
}

function sanitizePieLabels(source: string): string {
  return source.replace(
    /"([^"]+)"\s*:\s*(\d+\.?\d*)/g,
    (_match, label: string, value: string) => `"${cleanLabel(label)}" : ${value}`,
  );
}

/**
 * Strips punctuation from x-axis label lists of `xychart-beta` diagrams and from slice labels of
 * `pie` diagrams; mermaid rejects many of the characters models like to put there.
 * Other diagram types pass through untouched. Applying it twice equals applying it once.
 */
export function sanitizeDiagramSource(source: string): string {
  const type = diagramType(source);
  if (type === 'xychart-beta') {
    return sanitizeAxisLabels(source);
  }
  if (type === 'pie') {
    return sanitizePieLabels(source);
  }
  return source;
}
