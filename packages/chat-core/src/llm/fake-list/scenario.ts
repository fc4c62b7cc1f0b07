export type ScriptedFailure =
  | { kind: 'network' }
  | { kind: 'http'; status: number }
  | { kind: 'server'; message: string; afterChars?: number };

export interface ScriptedScenario {
  name: string;
  response: string;
  charsPerRecord?: number;
  chunkDelayMs?: number;
  stopAfterChars?: number;
  failure?: ScriptedFailure;
}

export const BUILTIN_SCRIPTED_SCENARIOS: Record<string, ScriptedScenario> = {
  markdown_table: {
    name: 'markdown_table',
    response:
      'Store counts by region:\n\n| Region | Stores |\n|---|---|\n| Seoul | 42 |\n| Busan | 17 |\n| Incheon | 9 |\n\nSeoul has the most stores.',
    chunkDelayMs: 10,
  },
  bar_chart: {
    name: 'bar_chart',
    response: [
      'Monthly sales for the first quarter:',
      '',
      '```chartjs',
      '{"type":"bar","title":"Q1 sales","labels":["Jan","Feb","Mar"],"data":[120,98,143]}',
      '```',
      '',
      'March was the strongest month.',
    ].join('\n'),
    chunkDelayMs: 10,
  },
  pie_diagram: {
    name: 'pie_diagram',
    response: [
      'Category share:',
      '',
      '```mermaid',
      'pie title Category share',
      '    "Snacks (dry)" : 45',
      '    "Drinks!" : 30',
      '    "Fresh food" : 25',
      '```',
    ].join('\n'),
    chunkDelayMs: 10,
  },
  stopped_midway: {
    name: 'stopped_midway',
    response: 'This answer is cut short by the server before it finishes.',
    stopAfterChars: 20,
  },
  server_error: {
    name: 'server_error',
    response: 'Partial answer before the upstream model fails.',
    failure: { kind: 'server', message: 'Upstream model unavailable', afterChars: 12 },
  },
  empty_answer: {
    name: 'empty_answer',
    response: '',
  },
};

export function listScriptedScenarios(): string[] {
  return Object.keys(BUILTIN_SCRIPTED_SCENARIOS);
}

export function getScriptedScenario(name?: string): ScriptedScenario {
  if (name && BUILTIN_SCRIPTED_SCENARIOS[name]) {
    return BUILTIN_SCRIPTED_SCENARIOS[name];
  }
  return BUILTIN_SCRIPTED_SCENARIOS.markdown_table;
}
