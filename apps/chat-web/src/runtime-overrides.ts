import {
  createScriptedCompletionService,
  getScriptedScenario,
  listScriptedScenarios,
  type CompletionService,
} from '@datachat/chat-core';

export const SCRIPTED_MODE_KEY = 'datachatScriptedMode';
export const SCENARIO_KEY = 'datachatScriptedScenario';

export interface RuntimeOverrides {
  scriptedEnabled: boolean;
  scriptedScenario?: string;
}

function readLocalStorageValue(key: string): string | undefined {
  try {
    const value = window.localStorage.getItem(key)?.trim();
    return value || undefined;
  } catch (error) {
    console.debug('[datachat][overrides] storage read failed', { key, error });
    return undefined;
  }
}

function writeLocalStorageValue(key: string, value?: string): void {
  try {
    if (value && value.trim()) {
      window.localStorage.setItem(key, value.trim());
    } else {
      window.localStorage.removeItem(key);
    }
  } catch (error) {
    console.debug('[datachat][overrides] storage write failed', { key, error });
  }
}

export function readRuntimeScenario(): string | undefined {
  return readLocalStorageValue(SCENARIO_KEY);
}

export function writeRuntimeScenario(value?: string): void {
  writeLocalStorageValue(SCENARIO_KEY, value);
}

export function isScriptedModeEnabled(): boolean {
  const value = readLocalStorageValue(SCRIPTED_MODE_KEY);
  return value === '1' || value?.toLowerCase() === 'true';
}

export function writeScriptedModeEnabled(enabled: boolean): void {
  writeLocalStorageValue(SCRIPTED_MODE_KEY, enabled ? 'true' : undefined);
}

export function getRuntimeScenarios(): string[] {
  return listScriptedScenarios();
}

export function readRuntimeOverrides(): RuntimeOverrides {
  if (!isScriptedModeEnabled()) {
    return { scriptedEnabled: false };
  }
  return { scriptedEnabled: true, scriptedScenario: readRuntimeScenario() };
}

export function createCompletionServiceFromOverrides(overrides: RuntimeOverrides): CompletionService | undefined {
  if (!overrides.scriptedEnabled) {
    return undefined;
  }
  const scenario = getScriptedScenario(overrides.scriptedScenario);
  console.info('[datachat][overrides] using scripted completion service', { scenario: scenario.name });
  return createScriptedCompletionService(scenario);
}
