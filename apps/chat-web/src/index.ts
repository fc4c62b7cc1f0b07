import type { ActionMode, ChatSettings, SessionEvent } from '@datachat/shared-types';
import {
  createChatSession,
  describeError,
  type AnswerRenderRequest,
  type ChatSession,
  type CompletionService,
  type TurnOutcome,
} from '@datachat/chat-core';
import { createIncrementalRenderer, type IncrementalRenderer } from '@datachat/rich-render';
import { loadSettings } from '@datachat/storage-local';
import { createDomRenderCapabilities, type DomRenderCapabilities } from './dom-surface';
import { createCompletionServiceFromOverrides, readRuntimeOverrides } from './runtime-overrides';
import { autoResizeTextarea, createLoadingDots, createNotice, setIconLabel, type NoticeKind } from './ui-helpers';
import './styles/chat.css';

export { createDomRenderCapabilities, renderMarkdown, type DomRenderCapabilities } from './dom-surface';

export const ROOT_SELECTOR = '[data-datachat-root]';
export const WELCOME_TEXT = 'System ready. Start a conversation.';
export const EXAMPLE_PROMPTS = ['제타큐브는 어떤 회사야?', 'NanoDC에 대해 알려줘', 'Vasp 라이센스가 뭐야?'];

export interface ChatUiOptions {
  settings?: ChatSettings;
  storage?: Storage;
  completionService?: CompletionService;
  fetch?: typeof fetch;
  examplePrompts?: readonly string[];
}

export interface ChatUiHandle {
  session: ChatSession;
  send(text: string): Promise<TurnOutcome | null>;
  destroy(): void;
}

interface AssistantTurnView {
  row: HTMLElement;
  capabilities: DomRenderCapabilities;
  renderer: IncrementalRenderer<HTMLElement>;
}

export function mountChatUi(container: HTMLElement, options: ChatUiOptions = {}): ChatUiHandle {
  const settings = options.settings ?? loadSettings(options.storage);
  const completionService = options.completionService ?? createCompletionServiceFromOverrides(readRuntimeOverrides());
  const examplePrompts = options.examplePrompts ?? EXAMPLE_PROMPTS;
  const turnViews = new Map<string, AssistantTurnView>();
  let loadingRow: HTMLElement | null = null;

  const root = document.createElement('div');
  root.className = 'datachat-root';

  const header = document.createElement('div');
  header.className = 'datachat-header';
  const title = document.createElement('div');
  title.className = 'datachat-title';
  setIconLabel(title, '◈', 'Data Chat');
  const clearButton = document.createElement('button');
  clearButton.type = 'button';
  clearButton.className = 'datachat-header-button';
  clearButton.setAttribute('data-testid', 'clear-button');
  setIconLabel(clearButton, '✕', 'Clear');
  header.append(title, clearButton);

  const feed = document.createElement('div');
  feed.className = 'datachat-feed';
  feed.setAttribute('data-testid', 'chat-feed');

  const composerWrap = document.createElement('div');
  composerWrap.className = 'datachat-composer';
  const composer = document.createElement('textarea');
  composer.className = 'datachat-textarea';
  composer.rows = 1;
  composer.placeholder = 'Ask about your data...';
  const primaryButton = document.createElement('button');
  primaryButton.type = 'button';
  primaryButton.className = 'datachat-primary';
  primaryButton.setAttribute('data-testid', 'action-button');
  composerWrap.append(composer, primaryButton);

  root.append(header, feed, composerWrap);
  container.innerHTML = '';
  container.append(root);

  function revealLatest(): void {
    feed.scrollTop = feed.scrollHeight;
  }

  function renderWelcome(): void {
    const welcome = document.createElement('div');
    welcome.className = 'datachat-welcome';
    const heading = document.createElement('h2');
    heading.textContent = WELCOME_TEXT;
    const prompts = document.createElement('div');
    prompts.className = 'datachat-examples';
    for (const prompt of examplePrompts) {
      const button = document.createElement('button');
      button.type = 'button';
      button.className = 'datachat-example';
      button.textContent = prompt;
      button.onclick = () => submit(prompt);
      prompts.append(button);
    }
    welcome.append(heading, prompts);
    feed.append(welcome);
  }

  function dismissNotices(): void {
    for (const notice of Array.from(feed.querySelectorAll('.datachat-notice'))) {
      notice.remove();
    }
  }

  function appendNotice(kind: NoticeKind, text: string): void {
    feed.append(createNotice(kind, text));
    revealLatest();
  }

  function appendUserRow(text: string): void {
    const row = document.createElement('div');
    row.className = 'datachat-row user';
    const bubble = document.createElement('div');
    bubble.className = 'datachat-message';
    bubble.textContent = text;
    row.append(bubble);
    feed.append(row);
  }

  function removeLoading(): void {
    loadingRow?.remove();
    loadingRow = null;
  }

  function showLoading(): void {
    removeLoading();
    loadingRow = document.createElement('div');
    loadingRow.className = 'datachat-row assistant';
    loadingRow.append(createLoadingDots());
    feed.append(loadingRow);
    revealLatest();
  }

  function ensureAssistantView(turnId: string): AssistantTurnView {
    const existing = turnViews.get(turnId);
    if (existing) {
      return existing;
    }
    removeLoading();
    const row = document.createElement('div');
    row.className = 'datachat-row assistant';
    row.dataset.turnId = turnId;
    const body = document.createElement('div');
    body.className = 'datachat-message datachat-body';
    row.append(body);
    feed.append(row);

    const capabilities = createDomRenderCapabilities({ body, scroller: feed });
    const view = { row, capabilities, renderer: createIncrementalRenderer(capabilities) };
    turnViews.set(turnId, view);
    return view;
  }

  function disposeTurnViews(): void {
    for (const view of turnViews.values()) {
      view.renderer.reset();
      view.capabilities.dispose();
    }
    turnViews.clear();
  }

  async function renderAnswer({ turnId, text, final }: AnswerRenderRequest): Promise<void> {
    await ensureAssistantView(turnId).renderer.update(text, { final });
  }

  function applyActionMode(mode: ActionMode): void {
    primaryButton.dataset.mode = mode;
    if (mode === 'stop') {
      setIconLabel(primaryButton, '■', 'Stop');
      primaryButton.disabled = false;
      return;
    }
    if (mode === 'send') {
      setIconLabel(primaryButton, '➤', 'Send');
    }
    primaryButton.disabled = mode === 'disabled';
  }

  const session = createChatSession({ settings, completionService, fetch: options.fetch, renderAnswer });

  const handleSessionEvent = (event: SessionEvent): void => {
    if (event.type === 'turn.status.changed') {
      if (event.payload.status === 'sending') {
        showLoading();
      } else {
        removeLoading();
      }
      return;
    }
    if (event.type === 'action.mode.changed') {
      applyActionMode(event.payload.mode);
      return;
    }
    if (event.type === 'turn.empty') {
      appendNotice('info', event.payload.notice);
      return;
    }
    if (event.type === 'turn.failed') {
      appendNotice('error', `Error: ${event.payload.reason}`);
      return;
    }
    if (event.type === 'turn.cancelled') {
      turnViews.get(event.payload.turnId)?.row.classList.add('cancelled');
      return;
    }
    if (event.type === 'composer.focus') {
      composer.focus();
    }
  };
  const unsubscribe = session.subscribe(handleSessionEvent);

  function send(rawText: string): Promise<TurnOutcome | null> {
    const text = rawText.trim();
    if (!text) {
      return Promise.resolve(null);
    }
    dismissNotices();
    feed.querySelector('.datachat-welcome')?.remove();
    appendUserRow(text);
    composer.value = '';
    autoResizeTextarea(composer);
    revealLatest();
    return session.submit(text);
  }

  function submit(text: string): void {
    send(text).catch((error: unknown) => {
      console.error('[datachat][ui] submit failed', describeError(error));
      appendNotice('error', `Error: ${describeError(error)}`);
    });
  }

  composer.addEventListener('input', () => autoResizeTextarea(composer));
  composer.addEventListener('keydown', (event) => {
    if (event.key !== 'Enter' || event.shiftKey || event.isComposing) {
      return;
    }
    event.preventDefault();
    submit(composer.value);
  });

  primaryButton.onclick = () => {
    if (session.getActionMode() === 'stop') {
      session.stop();
      return;
    }
    submit(composer.value);
  };

  clearButton.onclick = () => {
    session.clear();
    disposeTurnViews();
    removeLoading();
    feed.innerHTML = '';
    renderWelcome();
    composer.value = '';
    autoResizeTextarea(composer);
  };

  applyActionMode(session.getActionMode());
  renderWelcome();

  return {
    session,
    send,
    destroy() {
      unsubscribe();
      session.clear();
      disposeTurnViews();
      container.innerHTML = '';
    },
  };
}

export function bootstrapChatUi(doc: Document = document): ChatUiHandle | null {
  const root = doc.querySelector(ROOT_SELECTOR);
  return root instanceof HTMLElement ? mountChatUi(root) : null;
}

if (typeof document !== 'undefined') {
  bootstrapChatUi();
}
