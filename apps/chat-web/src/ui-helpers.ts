import type { StructuredBlockKind } from '@datachat/rich-render';

export type NoticeKind = 'info' | 'error';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (character) => HTML_ESCAPES[character] ?? character);
}

export function setIconLabel(target: HTMLElement, icon: string, label: string): void {
  target.innerHTML = '';
  const iconNode = document.createElement('span');
  iconNode.className = 'datachat-icon';
  iconNode.setAttribute('aria-hidden', 'true');
  iconNode.textContent = icon;
  const labelNode = document.createElement('span');
  labelNode.className = 'datachat-label';
  labelNode.textContent = label;
  target.append(iconNode, labelNode);
  target.setAttribute('aria-label', label);
}

export function createLoadingDots(): HTMLElement {
  const dots = document.createElement('div');
  dots.className = 'datachat-loading';
  for (let i = 0; i < 3; i += 1) {
    dots.append(document.createElement('span'));
  }
  return dots;
}

export function createNotice(kind: NoticeKind, text: string): HTMLElement {
  const notice = document.createElement('div');
  notice.className = `datachat-notice ${kind}`;
  notice.setAttribute('role', kind === 'error' ? 'alert' : 'status');
  notice.textContent = text;
  return notice;
}

export function createBlockPlaceholder(kind: StructuredBlockKind): HTMLElement {
  const placeholder = document.createElement('div');
  placeholder.className = 'datachat-block-loading';
  const spinner = document.createElement('div');
  spinner.className = 'datachat-spinner';
  const label = document.createElement('p');
  label.textContent = kind === 'chart' ? 'Building chart...' : 'Drawing diagram...';
  placeholder.append(spinner, label);
  return placeholder;
}

export function createBlockError(reason: string): HTMLElement {
  const error = document.createElement('div');
  error.className = 'datachat-block-error';
  error.textContent = reason;
  return error;
}

export function autoResizeTextarea(textarea: HTMLTextAreaElement, maxHeight = 160): void {
  textarea.style.height = 'auto';
  textarea.style.height = `${Math.min(textarea.scrollHeight, maxHeight)}px`;
}
