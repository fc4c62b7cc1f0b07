export function sliceForTyping(text: string, sliceSize: number): string[] {
  const characters = Array.from(text);
  const size = Math.max(1, Math.floor(sliceSize));
  const slices: string[] = [];
  for (let index = 0; index < characters.length; index += size) {
    slices.push(characters.slice(index, index + size).join(''));
  }
  return slices;
}

export function wait(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new DOMException('The operation was aborted.', 'AbortError'));
  }
  if (!ms || ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve, reject) => {
    const handle = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(handle);
      reject(new DOMException('The operation was aborted.', 'AbortError'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
