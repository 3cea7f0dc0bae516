import { OpenThread } from '../campaign/types.js';

function sameText(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

export function addThread(threads: OpenThread[], text: string, createdAt: string): void {
  const trimmed = text.trim();
  if (!trimmed) return;
  if (threads.some((thread) => !thread.resolved && sameText(thread.text, trimmed))) return;
  threads.push({ text: trimmed, createdAt, resolved: false });
}

/** Flip the resolved flag on the oldest open thread matching `text`. Returns false if none matched. */
export function resolveThread(threads: OpenThread[], text: string): boolean {
  const thread = threads.find((t) => !t.resolved && sameText(t.text, text));
  if (!thread) return false;
  thread.resolved = true;
  return true;
}

export function unresolvedThreads(threads: readonly OpenThread[]): OpenThread[] {
  return threads.filter((thread) => !thread.resolved);
}
