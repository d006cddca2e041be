import { Turn } from './types';

/** Keeps the newest `limit` turns; the oldest are evicted first. */
export function boundHistory(turns: readonly Turn[], limit: number): Turn[] {
  if (limit <= 0) return [];
  return turns.slice(Math.max(0, turns.length - limit));
}

export function formatHistory(turns: readonly Turn[]): string {
  return turns.map(t => `${t.role === 'user' ? 'User' : 'Assistant'}: ${t.content}`).join('\n');
}
