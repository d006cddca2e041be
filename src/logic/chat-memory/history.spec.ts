import { boundHistory, formatHistory } from './history';
import { Turn } from './types';

function turns(count: number): Turn[] {
  return Array.from({ length: count }, (_, i): Turn => ({
    role: i % 2 === 0 ? 'user' : 'assistant',
    content: `turn ${i}`,
    timestamp: new Date(Date.UTC(2024, 0, 1, 0, 0, i)),
  }));
}

describe('boundHistory', () => {
  it('evicts the oldest turns once the limit is exceeded', () => {
    const bounded = boundHistory(turns(13), 10);
    expect(bounded).toHaveLength(10);
    expect(bounded[0].content).toBe('turn 3');
    expect(bounded[9].content).toBe('turn 12');
  });

  it('keeps short histories intact', () => {
    expect(boundHistory(turns(4), 10).map(t => t.content)).toEqual(['turn 0', 'turn 1', 'turn 2', 'turn 3']);
  });

  it('returns nothing for a zero limit', () => {
    expect(boundHistory(turns(4), 0)).toEqual([]);
  });
});

describe('formatHistory', () => {
  it('labels speakers', () => {
    expect(formatHistory(turns(2))).toBe('User: turn 0\nAssistant: turn 1');
  });
});
