import { computeConfidence } from './confidence';

describe('computeConfidence', () => {
  it('is zero when nothing passes the threshold', () => {
    expect(computeConfidence({ scores: [], threshold: 0.7, topK: 5 })).toBe(0);
    expect(computeConfidence({ scores: [0.69, 0.5], threshold: 0.7, topK: 5, certainty: 1 })).toBe(0);
  });

  it('rescales top score and coverage without a certainty signal', () => {
    // (0.5 * 0.95 + 0.25 * 3/5) / 0.75
    expect(computeConfidence({ scores: [0.95, 0.91, 0.78], threshold: 0.7, topK: 5 })).toBe(0.833);
  });

  it('blends in generation certainty when available', () => {
    // 0.5 * 0.95 + 0.25 * 0.6 + 0.25 * 0.8
    expect(computeConfidence({ scores: [0.95, 0.91, 0.78], threshold: 0.7, topK: 5, certainty: 0.8 })).toBe(0.825);
  });

  it('stays within [0, 1]', () => {
    expect(computeConfidence({ scores: [1, 1, 1, 1, 1, 1], threshold: 0.7, topK: 5, certainty: 3 })).toBe(1);
  });
});
