import { describe, expect, it } from 'vitest';
import { cosineSimilarity, dot, euclideanDistance, quantize, similarity } from '../../index/metrics.js';

describe('metrics', () => {
  it('should compute dot products and distances', () => {
    expect(dot([1, 2], [3, 4])).toBe(11);
    expect(euclideanDistance([0, 0], [3, 4])).toBe(5);
  });

  it('should score cosine similarity in [-1, 1] and zero for zero vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 12);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('should map every metric so larger means closer', () => {
    expect(similarity('dot', [1, 2], [3, 4])).toBe(11);
    expect(similarity('euclidean', [0, 0], [3, 4])).toBeCloseTo(1 / 6, 12);
    expect(similarity('euclidean', [1, 1], [1, 1])).toBe(1);
  });

  describe('quantize', () => {
    it('should round to float32', () => {
      expect(quantize([0.1], 'float32')).toEqual([Math.fround(0.1)]);
    });

    it('should scale int8 symmetrically per vector', () => {
      const out = quantize([1, -0.3, 0.1], 'int8');
      expect(out[0]).toBeCloseTo(1, 12);
      expect(out[1]).toBeCloseTo(-38 / 127, 12);
      expect(out[2]).toBeCloseTo(13 / 127, 12);
    });

    it('should keep int16 within one step of the input', () => {
      const input = [0.25, -0.7, 0.9];
      quantize(input, 'int16').forEach((v, i) => {
        expect(Math.abs(v - (input[i] ?? 0))).toBeLessThanOrEqual(0.9 / 32767);
      });
    });

    it('should leave a zero vector at zero', () => {
      expect(quantize([0, 0], 'int8')).toEqual([0, 0]);
    });
  });
});
