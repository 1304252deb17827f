import { buildLeadEngineConfig } from '../config/lead-engine.config';
import { NicheClassifier, UNCATEGORIZED, classifyNiche } from './niche-classifier';

describe('classifyNiche', () => {
  const table = {
    gaming: { gaming: 3, esports: 2 },
    fitness: { workout: 2, gym: 2 },
  };

  it('should score matched weight over total weight', () => {
    expect(classifyNiche('Pro Gaming and Esports', table)).toEqual({
      niche: 'gaming',
      confidence: 1,
    });
    expect(classifyNiche('gaming at the gym', table)).toEqual({
      niche: 'gaming',
      confidence: 0.6,
    });
  });

  it('should fall back to uncategorized when nothing matches', () => {
    expect(classifyNiche('slow cooking recipes', table)).toEqual({
      niche: UNCATEGORIZED,
      confidence: 0,
    });
  });

  it('should break ties by the lexicographically smaller label', () => {
    const tied = { beta: { bar: 1 }, alpha: { foo: 1 } };
    expect(classifyNiche('foo bar', tied).niche).toBe('alpha');
  });
});

describe('NicheClassifier', () => {
  const classifier = new NicheClassifier(buildLeadEngineConfig());

  it('should classify against the bundled keyword table', () => {
    const result = classifier.classify('Daily workout and yoga routines');
    expect(result.niche).toBe('fitness');
    expect(result.confidence).toBeCloseTo(5 / 14);
  });

  it('should list the configured niches in order', () => {
    expect(classifier.niches()).toEqual([
      'business',
      'creative',
      'education',
      'fitness',
      'gaming',
      'technology',
    ]);
  });
});
