import { describe, it, expect } from 'vitest';
import { name, TreeClassifier } from './index';

describe('repo package', () => {
  it('exports name and the classifier', () => {
    expect(name).toBe('@gitree/repo');
    expect(typeof TreeClassifier).toBe('function');
  });
});
