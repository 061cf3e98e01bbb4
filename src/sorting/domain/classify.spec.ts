import { Category, categoryLabel } from './category';
import {
  assessPackage,
  classify,
  classifyPackage,
  isBulky,
  isHeavy,
} from './classify';
import { createPackage, volumeOf } from './package';

const RESTRICTIVENESS: Record<Category, number> = {
  [Category.Standard]: 0,
  [Category.Special]: 1,
  [Category.Rejected]: 2,
};

describe('classify', () => {
  it.each([
    [50, 50, 50, 10, Category.Standard],
    [100, 100, 100, 10, Category.Special],
    [160, 50, 50, 10, Category.Special],
    [50, 50, 50, 25, Category.Special],
    [160, 50, 50, 25, Category.Rejected],
    [149, 149, 1, 19.9, Category.Standard],
    [100, 100, 100, 5, Category.Special],
  ])('%p x %p x %p cm, %p kg -> %s', (w, h, l, m, expected) => {
    expect(classify(w, h, l, m)).toBe(expected);
  });

  it('treats every threshold as inclusive', () => {
    expect(classify(150, 1, 1, 0)).toBe(Category.Special);
    expect(classify(1, 150, 1, 0)).toBe(Category.Special);
    expect(classify(1, 1, 150, 0)).toBe(Category.Special);
    expect(classify(1, 1, 1, 20)).toBe(Category.Special);
    expect(classify(100, 100, 100, 20)).toBe(Category.Rejected);
  });

  it('stays standard just below every threshold', () => {
    expect(classify(149.99, 1, 1, 19.99)).toBe(Category.Standard);
    expect(classify(99, 100, 100, 0)).toBe(Category.Standard);
  });

  it('returns the same category for repeated calls', () => {
    const first = classify(120, 80, 110, 19);
    for (let i = 0; i < 10; i++) {
      expect(classify(120, 80, 110, 19)).toBe(first);
    }
  });

  it('never becomes less restrictive as one input grows', () => {
    const steps = [0, 1, 19.9, 20, 99, 100, 149, 150, 1000];
    const bases: [number, number, number, number][] = [
      [10, 10, 10, 1],
      [99, 99, 99, 19],
      [1, 1, 1, 30],
    ];

    for (const base of bases) {
      for (let slot = 0; slot < 4; slot++) {
        let previous = -1;
        for (const value of steps) {
          const args: [number, number, number, number] = [...base];
          args[slot] = value;
          const rank = RESTRICTIVENESS[classify(...args)];
          expect(rank).toBeGreaterThanOrEqual(previous);
          previous = rank;
        }
      }
    }
  });

  describe('non-finite and negative inputs', () => {
    it('never lets NaN trigger a threshold on its own', () => {
      expect(classify(NaN, 50, 50, 10)).toBe(Category.Standard);
      expect(classify(50, 50, 50, NaN)).toBe(Category.Standard);
      expect(classify(NaN, NaN, NaN, NaN)).toBe(Category.Standard);
    });

    it('still applies the other predicates around a NaN', () => {
      expect(classify(NaN, 160, 50, 25)).toBe(Category.Rejected);
      expect(classify(160, 50, 50, NaN)).toBe(Category.Special);
    });

    it('treats infinities like any other large value', () => {
      expect(classify(Infinity, 1, 1, 0)).toBe(Category.Special);
      expect(classify(1, 1, 1, Infinity)).toBe(Category.Special);
      expect(classify(-Infinity, 1, 1, 0)).toBe(Category.Standard);
    });

    it('runs negative values through the same formulas', () => {
      expect(classify(-200, -200, -200, -5)).toBe(Category.Standard);
      // two negatives make a positive volume of 2,000,000
      expect(classify(-200, -200, 50, 1)).toBe(Category.Special);
    });
  });
});

describe('predicates', () => {
  it('flags bulky by volume or by a single dimension', () => {
    expect(isBulky(createPackage(100, 100, 100, 0))).toBe(true);
    expect(isBulky(createPackage(10, 10, 150, 0))).toBe(true);
    expect(isBulky(createPackage(149, 149, 1, 0))).toBe(false);
  });

  it('flags heavy at 20 kg and above', () => {
    expect(isHeavy(createPackage(1, 1, 1, 20))).toBe(true);
    expect(isHeavy(createPackage(1, 1, 1, 19.9))).toBe(false);
  });
});

describe('assessPackage', () => {
  it('reports both predicates with the category and volume', () => {
    expect(assessPackage(createPackage(160, 50, 50, 25))).toEqual({
      category: Category.Rejected,
      bulky: true,
      heavy: true,
      volume: 400_000,
    });
  });

  it('agrees with classifyPackage', () => {
    const pkg = createPackage(50, 50, 50, 25);
    expect(assessPackage(pkg).category).toBe(classifyPackage(pkg));
  });
});

describe('createPackage', () => {
  it('freezes the package', () => {
    const pkg = createPackage(1, 2, 3, 4);
    expect(Object.isFrozen(pkg)).toBe(true);
    expect(volumeOf(pkg)).toBe(6);
  });
});

describe('categoryLabel', () => {
  it('renders the canonical display strings', () => {
    expect(categoryLabel(Category.Standard)).toBe('STANDARD');
    expect(categoryLabel(Category.Special)).toBe('SPECIAL');
    expect(categoryLabel(Category.Rejected)).toBe('REJECTED');
  });
});
