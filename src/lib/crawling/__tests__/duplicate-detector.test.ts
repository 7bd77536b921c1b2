/**
 * Duplicate Detector Tests
 */

import { DuplicateDetector } from '../duplicate-detector';

describe('DuplicateDetector', () => {
  it('should report a URL as duplicate from its second claim on', () => {
    const detector = new DuplicateDetector();

    expect(detector.claim('https://auto.example.com/a.html')).toBe(false);
    expect(detector.claim('https://auto.example.com/a.html')).toBe(true);
    expect(detector.claim('https://auto.example.com/a.html#gallery')).toBe(true);
    expect(detector.getStats()).toEqual({ total: 1, duplicates: 2 });
  });

  it('should partition a batch against earlier claims and itself', () => {
    const detector = new DuplicateDetector();
    detector.claim('https://auto.example.com/a.html');

    const result = detector.partition([
      'https://auto.example.com/b.html',
      'https://auto.example.com/a.html',
      'https://auto.example.com/b.html',
      'https://auto.example.com/c.html',
    ]);

    expect(result).toEqual({
      fresh: ['https://auto.example.com/b.html', 'https://auto.example.com/c.html'],
      duplicates: ['https://auto.example.com/a.html', 'https://auto.example.com/b.html'],
    });
    expect(detector.getStats()).toEqual({ total: 3, duplicates: 2 });
    expect(detector.claim('https://auto.example.com/c.html')).toBe(true);
  });
});
