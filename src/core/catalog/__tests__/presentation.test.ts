import { describe, it, expect } from 'vitest';
import { createCreature } from '../creature.js';
import { buildDetails } from '../extractors.js';
import {
  buildSelectionOptions,
  describeCreature,
  findSelection,
  formatIdentifier,
  formatMeasurement,
  joinNames,
  metricBars,
  splitIntoColumns,
} from '../presentation.js';
import { detailPayload, detailUrl } from '../../../tests/fixtures.js';

const entries = [
  { name: 'sproutling', reference: detailUrl(1) },
  { name: 'mr. twig', reference: detailUrl(2) },
];

describe('selection options', () => {
  it('should number labels from one in listing order', () => {
    expect(buildSelectionOptions(entries).map(o => o.label)).toEqual(['1 - Sproutling', '2 - Mr. Twig']);
  });

  it('should find the entry behind a label', () => {
    const options = buildSelectionOptions(entries);
    expect(findSelection(options, '2 - Mr. Twig')).toBe(entries[1]);
    expect(findSelection(options, '3 - Nobody')).toBeUndefined();
  });
});

describe('formatIdentifier', () => {
  it('should pad to three digits', () => {
    expect(formatIdentifier(1)).toBe('#001');
    expect(formatIdentifier(25)).toBe('#025');
    expect(formatIdentifier(151)).toBe('#151');
    expect(formatIdentifier(1010)).toBe('#1010');
  });

  it('should be empty for an unknown identifier', () => {
    expect(formatIdentifier(undefined)).toBe('');
  });
});

describe('formatMeasurement', () => {
  it('should keep one decimal on whole numbers', () => {
    expect(formatMeasurement(7, 'm')).toBe('7.0 m');
    expect(formatMeasurement(0, 'kg')).toBe('0.0 kg');
  });

  it('should print fractions as they are', () => {
    expect(formatMeasurement(0.7, 'm')).toBe('0.7 m');
    expect(formatMeasurement(6.9, 'kg')).toBe('6.9 kg');
  });

  it('should be undefined for an unknown value', () => {
    expect(formatMeasurement(undefined, 'm')).toBeUndefined();
  });
});

describe('metricBars', () => {
  it('should scale against the ceiling and clamp to one', () => {
    const bars = metricBars(new Map([['Hp', 51], ['Attack', 300], ['Defense', 0]]));

    expect(bars.map(b => b.name)).toEqual(['Hp', 'Attack', 'Defense']);
    expect(bars[0]?.ratio).toBeCloseTo(0.2);
    expect(bars[1]?.ratio).toBe(1);
    expect(bars[2]?.ratio).toBe(0);
  });

  it('should accept a custom ceiling', () => {
    expect(metricBars(new Map([['Speed', 50]]), 100)[0]?.ratio).toBe(0.5);
  });
});

describe('splitIntoColumns', () => {
  it('should alternate items between two columns', () => {
    expect(splitIntoColumns(['a', 'b', 'c', 'd', 'e'])).toEqual([['a', 'c', 'e'], ['b', 'd']]);
  });

  it('should support other column counts', () => {
    expect(splitIntoColumns([1, 2, 3, 4], 3)).toEqual([[1, 4], [2], [3]]);
    expect(splitIntoColumns([1, 2], 0)).toEqual([[1, 2]]);
  });
});

describe('describeCreature', () => {
  it('should degrade an unpopulated creature to its name', () => {
    const view = describeCreature(createCreature({ name: 'sproutling', reference: detailUrl(1) }));

    expect(view).toEqual({
      title: 'Sproutling',
      imageUrl: undefined,
      imageCaption: 'Sproutling',
      rows: [],
      metricColumns: [],
    });
  });

  it('should describe a populated creature', () => {
    const creature = createCreature({ name: 'sproutling', reference: detailUrl(1) });
    creature.applyDetails(buildDetails(detailPayload()).details);

    const view = describeCreature(creature);

    expect(view.title).toBe('Sproutling #001');
    expect(view.imageUrl).toBe('https://img.example.test/artwork/1.png');
    expect(view.rows).toEqual([
      { label: 'Type', value: 'Grass, Poison' },
      { label: 'Height', value: '0.7 m' },
      { label: 'Weight', value: '6.9 kg' },
      { label: 'Abilities', value: 'Overgrow, Leaf-guard' },
    ]);
    expect(view.metricColumns.map(column => column.map(bar => bar.name))).toEqual([
      ['Hp', 'Special Attack'],
      ['Attack'],
    ]);
  });
});

describe('joinNames', () => {
  it('should join with commas', () => {
    expect(joinNames(['Grass', 'Poison'])).toBe('Grass, Poison');
    expect(joinNames([])).toBe('');
  });
});
