import { describe, expect, it } from 'vitest';
import { classifyCompleteness, createSkeletonRecord, isEmptyFragment, mergeFragment } from '../src/merge.js';
import { FIXED_NOW } from './helpers.js';

describe('mergeFragment', () => {
  it('lets the later fragment win on conflicting stats and keeps the rest', () => {
    let record = createSkeletonRecord('Twin 127mm', 'destroyer_guns', FIXED_NOW);
    record = mergeFragment(record, { stats_numerical: { range: 5 } });
    record = mergeFragment(record, { stats_numerical: { range: 6, firepower: 10 } });

    expect(record.stats_numerical).toEqual({ range: 6, firepower: 10 });
  });

  it('ignores undefined fields in a fragment', () => {
    let record = createSkeletonRecord('Twin 127mm', 'destroyer_guns', FIXED_NOW);
    record = mergeFragment(record, { stats_qualitative_visual: { ammoType: 'HE' } });
    record = mergeFragment(record, { stats_qualitative_visual: { ammoType: undefined, damageType: 'Light' } });

    expect(record.stats_qualitative_visual).toEqual({ ammoType: 'HE', damageType: 'Light' });
  });

  it('applies identity overrides but never the name or category', () => {
    const record = createSkeletonRecord('Twin 127mm', 'destroyer_guns', FIXED_NOW);
    const fragment = JSON.parse(
      '{"identity": {"name": "Renamed", "category": "fighters", "id": 2100, "rarity": "Elite"}}'
    );

    const merged = mergeFragment(record, fragment);
    expect(merged.identity).toEqual({
      name: 'Twin 127mm',
      category: 'destroyer_guns',
      id: 2100,
      rarity: 'Elite'
    });
  });

  it('does not modify the accumulator it was given', () => {
    const record = createSkeletonRecord('Twin 127mm', 'destroyer_guns', FIXED_NOW);
    mergeFragment(record, { stats_numerical: { damage: 6 } });
    expect(record.stats_numerical).toEqual({});
  });
});

describe('classifyCompleteness', () => {
  const skeleton = () => createSkeletonRecord('Twin 127mm', 'destroyer_guns', FIXED_NOW);

  it('is basic when neither stats nor analysis are present', () => {
    const record = mergeFragment(skeleton(), { stats_qualitative_visual: { ammoType: 'HE' } });
    expect(classifyCompleteness(record)).toBe('basic');
  });

  it('is partial with stats only', () => {
    const record = mergeFragment(skeleton(), { stats_numerical: { damage: 6 } });
    expect(classifyCompleteness(record)).toBe('partial');
  });

  it('is complete with stats and analysis', () => {
    const record = mergeFragment(skeleton(), {
      stats_numerical: { damage: 6 },
      derived_analysis: { strengths: ['Fast reload'] }
    });
    expect(classifyCompleteness(record)).toBe('complete');
  });

  it('stays basic with analysis alone', () => {
    const record = mergeFragment(skeleton(), { derived_analysis: { notes: 'Early game filler' } });
    expect(classifyCompleteness(record)).toBe('basic');
  });
});

describe('isEmptyFragment', () => {
  it('is true when every section is missing or holds only undefined fields', () => {
    expect(isEmptyFragment({})).toBe(true);
    expect(isEmptyFragment({ source: {}, identity: { rarity: undefined } })).toBe(true);
  });

  it('is false once any section has a defined field', () => {
    expect(isEmptyFragment({ stats_qualitative_visual: { ammoType: 'HE' } })).toBe(false);
  });
});
