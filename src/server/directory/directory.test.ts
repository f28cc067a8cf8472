import { describe, expect, it } from 'vitest';

import { Directory, parseDirectoryRows } from './directory';

const rows = [
  ['Office A', 'G1', 'pw1'],
  ['Office A', 'G2', 'pw2'],
  ['Office B', 'G1', '1234'],
  ['Office A', 'G1', 'second-row'],
];

describe('parseDirectoryRows', () => {
  it('keeps store order and pads a missing password', () => {
    expect(parseDirectoryRows([['Office A', 'G1'], ['Office B', 'G2', 'x']])).toEqual([
      { department: 'Office A', group: 'G1', secret: '' },
      { department: 'Office B', group: 'G2', secret: 'x' },
    ]);
  });

  it('skips rows without a department or group', () => {
    expect(parseDirectoryRows([['', 'G1', 'pw'], ['Office A', '', 'pw'], []])).toEqual([]);
  });
});

describe('Directory.authenticate', () => {
  const dir = new Directory(parseDirectoryRows(rows));

  it('accepts an exact three-field match', () => {
    expect(dir.authenticate('Office A', 'G1', 'pw1')).toBe(true);
  });

  it('rejects any single-field mismatch', () => {
    expect(dir.authenticate('Office B', 'G1', 'pw1')).toBe(false);
    expect(dir.authenticate('Office A', 'G3', 'pw1')).toBe(false);
    expect(dir.authenticate('Office A', 'G1', 'pw2')).toBe(false);
  });

  it('is case-sensitive and does not trim', () => {
    expect(dir.authenticate('office a', 'G1', 'pw1')).toBe(false);
    expect(dir.authenticate('Office A', 'G1', 'PW1')).toBe(false);
    expect(dir.authenticate('Office A', 'G1', ' pw1')).toBe(false);
  });

  it('never matches an empty secret against a stored one', () => {
    expect(dir.authenticate('Office A', 'G1', '')).toBe(false);
  });

  it('also matches a later duplicate row', () => {
    expect(dir.authenticate('Office A', 'G1', 'second-row')).toBe(true);
  });

  it('compares numeric-looking passwords as text', () => {
    expect(dir.authenticate('Office B', 'G1', '1234')).toBe(true);
    expect(dir.authenticate('Office B', 'G1', '01234')).toBe(false);
  });

  it('rejects everything when the directory is empty', () => {
    expect(new Directory([]).authenticate('Office A', 'G1', 'pw1')).toBe(false);
  });
});

describe('Directory pickers', () => {
  const dir = new Directory(parseDirectoryRows(rows));

  it('lists departments once, in first-seen order', () => {
    expect(dir.departments()).toEqual(['Office A', 'Office B']);
  });

  it('lists groups of a department in row order', () => {
    expect(dir.groupsIn('Office A')).toEqual(['G1', 'G2', 'G1']);
    expect(dir.groupsIn('Nowhere')).toEqual([]);
  });
});
