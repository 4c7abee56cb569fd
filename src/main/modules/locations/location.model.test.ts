import { describe, it, expect } from 'vitest';
import { LocationModel } from './location.model';
import type { Location } from '../../../@types/location';

const oldFaithful: Location = {
  id: 1,
  name: 'Old Faithful',
  category: 'Geyser',
  city: 'West Yellowstone',
  state: 'Wyoming',
  park: 'Yellowstone National Park',
  description: 'Erupts on a schedule.',
  imageName: 'oldfaithful',
  isCompleted: false
};

describe('LocationModel.decodeList', () => {
  it('decodes a valid list in file order', () => {
    const second = { ...oldFaithful, id: 7, name: 'Half Dome' };
    const result = LocationModel.decodeList(JSON.stringify([second, oldFaithful]));

    expect(result).toEqual({ ok: true, locations: [second, oldFaithful] });
  });

  it('decodes an empty array', () => {
    expect(LocationModel.decodeList('[]')).toEqual({ ok: true, locations: [] });
  });

  it('rejects malformed JSON', () => {
    const result = LocationModel.decodeList('[{"id": 1,');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toMatch(/^Invalid JSON: /);
    }
  });

  it('rejects a document that is not an array', () => {
    expect(LocationModel.decodeList(JSON.stringify(oldFaithful)).ok).toBe(false);
  });

  it('rejects a record with a missing field', () => {
    const { imageName: _imageName, ...partial } = oldFaithful;
    const result = LocationModel.decodeList(JSON.stringify([partial]));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toContain('0.imageName');
    }
  });

  it('rejects a record with an unknown field', () => {
    const result = LocationModel.decodeList(JSON.stringify([{ ...oldFaithful, rating: 5 }]));

    expect(result.ok).toBe(false);
  });

  it('rejects a non-integer id', () => {
    const result = LocationModel.decodeList(JSON.stringify([{ ...oldFaithful, id: 1.5 }]));

    expect(result.ok).toBe(false);
  });

  it('rejects an id beyond the safe integer range', () => {
    const result = LocationModel.decodeList(JSON.stringify([{ ...oldFaithful, id: Number.MAX_SAFE_INTEGER + 1 }]));

    expect(result.ok).toBe(false);
  });

  it('rejects a completion flag that is not a boolean', () => {
    const result = LocationModel.decodeList(JSON.stringify([{ ...oldFaithful, isCompleted: 1 }]));

    expect(result.ok).toBe(false);
  });

  it('rejects duplicate ids', () => {
    const result = LocationModel.decodeList(JSON.stringify([oldFaithful, { ...oldFaithful, name: 'Copy' }]));

    expect(result).toEqual({ ok: false, reason: '1.id: Duplicate location id 1' });
  });
});

describe('LocationModel.encodeList', () => {
  it('writes fields in canonical order regardless of input order', () => {
    const shuffled: Location = {
      isCompleted: true,
      imageName: 'oldfaithful',
      description: 'Erupts on a schedule.',
      park: 'Yellowstone National Park',
      state: 'Wyoming',
      city: 'West Yellowstone',
      category: 'Geyser',
      name: 'Old Faithful',
      id: 1
    };

    const encoded = LocationModel.encodeList([shuffled]);
    const parsed: unknown = JSON.parse(encoded);

    expect(Array.isArray(parsed)).toBe(true);
    if (Array.isArray(parsed)) {
      expect(Object.keys(parsed[0])).toEqual([
        'id', 'name', 'category', 'city', 'state', 'park', 'description', 'imageName', 'isCompleted'
      ]);
    }
  });

  it('pretty-prints with two spaces', () => {
    const encoded = LocationModel.encodeList([oldFaithful]);

    expect(encoded.split('\n')[2]).toBe('    "id": 1,');
  });
});

describe('LocationModel.toggled', () => {
  it('flips only the completion flag', () => {
    const toggled = LocationModel.toggled(oldFaithful);

    expect(toggled).toEqual({ ...oldFaithful, isCompleted: true });
    expect(oldFaithful.isCompleted).toBe(false);
  });
});

describe('LocationModel.validate', () => {
  it('accepts a complete record and rejects anything else', () => {
    expect(LocationModel.validate(oldFaithful)).toBe(true);
    expect(LocationModel.validate({ id: 1 })).toBe(false);
    expect(LocationModel.validate(null)).toBe(false);
  });
});
