import { getMetadataArgsStorage } from 'typeorm';
import { User, parseInterests, serializeInterests } from './user.entity';

describe('parseInterests', () => {
  it('should return an empty list for null or empty values', () => {
    expect(parseInterests(null)).toEqual([]);
    expect(parseInterests(undefined)).toEqual([]);
    expect(parseInterests('')).toEqual([]);
  });

  it('should split, trim and lowercase', () => {
    expect(parseInterests('AI, Robotics ,,future')).toEqual(['ai', 'robotics', 'future']);
  });
});

describe('serializeInterests', () => {
  it('should deduplicate and sort', () => {
    expect(serializeInterests(['future', 'Conference', 'future', ' explore '])).toBe('conference,explore,future');
  });

  it('should return null when nothing is left', () => {
    expect(serializeInterests([])).toBeNull();
    expect(serializeInterests(['  '])).toBeNull();
  });

  it('should accept any iterable', () => {
    expect(serializeInterests(new Set(['b', 'a']))).toBe('a,b');
  });
});

describe('User.interests column', () => {
  it('should be stored as unbounded text', () => {
    const column = getMetadataArgsStorage().columns.find(
      (args) => args.target === User && args.propertyName === 'interests',
    );

    expect(column?.options.type).toBe('text');
    expect(column?.options.length).toBeUndefined();
    expect(column?.options.nullable).toBe(true);
  });

  it('should hold more keywords than fit in 1024 characters', () => {
    const keywords = Array.from({ length: 200 }, (_, i) => `keyword${String(i).padStart(3, '0')}`);

    const serialized = serializeInterests(keywords);

    expect(serialized?.length).toBeGreaterThan(1024);
    expect(parseInterests(serialized)).toHaveLength(200);
  });
});
