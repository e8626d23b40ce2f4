import { describe, expect, it } from 'vitest';

import { LevelCatalog } from './schema';

const intro = {
  id: 'intro',
  source: 'levels/intro.ldtk',
  level: 'Level_0',
  collisionLayer: 'Collision',
  triggerLayer: 'Triggers',
  start: { x: 32, y: 48 },
  next: 'ascent',
};

const ascent = {
  id: 'ascent',
  source: 'levels/ascent.ldtk',
  level: 'Level_0',
  collisionLayer: 'Collision',
  start: { x: 16, y: 16 },
};

describe('LevelCatalog', () => {
  it('accepts a catalog whose references resolve', () => {
    const catalog = LevelCatalog.parse({ start: 'intro', levels: [intro, ascent] });
    expect(catalog.levels.map((level) => level.id)).toEqual(['intro', 'ascent']);
    expect(catalog.levels[1].triggerLayer).toBeUndefined();
  });

  it('rejects an unknown start level', () => {
    const result = LevelCatalog.safeParse({ start: 'finale', levels: [intro, ascent] });
    expect(result.success).toBe(false);
    expect(result.error?.issues[0].path).toEqual(['start']);
  });

  it('rejects a dangling next reference', () => {
    const result = LevelCatalog.safeParse({ start: 'intro', levels: [intro] });
    expect(result.success).toBe(false);
    expect(result.error?.issues[0].message).toBe('Next level "ascent" is not in the catalog');
  });

  it('rejects duplicate ids', () => {
    const result = LevelCatalog.safeParse({ start: 'ascent', levels: [ascent, ascent] });
    expect(result.success).toBe(false);
    expect(result.error?.issues[0].path).toEqual(['levels', 1, 'id']);
  });

  it('requires a collision layer name', () => {
    const result = LevelCatalog.safeParse({ start: 'ascent', levels: [{ ...ascent, collisionLayer: '' }] });
    expect(result.success).toBe(false);
  });
});
