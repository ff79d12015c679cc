import { buildSlots, formKey, narrationFor, slotKey } from './slots.js';

describe('buildSlots', () => {
  it('orders intro, scenes, outro', () => {
    expect(buildSlots(2).map(slotKey)).toEqual(['intro', 'scene_0', 'scene_1', 'outro']);
  });

  it('still has intro and outro with no scenes', () => {
    expect(buildSlots(0).map(slotKey)).toEqual(['intro', 'outro']);
  });
});

describe('formKey', () => {
  it('maps slots to upload fields', () => {
    expect(buildSlots(1).map(formKey)).toEqual(['media_intro', 'media_0', 'media_outro']);
  });
});

describe('narrationFor', () => {
  const narration = { intro: 'hello', items: ['first'], outro: 'bye' };

  it('picks the matching text', () => {
    expect(narrationFor({ kind: 'intro' }, narration)).toBe('hello');
    expect(narrationFor({ kind: 'scene', index: 0 }, narration)).toBe('first');
    expect(narrationFor({ kind: 'outro' }, narration)).toBe('bye');
  });

  it('returns an empty string for a scene without text', () => {
    expect(narrationFor({ kind: 'scene', index: 3 }, narration)).toBe('');
  });
});
