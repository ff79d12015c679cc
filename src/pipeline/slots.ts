import type { NarrationSet, Slot } from '../types.js';

/** Declared video order: intro, every scene, outro. */
export function buildSlots(sceneCount: number): Slot[] {
  return [
    { kind: 'intro' },
    ...Array.from({ length: sceneCount }, (_, index): Slot => ({ kind: 'scene', index })),
    { kind: 'outro' },
  ];
}

/** Stable label used in file names, logs and responses. */
export function slotKey(slot: Slot): string {
  return slot.kind === 'scene' ? `scene_${slot.index}` : slot.kind;
}

/** Multipart field that carries the caller's upload for this slot. */
export function formKey(slot: Slot): string {
  return slot.kind === 'scene' ? `media_${slot.index}` : `media_${slot.kind}`;
}

export function narrationFor(slot: Slot, narration: NarrationSet): string {
  switch (slot.kind) {
    case 'intro': return narration.intro;
    case 'outro': return narration.outro;
    case 'scene': return narration.items[slot.index] ?? '';
  }
}
