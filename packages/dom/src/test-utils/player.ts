import { vi } from 'vitest';
import type { PlayAnimation } from '../dom-host.js';

/** A `play` stand-in that records every animation and shares one `cancel` spy */
export function createPlayer() {
  const cancel = vi.fn();
  const play = vi.fn<PlayAnimation>(() => ({ cancel }));
  return { play, cancel };
}
