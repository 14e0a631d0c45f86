import type { AnimationDescription } from './animation.js';
import { localBounds, type Point, type Rect, ZERO_RECT } from './geometry.js';
import type { Path } from './path.js';

/**
 * A node of the retained render tree.
 *
 * Frames are in the superlayer's coordinate space. Animations are attached
 * under string keys; adding under an existing key replaces the previous
 * description, the way a host engine treats a named animation slot.
 */
export class Layer {
  frame: Rect = { ...ZERO_RECT };
  opacity = 1;
  /** CSS colour, or null for transparent */
  backgroundColor: string | null = null;
  cornerRadius = 0;

  private _sublayers: Layer[] = [];
  private _superlayer: Layer | null = null;
  private _mask: Layer | null = null;
  private readonly animations = new Map<string, AnimationDescription>();

  constructor(readonly name = 'layer') {}

  get sublayers(): readonly Layer[] {
    return this._sublayers;
  }

  get superlayer(): Layer | null {
    return this._superlayer;
  }

  /** The layer's own coordinate space: its frame moved to the origin */
  get bounds(): Rect {
    return localBounds(this.frame);
  }

  /**
   * Alpha mask, drawn in this layer's coordinate space. A mask is never part
   * of the sublayer tree.
   */
  get mask(): Layer | null {
    return this._mask;
  }

  set mask(layer: Layer | null) {
    layer?.removeFromSuperlayer();
    this._mask = layer;
  }

  addSublayer(layer: Layer): void {
    if (layer === this || layer.isAncestorOf(this)) {
      throw new Error(`Cannot add layer "${layer.name}" beneath itself`);
    }
    layer.removeFromSuperlayer();
    this._sublayers.push(layer);
    layer._superlayer = this;
  }

  removeFromSuperlayer(): void {
    const parent = this._superlayer;
    if (!parent) return;
    parent._sublayers = parent._sublayers.filter((child) => child !== this);
    this._superlayer = null;
  }

  isAncestorOf(layer: Layer): boolean {
    for (let current = layer._superlayer; current; current = current._superlayer) {
      if (current === this) return true;
    }
    return false;
  }

  addAnimation(animation: AnimationDescription, key: string): void {
    this.animations.set(key, animation);
  }

  animation(key: string): AnimationDescription | undefined {
    return this.animations.get(key);
  }

  /** Returns whether an animation was attached under `key` */
  removeAnimation(key: string): boolean {
    return this.animations.delete(key);
  }

  removeAllAnimations(): void {
    this.animations.clear();
  }

  animationKeys(): string[] {
    return [...this.animations.keys()];
  }
}

/**
 * Draws each sublayer `instanceCount` times. Copy `i` is offset by
 * `i * instanceTranslation` and starts its animations `i * instanceDelay`
 * milliseconds later.
 */
export class ReplicatorLayer extends Layer {
  private _instanceCount = 1;
  private _instanceDelay = 0;
  instanceTranslation: Point = { x: 0, y: 0 };

  get instanceCount(): number {
    return this._instanceCount;
  }

  set instanceCount(count: number) {
    this._instanceCount = Number.isFinite(count) ? Math.max(0, Math.floor(count)) : 0;
  }

  get instanceDelay(): number {
    return this._instanceDelay;
  }

  set instanceDelay(delay: number) {
    this._instanceDelay = Number.isFinite(delay) ? Math.max(0, delay) : 0;
  }

  /** Frames of every copy of `sublayer`, in this layer's coordinate space */
  instanceFrames(sublayer: Layer): Rect[] {
    const frames: Rect[] = [];
    for (let i = 0; i < this._instanceCount; i++) {
      frames.push({
        ...sublayer.frame,
        x: sublayer.frame.x + i * this.instanceTranslation.x,
        y: sublayer.frame.y + i * this.instanceTranslation.y,
      });
    }
    return frames;
  }
}

export type LineCap = 'butt' | 'round' | 'square';

export class ShapeLayer extends Layer {
  path: Path | null = null;
  fillColor: string | null = null;
  strokeColor: string | null = null;
  lineWidth = 1;
  lineCap: LineCap = 'butt';
}

/**
 * Linear gradient across the layer. Points are in unit coordinates of the
 * layer's bounds; `locations` pairs with `colors` by index, and null spreads
 * the colours evenly.
 */
export class GradientLayer extends Layer {
  colors: string[] = [];
  locations: number[] | null = null;
  startPoint: Point = { x: 0.5, y: 0 };
  endPoint: Point = { x: 0.5, y: 1 };
}
