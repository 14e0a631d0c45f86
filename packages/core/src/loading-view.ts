import {
  type AnimationDescription,
  Layer,
  localBounds,
  type Rect,
  rectsEqual,
  type Size,
  ZERO_RECT,
} from '@loading-kit/layers';
import {
  type AccessibilityState,
  type AccessibilityTrait,
  DEFAULT_ANIMATION_KEY,
  isAnimating,
  type LoadingAnimatable,
  startAnimating,
  stopAnimating,
} from './loading-animatable.js';
import type { LoadingMode } from './loading-mode.js';
import { logger } from './logger.js';
import type { LayoutHost, Strategy } from './strategy.js';

export type LoadingViewChange = 'needsLayout' | 'layout' | 'animation' | 'accessibility';

export interface LoadingViewOptions<TStyle extends object> {
  /** Initial style; defaults to the mode's default style */
  style?: Readonly<TStyle>;
  bounds?: Rect;
  /** Key the running animation is attached under */
  animationKey?: string;
}

/**
 * A loading indicator bound to one mode.
 *
 * The style type follows from the mode, so a view created with `DotsMode`
 * only accepts dots styles:
 *
 * @example
 * ```typescript
 * const dots = new LoadingView(DotsMode);
 * dots.updateStyle({ color: 'seagreen', count: 4, size: 10 });
 * dots.sizeToFit();
 * dots.startAnimating();
 * ```
 *
 * Style changes are mirrored into the strategy immediately and request a
 * layout pass; the host runs the pass with `layoutIfNeeded()` and feeds size
 * changes through `setBounds()`.
 */
export class LoadingView<TStyle extends object> implements LoadingAnimatable, LayoutHost {
  readonly layer = new Layer('loading-view');
  readonly animationKey: string;
  accessibility: AccessibilityState = { isElement: false, label: null, traits: new Set<AccessibilityTrait>() };

  private readonly strategy: Strategy<TStyle>;
  private _style: Readonly<TStyle>;
  private _bounds: Rect;
  private needsLayout = true;
  private readonly changeHandlers = new Set<(change: LoadingViewChange) => void>();

  constructor(
    readonly mode: LoadingMode<TStyle>,
    options: LoadingViewOptions<TStyle> = {}
  ) {
    this.animationKey = options.animationKey ?? DEFAULT_ANIMATION_KEY;
    this._bounds = options.bounds ? localBounds(options.bounds) : { ...ZERO_RECT };
    this.layer.frame = { ...this._bounds };

    this.strategy = mode.makeStrategy();
    this._style = options.style ?? mode.defaultStyle;
    this.strategy.apply(this._style);
  }

  get style(): Readonly<TStyle> {
    return this._style;
  }

  /** Replaces the whole style. A running animation is re-described in place. */
  set style(style: Readonly<TStyle>) {
    this._style = style;
    this.strategy.apply(style);

    if (this.isAnimating) {
      this.animationHostLayer.addAnimation(this.makeAnimation(), this.animationKey);
      this.emit('animation');
    }
    this.setNeedsLayout();
  }

  /** Shallow-merges `patch` into the current style and assigns the result */
  updateStyle(patch: Partial<TStyle>): void {
    this.style = { ...this._style, ...patch };
  }

  /** Always at the origin: the view's own coordinate space */
  get bounds(): Rect {
    return this._bounds;
  }

  setBounds(rect: Rect): void {
    const next = localBounds(rect);
    if (rectsEqual(next, this._bounds)) return;
    this._bounds = next;
    this.layer.frame = { ...next };
    this.setNeedsLayout();
  }

  get intrinsicContentSize(): Size {
    return this.mode.intrinsicContentSize(this._style);
  }

  sizeToFit(): void {
    const { width, height } = this.intrinsicContentSize;
    this.setBounds({ x: 0, y: 0, width, height });
  }

  setNeedsLayout(): void {
    if (this.needsLayout) return;
    this.needsLayout = true;
    this.emit('needsLayout');
  }

  layoutIfNeeded(): void {
    if (this.needsLayout) this.layoutSubviews();
  }

  /** The layout pass. Hosts call this whenever the bounds change. */
  layoutSubviews(): void {
    this.needsLayout = false;
    this.strategy.layout(this);
    this.emit('layout');
  }

  get animationHostLayer(): Layer {
    return this.strategy.hostLayer(this);
  }

  buildLayersIfNeeded(): void {
    this.strategy.build(this);
    this.setNeedsLayout();
  }

  makeAnimation(): AnimationDescription {
    return this.strategy.makeAnimation(this);
  }

  get isAnimating(): boolean {
    return isAnimating(this);
  }

  startAnimating(): void {
    const wasAccessible = this.accessibility.isElement;
    if (!startAnimating(this)) return;

    logger.debug({ mode: this.mode.name, key: this.animationKey }, 'Started animating');
    this.emit('animation');
    if (!wasAccessible) this.emit('accessibility');
  }

  stopAnimating(): void {
    if (!stopAnimating(this)) return;

    logger.debug({ mode: this.mode.name, key: this.animationKey }, 'Stopped animating');
    this.emit('animation');
  }

  /**
   * Subscribe to changes a host needs to render.
   * @returns unsubscribe function
   */
  onChange(handler: (change: LoadingViewChange) => void): () => void {
    this.changeHandlers.add(handler);
    return () => {
      this.changeHandlers.delete(handler);
    };
  }

  private emit(change: LoadingViewChange): void {
    for (const handler of this.changeHandlers) {
      handler(change);
    }
  }
}
