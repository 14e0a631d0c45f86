import type { LoadingView, LoadingViewChange } from '@loading-kit/core';
import {
  type AnimationDescription,
  GradientLayer,
  type Layer,
  type Rect,
  ReplicatorLayer,
  ShapeLayer,
  toSvgPathData,
} from '@loading-kit/layers';
import { linearGradient, toWebAnimations, type WebAnimation } from './keyframes.js';
import { logger } from './logger.js';

const SVG_NS = 'http://www.w3.org/2000/svg';

/** The part of a Web Animation the host keeps a handle on */
export type PlayedAnimation = Pick<Animation, 'cancel'>;

export type PlayAnimation = (element: HTMLElement, animation: WebAnimation) => PlayedAnimation;

export interface DomHostOptions {
  /** Plays one animation; defaults to `Element.animate` */
  play?: PlayAnimation;
  /** Follow the container's size with a `ResizeObserver` when one exists */
  observeResize?: boolean;
}

interface RunningAnimation {
  description: AnimationDescription;
  handles: PlayedAnimation[];
}

/** One rendered copy of a layer */
interface MountedLayer {
  readonly layer: Layer;
  readonly instance: number;
  readonly element: HTMLElement;
  readonly shape: { svg: SVGSVGElement; path: SVGPathElement } | null;
  delay: number;
  children: MountedLayer[];
  readonly running: Map<string, RunningAnimation>;
}

function px(value: number): string {
  return `${value}px`;
}

/**
 * Renders a `LoadingView` into a DOM element.
 *
 * Every layer becomes an absolutely positioned element; shape layers carry an
 * inline SVG, and sublayers of a replicator are rendered once per copy with
 * staggered start delays. Animations attached to a layer are played through
 * the Web Animations API and cancelled when the view detaches them.
 *
 * @example
 * ```typescript
 * const view = new LoadingView(RingMode);
 * const host = new DomHost(view, document.querySelector('#spinner'));
 * view.startAnimating();
 * // later
 * host.detach();
 * ```
 */
export class DomHost<TStyle extends object> {
  readonly element: HTMLElement;

  private readonly document: Document;
  private readonly play: PlayAnimation | null;
  private readonly root: MountedLayer;
  private readonly unsubscribe: () => void;
  private resizeObserver: ResizeObserver | null = null;
  private warnedNoAnimate = false;

  constructor(
    readonly view: LoadingView<TStyle>,
    readonly container: HTMLElement,
    options: DomHostOptions = {}
  ) {
    this.document = container.ownerDocument;
    this.play = options.play ?? this.defaultPlay();
    this.root = this.mount(view.layer, 0, 0);
    this.element = this.root.element;
    this.element.style.position = 'relative';
    this.element.dataset.mode = view.mode.name;
    container.appendChild(this.element);

    this.unsubscribe = view.onChange((change) => this.handleChange(change));
    if (options.observeResize ?? true) this.observeResize();

    view.layoutIfNeeded();
    this.render();
    this.applyAccessibility();
  }

  /** Sync elements and animations with the current layer tree */
  render(): void {
    this.paint(this.root, this.view.bounds);
  }

  /** Stop following the view, cancel its animations and remove its elements */
  detach(): void {
    this.unsubscribe();
    this.resizeObserver?.disconnect();
    this.resizeObserver = null;
    this.unmount(this.root);
  }

  private handleChange(change: LoadingViewChange): void {
    switch (change) {
      case 'needsLayout':
        this.view.layoutIfNeeded();
        return;
      case 'layout':
      case 'animation':
        this.render();
        return;
      case 'accessibility':
        this.applyAccessibility();
        return;
    }
  }

  private applyAccessibility(): void {
    const { isElement, label } = this.view.accessibility;
    if (!isElement) {
      for (const name of ['role', 'aria-label', 'aria-live']) this.element.removeAttribute(name);
      return;
    }
    this.element.setAttribute('role', 'status');
    this.element.setAttribute('aria-live', 'polite');
    if (label) this.element.setAttribute('aria-label', label);
  }

  private observeResize(): void {
    if (typeof ResizeObserver === 'undefined') return;
    this.resizeObserver = new ResizeObserver((entries) => {
      for (const entry of entries) {
        const { width, height } = entry.contentRect;
        this.view.setBounds({ x: 0, y: 0, width, height });
      }
    });
    this.resizeObserver.observe(this.container);
  }

  private defaultPlay(): PlayAnimation | null {
    const view = this.document.defaultView;
    if (!view || typeof view.Element.prototype.animate !== 'function') return null;
    return (element, { keyframes, options }) => element.animate(keyframes, options);
  }

  private mount(layer: Layer, instance: number, delay: number): MountedLayer {
    const element = this.document.createElement('div');
    element.dataset.layer = layer.name;
    element.style.position = 'absolute';
    element.style.boxSizing = 'border-box';

    let shape: MountedLayer['shape'] = null;
    if (layer instanceof ShapeLayer) {
      const svg = this.document.createElementNS(SVG_NS, 'svg');
      const path = this.document.createElementNS(SVG_NS, 'path');
      svg.style.overflow = 'visible';
      svg.appendChild(path);
      element.appendChild(svg);
      shape = { svg, path };
    }

    return { layer, instance, element, shape, delay, children: [], running: new Map() };
  }

  private unmount(mounted: MountedLayer): void {
    for (const child of mounted.children) this.unmount(child);
    for (const running of mounted.running.values()) this.cancel(running);
    mounted.running.clear();
    mounted.element.remove();
  }

  private paint(mounted: MountedLayer, frame: Rect): void {
    const { layer, element } = mounted;
    const style = element.style;

    style.left = px(frame.x);
    style.top = px(frame.y);
    style.width = px(frame.width);
    style.height = px(frame.height);
    style.opacity = String(layer.opacity);
    style.backgroundColor = layer.backgroundColor ?? '';
    style.borderRadius = layer.cornerRadius > 0 ? px(layer.cornerRadius) : '';

    if (layer instanceof GradientLayer) {
      style.backgroundImage = linearGradient(layer.colors, layer.locations, layer.startPoint, layer.endPoint);
    }
    if (layer instanceof ShapeLayer) this.paintShape(mounted, layer, frame);

    const mask = layer.mask;
    if (mask instanceof ShapeLayer && mask.path) {
      style.setProperty('clip-path', `path('${toSvgPathData(mask.path)}')`);
    } else {
      style.removeProperty('clip-path');
    }

    this.paintChildren(mounted);
    this.syncAnimations(mounted);
  }

  private paintShape(mounted: MountedLayer, layer: ShapeLayer, frame: Rect): void {
    if (!mounted.shape) return;
    const { svg, path } = mounted.shape;

    svg.setAttribute('width', String(frame.width));
    svg.setAttribute('height', String(frame.height));
    path.setAttribute('d', layer.path ? toSvgPathData(layer.path) : '');
    path.setAttribute('fill', layer.fillColor ?? 'none');
    path.setAttribute('stroke', layer.strokeColor ?? 'none');
    path.setAttribute('stroke-width', String(layer.lineWidth));
    path.setAttribute('stroke-linecap', layer.lineCap);
  }

  private paintChildren(mounted: MountedLayer): void {
    const { layer } = mounted;
    const next: MountedLayer[] = [];
    const frames: Rect[] = [];

    for (const sublayer of layer.sublayers) {
      const copies = layer instanceof ReplicatorLayer ? layer.instanceFrames(sublayer) : [sublayer.frame];
      copies.forEach((frame, instance) => {
        const delay = mounted.delay + (layer instanceof ReplicatorLayer ? instance * layer.instanceDelay : 0);
        const existing = mounted.children.find((child) => child.layer === sublayer && child.instance === instance);
        const child = existing && existing.delay === delay ? existing : this.mount(sublayer, instance, delay);
        next.push(child);
        frames.push(frame);
      });
    }

    for (const child of mounted.children) {
      if (!next.includes(child)) this.unmount(child);
    }
    mounted.children = next;

    next.forEach((child, index) => {
      mounted.element.appendChild(child.element);
      const frame = frames[index];
      if (frame) this.paint(child, frame);
    });
  }

  private syncAnimations(mounted: MountedLayer): void {
    const { layer, running } = mounted;
    const keys = layer.animationKeys();

    for (const [key, current] of running) {
      if (!keys.includes(key)) {
        this.cancel(current);
        running.delete(key);
      }
    }

    for (const key of keys) {
      const description = layer.animation(key);
      if (!description || running.get(key)?.description === description) continue;

      const previous = running.get(key);
      if (previous) this.cancel(previous);
      running.set(key, { description, handles: this.start(mounted, key, description) });
    }
  }

  private start(mounted: MountedLayer, key: string, description: AnimationDescription): PlayedAnimation[] {
    if (!this.play) {
      if (!this.warnedNoAnimate) {
        logger.warn({ key }, 'Element.animate is unavailable; loading animation will not play');
        this.warnedNoAnimate = true;
      }
      return [];
    }

    const { layer, element, delay } = mounted;
    const gradient = layer instanceof GradientLayer ? layer : undefined;
    const play = this.play;
    return toWebAnimations(description, { key, delay, gradient }).map((animation) => play(element, animation));
  }

  private cancel(running: RunningAnimation): void {
    for (const handle of running.handles) handle.cancel();
  }
}
