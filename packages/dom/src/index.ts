/**
 * @loading-kit/dom - renders loading views into the DOM and plays their
 * animations through the Web Animations API.
 *
 * @module
 */

export { DomHost, type DomHostOptions, type PlayAnimation, type PlayedAnimation } from './dom-host.js';
export {
  GRADIENT_SAMPLES,
  gradientAngle,
  linearGradient,
  toWebAnimations,
  type WebAnimation,
  type WebAnimationContext,
} from './keyframes.js';
