/**
 * Default animation timings shared by the loading strategies.
 * All values are milliseconds.
 */

/** One scale/opacity pulse of a dot */
export const DOTS_PULSE_MS = 600;

/** One full turn of the ring */
export const RING_ROTATION_MS = 900;

/** One left-to-right sweep of the shimmer band */
export const SHIMMER_SWEEP_MS = 1200;

/** One up/down travel of a wave dot */
export const WAVE_TRAVEL_MS = 400;
