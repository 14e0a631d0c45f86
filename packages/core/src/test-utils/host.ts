import { Layer, ReplicatorLayer } from '@loading-kit/layers';
import type { LayoutHost } from '../strategy.js';

export function createHost(width = 100, height = 40): LayoutHost {
  return { layer: new Layer('host'), bounds: { x: 0, y: 0, width, height } };
}

export function onlyReplicator(host: LayoutHost): ReplicatorLayer {
  const [replicator] = host.layer.sublayers;
  if (!(replicator instanceof ReplicatorLayer)) {
    throw new Error('Expected a replicator as the first sublayer');
  }
  return replicator;
}
