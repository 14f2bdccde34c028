import type { BridgeCoordinator } from './coordinator';

/**
 * The running bridge, shared with the HTTP route handlers.
 * Set once by the process entry point (and by route tests).
 */
let current: BridgeCoordinator | null = null;

export function setBridge(bridge: BridgeCoordinator | null): void {
  current = bridge;
}

export function getBridge(): BridgeCoordinator {
  if (!current) {
    throw new Error('Bridge is not running');
  }
  return current;
}
