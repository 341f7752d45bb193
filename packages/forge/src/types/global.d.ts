/**
 * Global declarations for the plugin registry.
 */
import type { Registry } from '../registry/registry.js';

declare global {
  /**
   * Process-wide default registry.
   *
   * Kept on globalThis so that a package bundled twice still registers into
   * and reads from a single instance.
   */
  var __KILN_REGISTRY__: Registry | undefined;
}

export {};
