/**
 * @fileoverview macOS transport: Apple events through `osascript -l JavaScript`.
 */

import { resolveAssetPath } from './assets.js';
import { ProcessBridge, type DriverInvocation, type DriverMode, type ProcessBridgeOptions } from './process_bridge.js';

/** Application names tried in order, newest release first. */
export const DEFAULT_OSASCRIPT_TARGETS = [
  'Adobe InDesign 2026',
  'Adobe InDesign 2025',
  'Adobe InDesign 2024',
  'Adobe InDesign',
] as const;

export class OsascriptBridge extends ProcessBridge {
  readonly kind = 'osascript';

  constructor(options: Partial<ProcessBridgeOptions> = {}) {
    super({ targets: options.targets ?? DEFAULT_OSASCRIPT_TARGETS });
  }

  protected buildInvocation(target: string, mode: DriverMode, scriptPath?: string): DriverInvocation {
    const args = ['-l', 'JavaScript', resolveAssetPath('bridges', 'jxa_driver.js'), target, mode];
    if (scriptPath !== undefined) args.push(scriptPath);
    return { command: 'osascript', args };
  }
}
