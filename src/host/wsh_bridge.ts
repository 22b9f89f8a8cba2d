/**
 * @fileoverview Windows transport: COM automation through Windows Script Host.
 *
 * `cscript //U` writes UTF-16LE, so the driver output is decoded as such.
 */

import { resolveAssetPath } from './assets.js';
import { ProcessBridge, type DriverInvocation, type DriverMode, type ProcessBridgeOptions } from './process_bridge.js';

/** COM ProgIDs tried in order; the unversioned one binds to whatever is registered last. */
export const DEFAULT_WSH_TARGETS = [
  'InDesign.Application.2026',
  'InDesign.Application.2025',
  'InDesign.Application.2024',
  'InDesign.Application',
] as const;

export class WindowsScriptHostBridge extends ProcessBridge {
  readonly kind = 'wsh';

  constructor(options: Partial<ProcessBridgeOptions> = {}) {
    super({ targets: options.targets ?? DEFAULT_WSH_TARGETS });
  }

  protected buildInvocation(target: string, mode: DriverMode, scriptPath?: string): DriverInvocation {
    const args = ['//nologo', '//U', '//E:JScript', resolveAssetPath('bridges', 'wsh_driver.js'), target, mode];
    if (scriptPath !== undefined) args.push(scriptPath);
    return { command: 'cscript', args, encoding: 'utf16le' };
  }
}
