import type { ExecServerConfig } from '../config/index.js';
import { OsascriptBridge } from './osascript_bridge.js';
import type { HostBridge } from './types.js';
import { WindowsScriptHostBridge } from './wsh_bridge.js';

/**
 * Pick the transport for `config.bridge`. `auto` chooses osascript on macOS
 * and Windows Script Host elsewhere; InDesign only ships for those two.
 */
export function createHostBridge(
  config: Pick<ExecServerConfig, 'bridge'>,
  platform: NodeJS.Platform = process.platform
): HostBridge {
  const kind = config.bridge.kind === 'auto' ? (platform === 'darwin' ? 'osascript' : 'wsh') : config.bridge.kind;
  const options = config.bridge.targets.length > 0 ? { targets: config.bridge.targets } : {};
  return kind === 'osascript' ? new OsascriptBridge(options) : new WindowsScriptHostBridge(options);
}
