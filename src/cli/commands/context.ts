import type { ExecutionEnvelope } from '../../execution/envelope.js';
import type { HostBridge } from '../../host/types.js';
import type { Session } from '../../session/session.js';

/** What every one-off command runs against. */
export interface CommandContext {
  bridge: HostBridge;
  session: Session;
  envelope: ExecutionEnvelope;

  /** Print machine-readable JSON instead of text */
  json: boolean;
}
