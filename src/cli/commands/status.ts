import { printJson, printKeyValue } from '../output.js';
import type { CommandContext } from './context.js';

export async function statusCommand(context: CommandContext): Promise<void> {
  const status = await context.session.status();

  if (context.json) {
    printJson({ success: true, bridge: context.bridge.kind, ...status });
    return;
  }

  console.log('InDesign Status');
  console.log('===============\n');
  printKeyValue([
    { key: 'Bridge', value: context.bridge.kind },
    { key: 'Application', value: status.name },
    { key: 'Version', value: status.version },
    { key: 'Open documents', value: status.documentCount },
    { key: 'Active document', value: status.activeDocument ?? null },
  ]);
}
