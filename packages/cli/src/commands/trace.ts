import { Command } from 'commander';
import { formatTrace } from '../output/formatter.js';
import { withSinew, withStoreOptions, type StoreOptions } from '../setup.js';

export const traceCommand = withStoreOptions(new Command('trace'))
  .description('View a persisted execution trace (needs logging.traceOutput: sqlite)')
  .argument('<trace-id>', 'Trace ID to view')
  .option('--json', 'Output as JSON')
  .action(async (traceId: string, options: StoreOptions & { json?: boolean }) => {
    await withSinew(options, async (sinew) => {
      const trace = sinew.tracer.loadTrace(traceId);
      if (!trace) {
        console.error(`Trace not found: ${traceId}`);
        process.exitCode = 1;
        return;
      }
      console.log(options.json ? JSON.stringify(trace, null, 2) : formatTrace(trace));
    });
  });
