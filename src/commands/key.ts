import { Command } from 'commander';
import { getNamingManager } from '../naming/index.js';
import { output } from '../utils/output.js';

export function createKeyCommand(): Command {
  return new Command('key')
    .description('Resolve the element/attribute key for a field')
    .argument('<name>', 'Raw field name')
    .option('-r, --rename <text>', 'Explicit rename, used verbatim')
    .option('--json', 'Output in JSON format')
    .action((name: string, options: { rename?: string; json?: boolean }) => {
      const field = getNamingManager().getFieldKey({ name, rename: options.rename });

      if (options.json) {
        output.result(JSON.stringify(field, null, 2));
      } else {
        output.result(field.key);
      }
    });
}
