import { Command } from 'commander';
import { getNamingManager } from '../naming/index.js';
import { formatNameList } from '../structures/output-formatter.js';
import { output } from '../utils/output.js';

export function createElementCommand(): Command {
  return new Command('element')
    .description('Convert identifiers to element names (lowerCamelCase, "_" before leading digits)')
    .argument('<names...>', 'Structure, variant or field names, or tuple indices')
    .option('--json', 'Output in JSON format')
    .action((names: string[], options: { json?: boolean }) => {
      const naming = getNamingManager();
      const entries = names.map((name) => ({ name, result: naming.resolveElementName(name) }));

      const formatted = formatNameList(entries, options.json ? 'json' : 'text');
      output.result(formatted.content);
      output.debug(`${naming.cacheSize} name(s) cached`);
      process.exitCode = formatted.exitCode;
    });
}
