import { Command } from 'commander';
import { getNamingManager } from '../naming/index.js';
import { formatStructureNames, isOutputFormat } from '../structures/output-formatter.js';
import { readStructureDocument } from '../structures/reader.js';
import { debugError } from '../utils/debug.js';
import { output } from '../utils/output.js';

export function createStructureCommand(): Command {
  return new Command('structure')
    .description('Resolve element names for a structure document (JSON)')
    .argument('<file>', 'Path to the structure document')
    .option('-f, --format <format>', 'Output format: text, json', 'text')
    .action(async (file: string, options: { format: string }) => {
      if (!isOutputFormat(options.format)) {
        output.error(`Error: Unknown format '${options.format}'`);
        output.error('Hint: Use one of: text, json');
        process.exitCode = 1;
        return;
      }

      try {
        const structure = await readStructureDocument(file);
        output.info(`Resolving ${structure.fields.length} field(s) of ${structure.name}...`);

        const names = getNamingManager().getStructureNames(structure);
        const formatted = formatStructureNames(names, options.format);

        output.result(formatted.content);
        process.exitCode = formatted.exitCode;
      } catch (error) {
        debugError('structure command failed', error);
        output.error(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`);
        process.exitCode = 1;
      }
    });
}
