import { Command } from 'commander';
import { createElementCommand } from './commands/element.js';
import { createKeyCommand } from './commands/key.js';
import { createStructureCommand } from './commands/structure.js';
import { output } from './utils/output.js';
import { VERSION } from './version.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('markup-names')
    .description('Element and attribute names for markup serialization')
    .version(VERSION)
    .option('-q, --quiet', 'Only print results and errors')
    .option('-v, --verbose', 'Print debug output')
    .addHelpText(
      'after',
      `
Examples:
  $ markup-names element MyPlaylist field_name 0     # myPlaylist, fieldName, _0
  $ markup-names key track_list --rename tracks     # tracks
  $ markup-names structure playlist.json --format json
`,
    );

  // CLI flags override MARKUP_NAMES_QUIET / MARKUP_NAMES_VERBOSE
  program.hook('preAction', (thisCommand) => {
    const flags = thisCommand.opts<{ quiet?: boolean; verbose?: boolean }>();
    if (flags.quiet) {
      output.setLevel('quiet');
    } else if (flags.verbose) {
      output.setLevel('verbose');
    }
  });

  program.addCommand(createElementCommand());
  program.addCommand(createKeyCommand());
  program.addCommand(createStructureCommand());

  return program;
}
