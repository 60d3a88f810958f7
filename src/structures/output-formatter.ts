/**
 * Output formatter for resolved names
 * Supports two output formats: text, json
 */

import type { ElementName, StructureNames } from '../naming/types.js';

export type OutputFormat = 'text' | 'json';

export interface FormattedOutput {
  content: string;
  exitCode: number;
}

export interface NameEntry {
  name: string;
  result: ElementName;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'text' || value === 'json';
}

/**
 * Format a list of converted names
 *
 * text: one `name -> element` line per entry
 * json: array of { name, element, unchanged }
 */
export function formatNameList(entries: readonly NameEntry[], format: OutputFormat): FormattedOutput {
  if (format === 'json') {
    const output = entries.map((entry) => ({
      name: entry.name,
      element: entry.result.value,
      unchanged: entry.result.kind === 'borrowed',
    }));
    return { content: JSON.stringify(output, null, 2), exitCode: 0 };
  }

  return {
    content: entries.map((entry) => `${entry.name} -> ${entry.result.value}`).join('\n'),
    exitCode: 0,
  };
}

/**
 * Format the resolved names of a structure
 */
export function formatStructureNames(names: StructureNames, format: OutputFormat): FormattedOutput {
  switch (format) {
    case 'json':
      return formatStructureAsJson(names);
    default:
      return formatStructureAsText(names);
  }
}

/**
 * Format as plain text (default)
 *
 * MyPlaylist -> myPlaylist
 *   track_list -> tracks (renamed)
 *   0 -> _0
 */
function formatStructureAsText(names: StructureNames): FormattedOutput {
  const lines = [`${names.name} -> ${names.element}`];

  for (const field of names.fields) {
    const suffix = field.source === 'rename' ? ' (renamed)' : '';
    lines.push(`  ${field.name} -> ${field.key}${suffix}`);
  }

  return {
    content: lines.join('\n'),
    exitCode: 0,
  };
}

function formatStructureAsJson(names: StructureNames): FormattedOutput {
  const output = {
    structure: names.name,
    element: names.element,
    fields: names.fields.map((field) => ({
      name: field.name,
      key: field.key,
      source: field.source,
    })),
  };

  return {
    content: JSON.stringify(output, null, 2),
    exitCode: 0,
  };
}
