import type { ToolSchema } from '../types.js';

type JsonSchema = Record<string, unknown>;

const obj = (properties: Record<string, JsonSchema>, required: string[] = []) => ({
  type: 'object',
  additionalProperties: false,
  properties,
  required,
});
const typed = (type: string, description?: string) => ({
  type,
  ...(description !== undefined && { description }),
});
const str = (description?: string) => typed('string', description);
const bool = (description?: string) => typed('boolean', description);

const SCHEMAS: ToolSchema[] = [
  {
    type: 'function',
    function: {
      name: 'read_file',
      description: 'Read the whole contents of a file.',
      parameters: obj({ path: str('File path, relative to the working directory') }, ['path']),
    },
  },
  {
    type: 'function',
    function: {
      name: 'list_files',
      description: 'List the immediate children of a directory. Directories end with "/".',
      parameters: obj({ path: str('Directory path (default ".")') }),
    },
  },
  {
    type: 'function',
    function: {
      name: 'bash_command',
      description:
        'Run a shell command with bash. Combined stdout and stderr are returned. Commands are killed after a timeout.',
      parameters: obj({ command: str() }, ['command']),
    },
  },
  {
    type: 'function',
    function: {
      name: 'edit_file',
      description:
        'Create or edit a file. To edit, pass oldString (text to find, copied from the file) and newString. ' +
        'To create, pass newString without oldString. To replace the whole file, pass content.',
      parameters: obj(
        {
          filePath: str('Path of the file to create or edit'),
          oldString: str('Text to replace; must identify one location unless replaceAll is set'),
          newString: str('Replacement text, or the contents of a new file'),
          replaceAll: bool('Replace every occurrence of oldString'),
          content: str('Full new contents (fallback for whole-file rewrites)'),
        },
        ['filePath']
      ),
    },
  },
  {
    type: 'function',
    function: {
      name: 'search_code',
      description: 'Search file contents recursively for a regex pattern. Returns path:line:text.',
      parameters: obj({ pattern: str(), directory: str('Directory to search (default ".")') }, [
        'pattern',
      ]),
    },
  },
  {
    type: 'function',
    function: {
      name: 'preview_edit',
      description: 'Show the diff that replacing a file with new content would produce, without writing.',
      parameters: obj({ path: str(), content: str() }, ['path', 'content']),
    },
  },
];

export function buildToolsSchema(): ToolSchema[] {
  return SCHEMAS;
}
